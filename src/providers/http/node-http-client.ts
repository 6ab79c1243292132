/**
 * HttpClient over Node's http / https modules.
 *
 * The connect timeout covers the socket; the total timeout covers the
 * whole exchange. The body is drained and discarded.
 */

import * as http from 'http';
import * as https from 'https';

import type { HttpClient, HttpRequestOptions } from '../interfaces/index.js';

export class NodeHttpClient implements HttpClient {
  async get(url: string, options: HttpRequestOptions): Promise<number> {
    const target = new URL(url);

    return new Promise((resolve, reject) => {
      let settled = false;
      const finish = (error: Error | null, statusCode?: number): void => {
        if (settled) return;
        settled = true;
        clearTimeout(totalTimer);
        if (error) {
          reject(error);
        } else {
          resolve(statusCode ?? 0);
        }
      };

      const requestOptions: http.RequestOptions = {
        method: 'GET',
        headers: { 'User-Agent': 'aistack-health-check' },
      };
      const onResponse = (res: http.IncomingMessage): void => {
        res.on('data', () => undefined);
        res.on('end', () => finish(null, res.statusCode));
        res.on('error', (e) => finish(e));
      };

      const req =
        target.protocol === 'https:'
          ? https.request(target, requestOptions, onResponse)
          : http.request(target, requestOptions, onResponse);

      const totalTimer = setTimeout(() => {
        req.destroy(new Error(`Request timed out after ${options.totalTimeoutMs}ms`));
      }, options.totalTimeoutMs);

      req.on('socket', (socket) => {
        if (socket.connecting) {
          const connectTimer = setTimeout(() => {
            req.destroy(new Error(`Connection timed out after ${options.connectTimeoutMs}ms`));
          }, options.connectTimeoutMs);
          socket.once('connect', () => clearTimeout(connectTimer));
          socket.once('close', () => clearTimeout(connectTimer));
        }
      });

      req.on('error', (e) => finish(e));
      req.end();
    });
  }
}
