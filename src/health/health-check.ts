/**
 * Health Checker
 *
 * Polls every service endpoint concurrently until it answers with a 2xx or
 * 3xx status or the attempts run out. Never throws: every endpoint ends up
 * healthy, unhealthy or unknown.
 */

import type { HealthCheckOptions, HealthCheckResult, ServiceEndpoint } from '../types/index.js';
import type { HttpClient } from '../providers/interfaces/index.js';
import { errorMessage } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/retry.js';
import { endpointUrl } from './endpoints.js';

const DEFAULTS = {
  maxAttempts: 10,
  intervalMs: 15000,
  connectTimeoutMs: 10000,
  totalTimeoutMs: 15000,
};

function isHealthyStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400;
}

async function checkEndpoint(
  endpoint: ServiceEndpoint,
  options: Required<Omit<HealthCheckOptions, 'verbose'>> & { verbose: boolean },
  httpClient: HttpClient,
  sleep: Sleep
): Promise<HealthCheckResult> {
  const url = endpointUrl(endpoint);
  const base = { serviceName: endpoint.serviceName, endpointPath: endpoint.path, url };

  if (!endpoint.host) {
    return { ...base, status: 'unknown', lastCheckedAt: new Date(), attempts: 0, error: 'No host to check' };
  }

  let statusCode: number | undefined;
  let error: string | undefined;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      statusCode = await httpClient.get(url, {
        connectTimeoutMs: options.connectTimeoutMs,
        totalTimeoutMs: options.totalTimeoutMs,
      });
      error = undefined;
      if (isHealthyStatus(statusCode)) {
        return { ...base, status: 'healthy', lastCheckedAt: new Date(), attempts: attempt, statusCode };
      }
      error = `HTTP ${statusCode}`;
    } catch (e) {
      statusCode = undefined;
      error = errorMessage(e);
    }

    if (options.verbose) {
      console.log(`   ${endpoint.serviceName} attempt ${attempt}/${options.maxAttempts}: ${error}`);
    }
    if (attempt < options.maxAttempts) {
      await sleep(options.intervalMs * attempt);
    }
  }

  return {
    ...base,
    status: 'unhealthy',
    lastCheckedAt: new Date(),
    attempts: options.maxAttempts,
    statusCode,
    error,
  };
}

/**
 * Check all endpoints concurrently
 */
export async function checkHealth(
  endpoints: ServiceEndpoint[],
  options: HealthCheckOptions,
  httpClient: HttpClient,
  sleep: Sleep = defaultSleep
): Promise<HealthCheckResult[]> {
  const resolved = {
    maxAttempts: Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts),
    intervalMs: options.intervalMs ?? DEFAULTS.intervalMs,
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULTS.connectTimeoutMs,
    totalTimeoutMs: options.totalTimeoutMs ?? DEFAULTS.totalTimeoutMs,
    verbose: options.verbose ?? false,
  };

  return Promise.all(endpoints.map((endpoint) => checkEndpoint(endpoint, resolved, httpClient, sleep)));
}

export function allHealthy(results: HealthCheckResult[]): boolean {
  return results.length > 0 && results.every((r) => r.status === 'healthy');
}

/**
 * Print one line per service
 */
export function printHealthResults(results: HealthCheckResult[]): void {
  console.log('\n🩺 Service health:');
  for (const result of results) {
    const prefix = result.status === 'healthy' ? '[OK]' : result.status === 'unknown' ? '[?]' : '[ERROR]';
    const detail = result.status === 'healthy' ? `${result.attempts} attempt(s)` : result.error ?? result.status;
    console.log(`   ${prefix} ${result.serviceName.padEnd(10)} ${result.url} (${detail})`);
  }
}
