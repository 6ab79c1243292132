/**
 * HTTP client used by the health checker
 */

export interface HttpRequestOptions {
  connectTimeoutMs: number;
  totalTimeoutMs: number;
}

export interface HttpClient {
  /**
   * GET a URL and resolve with the response status code. Rejects on
   * connection errors and timeouts.
   */
  get(url: string, options: HttpRequestOptions): Promise<number>;
}
