/**
 * Health Check Types
 */

export type HealthStatus = 'healthy' | 'unhealthy' | 'unknown';

/**
 * One service endpoint to poll
 */
export interface ServiceEndpoint {
  serviceName: string;
  host: string;
  port: number;
  path: string;
  protocol?: 'http' | 'https';
}

/**
 * Result of polling one endpoint. Recomputed on every check, never persisted.
 */
export interface HealthCheckResult {
  serviceName: string;
  endpointPath: string;
  url: string;
  status: HealthStatus;
  lastCheckedAt: Date;
  attempts: number;
  statusCode?: number;
  error?: string;
}

/**
 * Polling options for checkHealth()
 */
export interface HealthCheckOptions {
  maxAttempts?: number;
  /** Base delay between attempts; attempt n waits intervalMs * n */
  intervalMs?: number;
  connectTimeoutMs?: number;
  totalTimeoutMs?: number;
  verbose?: boolean;
}
