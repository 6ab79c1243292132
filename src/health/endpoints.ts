/**
 * Service endpoints polled after a deployment
 */

import type { DeploymentConfiguration, HealthCheckOptions, ServiceEndpoint } from '../types/index.js';
import { servicePort, type ServiceName } from '../bootstrap/compose.js';
import { getNumber, getString } from '../utils/config-helpers.js';

/** Services with an HTTP health endpoint, and their default paths */
export const HEALTH_PATHS: Partial<Record<ServiceName, string>> = {
  n8n: '/healthz',
  ollama: '/api/tags',
  qdrant: '/healthz',
  crawl4ai: '/health',
};

export function buildServiceEndpoints(config: DeploymentConfiguration, host: string): ServiceEndpoint[] {
  const endpoints: ServiceEndpoint[] = [];
  for (const [service, defaultPath] of Object.entries(HEALTH_PATHS)) {
    if (!isServiceName(service) || defaultPath === undefined) continue;
    endpoints.push({
      serviceName: service,
      host,
      port: servicePort(config, service),
      path: getString(config, `services.${service}.health_path`, defaultPath),
      protocol: 'http',
    });
  }
  return endpoints;
}

function isServiceName(value: string): value is ServiceName {
  return value in HEALTH_PATHS;
}

export function endpointUrl(endpoint: ServiceEndpoint): string {
  const protocol = endpoint.protocol ?? 'http';
  return `${protocol}://${endpoint.host}:${endpoint.port}${endpoint.path}`;
}

/**
 * Polling options from the health.* keys
 */
export function healthOptionsFromConfig(config: DeploymentConfiguration): HealthCheckOptions {
  return {
    maxAttempts: getNumber(config, 'health.max_attempts', 10),
    intervalMs: getNumber(config, 'health.interval_seconds', 15) * 1000,
    connectTimeoutMs: getNumber(config, 'health.connect_timeout_seconds', 10) * 1000,
    totalTimeoutMs: getNumber(config, 'health.total_timeout_seconds', 15) * 1000,
  };
}
