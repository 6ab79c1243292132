/**
 * Provider Registry
 *
 * Bundles the cloud and HTTP clients a deploy or cleanup run needs.
 * Commands build the AWS bundle; tests pass fakes in its place.
 */

import type {
  ComputeProvider,
  HttpClient,
  InfrastructureProvider,
  LoadBalancingProvider,
  MonitoringProvider,
  StackResourceProvider,
} from './interfaces/index.js';
import type { RetryOptions } from '../utils/retry.js';
import { AwsComputeProvider } from './aws/compute.js';
import { AwsInfrastructureProvider } from './aws/infrastructure.js';
import { AwsLoadBalancingProvider } from './aws/load-balancing.js';
import { AwsMonitoringProvider } from './aws/monitoring.js';
import { AwsStackResourceProvider } from './aws/stack-resources.js';
import { NodeHttpClient } from './http/node-http-client.js';

export type * from './interfaces/index.js';

export interface DeploymentProviders {
  compute: ComputeProvider;
  infrastructure: InfrastructureProvider;
  loadBalancing: LoadBalancingProvider;
  monitoring: MonitoringProvider;
  stackResources: StackResourceProvider;
  http: HttpClient;
}

export interface AwsProviderOptions extends RetryOptions {
  /** Prefix used when looking for the stack's log group during cleanup */
  logGroupPrefix?: string;
}

/**
 * AWS-backed providers bound to one region
 */
export function createAwsProviders(region: string, options: AwsProviderOptions = {}): DeploymentProviders {
  const { logGroupPrefix, ...retry } = options;
  return {
    compute: new AwsComputeProvider(retry),
    infrastructure: new AwsInfrastructureProvider({ region, ...retry }),
    loadBalancing: new AwsLoadBalancingProvider({ region, ...retry }),
    monitoring: new AwsMonitoringProvider(region),
    stackResources: new AwsStackResourceProvider({ region, logGroupPrefix, ...retry }),
    http: new NodeHttpClient(),
  };
}
