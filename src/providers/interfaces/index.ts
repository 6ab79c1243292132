export type { ComputeProvider } from './compute.js';
export type { DiscoverableResourceType, StackResourceProvider } from './stack-resources.js';
export type { HttpClient, HttpRequestOptions } from './http.js';
export type {
  DistributionSetup,
  InfrastructureProvider,
  LoadBalancerSetup,
  LoadBalancingProvider,
  MonitoringOptions,
  MonitoringProvider,
  MonitoringSetup,
  SecurityGroupSpec,
} from './infrastructure.js';
