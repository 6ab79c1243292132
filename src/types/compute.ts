/**
 * Compute Types
 *
 * Spot pricing, launch requests and instance records.
 */

/**
 * Instance lifecycle states reported by the provider
 */
export type InstanceState =
  | 'pending'
  | 'running'
  | 'shutting-down'
  | 'terminated'
  | 'stopping'
  | 'stopped';

/**
 * Most recent spot price for one availability zone
 */
export interface SpotPriceQuote {
  availabilityZone: string;
  pricePerHour: number;
  timestamp: Date;
}

/**
 * Result of analyzeSpotPricing()
 */
export interface SpotPriceAnalysis {
  availabilityZone: string;
  price: number;
  quotes: SpotPriceQuote[];
}

/**
 * Where and at what bid a spot instance should be requested
 */
export interface SpotLaunchPlan {
  instanceType: string;
  availabilityZone: string;
  currentPrice: number;
  bidPrice: number;
  maxPrice: number;
  /** Every quote at or under maxPrice, cheapest first */
  rankedZones: SpotPriceQuote[];
}

/**
 * Machine image families the provisioner asks for
 */
export type ImageFamily = 'gpu-optimized' | 'ubuntu';

/**
 * Everything needed to submit one instance launch
 */
export interface InstanceRequest {
  stackName: string;
  instanceType: string;
  amiId: string;
  securityGroupId?: string;
  subnetId?: string;
  keyName?: string;
  iamProfile?: string;
  userDataScript?: string;
  tags: Record<string, string>;
  availabilityZone?: string;
  volumeSizeGb?: number;
}

/**
 * Spot request submitted through requestSpotInstance()
 */
export interface SpotInstanceRequest extends InstanceRequest {
  bidPrice: number;
  availabilityZone: string;
  requestType: 'one-time' | 'persistent';
}

/**
 * Spot request lifecycle as seen while polling
 */
export type SpotRequestState = 'open' | 'active' | 'closed' | 'cancelled' | 'failed';

export interface SpotRequestStatus {
  requestId: string;
  state: SpotRequestState;
  instanceId?: string;
  statusCode?: string;
}

/**
 * Instance as last described by the provider
 */
export interface InstanceRecord {
  instanceId: string;
  state: InstanceState;
  publicAddress: string | null;
  privateAddress?: string | null;
  availabilityZone?: string;
  spotRequestId?: string;
}

/**
 * Caller-supplied launch parameters shared by all variants
 */
export interface LaunchParameters {
  region: string;
  securityGroupId?: string;
  subnetId?: string;
  keyName?: string;
  iamProfile?: string;
  userDataScript?: string;
  environment?: string;
  tags?: Record<string, string>;
  /** Explicit image; skips the image lookup */
  amiId?: string;
  /** Root volume size; defaults by instance family */
  volumeSizeGb?: number;
}

/**
 * Extra parameters for spot launches
 */
export interface SpotLaunchParameters extends LaunchParameters {
  maxPrice: number;
  requestType?: 'one-time' | 'persistent';
  /** Try the next eligible zone when a request is not fulfilled */
  failover?: boolean;
}
