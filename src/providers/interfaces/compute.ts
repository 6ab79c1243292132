/**
 * Compute Provider Interface
 *
 * Everything the spot analyzer and the instance provisioner need from the
 * cloud. The AWS implementation lives in providers/aws/compute.ts; tests
 * pass in-process fakes.
 */

import type {
  ImageFamily,
  InstanceRecord,
  InstanceRequest,
  SpotInstanceRequest,
  SpotPriceQuote,
  SpotRequestStatus,
} from '../../types/index.js';

export interface ComputeProvider {
  // ============================================================
  // READ CALLS (retried by the implementation)
  // ============================================================

  /**
   * Names of the available zones in a region
   */
  listAvailabilityZones(region: string): Promise<string[]>;

  /**
   * Most recent Linux/UNIX spot price for one zone, or null when the zone
   * has no price history for the type
   */
  getLatestSpotPrice(instanceType: string, availabilityZone: string, region: string): Promise<SpotPriceQuote | null>;

  /**
   * Newest image of a family, or null when none is visible
   */
  findImage(family: ImageFamily, region: string): Promise<string | null>;

  describeSpotRequest(requestId: string, region: string): Promise<SpotRequestStatus>;

  /**
   * Null when the instance is unknown to the provider
   */
  describeInstance(instanceId: string, region: string): Promise<InstanceRecord | null>;

  /**
   * A subnet of the default VPC in the zone, or null
   */
  findSubnetForAz(availabilityZone: string, region: string): Promise<string | null>;

  // ============================================================
  // MUTATING CALLS (never retried)
  // ============================================================

  /**
   * Launch one on-demand instance; returns its ID
   */
  runInstance(request: InstanceRequest, region: string): Promise<string>;

  /**
   * Submit a spot request; returns the request ID
   */
  requestSpotInstance(request: SpotInstanceRequest, region: string): Promise<string>;

  cancelSpotRequest(requestId: string, region: string): Promise<void>;

  tagResources(resourceIds: string[], tags: Record<string, string>, region: string): Promise<void>;
}
