/**
 * Cleanup Types
 *
 * Types for stack resource discovery and teardown.
 */

/**
 * Every resource kind the cleanup engine knows how to delete
 */
export type StackResourceType =
  | 'instance'
  | 'spot-request'
  | 'cloudfront-distribution'
  | 'load-balancer'
  | 'target-group'
  | 'security-group'
  | 'volume'
  | 'efs-mount-target'
  | 'efs-filesystem'
  | 'iam-role'
  | 'instance-profile'
  | 'alarm'
  | 'dashboard'
  | 'log-group'
  | 'key-pair';

/**
 * Resource categories selectable from the CLI (--types)
 */
export type CleanupCategory = 'compute' | 'network' | 'storage' | 'iam' | 'monitoring';

export const CLEANUP_CATEGORIES: readonly CleanupCategory[] = [
  'compute',
  'network',
  'storage',
  'iam',
  'monitoring',
];

/**
 * How a resource was found
 */
export type DiscoveryStrategy = 'tag' | 'name';

/**
 * A resource that belongs to a stack
 */
export interface DiscoveredResource {
  stackName: string;
  resourceType: StackResourceType;
  resourceId: string;
  name?: string;
  /** Owning resource (EFS file system for a mount target) */
  parentId?: string;
}

/**
 * Options for CleanupEngine.cleanup()
 */
export interface CleanupOptions {
  dryRun?: boolean;
  force?: boolean;
  resourceTypes?: CleanupCategory[];
  verbose?: boolean;
}

/**
 * Per resource type counters
 */
export interface CleanupCounts {
  deleted: number;
  skipped: number;
  failed: number;
}

/**
 * A deletion that did not succeed
 */
export interface CleanupFailure {
  resourceType: StackResourceType;
  resourceId: string;
  error: string;
}

/**
 * Outcome of a cleanup run. Partial failure is reported here, not thrown.
 */
export interface CleanupReport {
  stackName: string;
  dryRun: boolean;
  cancelled: boolean;
  counts: Partial<Record<StackResourceType, CleanupCounts>>;
  totals: CleanupCounts;
  failures: CleanupFailure[];
}
