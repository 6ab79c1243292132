/**
 * Stack Resource Provider Interface
 *
 * Discovery and deletion of the resources a stack leaves behind. Bound to
 * one region at construction.
 */

import type { DiscoveredResource, DiscoveryStrategy, StackResourceType } from '../../types/index.js';

/**
 * Types found through discover(); mount targets come from listMountTargets()
 */
export type DiscoverableResourceType = Exclude<StackResourceType, 'efs-mount-target'>;

export interface StackResourceProvider {
  /**
   * Resources of one type belonging to the stack.
   *
   * 'tag' matches Stack=<stackName>; 'name' matches the <stackName>-* naming
   * convention. A type that cannot be found one way returns [] for it.
   */
  discover(
    resourceType: DiscoverableResourceType,
    stackName: string,
    strategy: DiscoveryStrategy
  ): Promise<DiscoveredResource[]>;

  listMountTargets(stackName: string, fileSystemId: string): Promise<DiscoveredResource[]>;

  /**
   * Delete (or terminate, or cancel) one resource. IAM roles have their
   * policies detached first.
   */
  deleteResource(resource: DiscoveredResource): Promise<void>;

  isSecurityGroupInUse(groupId: string): Promise<boolean>;

  /**
   * Roles still attached to an instance profile
   */
  listInstanceProfileRoles(profileName: string): Promise<string[]>;

  removeRoleFromInstanceProfile(profileName: string, roleName: string): Promise<void>;

  waitForInstancesTerminated(instanceIds: string[]): Promise<void>;

  waitForMountTargetsDeleted(fileSystemId: string): Promise<void>;
}
