/**
 * Resource Cleanup Engine
 *
 * Finds everything a stack left behind and deletes it in dependency order:
 *
 *   1. instances (terminate) and spot requests (cancel), wait for termination
 *   2. CloudFront distributions, load balancers, target groups
 *   3. security groups (skipped while still referenced)
 *   4. detached EBS volumes
 *   5. EFS mount targets, wait, EFS file systems
 *   6. IAM: roles out of instance profiles, roles, instance profiles
 *   7. CloudWatch alarms, dashboards, log groups
 *   8. the stack's EC2 key pair
 *
 * Each deletion stands alone: a failure is logged, counted and recorded in
 * the report, and the run carries on. cleanup() never throws for a
 * partial failure.
 */

import type {
  CleanupCategory,
  CleanupCounts,
  CleanupOptions,
  CleanupReport,
  DiscoveredResource,
  StackResourceType,
} from '../types/index.js';
import { CLEANUP_CATEGORIES } from '../types/index.js';
import type { DiscoverableResourceType, StackResourceProvider } from '../providers/interfaces/index.js';
import { MissingParameterError, errorMessage } from '../utils/errors.js';
import type { ConfirmPrompt } from '../utils/prompts.js';

/**
 * Deletion order
 */
export const DELETION_ORDER: readonly StackResourceType[] = [
  'instance',
  'spot-request',
  'cloudfront-distribution',
  'load-balancer',
  'target-group',
  'security-group',
  'volume',
  'efs-mount-target',
  'efs-filesystem',
  'iam-role',
  'instance-profile',
  'alarm',
  'dashboard',
  'log-group',
  'key-pair',
];

export const RESOURCE_CATEGORIES: Record<StackResourceType, CleanupCategory> = {
  instance: 'compute',
  'spot-request': 'compute',
  'cloudfront-distribution': 'network',
  'load-balancer': 'network',
  'target-group': 'network',
  'security-group': 'network',
  volume: 'storage',
  'efs-mount-target': 'storage',
  'efs-filesystem': 'storage',
  'iam-role': 'iam',
  'instance-profile': 'iam',
  alarm: 'monitoring',
  dashboard: 'monitoring',
  'log-group': 'monitoring',
  'key-pair': 'compute',
};

export type DiscoveredResources = Map<StackResourceType, DiscoveredResource[]>;

export interface CleanupEngineOptions {
  /** Asked once before the first deletion unless force is set */
  confirm?: ConfirmPrompt;
}

function emptyCounts(): CleanupCounts {
  return { deleted: 0, skipped: 0, failed: 0 };
}

/**
 * Resource types selected by a list of categories, in deletion order
 */
export function selectResourceTypes(categories?: CleanupCategory[]): StackResourceType[] {
  const selected = categories && categories.length > 0 ? categories : CLEANUP_CATEGORIES;
  return DELETION_ORDER.filter((type) => selected.includes(RESOURCE_CATEGORIES[type]));
}

/**
 * Tag matches first, then name matches not already seen
 */
export function mergeDiscovered(...lists: DiscoveredResource[][]): DiscoveredResource[] {
  const seen = new Set<string>();
  const merged: DiscoveredResource[] = [];
  for (const list of lists) {
    for (const resource of list) {
      if (seen.has(resource.resourceId)) continue;
      seen.add(resource.resourceId);
      merged.push(resource);
    }
  }
  return merged;
}

/**
 * Mutable report under construction
 */
class ReportBuilder {
  readonly report: CleanupReport;

  constructor(stackName: string, dryRun: boolean) {
    this.report = {
      stackName,
      dryRun,
      cancelled: false,
      counts: {},
      totals: emptyCounts(),
      failures: [],
    };
  }

  private bump(type: StackResourceType, field: keyof CleanupCounts): void {
    const counts = this.report.counts[type] ?? emptyCounts();
    counts[field] += 1;
    this.report.counts[type] = counts;
    this.report.totals[field] += 1;
  }

  deleted(type: StackResourceType): void {
    this.bump(type, 'deleted');
  }

  skipped(type: StackResourceType): void {
    this.bump(type, 'skipped');
  }

  failed(type: StackResourceType, resourceId: string, error: string): void {
    this.bump(type, 'failed');
    this.report.failures.push({ resourceType: type, resourceId, error });
  }
}

export class CleanupEngine {
  private readonly confirm?: ConfirmPrompt;

  constructor(
    private readonly provider: StackResourceProvider,
    options: CleanupEngineOptions = {}
  ) {
    this.confirm = options.confirm;
  }

  // ============================================================
  // DISCOVERY
  // ============================================================

  /**
   * Find the stack's resources of the given types. Every call with the same
   * provider state returns the same resources in the same order.
   */
  async discover(
    stackName: string,
    types: StackResourceType[],
    onError: (type: StackResourceType, error: string) => void = (): void => undefined
  ): Promise<DiscoveredResources> {
    const found: DiscoveredResources = new Map();

    for (const type of types) {
      if (type === 'efs-mount-target') continue;
      try {
        found.set(type, await this.discoverType(type, stackName));
      } catch (e) {
        onError(type, errorMessage(e));
        found.set(type, []);
      }
    }

    if (types.includes('efs-mount-target')) {
      const fileSystems = found.get('efs-filesystem') ?? (await this.discoverFileSystemsQuietly(stackName, onError));
      const mountTargets: DiscoveredResource[] = [];
      for (const fileSystem of fileSystems) {
        try {
          mountTargets.push(...(await this.provider.listMountTargets(stackName, fileSystem.resourceId)));
        } catch (e) {
          onError('efs-mount-target', errorMessage(e));
        }
      }
      found.set('efs-mount-target', mergeDiscovered(mountTargets));
    }

    return found;
  }

  private async discoverType(type: DiscoverableResourceType, stackName: string): Promise<DiscoveredResource[]> {
    const byTag = await this.provider.discover(type, stackName, 'tag');
    const byName = await this.provider.discover(type, stackName, 'name');
    return mergeDiscovered(byTag, byName);
  }

  private async discoverFileSystemsQuietly(
    stackName: string,
    onError: (type: StackResourceType, error: string) => void
  ): Promise<DiscoveredResource[]> {
    try {
      return await this.discoverType('efs-filesystem', stackName);
    } catch (e) {
      onError('efs-filesystem', errorMessage(e));
      return [];
    }
  }

  // ============================================================
  // CLEANUP
  // ============================================================

  /**
   * Delete every resource of the stack in the selected categories.
   *
   * @throws MissingParameterError when stackName is empty
   */
  async cleanup(stackName: string, options: CleanupOptions = {}): Promise<CleanupReport> {
    if (!stackName || !stackName.trim()) {
      throw new MissingParameterError('cleanup', ['stackName']);
    }

    const dryRun = options.dryRun ?? false;
    const builder = new ReportBuilder(stackName, dryRun);
    const types = selectResourceTypes(options.resourceTypes);

    console.log(`\n🧹 ${dryRun ? '[DRY RUN] ' : ''}Cleaning up stack: ${stackName}`);

    const discovered = await this.discover(stackName, types, (type, error) => {
      console.log(`[!] Could not list ${type} resources: ${error}`);
      builder.failed(type, '(discovery)', error);
    });

    const total = types.reduce((sum, type) => sum + (discovered.get(type)?.length ?? 0), 0);
    if (total === 0) {
      console.log('   No resources found');
      return builder.report;
    }

    if (dryRun) {
      for (const type of types) {
        for (const resource of discovered.get(type) ?? []) {
          console.log(`   Would delete ${type}: ${describe(resource)}`);
          builder.skipped(type);
        }
      }
      return builder.report;
    }

    if (!options.force && this.confirm) {
      const confirmed = await this.confirm(`This will delete ${total} resource(s) of stack ${stackName}.`);
      if (!confirmed) {
        console.log('Cleanup cancelled');
        builder.report.cancelled = true;
        return builder.report;
      }
    }

    const run = new CleanupRun(this.provider, discovered, builder, options.verbose ?? false);
    await run.execute(types);

    const { deleted, skipped, failed } = builder.report.totals;
    console.log(`\n${failed > 0 ? '[!]' : '[OK]'} Cleanup of ${stackName}: ${deleted} deleted, ${skipped} skipped, ${failed} failed`);

    return builder.report;
  }
}

function describe(resource: DiscoveredResource): string {
  return resource.name && resource.name !== resource.resourceId
    ? `${resource.name} (${resource.resourceId})`
    : resource.resourceId;
}

/**
 * One pass over the discovered resources
 */
class CleanupRun {
  constructor(
    private readonly provider: StackResourceProvider,
    private readonly discovered: DiscoveredResources,
    private readonly builder: ReportBuilder,
    private readonly verbose: boolean
  ) {}

  async execute(types: StackResourceType[]): Promise<void> {
    const selected = new Set(types);

    if (selected.has('instance')) {
      const terminated = await this.deleteAll('instance');
      if (terminated.length > 0) {
        await this.waitQuietly('instances to terminate', () => this.provider.waitForInstancesTerminated(terminated));
      }
    }
    if (selected.has('spot-request')) await this.deleteAll('spot-request');

    if (selected.has('cloudfront-distribution')) await this.deleteAll('cloudfront-distribution');
    if (selected.has('load-balancer')) await this.deleteAll('load-balancer');
    if (selected.has('target-group')) await this.deleteAll('target-group');
    if (selected.has('security-group')) await this.deleteSecurityGroups();

    if (selected.has('volume')) await this.deleteAll('volume');
    if (selected.has('efs-mount-target')) await this.deleteMountTargets();
    if (selected.has('efs-filesystem')) await this.deleteAll('efs-filesystem');

    if (selected.has('instance-profile')) await this.detachProfileRoles();
    if (selected.has('iam-role')) await this.deleteAll('iam-role');
    if (selected.has('instance-profile')) await this.deleteAll('instance-profile');

    if (selected.has('alarm')) await this.deleteAll('alarm');
    if (selected.has('dashboard')) await this.deleteAll('dashboard');
    if (selected.has('log-group')) await this.deleteAll('log-group');

    if (selected.has('key-pair')) await this.deleteAll('key-pair');
  }

  private resources(type: StackResourceType): DiscoveredResource[] {
    return this.discovered.get(type) ?? [];
  }

  /**
   * Delete every resource of a type; returns the IDs that were deleted
   */
  private async deleteAll(type: StackResourceType): Promise<string[]> {
    const deleted: string[] = [];
    for (const resource of this.resources(type)) {
      if (await this.deleteOne(resource)) {
        deleted.push(resource.resourceId);
      }
    }
    return deleted;
  }

  private async deleteOne(resource: DiscoveredResource): Promise<boolean> {
    try {
      await this.provider.deleteResource(resource);
      console.log(`   [OK] Deleted ${resource.resourceType}: ${describe(resource)}`);
      this.builder.deleted(resource.resourceType);
      return true;
    } catch (e) {
      const message = errorMessage(e);
      console.log(`   [ERROR] Failed to delete ${resource.resourceType} ${describe(resource)}: ${message}`);
      this.builder.failed(resource.resourceType, resource.resourceId, message);
      return false;
    }
  }

  private async deleteSecurityGroups(): Promise<void> {
    for (const group of this.resources('security-group')) {
      let inUse = false;
      try {
        inUse = await this.provider.isSecurityGroupInUse(group.resourceId);
      } catch (e) {
        if (this.verbose) {
          console.log(`   Could not check references to ${group.resourceId}: ${errorMessage(e)}`);
        }
      }

      if (inUse) {
        console.log(`   [!] Skipping security group ${describe(group)}: still referenced`);
        this.builder.skipped('security-group');
        continue;
      }
      await this.deleteOne(group);
    }
  }

  private async deleteMountTargets(): Promise<void> {
    const fileSystems = new Set<string>();
    for (const target of this.resources('efs-mount-target')) {
      if (await this.deleteOne(target)) {
        if (target.parentId) fileSystems.add(target.parentId);
      }
    }
    for (const fileSystemId of fileSystems) {
      await this.waitQuietly(`mount targets of ${fileSystemId} to be deleted`, () =>
        this.provider.waitForMountTargetsDeleted(fileSystemId)
      );
    }
  }

  private async detachProfileRoles(): Promise<void> {
    for (const profile of this.resources('instance-profile')) {
      const profileName = profile.name ?? profile.resourceId;
      try {
        const roles = await this.provider.listInstanceProfileRoles(profileName);
        for (const role of roles) {
          await this.provider.removeRoleFromInstanceProfile(profileName, role);
          if (this.verbose) {
            console.log(`   Removed role ${role} from ${profileName}`);
          }
        }
      } catch (e) {
        console.log(`   [!] Could not detach roles from ${profileName}: ${errorMessage(e)}`);
      }
    }
  }

  private async waitQuietly(what: string, wait: () => Promise<void>): Promise<void> {
    console.log(`   Waiting for ${what}...`);
    try {
      await wait();
    } catch (e) {
      console.log(`   [!] Gave up waiting for ${what}: ${errorMessage(e)}`);
    }
  }
}
