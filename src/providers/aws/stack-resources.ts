/**
 * AWS Stack Resource Provider
 *
 * Finds a stack's resources by the Stack tag or by the <stack>-* naming
 * convention, and deletes them one at a time. Listing calls are retried;
 * deletions are not.
 *
 * IAM, CloudWatch and CloudFront resources are found by name only.
 */

import {
  CancelSpotInstanceRequestsCommand,
  DeleteKeyPairCommand,
  DeleteSecurityGroupCommand,
  DescribeKeyPairsCommand,
  DeleteVolumeCommand,
  DescribeNetworkInterfacesCommand,
  TerminateInstancesCommand,
  paginateDescribeInstances,
  paginateDescribeSecurityGroups,
  paginateDescribeSpotInstanceRequests,
  paginateDescribeVolumes,
  waitUntilInstanceTerminated,
  type Filter,
} from '@aws-sdk/client-ec2';
import {
  DeleteFileSystemCommand,
  DeleteMountTargetCommand,
  DescribeMountTargetsCommand,
  paginateDescribeFileSystems,
} from '@aws-sdk/client-efs';
import {
  DeleteInstanceProfileCommand,
  DeleteRoleCommand,
  DeleteRolePolicyCommand,
  DetachRolePolicyCommand,
  GetInstanceProfileCommand,
  ListAttachedRolePoliciesCommand,
  ListRolePoliciesCommand,
  RemoveRoleFromInstanceProfileCommand,
  paginateListInstanceProfiles,
  paginateListRoles,
} from '@aws-sdk/client-iam';
import {
  DeleteLoadBalancerCommand,
  DeleteTargetGroupCommand,
  DescribeTagsCommand,
  paginateDescribeLoadBalancers,
  paginateDescribeTargetGroups,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import {
  DeleteAlarmsCommand,
  DeleteDashboardsCommand,
  paginateDescribeAlarms,
  paginateListDashboards,
} from '@aws-sdk/client-cloudwatch';
import { DeleteLogGroupCommand, paginateDescribeLogGroups } from '@aws-sdk/client-cloudwatch-logs';
import {
  DeleteDistributionCommand,
  GetDistributionConfigCommand,
  ListDistributionsCommand,
  UpdateDistributionCommand,
} from '@aws-sdk/client-cloudfront';

import type { DiscoveredResource, DiscoveryStrategy, StackResourceType } from '../../types/index.js';
import type { DiscoverableResourceType, StackResourceProvider } from '../interfaces/index.js';
import { STACK_TAG } from '../../constants/tags.js';
import { ProviderApiError } from '../../utils/errors.js';
import { callOnce, getErrorCode, sleep as defaultSleep, withRetry, type RetryOptions } from '../../utils/retry.js';
import {
  findTag,
  getCloudFrontClient,
  getCloudWatchClient,
  getCloudWatchLogsClient,
  getEC2Client,
  getEFSClient,
  getELBClient,
  getIAMClient,
  matchesStackName,
  nameTagFilter,
  stackTagFilter,
} from './aws-helpers.js';

const LIVE_INSTANCE_STATES = ['pending', 'running', 'stopping', 'stopped'];
const LIVE_SPOT_REQUEST_STATES = ['open', 'active'];

/** ELB DescribeTags takes at most 20 ARNs */
const ELB_TAG_BATCH = 20;

export interface AwsStackResourceOptions extends RetryOptions {
  region: string;
  /** Prefix of the stack's CloudWatch log group (monitoring.log_group) */
  logGroupPrefix?: string;
  /** Polls while waiting for EFS mount targets to disappear (default 30, 10 s apart) */
  mountTargetWaitAttempts?: number;
  /** Seconds to wait for instance termination (default 600) */
  terminationWaitSeconds?: number;
}

async function collect<P, T>(pages: AsyncIterable<P>, pick: (page: P) => T[] | undefined): Promise<T[]> {
  const items: T[] = [];
  for await (const page of pages) {
    items.push(...(pick(page) ?? []));
  }
  return items;
}

export class AwsStackResourceProvider implements StackResourceProvider {
  private readonly region: string;
  private readonly logGroupPrefix: string;
  private readonly retry: RetryOptions;
  private readonly mountTargetWaitAttempts: number;
  private readonly terminationWaitSeconds: number;

  constructor(options: AwsStackResourceOptions) {
    this.region = options.region;
    this.logGroupPrefix = options.logGroupPrefix ?? '/aws/aistack';
    this.retry = { attempts: options.attempts, baseDelayMs: options.baseDelayMs, sleep: options.sleep, verbose: options.verbose };
    this.mountTargetWaitAttempts = options.mountTargetWaitAttempts ?? 30;
    this.terminationWaitSeconds = options.terminationWaitSeconds ?? 600;
  }

  // ============================================================
  // DISCOVERY
  // ============================================================

  async discover(
    resourceType: DiscoverableResourceType,
    stackName: string,
    strategy: DiscoveryStrategy
  ): Promise<DiscoveredResource[]> {
    return withRetry(`discover ${resourceType}`, () => this.discoverOnce(resourceType, stackName, strategy), this.retry);
  }

  private async discoverOnce(
    type: DiscoverableResourceType,
    stackName: string,
    strategy: DiscoveryStrategy
  ): Promise<DiscoveredResource[]> {
    const make = (resourceId: string, name?: string): DiscoveredResource => ({
      stackName,
      resourceType: type,
      resourceId,
      name,
    });
    const byName = strategy === 'name';

    switch (type) {
      case 'instance': {
        const filter = byName ? nameTagFilter(stackName) : stackTagFilter(stackName);
        const reservations = await collect(
          paginateDescribeInstances(
            { client: getEC2Client(this.region) },
            { Filters: [filter, { Name: 'instance-state-name', Values: LIVE_INSTANCE_STATES }] }
          ),
          (page) => page.Reservations
        );
        return reservations
          .flatMap((r) => r.Instances ?? [])
          .flatMap((i) => (i.InstanceId ? [make(i.InstanceId, findTag(i.Tags, 'Name'))] : []));
      }

      case 'spot-request': {
        const filter = byName ? nameTagFilter(stackName) : stackTagFilter(stackName);
        const requests = await collect(
          paginateDescribeSpotInstanceRequests(
            { client: getEC2Client(this.region) },
            { Filters: [filter, { Name: 'state', Values: LIVE_SPOT_REQUEST_STATES }] }
          ),
          (page) => page.SpotInstanceRequests
        );
        return requests.flatMap((r) => (r.SpotInstanceRequestId ? [make(r.SpotInstanceRequestId)] : []));
      }

      case 'security-group': {
        const filter: Filter = byName
          ? { Name: 'group-name', Values: [`${stackName}-*`] }
          : stackTagFilter(stackName);
        const groups = await collect(
          paginateDescribeSecurityGroups({ client: getEC2Client(this.region) }, { Filters: [filter] }),
          (page) => page.SecurityGroups
        );
        return groups
          .filter((g) => g.GroupName !== 'default')
          .flatMap((g) => (g.GroupId ? [make(g.GroupId, g.GroupName)] : []));
      }

      case 'volume': {
        const filter = byName ? nameTagFilter(stackName) : stackTagFilter(stackName);
        const volumes = await collect(
          paginateDescribeVolumes(
            { client: getEC2Client(this.region) },
            { Filters: [filter, { Name: 'status', Values: ['available'] }] }
          ),
          (page) => page.Volumes
        );
        return volumes.flatMap((v) => (v.VolumeId ? [make(v.VolumeId, findTag(v.Tags, 'Name'))] : []));
      }

      case 'key-pair': {
        const filter: Filter = byName ? { Name: 'key-name', Values: [`${stackName}-*`] } : stackTagFilter(stackName);
        const result = await getEC2Client(this.region).send(new DescribeKeyPairsCommand({ Filters: [filter] }));
        return (result.KeyPairs ?? []).flatMap((k) => (k.KeyPairId ? [make(k.KeyPairId, k.KeyName)] : []));
      }

      case 'load-balancer': {
        const balancers = await collect(
          paginateDescribeLoadBalancers({ client: getELBClient(this.region) }, {}),
          (page) => page.LoadBalancers
        );
        const candidates = balancers.flatMap((lb) =>
          lb.LoadBalancerArn ? [make(lb.LoadBalancerArn, lb.LoadBalancerName)] : []
        );
        return byName
          ? candidates.filter((c) => matchesStackName(c.name, stackName))
          : this.filterElbByStackTag(candidates, stackName);
      }

      case 'target-group': {
        const groups = await collect(
          paginateDescribeTargetGroups({ client: getELBClient(this.region) }, {}),
          (page) => page.TargetGroups
        );
        const candidates = groups.flatMap((tg) =>
          tg.TargetGroupArn ? [make(tg.TargetGroupArn, tg.TargetGroupName)] : []
        );
        return byName
          ? candidates.filter((c) => matchesStackName(c.name, stackName))
          : this.filterElbByStackTag(candidates, stackName);
      }

      case 'efs-filesystem': {
        const fileSystems = await collect(
          paginateDescribeFileSystems({ client: getEFSClient(this.region) }, {}),
          (page) => page.FileSystems
        );
        return fileSystems
          .filter((fs) =>
            byName ? matchesStackName(fs.Name, stackName) : findTag(fs.Tags, STACK_TAG) === stackName
          )
          .flatMap((fs) => (fs.FileSystemId ? [make(fs.FileSystemId, fs.Name)] : []));
      }

      case 'iam-role': {
        if (!byName) return [];
        const roles = await collect(paginateListRoles({ client: getIAMClient(this.region) }, {}), (page) => page.Roles);
        return roles
          .filter((r) => matchesStackName(r.RoleName, stackName))
          .flatMap((r) => (r.RoleName ? [make(r.RoleName, r.RoleName)] : []));
      }

      case 'instance-profile': {
        if (!byName) return [];
        const profiles = await collect(
          paginateListInstanceProfiles({ client: getIAMClient(this.region) }, {}),
          (page) => page.InstanceProfiles
        );
        return profiles
          .filter((p) => matchesStackName(p.InstanceProfileName, stackName))
          .flatMap((p) => (p.InstanceProfileName ? [make(p.InstanceProfileName, p.InstanceProfileName)] : []));
      }

      case 'alarm': {
        if (!byName) return [];
        const alarms = await collect(
          paginateDescribeAlarms({ client: getCloudWatchClient(this.region) }, { AlarmNamePrefix: `${stackName}-` }),
          (page) => page.MetricAlarms
        );
        return alarms.flatMap((a) => (a.AlarmName ? [make(a.AlarmName, a.AlarmName)] : []));
      }

      case 'dashboard': {
        if (!byName) return [];
        const dashboards = await collect(
          paginateListDashboards({ client: getCloudWatchClient(this.region) }, { DashboardNamePrefix: `${stackName}-` }),
          (page) => page.DashboardEntries
        );
        return dashboards.flatMap((d) => (d.DashboardName ? [make(d.DashboardName, d.DashboardName)] : []));
      }

      case 'log-group': {
        if (!byName) return [];
        const groups = await collect(
          paginateDescribeLogGroups(
            { client: getCloudWatchLogsClient(this.region) },
            { logGroupNamePrefix: this.logGroupPrefix }
          ),
          (page) => page.logGroups
        );
        return groups
          .filter((g) => matchesStackName(g.logGroupName?.split('/').pop(), stackName))
          .flatMap((g) => (g.logGroupName ? [make(g.logGroupName, g.logGroupName)] : []));
      }

      case 'cloudfront-distribution': {
        if (!byName) return [];
        return (await this.listDistributions())
          .filter((d) => matchesStackName(d.comment, stackName))
          .map((d) => make(d.id, d.comment));
      }
    }
  }

  private async filterElbByStackTag(candidates: DiscoveredResource[], stackName: string): Promise<DiscoveredResource[]> {
    const matching = new Set<string>();
    for (let i = 0; i < candidates.length; i += ELB_TAG_BATCH) {
      const batch = candidates.slice(i, i + ELB_TAG_BATCH).map((c) => c.resourceId);
      const result = await getELBClient(this.region).send(new DescribeTagsCommand({ ResourceArns: batch }));
      for (const description of result.TagDescriptions ?? []) {
        if (description.ResourceArn && findTag(description.Tags, STACK_TAG) === stackName) {
          matching.add(description.ResourceArn);
        }
      }
    }
    return candidates.filter((c) => matching.has(c.resourceId));
  }

  private async listDistributions(): Promise<Array<{ id: string; comment: string }>> {
    const client = getCloudFrontClient();
    const distributions: Array<{ id: string; comment: string }> = [];
    let marker: string | undefined;
    do {
      const result = await client.send(new ListDistributionsCommand({ Marker: marker }));
      for (const item of result.DistributionList?.Items ?? []) {
        if (item.Id) distributions.push({ id: item.Id, comment: item.Comment ?? '' });
      }
      marker = result.DistributionList?.IsTruncated ? result.DistributionList.NextMarker : undefined;
    } while (marker);
    return distributions;
  }

  async listMountTargets(stackName: string, fileSystemId: string): Promise<DiscoveredResource[]> {
    const result = await withRetry(
      'DescribeMountTargets',
      () => getEFSClient(this.region).send(new DescribeMountTargetsCommand({ FileSystemId: fileSystemId })),
      this.retry
    );
    return (result.MountTargets ?? []).flatMap((mt) =>
      mt.MountTargetId
        ? [
            {
              stackName,
              resourceType: 'efs-mount-target' satisfies StackResourceType,
              resourceId: mt.MountTargetId,
              parentId: fileSystemId,
            },
          ]
        : []
    );
  }

  // ============================================================
  // DELETION
  // ============================================================

  async deleteResource(resource: DiscoveredResource): Promise<void> {
    const id = resource.resourceId;
    const operation = `delete ${resource.resourceType} ${id}`;

    await callOnce(operation, async () => {
      switch (resource.resourceType) {
        case 'instance':
          await getEC2Client(this.region).send(new TerminateInstancesCommand({ InstanceIds: [id] }));
          return;
        case 'spot-request':
          await getEC2Client(this.region).send(new CancelSpotInstanceRequestsCommand({ SpotInstanceRequestIds: [id] }));
          return;
        case 'cloudfront-distribution':
          await this.deleteDistribution(id);
          return;
        case 'load-balancer':
          await getELBClient(this.region).send(new DeleteLoadBalancerCommand({ LoadBalancerArn: id }));
          return;
        case 'target-group':
          await getELBClient(this.region).send(new DeleteTargetGroupCommand({ TargetGroupArn: id }));
          return;
        case 'security-group':
          await getEC2Client(this.region).send(new DeleteSecurityGroupCommand({ GroupId: id }));
          return;
        case 'volume':
          await getEC2Client(this.region).send(new DeleteVolumeCommand({ VolumeId: id }));
          return;
        case 'efs-mount-target':
          await getEFSClient(this.region).send(new DeleteMountTargetCommand({ MountTargetId: id }));
          return;
        case 'efs-filesystem':
          await getEFSClient(this.region).send(new DeleteFileSystemCommand({ FileSystemId: id }));
          return;
        case 'iam-role':
          await this.deleteRole(id);
          return;
        case 'instance-profile':
          await getIAMClient(this.region).send(new DeleteInstanceProfileCommand({ InstanceProfileName: id }));
          return;
        case 'alarm':
          await getCloudWatchClient(this.region).send(new DeleteAlarmsCommand({ AlarmNames: [id] }));
          return;
        case 'dashboard':
          await getCloudWatchClient(this.region).send(new DeleteDashboardsCommand({ DashboardNames: [id] }));
          return;
        case 'log-group':
          await getCloudWatchLogsClient(this.region).send(new DeleteLogGroupCommand({ logGroupName: id }));
          return;
        case 'key-pair':
          await getEC2Client(this.region).send(new DeleteKeyPairCommand({ KeyPairId: id }));
          return;
      }
    });
  }

  /**
   * Detach managed policies and delete inline ones, then delete the role
   */
  private async deleteRole(role: string): Promise<void> {
    const iam = getIAMClient(this.region);

    const attached = await iam.send(new ListAttachedRolePoliciesCommand({ RoleName: role }));
    for (const policy of attached.AttachedPolicies ?? []) {
      if (policy.PolicyArn) {
        await iam.send(new DetachRolePolicyCommand({ RoleName: role, PolicyArn: policy.PolicyArn }));
      }
    }

    const inline = await iam.send(new ListRolePoliciesCommand({ RoleName: role }));
    for (const policyName of inline.PolicyNames ?? []) {
      await iam.send(new DeleteRolePolicyCommand({ RoleName: role, PolicyName: policyName }));
    }

    await iam.send(new DeleteRoleCommand({ RoleName: role }));
  }

  /**
   * A distribution must be disabled and fully deployed before it can be
   * deleted. An enabled one is disabled and reported as pending.
   */
  private async deleteDistribution(id: string): Promise<void> {
    const client = getCloudFrontClient();
    const current = await client.send(new GetDistributionConfigCommand({ Id: id }));
    const config = current.DistributionConfig;
    if (!config) {
      throw new ProviderApiError('GetDistributionConfig', `Distribution ${id} has no configuration`);
    }

    if (config.Enabled) {
      await client.send(
        new UpdateDistributionCommand({ Id: id, IfMatch: current.ETag, DistributionConfig: { ...config, Enabled: false } })
      );
      throw new ProviderApiError(
        'DeleteDistribution',
        `Distribution ${id} disabled; run cleanup again once the change has deployed`
      );
    }

    await client.send(new DeleteDistributionCommand({ Id: id, IfMatch: current.ETag }));
  }

  // ============================================================
  // DEPENDENCY CHECKS AND WAITS
  // ============================================================

  async isSecurityGroupInUse(groupId: string): Promise<boolean> {
    const result = await withRetry(
      'DescribeNetworkInterfaces',
      () =>
        getEC2Client(this.region).send(
          new DescribeNetworkInterfacesCommand({ Filters: [{ Name: 'group-id', Values: [groupId] }] })
        ),
      this.retry
    );
    return (result.NetworkInterfaces?.length ?? 0) > 0;
  }

  async listInstanceProfileRoles(profileName: string): Promise<string[]> {
    const result = await withRetry(
      'GetInstanceProfile',
      async () => {
        try {
          return await getIAMClient(this.region).send(new GetInstanceProfileCommand({ InstanceProfileName: profileName }));
        } catch (e) {
          if (getErrorCode(e) === 'NoSuchEntityException') return null;
          throw e;
        }
      },
      this.retry
    );
    return (result?.InstanceProfile?.Roles ?? []).flatMap((r) => (r.RoleName ? [r.RoleName] : []));
  }

  async removeRoleFromInstanceProfile(profileName: string, role: string): Promise<void> {
    await callOnce('RemoveRoleFromInstanceProfile', () =>
      getIAMClient(this.region).send(
        new RemoveRoleFromInstanceProfileCommand({ InstanceProfileName: profileName, RoleName: role })
      )
    );
  }

  async waitForInstancesTerminated(instanceIds: string[]): Promise<void> {
    if (instanceIds.length === 0) return;
    await waitUntilInstanceTerminated(
      { client: getEC2Client(this.region), maxWaitTime: this.terminationWaitSeconds },
      { InstanceIds: instanceIds }
    );
  }

  async waitForMountTargetsDeleted(fileSystemId: string): Promise<void> {
    const wait = this.retry.sleep ?? defaultSleep;
    for (let attempt = 1; attempt <= this.mountTargetWaitAttempts; attempt++) {
      const remaining = await this.listMountTargets('', fileSystemId);
      if (remaining.length === 0) return;
      await wait(10000);
    }
    throw new ProviderApiError(
      'waitForMountTargetsDeleted',
      `Mount targets of ${fileSystemId} still present after ${this.mountTargetWaitAttempts} checks`
    );
  }
}
