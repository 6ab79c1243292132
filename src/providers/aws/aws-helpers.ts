/**
 * AWS Helper Utilities
 *
 * Shared functions for the AWS SDK v3 providers: region-cached clients,
 * stack tagging and filters, and naming conventions.
 */

import { EC2Client, _InstanceType, type Filter, type ResourceType, type Tag, type TagSpecification } from '@aws-sdk/client-ec2';
import { EFSClient } from '@aws-sdk/client-efs';
import { IAMClient } from '@aws-sdk/client-iam';
import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { ElasticLoadBalancingV2Client } from '@aws-sdk/client-elastic-load-balancing-v2';
import { CloudFrontClient } from '@aws-sdk/client-cloudfront';

import { CREATED_BY, STACK_TAG } from '../../constants/tags.js';

// ============================================================
// CLIENT FACTORIES — cached per region
// ============================================================

function cached<T>(cache: Map<string, T>, region: string, create: (region: string) => T): T {
  let client = cache.get(region);
  if (!client) {
    client = create(region);
    cache.set(region, client);
  }
  return client;
}

const ec2Clients = new Map<string, EC2Client>();
const efsClients = new Map<string, EFSClient>();
const iamClients = new Map<string, IAMClient>();
const cloudWatchClients = new Map<string, CloudWatchClient>();
const logsClients = new Map<string, CloudWatchLogsClient>();
const elbClients = new Map<string, ElasticLoadBalancingV2Client>();
const cloudFrontClients = new Map<string, CloudFrontClient>();

export function getEC2Client(region: string): EC2Client {
  return cached(ec2Clients, region, (r) => new EC2Client({ region: r }));
}

export function getEFSClient(region: string): EFSClient {
  return cached(efsClients, region, (r) => new EFSClient({ region: r }));
}

/** IAM is global; the region only selects the endpoint partition */
export function getIAMClient(region: string): IAMClient {
  return cached(iamClients, region, (r) => new IAMClient({ region: r }));
}

export function getCloudWatchClient(region: string): CloudWatchClient {
  return cached(cloudWatchClients, region, (r) => new CloudWatchClient({ region: r }));
}

export function getCloudWatchLogsClient(region: string): CloudWatchLogsClient {
  return cached(logsClients, region, (r) => new CloudWatchLogsClient({ region: r }));
}

export function getELBClient(region: string): ElasticLoadBalancingV2Client {
  return cached(elbClients, region, (r) => new ElasticLoadBalancingV2Client({ region: r }));
}

/** CloudFront is served from us-east-1 */
export function getCloudFrontClient(): CloudFrontClient {
  return cached(cloudFrontClients, 'us-east-1', (r) => new CloudFrontClient({ region: r }));
}

// ============================================================
// TAGGING HELPERS
// ============================================================

/**
 * Standard tags for every resource a stack creates
 */
export function buildTags(stackName: string, name: string = stackName, extraTags?: Record<string, string>): Tag[] {
  const tags: Tag[] = [
    { Key: 'Name', Value: name },
    { Key: STACK_TAG, Value: stackName },
    { Key: 'CreatedBy', Value: CREATED_BY },
  ];
  for (const [key, value] of Object.entries(extraTags ?? {})) {
    const existing = tags.find((t) => t.Key === key);
    if (existing) {
      existing.Value = value;
    } else {
      tags.push({ Key: key, Value: value });
    }
  }
  return tags;
}

export function toTagList(tags: Record<string, string>): Tag[] {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

/**
 * Build TagSpecification for resource creation
 */
export function tagSpec(resourceType: ResourceType, tags: Tag[]): TagSpecification {
  return { ResourceType: resourceType, Tags: tags };
}

/**
 * Filter on the Stack tag
 */
export function stackTagFilter(stackName: string): Filter {
  return { Name: `tag:${STACK_TAG}`, Values: [stackName] };
}

/**
 * Filter on the Name tag following the <stack>-* convention
 */
export function nameTagFilter(stackName: string): Filter {
  return { Name: 'tag:Name', Values: [stackName, `${stackName}-*`] };
}

/**
 * Read one tag from an SDK tag list (EC2, EFS and ELB share the shape)
 */
export function findTag(tags: Array<{ Key?: string; Value?: string }> | undefined, key: string): string | undefined {
  return tags?.find((t) => t.Key === key)?.Value;
}

// ============================================================
// NAMING
// ============================================================

/**
 * Resource names owned by a stack: the stack name itself or <stack>-*
 */
export function matchesStackName(name: string | undefined, stackName: string): boolean {
  return !!name && (name === stackName || name.startsWith(`${stackName}-`));
}

export function securityGroupName(stackName: string): string {
  return `${stackName}-sg`;
}

export function keyPairName(stackName: string): string {
  return `${stackName}-key`;
}

export function roleName(stackName: string): string {
  return `${stackName}-role`;
}

export function instanceProfileName(stackName: string): string {
  return `${stackName}-instance-profile`;
}

export function fileSystemName(stackName: string): string {
  return `${stackName}-efs`;
}

export function loadBalancerName(stackName: string): string {
  return `${stackName}-alb`;
}

export function targetGroupName(stackName: string): string {
  return `${stackName}-tg`;
}

export function logGroupName(prefix: string, stackName: string): string {
  return `${prefix.replace(/\/+$/, '')}/${stackName}`;
}

export function dashboardName(stackName: string): string {
  return `${stackName}-dashboard`;
}

// ============================================================
// SDK TYPE GUARDS
// ============================================================

const KNOWN_INSTANCE_TYPES: ReadonlySet<string> = new Set(Object.values(_InstanceType));

export function isInstanceType(value: string): value is _InstanceType {
  return KNOWN_INSTANCE_TYPES.has(value);
}

/**
 * Newest image by CreationDate
 */
export function pickLatestImage<T extends { ImageId?: string; CreationDate?: string }>(images: T[]): string | null {
  const sorted = [...images].sort((a, b) => (b.CreationDate ?? '').localeCompare(a.CreationDate ?? ''));
  return sorted[0]?.ImageId ?? null;
}
