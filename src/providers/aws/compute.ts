/**
 * AWS Compute Provider
 *
 * ComputeProvider over the EC2 API. Describe calls go through withRetry;
 * launches, spot requests, cancellations and tagging go through callOnce.
 */

import {
  CancelSpotInstanceRequestsCommand,
  CreateTagsCommand,
  DescribeAvailabilityZonesCommand,
  DescribeImagesCommand,
  DescribeInstancesCommand,
  DescribeSpotInstanceRequestsCommand,
  DescribeSpotPriceHistoryCommand,
  DescribeSubnetsCommand,
  RequestSpotInstancesCommand,
  RunInstancesCommand,
  type BlockDeviceMapping,
  type Instance,
  type _InstanceType,
} from '@aws-sdk/client-ec2';

import type {
  ImageFamily,
  InstanceRecord,
  InstanceRequest,
  InstanceState,
  SpotInstanceRequest,
  SpotPriceQuote,
  SpotRequestState,
  SpotRequestStatus,
} from '../../types/index.js';
import type { ComputeProvider } from '../interfaces/index.js';
import { ConfigurationError, ProviderApiError } from '../../utils/errors.js';
import { callOnce, getErrorCode, withRetry, type RetryOptions } from '../../utils/retry.js';
import { getEC2Client, isInstanceType, pickLatestImage, tagSpec, toTagList } from './aws-helpers.js';

/**
 * Image lookups per family
 */
const IMAGE_QUERIES: Record<ImageFamily, { owners: string[]; namePattern: string }> = {
  'gpu-optimized': {
    owners: ['amazon'],
    namePattern: 'Deep Learning Base OSS Nvidia Driver GPU AMI (Ubuntu 22.04)*',
  },
  ubuntu: {
    owners: ['099720109477'],
    namePattern: 'ubuntu/images/hvm-ssd/ubuntu-jammy-22.04-amd64-server-*',
  },
};

const INSTANCE_STATES: readonly InstanceState[] = [
  'pending',
  'running',
  'shutting-down',
  'terminated',
  'stopping',
  'stopped',
];

const SPOT_REQUEST_STATES: readonly SpotRequestState[] = ['open', 'active', 'closed', 'cancelled', 'failed'];

function toInstanceState(value: string | undefined): InstanceState {
  return INSTANCE_STATES.find((s) => s === value) ?? 'pending';
}

function toSpotRequestState(value: string | undefined): SpotRequestState {
  return SPOT_REQUEST_STATES.find((s) => s === value) ?? 'open';
}

function requireInstanceType(instanceType: string): _InstanceType {
  if (!isInstanceType(instanceType)) {
    throw new ConfigurationError(`Unknown EC2 instance type: ${instanceType}`, ['instance.type']);
  }
  return instanceType;
}

function encodeUserData(script: string | undefined): string | undefined {
  return script ? Buffer.from(script, 'utf8').toString('base64') : undefined;
}

function rootVolume(sizeGb: number | undefined): BlockDeviceMapping[] | undefined {
  if (!sizeGb) return undefined;
  return [
    {
      DeviceName: '/dev/sda1',
      Ebs: {
        VolumeSize: sizeGb,
        VolumeType: 'gp3',
        Encrypted: true,
        DeleteOnTermination: true,
      },
    },
  ];
}

export function toInstanceRecord(instance: Instance): InstanceRecord | null {
  if (!instance.InstanceId) return null;
  return {
    instanceId: instance.InstanceId,
    state: toInstanceState(instance.State?.Name),
    publicAddress: instance.PublicIpAddress ?? null,
    privateAddress: instance.PrivateIpAddress ?? null,
    availabilityZone: instance.Placement?.AvailabilityZone,
    spotRequestId: instance.SpotInstanceRequestId,
  };
}

export class AwsComputeProvider implements ComputeProvider {
  constructor(private readonly retry: RetryOptions = {}) {}

  // ============================================================
  // READ CALLS
  // ============================================================

  async listAvailabilityZones(region: string): Promise<string[]> {
    const result = await withRetry(
      'DescribeAvailabilityZones',
      () =>
        getEC2Client(region).send(
          new DescribeAvailabilityZonesCommand({
            Filters: [{ Name: 'state', Values: ['available'] }],
          })
        ),
      this.retry
    );
    return (result.AvailabilityZones ?? [])
      .map((zone) => zone.ZoneName)
      .filter((name): name is string => !!name)
      .sort();
  }

  async getLatestSpotPrice(
    instanceType: string,
    availabilityZone: string,
    region: string
  ): Promise<SpotPriceQuote | null> {
    const type = requireInstanceType(instanceType);
    const result = await withRetry(
      'DescribeSpotPriceHistory',
      () =>
        getEC2Client(region).send(
          new DescribeSpotPriceHistoryCommand({
            InstanceTypes: [type],
            AvailabilityZone: availabilityZone,
            ProductDescriptions: ['Linux/UNIX'],
            StartTime: new Date(),
          })
        ),
      this.retry
    );

    let latest: SpotPriceQuote | null = null;
    for (const entry of result.SpotPriceHistory ?? []) {
      const price = Number(entry.SpotPrice);
      if (!entry.SpotPrice || Number.isNaN(price)) continue;
      const timestamp = entry.Timestamp ?? new Date(0);
      if (!latest || timestamp > latest.timestamp) {
        latest = { availabilityZone: entry.AvailabilityZone ?? availabilityZone, pricePerHour: price, timestamp };
      }
    }
    return latest;
  }

  async findImage(family: ImageFamily, region: string): Promise<string | null> {
    const query = IMAGE_QUERIES[family];
    const result = await withRetry(
      'DescribeImages',
      () =>
        getEC2Client(region).send(
          new DescribeImagesCommand({
            Owners: query.owners,
            Filters: [
              { Name: 'name', Values: [query.namePattern] },
              { Name: 'state', Values: ['available'] },
              { Name: 'architecture', Values: ['x86_64'] },
            ],
          })
        ),
      this.retry
    );
    return pickLatestImage(result.Images ?? []);
  }

  async describeSpotRequest(requestId: string, region: string): Promise<SpotRequestStatus> {
    const result = await withRetry(
      'DescribeSpotInstanceRequests',
      () =>
        getEC2Client(region).send(
          new DescribeSpotInstanceRequestsCommand({ SpotInstanceRequestIds: [requestId] })
        ),
      this.retry
    );

    const request = result.SpotInstanceRequests?.[0];
    if (!request) {
      throw new ProviderApiError('DescribeSpotInstanceRequests', `Spot request ${requestId} not found`);
    }
    return {
      requestId,
      state: toSpotRequestState(request.State),
      instanceId: request.InstanceId,
      statusCode: request.Status?.Code,
    };
  }

  async describeInstance(instanceId: string, region: string): Promise<InstanceRecord | null> {
    const instance = await withRetry(
      'DescribeInstances',
      async () => {
        try {
          const result = await getEC2Client(region).send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
          return result.Reservations?.[0]?.Instances?.[0] ?? null;
        } catch (e) {
          // New instances can take a moment to become visible
          if (getErrorCode(e) === 'InvalidInstanceID.NotFound') return null;
          throw e;
        }
      },
      this.retry
    );
    return instance ? toInstanceRecord(instance) : null;
  }

  async findSubnetForAz(availabilityZone: string, region: string): Promise<string | null> {
    const result = await withRetry(
      'DescribeSubnets',
      () =>
        getEC2Client(region).send(
          new DescribeSubnetsCommand({
            Filters: [
              { Name: 'availability-zone', Values: [availabilityZone] },
              { Name: 'default-for-az', Values: ['true'] },
            ],
          })
        ),
      this.retry
    );
    return result.Subnets?.[0]?.SubnetId ?? null;
  }

  // ============================================================
  // MUTATING CALLS
  // ============================================================

  async runInstance(request: InstanceRequest, region: string): Promise<string> {
    const instanceType = requireInstanceType(request.instanceType);
    const tags = toTagList(request.tags);

    const result = await callOnce('RunInstances', () =>
      getEC2Client(region).send(
        new RunInstancesCommand({
          MinCount: 1,
          MaxCount: 1,
          ImageId: request.amiId,
          InstanceType: instanceType,
          KeyName: request.keyName,
          SecurityGroupIds: request.securityGroupId ? [request.securityGroupId] : undefined,
          SubnetId: request.subnetId,
          IamInstanceProfile: request.iamProfile ? { Name: request.iamProfile } : undefined,
          UserData: encodeUserData(request.userDataScript),
          BlockDeviceMappings: rootVolume(request.volumeSizeGb),
          Placement: request.availabilityZone ? { AvailabilityZone: request.availabilityZone } : undefined,
          TagSpecifications: [tagSpec('instance', tags), tagSpec('volume', tags)],
        })
      )
    );

    const instanceId = result.Instances?.[0]?.InstanceId;
    if (!instanceId) {
      throw new ProviderApiError('RunInstances', 'No instance ID returned');
    }
    return instanceId;
  }

  async requestSpotInstance(request: SpotInstanceRequest, region: string): Promise<string> {
    const instanceType = requireInstanceType(request.instanceType);

    const result = await callOnce('RequestSpotInstances', () =>
      getEC2Client(region).send(
        new RequestSpotInstancesCommand({
          InstanceCount: 1,
          Type: request.requestType,
          SpotPrice: request.bidPrice.toFixed(4),
          TagSpecifications: [tagSpec('spot-instances-request', toTagList(request.tags))],
          LaunchSpecification: {
            ImageId: request.amiId,
            InstanceType: instanceType,
            KeyName: request.keyName,
            SecurityGroupIds: request.securityGroupId ? [request.securityGroupId] : undefined,
            SubnetId: request.subnetId,
            IamInstanceProfile: request.iamProfile ? { Name: request.iamProfile } : undefined,
            UserData: encodeUserData(request.userDataScript),
            BlockDeviceMappings: rootVolume(request.volumeSizeGb),
            Placement: { AvailabilityZone: request.availabilityZone },
          },
        })
      )
    );

    const requestId = result.SpotInstanceRequests?.[0]?.SpotInstanceRequestId;
    if (!requestId) {
      throw new ProviderApiError('RequestSpotInstances', 'No spot request ID returned');
    }
    return requestId;
  }

  async cancelSpotRequest(requestId: string, region: string): Promise<void> {
    await callOnce('CancelSpotInstanceRequests', async () => {
      try {
        await getEC2Client(region).send(new CancelSpotInstanceRequestsCommand({ SpotInstanceRequestIds: [requestId] }));
      } catch (e) {
        if (getErrorCode(e) === 'InvalidSpotInstanceRequestID.NotFound') return;
        throw e;
      }
    });
  }

  async tagResources(resourceIds: string[], tags: Record<string, string>, region: string): Promise<void> {
    await callOnce('CreateTags', () =>
      getEC2Client(region).send(new CreateTagsCommand({ Resources: resourceIds, Tags: toTagList(tags) }))
    );
  }
}
