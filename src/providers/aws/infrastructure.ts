/**
 * AWS Infrastructure Provider
 *
 * Idempotent ensure-operations run before a launch. Each looks for the
 * resource by its conventional name first and creates it only when missing.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import {
  AuthorizeSecurityGroupIngressCommand,
  CreateKeyPairCommand,
  CreateSecurityGroupCommand,
  DescribeKeyPairsCommand,
  DescribeSecurityGroupsCommand,
  DescribeSubnetsCommand,
  DescribeVpcsCommand,
  type IpPermission,
} from '@aws-sdk/client-ec2';
import {
  CreateFileSystemCommand,
  CreateMountTargetCommand,
  DescribeFileSystemsCommand,
  DescribeMountTargetsCommand,
} from '@aws-sdk/client-efs';
import {
  AddRoleToInstanceProfileCommand,
  AttachRolePolicyCommand,
  CreateInstanceProfileCommand,
  CreateRoleCommand,
  GetInstanceProfileCommand,
  GetRoleCommand,
} from '@aws-sdk/client-iam';

import type { InfrastructureProvider, SecurityGroupSpec } from '../interfaces/index.js';
import { STACK_TAG } from '../../constants/tags.js';
import { ProviderApiError } from '../../utils/errors.js';
import { callOnce, getErrorCode, sleep as defaultSleep, withRetry, type RetryOptions } from '../../utils/retry.js';
import {
  buildTags,
  fileSystemName,
  getEC2Client,
  getEFSClient,
  getIAMClient,
  instanceProfileName,
  keyPairName,
  roleName,
  securityGroupName,
  tagSpec,
} from './aws-helpers.js';

export const INSTANCE_ROLE_POLICIES = [
  'arn:aws:iam::aws:policy/CloudWatchLogsFullAccess',
  'arn:aws:iam::aws:policy/CloudWatchAgentServerPolicy',
  'arn:aws:iam::aws:policy/AmazonSSMManagedInstanceCore',
];

const EC2_TRUST_POLICY = JSON.stringify({
  Version: '2012-10-17',
  Statement: [
    {
      Effect: 'Allow',
      Principal: { Service: 'ec2.amazonaws.com' },
      Action: 'sts:AssumeRole',
    },
  ],
});

const NFS_PORT = 2049;

export interface AwsInfrastructureOptions extends RetryOptions {
  region: string;
  /** Where new private keys are saved (default ~/.ssh) */
  keyDir?: string;
  verbose?: boolean;
}

export class AwsInfrastructureProvider implements InfrastructureProvider {
  private readonly region: string;
  private readonly keyDir: string;
  private readonly retry: RetryOptions;

  constructor(options: AwsInfrastructureOptions) {
    this.region = options.region;
    this.keyDir = options.keyDir ?? path.join(os.homedir(), '.ssh');
    this.retry = { attempts: options.attempts, baseDelayMs: options.baseDelayMs, sleep: options.sleep, verbose: options.verbose };
  }

  private get wait(): (ms: number) => Promise<void> {
    return this.retry.sleep ?? defaultSleep;
  }

  // ============================================================
  // KEY PAIR
  // ============================================================

  async ensureKeyPair(stackName: string, keyName: string = keyPairName(stackName)): Promise<string> {
    const ec2 = getEC2Client(this.region);

    const exists = await withRetry(
      'DescribeKeyPairs',
      async () => {
        try {
          const result = await ec2.send(new DescribeKeyPairsCommand({ KeyNames: [keyName] }));
          return (result.KeyPairs?.length ?? 0) > 0;
        } catch (e) {
          if (getErrorCode(e) === 'InvalidKeyPair.NotFound') return false;
          throw e;
        }
      },
      this.retry
    );
    if (exists) {
      console.log(`   [OK] Key pair exists: ${keyName}`);
      return keyName;
    }

    const result = await callOnce('CreateKeyPair', () =>
      ec2.send(
        new CreateKeyPairCommand({
          KeyName: keyName,
          KeyType: 'ed25519',
          TagSpecifications: [tagSpec('key-pair', buildTags(stackName, keyName))],
        })
      )
    );

    if (result.KeyMaterial) {
      fs.mkdirSync(this.keyDir, { recursive: true, mode: 0o700 });
      const keyPath = path.join(this.keyDir, `${keyName}.pem`);
      fs.writeFileSync(keyPath, result.KeyMaterial + '\n', { mode: 0o600 });
      console.log(`   Created key pair: ${keyName}`);
      console.log(`   Private key saved to: ${keyPath}`);
    }
    return keyName;
  }

  // ============================================================
  // NETWORK
  // ============================================================

  private async findDefaultVpc(): Promise<string> {
    const result = await withRetry(
      'DescribeVpcs',
      () =>
        getEC2Client(this.region).send(new DescribeVpcsCommand({ Filters: [{ Name: 'isDefault', Values: ['true'] }] })),
      this.retry
    );
    const vpcId = result.Vpcs?.[0]?.VpcId;
    if (!vpcId) {
      throw new ProviderApiError('DescribeVpcs', `No default VPC in ${this.region}`);
    }
    return vpcId;
  }

  async listDefaultSubnets(): Promise<Record<string, string>> {
    const result = await withRetry(
      'DescribeSubnets',
      () =>
        getEC2Client(this.region).send(
          new DescribeSubnetsCommand({ Filters: [{ Name: 'default-for-az', Values: ['true'] }] })
        ),
      this.retry
    );

    const subnets: Record<string, string> = {};
    for (const subnet of result.Subnets ?? []) {
      if (subnet.AvailabilityZone && subnet.SubnetId) {
        subnets[subnet.AvailabilityZone] = subnet.SubnetId;
      }
    }
    return subnets;
  }

  async ensureSecurityGroup(spec: SecurityGroupSpec): Promise<string> {
    const ec2 = getEC2Client(this.region);
    const groupName = securityGroupName(spec.stackName);
    const vpcId = await this.findDefaultVpc();

    const existing = await withRetry(
      'DescribeSecurityGroups',
      () =>
        ec2.send(
          new DescribeSecurityGroupsCommand({
            Filters: [
              { Name: 'group-name', Values: [groupName] },
              { Name: 'vpc-id', Values: [vpcId] },
            ],
          })
        ),
      this.retry
    );

    let groupId = existing.SecurityGroups?.[0]?.GroupId;
    if (groupId) {
      console.log(`   [OK] Security group exists: ${groupName} (${groupId})`);
    } else {
      const created = await callOnce('CreateSecurityGroup', () =>
        ec2.send(
          new CreateSecurityGroupCommand({
            GroupName: groupName,
            Description: `aistack security group for ${spec.stackName}`,
            VpcId: vpcId,
            TagSpecifications: [tagSpec('security-group', buildTags(spec.stackName, groupName))],
          })
        )
      );
      groupId = created.GroupId;
      if (!groupId) {
        throw new ProviderApiError('CreateSecurityGroup', 'No group ID returned');
      }
      console.log(`   Created security group: ${groupName} (${groupId})`);
    }

    const permissions: IpPermission[] = [
      { IpProtocol: 'tcp', FromPort: 22, ToPort: 22, IpRanges: [{ CidrIp: spec.sshCidr, Description: 'SSH' }] },
      ...spec.servicePorts.map((port) => ({
        IpProtocol: 'tcp',
        FromPort: port,
        ToPort: port,
        IpRanges: [{ CidrIp: '0.0.0.0/0' }],
      })),
    ];
    await this.authorizeIngress(groupId, permissions);
    console.log(`   Allowed inbound: SSH(22), ${spec.servicePorts.join(', ')}`);

    return groupId;
  }

  /**
   * Add rules one by one; rules that already exist are left alone
   */
  private async authorizeIngress(groupId: string, permissions: IpPermission[]): Promise<void> {
    const ec2 = getEC2Client(this.region);
    for (const permission of permissions) {
      await callOnce('AuthorizeSecurityGroupIngress', async () => {
        try {
          await ec2.send(new AuthorizeSecurityGroupIngressCommand({ GroupId: groupId, IpPermissions: [permission] }));
        } catch (e) {
          if (getErrorCode(e) === 'InvalidPermission.Duplicate') return;
          throw e;
        }
      });
    }
  }

  // ============================================================
  // IAM
  // ============================================================

  async ensureInstanceProfile(stackName: string): Promise<string> {
    const iam = getIAMClient(this.region);
    const role = roleName(stackName);
    const profile = instanceProfileName(stackName);

    const roleExists = await this.iamExists('GetRole', () => iam.send(new GetRoleCommand({ RoleName: role })));
    if (!roleExists) {
      await callOnce('CreateRole', () =>
        iam.send(
          new CreateRoleCommand({
            RoleName: role,
            AssumeRolePolicyDocument: EC2_TRUST_POLICY,
            Description: `aistack instance role for ${stackName}`,
            Tags: [{ Key: STACK_TAG, Value: stackName }],
          })
        )
      );
      for (const policyArn of INSTANCE_ROLE_POLICIES) {
        await callOnce('AttachRolePolicy', () =>
          iam.send(new AttachRolePolicyCommand({ RoleName: role, PolicyArn: policyArn }))
        );
      }
      console.log(`   Created IAM role: ${role}`);
    } else {
      console.log(`   [OK] IAM role exists: ${role}`);
    }

    const existing = await withRetry(
      'GetInstanceProfile',
      async () => {
        try {
          return await iam.send(new GetInstanceProfileCommand({ InstanceProfileName: profile }));
        } catch (e) {
          if (getErrorCode(e) === 'NoSuchEntityException') return null;
          throw e;
        }
      },
      this.retry
    );

    if (!existing) {
      await callOnce('CreateInstanceProfile', () =>
        iam.send(
          new CreateInstanceProfileCommand({
            InstanceProfileName: profile,
            Tags: [{ Key: STACK_TAG, Value: stackName }],
          })
        )
      );
      console.log(`   Created instance profile: ${profile}`);
    }

    const attachedRoles = existing?.InstanceProfile?.Roles ?? [];
    if (!attachedRoles.some((r) => r.RoleName === role)) {
      await callOnce('AddRoleToInstanceProfile', () =>
        iam.send(new AddRoleToInstanceProfileCommand({ InstanceProfileName: profile, RoleName: role }))
      );
      // New profiles are not usable by EC2 until IAM propagates them
      await this.wait(10000);
    }

    return profile;
  }

  private async iamExists(operation: string, fn: () => Promise<unknown>): Promise<boolean> {
    return withRetry(
      operation,
      async () => {
        try {
          await fn();
          return true;
        } catch (e) {
          if (getErrorCode(e) === 'NoSuchEntityException') return false;
          throw e;
        }
      },
      this.retry
    );
  }

  // ============================================================
  // EFS
  // ============================================================

  async ensureFileSystem(stackName: string, subnetId: string, securityGroupId: string): Promise<string> {
    const efs = getEFSClient(this.region);
    const name = fileSystemName(stackName);

    const existing = await withRetry(
      'DescribeFileSystems',
      () => efs.send(new DescribeFileSystemsCommand({ CreationToken: name })),
      this.retry
    );

    let fileSystemId = existing.FileSystems?.[0]?.FileSystemId;
    if (fileSystemId) {
      console.log(`   [OK] EFS exists: ${name} (${fileSystemId})`);
    } else {
      const created = await callOnce('CreateFileSystem', () =>
        efs.send(
          new CreateFileSystemCommand({
            CreationToken: name,
            PerformanceMode: 'generalPurpose',
            Encrypted: true,
            Tags: buildTags(stackName, name).map((t) => ({ Key: t.Key ?? '', Value: t.Value ?? '' })),
          })
        )
      );
      fileSystemId = created.FileSystemId;
      if (!fileSystemId) {
        throw new ProviderApiError('CreateFileSystem', 'No file system ID returned');
      }
      console.log(`   Created EFS: ${name} (${fileSystemId})`);
      await this.waitForFileSystemAvailable(fileSystemId);
    }

    await this.authorizeIngress(securityGroupId, [
      { IpProtocol: 'tcp', FromPort: NFS_PORT, ToPort: NFS_PORT, UserIdGroupPairs: [{ GroupId: securityGroupId }] },
    ]);

    const id = fileSystemId;
    const mountTargets = await withRetry(
      'DescribeMountTargets',
      () => efs.send(new DescribeMountTargetsCommand({ FileSystemId: id })),
      this.retry
    );
    if (!(mountTargets.MountTargets ?? []).some((mt) => mt.SubnetId === subnetId)) {
      await callOnce('CreateMountTarget', () =>
        efs.send(new CreateMountTargetCommand({ FileSystemId: id, SubnetId: subnetId, SecurityGroups: [securityGroupId] }))
      );
      console.log(`   Created EFS mount target in ${subnetId}`);
    }

    return fileSystemId;
  }

  private async waitForFileSystemAvailable(fileSystemId: string, maxAttempts = 30): Promise<void> {
    const efs = getEFSClient(this.region);
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await withRetry(
        'DescribeFileSystems',
        () => efs.send(new DescribeFileSystemsCommand({ FileSystemId: fileSystemId })),
        this.retry
      );
      if (result.FileSystems?.[0]?.LifeCycleState === 'available') return;
      await this.wait(5000);
    }
    throw new ProviderApiError('waitForFileSystemAvailable', `${fileSystemId} not available after ${maxAttempts} checks`);
  }
}
