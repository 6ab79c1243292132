/**
 * AWS Load Balancing Provider
 *
 * Optional front door for n8n: an application load balancer in the default
 * VPC and, when enabled, a CloudFront distribution in front of it.
 */

import { DescribeSubnetsCommand } from '@aws-sdk/client-ec2';
import {
  CreateListenerCommand,
  CreateLoadBalancerCommand,
  CreateTargetGroupCommand,
  DescribeListenersCommand,
  DescribeLoadBalancersCommand,
  DescribeTargetGroupsCommand,
  RegisterTargetsCommand,
  type LoadBalancer,
  type TargetGroup,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { CreateDistributionCommand } from '@aws-sdk/client-cloudfront';

import type { DistributionSetup, LoadBalancerSetup, LoadBalancingProvider } from '../interfaces/index.js';
import { ProviderApiError } from '../../utils/errors.js';
import { callOnce, getErrorCode, withRetry, type RetryOptions } from '../../utils/retry.js';
import {
  buildTags,
  getCloudFrontClient,
  getEC2Client,
  getELBClient,
  loadBalancerName,
  targetGroupName,
} from './aws-helpers.js';

const TARGET_HEALTH_PATH = '/healthz';
const LISTENER_PORT = 80;

// AWS managed policies: CachingDisabled and AllViewer
const CACHING_DISABLED_POLICY_ID = '4135ea2d-6df8-44a3-9df3-4b5a84be39ad';
const ALL_VIEWER_ORIGIN_POLICY_ID = '216adef6-5c7f-47e4-b989-5492eafa07d3';

export interface AwsLoadBalancingOptions extends RetryOptions {
  region: string;
  now?: () => Date;
}

export class AwsLoadBalancingProvider implements LoadBalancingProvider {
  private readonly region: string;
  private readonly retry: RetryOptions;
  private readonly now: () => Date;

  constructor(options: AwsLoadBalancingOptions) {
    this.region = options.region;
    this.retry = { attempts: options.attempts, baseDelayMs: options.baseDelayMs, sleep: options.sleep, verbose: options.verbose };
    this.now = options.now ?? (() => new Date());
  }

  async setupLoadBalancer(
    stackName: string,
    instanceId: string,
    targetPort: number,
    securityGroupId: string,
    subnetIds: string[]
  ): Promise<LoadBalancerSetup> {
    if (subnetIds.length < 2) {
      throw new ProviderApiError('CreateLoadBalancer', 'An application load balancer needs subnets in at least two zones');
    }

    const elb = getELBClient(this.region);
    const vpcId = await this.findVpcOfSubnet(subnetIds[0] ?? '');
    const tags = buildTags(stackName).map((t) => ({ Key: t.Key ?? '', Value: t.Value }));

    // Target group
    const tgName = targetGroupName(stackName);
    let targetGroup = await this.findTargetGroup(tgName);
    if (!targetGroup) {
      const created = await callOnce('CreateTargetGroup', () =>
        elb.send(
          new CreateTargetGroupCommand({
            Name: tgName,
            Protocol: 'HTTP',
            Port: targetPort,
            VpcId: vpcId,
            TargetType: 'instance',
            HealthCheckPath: TARGET_HEALTH_PATH,
            HealthCheckIntervalSeconds: 30,
            HealthyThresholdCount: 2,
            UnhealthyThresholdCount: 5,
            Tags: tags,
          })
        )
      );
      targetGroup = created.TargetGroups?.[0];
      console.log(`   Created target group: ${tgName}`);
    }
    const targetGroupArn = targetGroup?.TargetGroupArn;
    if (!targetGroupArn) {
      throw new ProviderApiError('CreateTargetGroup', 'No target group ARN returned');
    }

    await callOnce('RegisterTargets', () =>
      elb.send(new RegisterTargetsCommand({ TargetGroupArn: targetGroupArn, Targets: [{ Id: instanceId, Port: targetPort }] }))
    );

    // Load balancer
    const lbName = loadBalancerName(stackName);
    let loadBalancer = await this.findLoadBalancer(lbName);
    if (!loadBalancer) {
      const created = await callOnce('CreateLoadBalancer', () =>
        elb.send(
          new CreateLoadBalancerCommand({
            Name: lbName,
            Type: 'application',
            Scheme: 'internet-facing',
            Subnets: subnetIds,
            SecurityGroups: [securityGroupId],
            Tags: tags,
          })
        )
      );
      loadBalancer = created.LoadBalancers?.[0];
      console.log(`   Created load balancer: ${lbName}`);
    }
    const loadBalancerArn = loadBalancer?.LoadBalancerArn;
    const dnsName = loadBalancer?.DNSName;
    if (!loadBalancerArn || !dnsName) {
      throw new ProviderApiError('CreateLoadBalancer', 'No load balancer ARN or DNS name returned');
    }

    // Listener
    const listeners = await withRetry(
      'DescribeListeners',
      () => elb.send(new DescribeListenersCommand({ LoadBalancerArn: loadBalancerArn })),
      this.retry
    );
    if (!(listeners.Listeners ?? []).some((l) => l.Port === LISTENER_PORT)) {
      await callOnce('CreateListener', () =>
        elb.send(
          new CreateListenerCommand({
            LoadBalancerArn: loadBalancerArn,
            Protocol: 'HTTP',
            Port: LISTENER_PORT,
            DefaultActions: [{ Type: 'forward', TargetGroupArn: targetGroupArn }],
          })
        )
      );
    }

    return { loadBalancerArn, dnsName, targetGroupArn };
  }

  async setupCloudFront(stackName: string, originDomain: string): Promise<DistributionSetup> {
    const originId = `${stackName}-alb-origin`;

    const result = await callOnce('CreateDistribution', () =>
      getCloudFrontClient().send(
        new CreateDistributionCommand({
          DistributionConfig: {
            CallerReference: `${stackName}-${this.now().getTime()}`,
            // Cleanup finds distributions by this comment
            Comment: stackName,
            Enabled: true,
            Origins: {
              Quantity: 1,
              Items: [
                {
                  Id: originId,
                  DomainName: originDomain,
                  CustomOriginConfig: {
                    HTTPPort: 80,
                    HTTPSPort: 443,
                    OriginProtocolPolicy: 'http-only',
                  },
                },
              ],
            },
            DefaultCacheBehavior: {
              TargetOriginId: originId,
              ViewerProtocolPolicy: 'redirect-to-https',
              CachePolicyId: CACHING_DISABLED_POLICY_ID,
              OriginRequestPolicyId: ALL_VIEWER_ORIGIN_POLICY_ID,
              AllowedMethods: {
                Quantity: 7,
                Items: ['GET', 'HEAD', 'OPTIONS', 'PUT', 'POST', 'PATCH', 'DELETE'],
                CachedMethods: { Quantity: 2, Items: ['GET', 'HEAD'] },
              },
            },
          },
        })
      )
    );

    const distributionId = result.Distribution?.Id;
    const domainName = result.Distribution?.DomainName;
    if (!distributionId || !domainName) {
      throw new ProviderApiError('CreateDistribution', 'No distribution ID or domain returned');
    }
    console.log(`   Created CloudFront distribution: ${distributionId}`);
    return { distributionId, domainName };
  }

  // ============================================================
  // LOOKUPS
  // ============================================================

  private async findVpcOfSubnet(subnetId: string): Promise<string> {
    const result = await withRetry(
      'DescribeSubnets',
      () => getEC2Client(this.region).send(new DescribeSubnetsCommand({ SubnetIds: [subnetId] })),
      this.retry
    );
    const vpcId = result.Subnets?.[0]?.VpcId;
    if (!vpcId) {
      throw new ProviderApiError('DescribeSubnets', `No VPC found for subnet ${subnetId}`);
    }
    return vpcId;
  }

  private async findTargetGroup(name: string): Promise<TargetGroup | undefined> {
    return withRetry(
      'DescribeTargetGroups',
      async () => {
        try {
          const result = await getELBClient(this.region).send(new DescribeTargetGroupsCommand({ Names: [name] }));
          return result.TargetGroups?.[0];
        } catch (e) {
          if (getErrorCode(e) === 'TargetGroupNotFoundException') return undefined;
          throw e;
        }
      },
      this.retry
    );
  }

  private async findLoadBalancer(name: string): Promise<LoadBalancer | undefined> {
    return withRetry(
      'DescribeLoadBalancers',
      async () => {
        try {
          const result = await getELBClient(this.region).send(new DescribeLoadBalancersCommand({ Names: [name] }));
          return result.LoadBalancers?.[0];
        } catch (e) {
          if (getErrorCode(e) === 'LoadBalancerNotFoundException') return undefined;
          throw e;
        }
      },
      this.retry
    );
  }
}
