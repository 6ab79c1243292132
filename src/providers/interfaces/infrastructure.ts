/**
 * Infrastructure Provider Interface
 *
 * Idempotent ensure-operations run before a launch, plus the optional
 * ALB / CloudFront front door and CloudWatch monitoring. Bound to one
 * region at construction.
 */

export interface SecurityGroupSpec {
  stackName: string;
  /** TCP ports opened to the world, besides SSH */
  servicePorts: number[];
  sshCidr: string;
}

export interface InfrastructureProvider {
  /**
   * Make sure the key pair exists; returns its name
   */
  ensureKeyPair(stackName: string, keyName?: string): Promise<string>;

  /**
   * Make sure <stack>-sg exists in the default VPC with the given ingress; returns its ID
   */
  ensureSecurityGroup(spec: SecurityGroupSpec): Promise<string>;

  /**
   * Make sure <stack>-role and its instance profile exist; returns the profile name
   */
  ensureInstanceProfile(stackName: string): Promise<string>;

  /**
   * Make sure <stack>-efs exists with a mount target in the subnet; returns its ID
   */
  ensureFileSystem(stackName: string, subnetId: string, securityGroupId: string): Promise<string>;

  /**
   * One default-VPC subnet per zone, keyed by zone name
   */
  listDefaultSubnets(): Promise<Record<string, string>>;
}

export interface LoadBalancerSetup {
  loadBalancerArn: string;
  dnsName: string;
  targetGroupArn: string;
}

export interface DistributionSetup {
  distributionId: string;
  domainName: string;
}

export interface LoadBalancingProvider {
  /**
   * Create <stack>-alb and <stack>-tg, register the instance and add an HTTP listener
   */
  setupLoadBalancer(
    stackName: string,
    instanceId: string,
    targetPort: number,
    securityGroupId: string,
    subnetIds: string[]
  ): Promise<LoadBalancerSetup>;

  /**
   * Create a distribution in front of the ALB, commented with the stack name
   */
  setupCloudFront(stackName: string, originDomain: string): Promise<DistributionSetup>;
}

export interface MonitoringOptions {
  logGroupPrefix: string;
  retentionDays: number;
  cpuThreshold: number;
  spot: boolean;
}

export interface MonitoringSetup {
  logGroupName: string;
  alarmNames: string[];
  dashboardName: string;
}

export interface MonitoringProvider {
  setupMonitoring(stackName: string, instanceId: string, options: MonitoringOptions): Promise<MonitoringSetup>;
}
