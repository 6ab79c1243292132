/**
 * Deployer Module
 *
 * Runs a deployment against a resolved configuration:
 *
 *   1. supporting resources   key pair, security group, IAM profile, EFS
 *   2. bootstrap              Compose file, .env and the user-data script
 *   3. launch                 spot / ondemand / simple
 *   4. front door             ALB, then CloudFront (optional)
 *   5. monitoring             log group, alarms, dashboard
 *   6. health                 poll the four service endpoints
 *
 * A failure in steps 1-4 ends the run; with cleanup.on_failure the stack is
 * torn down again before returning.
 */

import type {
  DeploymentConfiguration,
  DeploymentType,
  DeployResult,
  HealthCheckResult,
  InstanceRecord,
  LaunchParameters,
} from '../types/index.js';
import type { DeploymentProviders, MonitoringSetup } from '../providers/index.js';
import { STACK_SERVICES, renderArtifacts, servicePort, writeDeploymentArtifacts } from '../bootstrap/index.js';
import { generateUserData } from '../bootstrap/user-data.js';
import { CleanupEngine } from '../cleanup/cleanup-engine.js';
import { allHealthy, buildServiceEndpoints, checkHealth, healthOptionsFromConfig, printHealthResults } from '../health/index.js';
import { InstanceProvisioner } from '../provisioner/instance-provisioner.js';
import {
  calculateSpotSavings,
  formatQuotes,
  formatSuggestions,
  getOptimalSpotConfiguration,
  suggestAlternativeInstanceTypes,
} from '../spot/spot-pricing.js';
import { getBoolean, getNumber, getOptionalString, getString } from '../utils/config-helpers.js';
import { formatDeploySummary } from '../utils/deployment-report.js';
import { ConfigurationError, PriceExceedsLimitError, errorMessage } from '../utils/errors.js';
import type { ConfirmPrompt } from '../utils/prompts.js';
import { sleep as defaultSleep, type Sleep } from '../utils/retry.js';
import { withStackLock } from '../utils/stack-lock.js';

export interface DeployerOptions {
  dryRun?: boolean;
  /** Skip the confirmation before anything billable is created */
  force?: boolean;
  /** Asked before launching unless force is set */
  confirm?: ConfirmPrompt;
  skipHealthCheck?: boolean;
  /** Also write the rendered artifacts here */
  outputDir?: string;
  /** Base directory for stack lock files (default os.tmpdir()) */
  lockDir?: string;
  sleep?: Sleep;
  verbose?: boolean;
}

interface SupportingResources {
  keyName: string;
  securityGroupId: string;
  iamProfile?: string;
  subnets: Record<string, string>;
  fileSystemId?: string;
}

function readSpotRequestType(config: DeploymentConfiguration): 'one-time' | 'persistent' {
  const value = getString(config, 'spot.request_type', 'one-time');
  if (value !== 'one-time' && value !== 'persistent') {
    throw new ConfigurationError(`spot.request_type must be one-time or persistent (got '${value}')`, ['spot.request_type']);
  }
  return value;
}

export class Deployer {
  private readonly sleep: Sleep;

  constructor(
    private readonly config: DeploymentConfiguration,
    private readonly providers: DeploymentProviders,
    private readonly options: DeployerOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  private get stackName(): string {
    return getString(this.config, 'stack.name');
  }

  private get deploymentType(): DeploymentType {
    const type = getString(this.config, 'deployment.type', 'spot');
    return type === 'ondemand' || type === 'simple' ? type : 'spot';
  }

  private get region(): string {
    return getString(this.config, 'aws.region');
  }

  async deploy(): Promise<DeployResult> {
    if (this.options.dryRun) {
      return this.dryRun();
    }

    if (!this.options.force && this.options.confirm) {
      const instanceType = getString(this.config, 'instance.type');
      const confirmed = await this.options.confirm(
        `This will launch a ${this.deploymentType} ${instanceType} instance for stack ${this.stackName} in ${this.region}.`
      );
      if (!confirmed) {
        console.log('Deployment cancelled');
        return { success: false, error: 'Deployment cancelled' };
      }
    }

    return withStackLock(this.stackName, 'deploy', () => this.run(), this.options.lockDir);
  }

  // ============================================================
  // DRY RUN
  // ============================================================

  private async dryRun(): Promise<DeployResult> {
    const instanceType = getString(this.config, 'instance.type');
    console.log(`\n[DRY RUN] ${this.deploymentType} deployment of ${this.stackName} (${instanceType}, ${this.region})`);

    if (this.deploymentType === 'spot') {
      const maxPrice = getNumber(this.config, 'spot.max_price');
      const plan = await getOptimalSpotConfiguration(this.providers.compute, instanceType, maxPrice, this.region);
      console.log(`\n💰 Spot prices (max $${maxPrice}/hour):`);
      for (const line of formatQuotes(plan.rankedZones, maxPrice)) {
        console.log(line);
      }
      console.log(`   Would request ${plan.availabilityZone} at bid $${plan.bidPrice}`);
    }

    const artifacts = renderArtifacts(this.config);
    const userData = generateUserData(this.config, artifacts);
    console.log(`\n[OK] Rendered docker-compose.yml (${artifacts.composeFile.length} bytes)`);
    console.log(`[OK] Rendered .env (${artifacts.envFile.length} bytes)`);
    console.log(`[OK] Rendered user data (${userData.split('\n').length} lines)`);

    if (this.options.outputDir) {
      writeDeploymentArtifacts(this.config, this.options.outputDir, artifacts);
    }

    return { success: true, message: 'Dry run complete, nothing was launched' };
  }

  // ============================================================
  // DEPLOY
  // ============================================================

  private async reportAlternatives(maxPrice: number): Promise<void> {
    const instanceType = getString(this.config, 'instance.type');
    console.log(`\n[!] Alternatives to ${instanceType} under $${maxPrice}/hour:`);
    try {
      const suggestions = await suggestAlternativeInstanceTypes(this.providers.compute, instanceType, maxPrice, this.region);
      for (const line of formatSuggestions(suggestions)) {
        console.log(line);
      }
    } catch (e) {
      console.log(`   Could not look up alternatives: ${errorMessage(e)}`);
    }
  }

  private async run(): Promise<DeployResult> {
    let instance: InstanceRecord;
    let resources: SupportingResources;
    let loadBalancerDns: string | undefined;
    let cloudFrontDomain: string | undefined;

    try {
      resources = await this.ensureSupportingResources();
      instance = await this.launch(resources);
      ({ loadBalancerDns, cloudFrontDomain } = await this.setupFrontDoor(instance, resources));
    } catch (e) {
      const message = errorMessage(e);
      console.log(`\n[ERROR] Deployment failed: ${message}`);
      if (e instanceof PriceExceedsLimitError) {
        await this.reportAlternatives(e.maxPrice);
      }
      if (!getBoolean(this.config, 'cleanup.on_failure')) {
        return { success: false, error: message };
      }

      console.log('\n🧹 cleanup.on_failure is set, removing what was created...');
      const engine = new CleanupEngine(this.providers.stackResources);
      const cleanup = await engine.cleanup(this.stackName, { force: true, verbose: this.options.verbose });
      return { success: false, error: message, cleanup };
    }

    const monitoring = await this.setupMonitoring(instance);

    let health: HealthCheckResult[] | undefined;
    if (!this.options.skipHealthCheck) {
      health = await this.checkServices(instance);
      if (getBoolean(this.config, 'health.blocking') && !allHealthy(health)) {
        return {
          success: false,
          error: 'Services did not become healthy',
          instance,
          health,
        };
      }
    }

    const spotPrice = this.deploymentType === 'spot' ? await this.currentSpotPrice(instance) : undefined;
    console.log(
      '\n' +
        formatDeploySummary({
          stackName: this.stackName,
          deploymentType: this.deploymentType,
          region: this.region,
          environment: getString(this.config, 'environment.name', 'development'),
          instance,
          keyName: resources.keyName,
          spotPrice,
          savings: spotPrice === undefined ? undefined : calculateSpotSavings(spotPrice, getString(this.config, 'instance.type')),
          loadBalancerDns,
          cloudFrontDomain,
          dashboardName: monitoring?.dashboardName,
          health,
        })
    );

    return { success: true, message: `Stack ${this.stackName} deployed`, instance, health };
  }

  private async ensureSupportingResources(): Promise<SupportingResources> {
    const { infrastructure } = this.providers;
    console.log(`\n🔧 Preparing supporting resources for ${this.stackName}...`);

    const keyName = await infrastructure.ensureKeyPair(this.stackName, getOptionalString(this.config, 'instance.key_name'));
    const securityGroupId = await infrastructure.ensureSecurityGroup({
      stackName: this.stackName,
      servicePorts: STACK_SERVICES.filter((s) => s !== 'postgres').map((s) => servicePort(this.config, s)),
      sshCidr: getString(this.config, 'network.ssh_cidr', '0.0.0.0/0'),
    });

    const iamProfile =
      this.deploymentType === 'simple' ? undefined : await infrastructure.ensureInstanceProfile(this.stackName);

    const subnets = await infrastructure.listDefaultSubnets();

    let fileSystemId: string | undefined;
    if (getBoolean(this.config, 'storage.efs_enabled') && this.deploymentType !== 'simple') {
      // One mount target per zone, since a spot launch may land in any of them
      for (const zone of Object.keys(subnets).sort()) {
        const subnetId = subnets[zone];
        if (subnetId) {
          fileSystemId = await infrastructure.ensureFileSystem(this.stackName, subnetId, securityGroupId);
        }
      }
    }

    return { keyName, securityGroupId, iamProfile, subnets, fileSystemId };
  }

  private async launch(resources: SupportingResources): Promise<InstanceRecord> {
    const instanceType = getString(this.config, 'instance.type');
    const artifacts = renderArtifacts(this.config);
    if (this.options.outputDir) {
      writeDeploymentArtifacts(this.config, this.options.outputDir, artifacts);
    }

    const params: LaunchParameters = {
      region: this.region,
      securityGroupId: resources.securityGroupId,
      keyName: resources.keyName,
      iamProfile: resources.iamProfile,
      userDataScript: generateUserData(this.config, { ...artifacts, efsFileSystemId: resources.fileSystemId }),
      environment: getString(this.config, 'environment.name', 'development'),
      amiId: getOptionalString(this.config, 'instance.ami_id'),
      subnetId: getOptionalString(this.config, 'instance.subnet_id'),
      volumeSizeGb: this.config['instance.volume_size_gb'] === undefined ? undefined : getNumber(this.config, 'instance.volume_size_gb'),
    };

    const provisioner = InstanceProvisioner.fromConfig(this.providers.compute, this.config, {
      sleep: this.sleep,
      verbose: this.options.verbose,
    });

    switch (this.deploymentType) {
      case 'spot':
        return provisioner.launchSpotInstance(this.stackName, instanceType, {
          ...params,
          maxPrice: getNumber(this.config, 'spot.max_price'),
          requestType: readSpotRequestType(this.config),
          failover: getBoolean(this.config, 'spot.failover', true),
        });
      case 'ondemand':
        return provisioner.launchOndemandInstance(this.stackName, instanceType, params);
      case 'simple':
        return provisioner.launchSimpleInstance(this.stackName, instanceType, params);
    }
  }

  private async setupFrontDoor(
    instance: InstanceRecord,
    resources: SupportingResources
  ): Promise<{ loadBalancerDns?: string; cloudFrontDomain?: string }> {
    const wantAlb = getBoolean(this.config, 'features.alb');
    const wantCloudFront = getBoolean(this.config, 'features.cloudfront');

    if (!wantAlb) {
      if (wantCloudFront) {
        console.log('[!] CloudFront needs the load balancer (features.alb); skipping');
      }
      return {};
    }
    if (this.deploymentType === 'simple') {
      console.log('[!] Load balancer is not available for simple deployments; skipping');
      return {};
    }

    console.log('\n🌐 Setting up load balancer...');
    const subnetIds = Object.keys(resources.subnets)
      .sort()
      .map((zone) => resources.subnets[zone])
      .filter((id): id is string => !!id);
    const alb = await this.providers.loadBalancing.setupLoadBalancer(
      this.stackName,
      instance.instanceId,
      servicePort(this.config, 'n8n'),
      resources.securityGroupId,
      subnetIds
    );
    console.log(`[OK] Load balancer: ${alb.dnsName}`);

    if (!wantCloudFront) {
      return { loadBalancerDns: alb.dnsName };
    }

    const distribution = await this.providers.loadBalancing.setupCloudFront(this.stackName, alb.dnsName);
    console.log(`[OK] CloudFront: ${distribution.domainName}`);
    return { loadBalancerDns: alb.dnsName, cloudFrontDomain: distribution.domainName };
  }

  /**
   * Monitoring failures are reported but do not fail the deployment
   */
  private async setupMonitoring(instance: InstanceRecord): Promise<MonitoringSetup | undefined> {
    if (!getBoolean(this.config, 'monitoring.enabled', true)) return undefined;

    console.log('\n📈 Setting up monitoring...');
    try {
      return await this.providers.monitoring.setupMonitoring(this.stackName, instance.instanceId, {
        logGroupPrefix: getString(this.config, 'monitoring.log_group', '/aws/aistack'),
        retentionDays: getNumber(this.config, 'monitoring.log_retention_days', 30),
        cpuThreshold: getNumber(this.config, 'monitoring.cpu_alarm_threshold', 80),
        spot: this.deploymentType === 'spot',
      });
    } catch (e) {
      console.log(`[!] Monitoring setup failed: ${errorMessage(e)}`);
      return undefined;
    }
  }

  private async checkServices(instance: InstanceRecord): Promise<HealthCheckResult[]> {
    console.log('\n🩺 Waiting for services...');
    const endpoints = buildServiceEndpoints(this.config, instance.publicAddress ?? '');
    const results = await checkHealth(
      endpoints,
      { ...healthOptionsFromConfig(this.config), verbose: this.options.verbose },
      this.providers.http,
      this.sleep
    );
    printHealthResults(results);
    return results;
  }

  private async currentSpotPrice(instance: InstanceRecord): Promise<number | undefined> {
    if (!instance.availabilityZone) return undefined;
    try {
      const quote = await this.providers.compute.getLatestSpotPrice(
        getString(this.config, 'instance.type'),
        instance.availabilityZone,
        this.region
      );
      return quote?.pricePerHour;
    } catch (e) {
      console.log(`[!] Could not read the current spot price: ${errorMessage(e)}`);
      return undefined;
    }
  }
}

export default Deployer;
