/**
 * Instance Provisioner
 *
 * Launches the single EC2 host for a stack in one of three variants:
 *
 *   spot      cheapest eligible zone, one-time spot request, fail-over to the
 *             next zone when a request is not fulfilled
 *   ondemand  GPU image, IAM instance profile, 100 GB encrypted root
 *   simple    Ubuntu 22.04, no IAM profile, 30 GB encrypted root
 *
 * Launch calls are never retried and nothing is rolled back here; the
 * deploy workflow decides whether to run the cleanup engine on failure.
 */

import type {
  DeploymentConfiguration,
  DeploymentType,
  ImageFamily,
  InstanceRecord,
  InstanceRequest,
  InstanceState,
  LaunchParameters,
  SpotLaunchParameters,
  SpotPriceQuote,
} from '../types/index.js';
import type { ComputeProvider } from '../providers/interfaces/index.js';
import { isGpuInstanceType } from '../constants/instance-types.js';
import { CREATED_BY, STACK_TAG } from '../constants/tags.js';
import { calculateBidPrice, getOptimalSpotConfiguration } from '../spot/spot-pricing.js';
import { getNumber } from '../utils/config-helpers.js';
import { LaunchTimeoutError, MissingParameterError, ProviderApiError, errorMessage } from '../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../utils/retry.js';

const GPU_VOLUME_GB = 100;
const SIMPLE_VOLUME_GB = 30;

/** States that can never turn into 'running' */
const DEAD_STATES: readonly InstanceState[] = ['shutting-down', 'terminated', 'stopping', 'stopped'];

export interface ProvisionerOptions {
  /** Polls per wait (default 10) */
  maxAttempts?: number;
  /** Delay between polls (default 15 s) */
  pollIntervalMs?: number;
  sleep?: Sleep;
  verbose?: boolean;
  /** Clock for the CreatedAt tag */
  now?: () => Date;
}

/**
 * Standard instance tags. Caller tags are applied last.
 */
export function buildInstanceTags(
  stackName: string,
  deploymentType: DeploymentType,
  environment: string | undefined,
  createdAt: Date,
  extra: Record<string, string> = {}
): Record<string, string> {
  return {
    Name: stackName,
    [STACK_TAG]: stackName,
    DeploymentType: deploymentType,
    Environment: environment ?? 'development',
    CreatedBy: CREATED_BY,
    CreatedAt: createdAt.toISOString(),
    ...extra,
  };
}

export class InstanceProvisioner {
  private readonly maxAttempts: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;
  private readonly verbose: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly provider: ComputeProvider,
    options: ProvisionerOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 10);
    this.pollIntervalMs = options.pollIntervalMs ?? 15000;
    this.sleep = options.sleep ?? defaultSleep;
    this.verbose = options.verbose ?? false;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Polling settings from launch.max_attempts / launch.poll_interval_seconds
   */
  static fromConfig(
    provider: ComputeProvider,
    config: DeploymentConfiguration,
    overrides: Omit<ProvisionerOptions, 'maxAttempts' | 'pollIntervalMs'> = {}
  ): InstanceProvisioner {
    return new InstanceProvisioner(provider, {
      ...overrides,
      maxAttempts: getNumber(config, 'launch.max_attempts', 10),
      pollIntervalMs: getNumber(config, 'launch.poll_interval_seconds', 15) * 1000,
    });
  }

  // ============================================================
  // LAUNCH VARIANTS
  // ============================================================

  /**
   * Launch a spot instance in the cheapest zone under params.maxPrice.
   *
   * @throws MissingParameterError, NoPricingDataError, PriceExceedsLimitError,
   *   LaunchTimeoutError or ProviderApiError
   */
  async launchSpotInstance(
    stackName: string,
    instanceType: string,
    params: SpotLaunchParameters
  ): Promise<InstanceRecord> {
    this.requireParameters('launchSpotInstance', { stackName, instanceType, region: params.region });
    if (!(params.maxPrice > 0)) {
      throw new MissingParameterError('launchSpotInstance', ['maxPrice']);
    }

    const { region } = params;
    console.log(`\n💰 Launching spot instance ${instanceType} for ${stackName}...`);

    const plan = await getOptimalSpotConfiguration(this.provider, instanceType, params.maxPrice, region);
    console.log(`   Best zone: ${plan.availabilityZone} at $${plan.currentPrice}/hour (bid $${plan.bidPrice})`);

    const amiId = await this.resolveImage(params.amiId, 'gpu-optimized', region);
    const tags = buildInstanceTags(stackName, 'spot', params.environment, this.now(), params.tags);

    // A fixed subnet pins the zone, so there is nothing to fail over to
    const zones: SpotPriceQuote[] =
      params.failover === false || params.subnetId ? plan.rankedZones.slice(0, 1) : plan.rankedZones;

    let lastError: unknown;
    let fulfilled: { requestId: string; instanceId: string } | undefined;
    for (const [index, quote] of zones.entries()) {
      if (index > 0) {
        console.log(`   Trying next zone: ${quote.availabilityZone} at $${quote.pricePerHour}/hour`);
      }

      try {
        const subnetId = params.subnetId ?? (await this.provider.findSubnetForAz(quote.availabilityZone, region));
        const requestId = await this.provider.requestSpotInstance(
          {
            ...this.baseRequest(stackName, instanceType, amiId, params, tags),
            subnetId: subnetId ?? undefined,
            iamProfile: params.iamProfile,
            volumeSizeGb: params.volumeSizeGb ?? this.defaultVolumeSize(instanceType),
            availabilityZone: quote.availabilityZone,
            bidPrice: calculateBidPrice(quote.pricePerHour, params.maxPrice),
            requestType: params.requestType ?? 'one-time',
          },
          region
        );
        console.log(`   Spot request submitted: ${requestId}`);

        const instanceId = await this.waitForSpotFulfillment(requestId, region);
        fulfilled = { requestId, instanceId };
        break;
      } catch (e) {
        if (!(e instanceof LaunchTimeoutError || e instanceof ProviderApiError)) {
          throw e;
        }
        lastError = e;
        console.log(`[!] Spot launch in ${quote.availabilityZone} failed: ${errorMessage(e)}`);
      }
    }

    if (!fulfilled) {
      throw lastError ?? new ProviderApiError('launchSpotInstance', 'No eligible availability zone');
    }

    // Failover ends once an instance exists; later errors belong to that instance
    const { requestId, instanceId } = fulfilled;
    await this.provider.tagResources([instanceId], { ...tags, SpotRequestId: requestId }, region);
    const record = await this.waitForInstanceRunning(instanceId, region);
    console.log(`[OK] Spot instance ${instanceId} running at ${record.publicAddress ?? 'no public address'}`);
    return { ...record, spotRequestId: requestId };
  }

  /**
   * Launch an on-demand instance with the GPU image and the IAM profile, when given.
   */
  async launchOndemandInstance(
    stackName: string,
    instanceType: string,
    params: LaunchParameters
  ): Promise<InstanceRecord> {
    this.requireParameters('launchOndemandInstance', { stackName, instanceType, region: params.region });

    console.log(`\n🚀 Launching on-demand instance ${instanceType} for ${stackName}...`);
    const amiId = await this.resolveImage(params.amiId, 'gpu-optimized', params.region);
    const tags = buildInstanceTags(stackName, 'ondemand', params.environment, this.now(), params.tags);

    return this.runAndWait(
      {
        ...this.baseRequest(stackName, instanceType, amiId, params, tags),
        iamProfile: params.iamProfile,
        volumeSizeGb: params.volumeSizeGb ?? this.defaultVolumeSize(instanceType),
      },
      params.region
    );
  }

  /**
   * Launch a plain Ubuntu instance. Never attaches an IAM profile.
   */
  async launchSimpleInstance(
    stackName: string,
    instanceType: string,
    params: LaunchParameters
  ): Promise<InstanceRecord> {
    this.requireParameters('launchSimpleInstance', { stackName, instanceType, region: params.region });

    console.log(`\n🚀 Launching simple instance ${instanceType} for ${stackName}...`);
    if (params.iamProfile && this.verbose) {
      console.log('   Ignoring IAM profile for simple deployment');
    }

    const amiId = params.amiId ?? (await this.requireImage('ubuntu', params.region));
    const tags = buildInstanceTags(stackName, 'simple', params.environment, this.now(), params.tags);

    return this.runAndWait(
      {
        ...this.baseRequest(stackName, instanceType, amiId, params, tags),
        volumeSizeGb: params.volumeSizeGb ?? SIMPLE_VOLUME_GB,
      },
      params.region
    );
  }

  // ============================================================
  // POLLING
  // ============================================================

  /**
   * Poll a spot request until it is fulfilled; returns the instance ID.
   * The request is cancelled when it fails or times out.
   */
  async waitForSpotFulfillment(requestId: string, region: string): Promise<string> {
    try {
      for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
        const status = await this.provider.describeSpotRequest(requestId, region);
        this.log(`   Spot request ${requestId}: ${status.state}${status.statusCode ? ` (${status.statusCode})` : ''} [${attempt}/${this.maxAttempts}]`);

        if (status.state === 'active' && status.instanceId) {
          return status.instanceId;
        }
        if (status.state === 'closed' || status.state === 'cancelled' || status.state === 'failed') {
          throw new ProviderApiError(
            'waitForSpotFulfillment',
            `Spot request ${requestId} ended in state ${status.state}${status.statusCode ? ` (${status.statusCode})` : ''}`,
            { providerCode: status.statusCode }
          );
        }

        if (attempt < this.maxAttempts) {
          await this.sleep(this.pollIntervalMs);
        }
      }
      throw new LaunchTimeoutError(requestId, 'fulfilled', this.maxAttempts);
    } catch (e) {
      await this.cancelQuietly(requestId, region);
      throw e;
    }
  }

  /**
   * Poll an instance until it is running with a public address
   */
  async waitForInstanceRunning(instanceId: string, region: string): Promise<InstanceRecord> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const record = await this.provider.describeInstance(instanceId, region);
      this.log(`   Instance ${instanceId}: ${record?.state ?? 'not visible yet'} [${attempt}/${this.maxAttempts}]`);

      if (record) {
        if (DEAD_STATES.includes(record.state)) {
          throw new ProviderApiError(
            'waitForInstanceRunning',
            `Instance ${instanceId} entered state ${record.state} while starting`
          );
        }
        if (record.state === 'running' && record.publicAddress) {
          return record;
        }
      }

      if (attempt < this.maxAttempts) {
        await this.sleep(this.pollIntervalMs);
      }
    }
    throw new LaunchTimeoutError(instanceId, 'running', this.maxAttempts);
  }

  // ============================================================
  // HELPERS
  // ============================================================

  private async runAndWait(request: InstanceRequest, region: string): Promise<InstanceRecord> {
    const instanceId = await this.provider.runInstance(request, region);
    console.log(`   Instance launched: ${instanceId}`);
    const record = await this.waitForInstanceRunning(instanceId, region);
    console.log(`[OK] Instance ${instanceId} running at ${record.publicAddress ?? 'no public address'}`);
    return record;
  }

  private baseRequest(
    stackName: string,
    instanceType: string,
    amiId: string,
    params: LaunchParameters,
    tags: Record<string, string>
  ): InstanceRequest {
    return {
      stackName,
      instanceType,
      amiId,
      securityGroupId: params.securityGroupId,
      subnetId: params.subnetId,
      keyName: params.keyName,
      userDataScript: params.userDataScript,
      tags,
    };
  }

  private defaultVolumeSize(instanceType: string): number {
    return isGpuInstanceType(instanceType) ? GPU_VOLUME_GB : SIMPLE_VOLUME_GB;
  }

  /**
   * Explicit image, else the preferred family, else Ubuntu
   */
  private async resolveImage(explicit: string | undefined, family: ImageFamily, region: string): Promise<string> {
    if (explicit) return explicit;
    const preferred = await this.provider.findImage(family, region);
    if (preferred) return preferred;
    console.log(`[!] No ${family} image found, falling back to Ubuntu`);
    return this.requireImage('ubuntu', region);
  }

  private async requireImage(family: ImageFamily, region: string): Promise<string> {
    const amiId = await this.provider.findImage(family, region);
    if (!amiId) {
      throw new ProviderApiError('findImage', `No ${family} image available in ${region}`);
    }
    return amiId;
  }

  private requireParameters(operation: string, values: Record<string, string>): void {
    const missing = Object.entries(values)
      .filter(([, value]) => !value || !value.trim())
      .map(([name]) => name);
    if (missing.length > 0) {
      throw new MissingParameterError(operation, missing);
    }
  }

  private async cancelQuietly(requestId: string, region: string): Promise<void> {
    try {
      await this.provider.cancelSpotRequest(requestId, region);
      console.log(`   Cancelled spot request ${requestId}`);
    } catch (e) {
      console.log(`[!] Could not cancel spot request ${requestId}: ${errorMessage(e)}`);
    }
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }
}
