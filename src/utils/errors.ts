/**
 * Deployment Errors
 *
 * Every error the toolkit raises on purpose extends DeploymentError and
 * carries a stable code so the CLI can report it without string matching.
 */

export type DeploymentErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'MISSING_PARAMETER'
  | 'NO_PRICING_DATA'
  | 'PRICE_EXCEEDS_LIMIT'
  | 'LAUNCH_TIMEOUT'
  | 'PROVIDER_API_ERROR'
  | 'STACK_LOCKED';

export class DeploymentError extends Error {
  readonly code: DeploymentErrorCode;

  constructor(code: DeploymentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Bad or missing settings. Always raised before any cloud call.
 */
export class ConfigurationError extends DeploymentError {
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super('CONFIGURATION_ERROR', message);
    this.keys = keys;
  }
}

/**
 * A required argument was empty
 */
export class MissingParameterError extends DeploymentError {
  readonly parameters: string[];

  constructor(operation: string, parameters: string[]) {
    super('MISSING_PARAMETER', `${operation} requires ${parameters.join(' and ')}`);
    this.parameters = parameters;
  }
}

/**
 * No availability zone returned a spot price for the instance type
 */
export class NoPricingDataError extends DeploymentError {
  readonly instanceType: string;
  readonly region: string;

  constructor(instanceType: string, region: string) {
    super('NO_PRICING_DATA', `No spot pricing data for ${instanceType} in ${region}`);
    this.instanceType = instanceType;
    this.region = region;
  }
}

/**
 * The cheapest spot price is above the configured ceiling
 */
export class PriceExceedsLimitError extends DeploymentError {
  readonly bestPrice: number;
  readonly maxPrice: number;
  readonly availabilityZone: string;

  constructor(bestPrice: number, maxPrice: number, availabilityZone: string) {
    super(
      'PRICE_EXCEEDS_LIMIT',
      `Best available spot price ($${bestPrice}/hour in ${availabilityZone}) exceeds maximum ($${maxPrice}/hour)`
    );
    this.bestPrice = bestPrice;
    this.maxPrice = maxPrice;
    this.availabilityZone = availabilityZone;
  }
}

/**
 * The provider accepted a request but the resource never became ready in time
 */
export class LaunchTimeoutError extends DeploymentError {
  readonly resourceId: string;
  readonly attempts: number;

  constructor(resourceId: string, waitingFor: string, attempts: number) {
    super('LAUNCH_TIMEOUT', `${resourceId} did not become ${waitingFor} after ${attempts} attempts`);
    this.resourceId = resourceId;
    this.attempts = attempts;
  }
}

/**
 * A cloud API call failed (after retries, for read calls)
 */
export class ProviderApiError extends DeploymentError {
  readonly operation: string;
  readonly providerCode?: string;

  constructor(operation: string, message: string, options?: { cause?: unknown; providerCode?: string }) {
    super('PROVIDER_API_ERROR', `${operation} failed: ${message}`, { cause: options?.cause });
    this.operation = operation;
    this.providerCode = options?.providerCode;
  }
}

/**
 * Another deploy or cleanup holds the lock for this stack
 */
export class StackLockedError extends DeploymentError {
  readonly stackName: string;

  constructor(stackName: string, holder: string) {
    super('STACK_LOCKED', `Stack ${stackName} is locked by ${holder}`);
    this.stackName = stackName;
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
