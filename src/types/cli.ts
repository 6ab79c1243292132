/**
 * CLI Types
 *
 * Types for CLI command options and results.
 */

import type { CleanupCategory, CleanupReport } from './cleanup.js';
import type { InstanceRecord, SpotPriceAnalysis } from './compute.js';
import type { HealthCheckResult } from './health.js';

/**
 * Base options shared by most commands
 */
export interface BaseOptions {
  rootDir?: string;
  configDir?: string;
  region?: string;
  verbose?: boolean;
}

/**
 * Options for the deploy command
 */
export interface DeployOptions extends BaseOptions {
  deploymentType?: string;
  instanceType?: string;
  spotPrice?: string;
  environment?: string;
  keyName?: string;
  setupAlb?: boolean;
  setupCloudfront?: boolean;
  usePinnedImages?: boolean;
  cleanupOnFailure?: boolean;
  skipHealthCheck?: boolean;
  dryRun?: boolean;
  /** Launch without asking for confirmation */
  force?: boolean;
  /** Write the rendered artifacts here as well */
  outputDir?: string;
}

/**
 * Result of a deploy run
 */
export interface DeployResult {
  success: boolean;
  message?: string;
  error?: string;
  instance?: InstanceRecord;
  health?: HealthCheckResult[];
  cleanup?: CleanupReport;
}

/**
 * Options for the cleanup command
 */
export interface CleanupCommandOptions extends BaseOptions {
  types?: CleanupCategory[];
  dryRun?: boolean;
  force?: boolean;
}

/**
 * Result of the cleanup command
 */
export interface CleanupCommandResult {
  success: boolean;
  error?: string;
  report?: CleanupReport;
}

/**
 * Options for the spot-prices command
 */
export interface SpotPricesOptions extends BaseOptions {
  maxPrice?: string;
  zones?: string[];
}

/**
 * Result of the spot-prices command
 */
export interface SpotPricesResult {
  success: boolean;
  error?: string;
  analysis?: SpotPriceAnalysis;
}

/**
 * Options for the health command
 */
export interface HealthCommandOptions extends BaseOptions {
  environment?: string;
  attempts?: string;
  interval?: string;
}

/**
 * Result of the health command
 */
export interface HealthCommandResult {
  success: boolean;
  error?: string;
  results?: HealthCheckResult[];
}

/**
 * Options for the config command
 */
export interface ConfigCommandOptions extends BaseOptions {
  deploymentType?: string;
  environment?: string;
  instanceType?: string;
}

/**
 * Options for the render command
 */
export interface RenderOptions extends BaseOptions {
  deploymentType?: string;
  environment?: string;
  usePinnedImages?: boolean;
  output?: string;
}

/**
 * Result shape shared by the simpler commands
 */
export interface CommandResult {
  success: boolean;
  error?: string;
}
