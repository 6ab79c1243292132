/**
 * Configuration Types
 *
 * Types for the layered deployment configuration (defaults.yml,
 * deployment-types.yml, environments/<env>.yml, env vars, CLI flags).
 */

/**
 * Supported deployment variants
 */
export type DeploymentType = 'spot' | 'ondemand' | 'simple';

export const DEPLOYMENT_TYPES: readonly DeploymentType[] = ['spot', 'ondemand', 'simple'];

/**
 * A single resolved configuration value
 */
export type ConfigValue = string | number | boolean;

/**
 * Flat mapping from dotted key (e.g. 'aws.region', 'services.ollama.port')
 * to scalar value. Frozen once resolved.
 */
export type DeploymentConfiguration = Readonly<Record<string, ConfigValue>>;

/**
 * One layer of configuration before merging
 */
export type ConfigLayer = Record<string, ConfigValue>;

/**
 * Options for resolve()
 */
export interface ResolveOptions {
  /** Directory holding defaults.yml, deployment-types.yml and environments/ */
  configDir?: string;
  /** Environment variables to read (defaults to process.env) */
  env?: Record<string, string | undefined>;
  /** Skip the required-key check (used by read-only commands) */
  allowIncomplete?: boolean;
}
