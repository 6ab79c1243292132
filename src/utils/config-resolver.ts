/**
 * Configuration Resolver
 *
 * Builds the flat DeploymentConfiguration from, lowest precedence first:
 *
 *   defaults            config/defaults.yml (package, then project)
 *   deployment-type     config/deployment-types.yml[<type>]
 *   environment         config/environments/<env>.yml
 *   process-env         AWS_REGION, INSTANCE_TYPE, SPOT_PRICE, ...
 *   cli                 flags passed by the caller
 *
 * This is the only module that reads environment variables. Everything
 * downstream receives the frozen result.
 */

import * as path from 'path';

import type {
  ConfigLayer,
  ConfigValue,
  DeploymentConfiguration,
  DeploymentType,
  ResolveOptions,
} from '../types/index.js';
import { DEPLOYMENT_TYPES } from '../types/index.js';
import {
  DEFAULTS_FILENAME,
  DEPLOYMENT_TYPES_FILENAME,
  getBuiltinConfigDir,
  getEnvironmentConfigPath,
} from '../constants/config-files.js';
import {
  compactLayer,
  flattenConfig,
  flattenSection,
  getNumber,
  getOptionalString,
  loadYamlFile,
  mergeLayers,
} from './config-helpers.js';
import { ConfigurationError } from './errors.js';

/**
 * Environment variables read into the process-env layer
 */
export const ENV_VAR_KEYS: Record<string, string> = {
  AWS_REGION: 'aws.region',
  ENVIRONMENT: 'environment.name',
  INSTANCE_TYPE: 'instance.type',
  SPOT_PRICE: 'spot.max_price',
  SETUP_ALB: 'features.alb',
  SETUP_CLOUDFRONT: 'features.cloudfront',
  USE_LATEST_IMAGES: 'images.use_latest',
  CLEANUP_ON_FAILURE: 'cleanup.on_failure',
  MAX_HEALTH_CHECK_ATTEMPTS: 'health.max_attempts',
  HEALTH_CHECK_INTERVAL: 'health.interval_seconds',
  KEY_NAME: 'instance.key_name',
};

const DEFAULT_DEPLOYMENT_TYPE: DeploymentType = 'spot';

const STACK_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]*$/;
const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

export function isDeploymentType(value: string): value is DeploymentType {
  return DEPLOYMENT_TYPES.some((t) => t === value);
}

/**
 * Normalize the requested deployment type.
 *
 * Empty means spot. An unrecognised value keeps only the global defaults:
 * no deployment-type layer is applied, so keys such as instance.type stay
 * unset unless another layer provides them.
 */
export function normalizeDeploymentType(requested: string | undefined): {
  type: DeploymentType;
  known: boolean;
} {
  const value = (requested ?? '').trim().toLowerCase();
  if (!value) return { type: DEFAULT_DEPLOYMENT_TYPE, known: true };
  if (isDeploymentType(value)) return { type: value, known: true };
  return { type: DEFAULT_DEPLOYMENT_TYPE, known: false };
}

/**
 * Stack names become resource name prefixes, so they must be safe for every service
 */
export function validateStackName(stackName: string): string | null {
  if (!stackName) return 'Stack name cannot be empty';
  if (stackName.length > 128) return `Stack name too long (max 128 characters): ${stackName}`;
  if (!STACK_NAME_PATTERN.test(stackName)) {
    return `Invalid stack name '${stackName}'. Must start with a letter and contain only letters, digits and hyphens`;
  }
  return null;
}

export function isLikelyRegion(region: string): boolean {
  return REGION_PATTERN.test(region);
}

function readDeploymentTypeTable(configDir: string): Record<string, unknown> | null {
  return loadYamlFile(path.join(configDir, DEPLOYMENT_TYPES_FILENAME));
}

function readDefaults(configDir: string): ConfigLayer {
  const defaults = loadYamlFile(path.join(configDir, DEFAULTS_FILENAME));
  return defaults ? flattenConfig(defaults) : {};
}

function readEnvironment(configDir: string, environment: string): ConfigLayer {
  const envConfig = loadYamlFile(getEnvironmentConfigPath(configDir, environment));
  return envConfig ? flattenConfig(envConfig) : {};
}

/**
 * Both the package's config directory and the project's contribute to
 * each layer; the project's files win within a layer.
 */
function configDirs(options: ResolveOptions): string[] {
  const builtin = getBuiltinConfigDir();
  if (!options.configDir || path.resolve(options.configDir) === path.resolve(builtin)) {
    return [builtin];
  }
  return [builtin, options.configDir];
}

/**
 * Process environment layer
 */
export function readEnvLayer(env: Record<string, string | undefined>): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [variable, key] of Object.entries(ENV_VAR_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      layer[key] = value;
    }
  }
  return layer;
}

function requiredKeys(type: DeploymentType, cli: ConfigLayer): string[] {
  const keys = ['aws.region', 'instance.type'];
  if (type === 'spot') keys.push('spot.max_price');
  if ('stack.name' in cli) keys.push('stack.name');
  return keys;
}

function validate(config: ConfigLayer, type: DeploymentType, cli: ConfigLayer): void {
  const frozen: DeploymentConfiguration = config;
  const missing = requiredKeys(type, cli).filter((key) => getOptionalString(frozen, key) === undefined);

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required configuration for ${type} deployment: ${missing.join(', ')}`,
      missing
    );
  }

  const stackName = getOptionalString(frozen, 'stack.name');
  if (stackName !== undefined) {
    const problem = validateStackName(stackName);
    if (problem) throw new ConfigurationError(problem, ['stack.name']);
  }

  if (type === 'spot') {
    const maxPrice = getNumber(frozen, 'spot.max_price');
    if (maxPrice <= 0) {
      throw new ConfigurationError(`spot.max_price must be greater than 0 (got ${maxPrice})`, ['spot.max_price']);
    }
  }

  const region = getOptionalString(frozen, 'aws.region');
  if (region && !isLikelyRegion(region)) {
    console.log(`[!] AWS region format may be invalid: ${region}`);
  }
}

/**
 * Resolve the configuration for one invocation.
 *
 * @param deploymentType - spot | ondemand | simple (empty means spot)
 * @param environment - Selects environments/<env>.yml; a missing file is not an error
 * @param cliOverrides - Highest precedence layer; undefined entries are ignored
 * @throws ConfigurationError when required keys are missing or malformed
 */
export function resolve(
  deploymentType: string | undefined,
  environment: string | undefined,
  cliOverrides: Record<string, ConfigValue | undefined> = {},
  options: ResolveOptions = {}
): DeploymentConfiguration {
  const env = options.env ?? process.env;
  const dirs = configDirs(options);
  const { type, known } = normalizeDeploymentType(deploymentType);

  if (!known) {
    console.log(`[!] Unknown deployment type '${deploymentType}', applying global defaults only`);
  }

  const defaults = mergeLayers(...dirs.map(readDefaults));

  const typeLayer = known
    ? mergeLayers(...dirs.map((dir) => flattenSection(readDeploymentTypeTable(dir), type)))
    : {};

  const envLayer = readEnvLayer(env);
  const cli = compactLayer(cliOverrides);

  const environmentName =
    environment?.trim() ||
    getOptionalString(envLayer, 'environment.name') ||
    getOptionalString(defaults, 'environment.name') ||
    'development';

  const environmentLayer = mergeLayers(...dirs.map((dir) => readEnvironment(dir, environmentName)));

  const merged = mergeLayers(defaults, typeLayer, environmentLayer, envLayer, cli, {
    'deployment.type': type,
    'environment.name': environmentName,
  });

  if (!options.allowIncomplete) {
    validate(merged, type, cli);
  }

  return Object.freeze(merged);
}
