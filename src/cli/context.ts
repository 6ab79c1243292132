/**
 * Command Context
 *
 * What a command needs from outside itself. The bin passes nothing and gets
 * the real AWS providers, process.env and the terminal prompt; tests pass
 * fakes.
 */

import type { BaseOptions, ConfigValue, DeploymentConfiguration } from '../types/index.js';
import { createAwsProviders, type DeploymentProviders } from '../providers/index.js';
import { getProjectConfigDir } from '../constants/config-files.js';
import { getString } from '../utils/config-helpers.js';
import { ConfigurationError } from '../utils/errors.js';
import { resolve, validateStackName } from '../utils/config-resolver.js';
import { confirmWithYes, type ConfirmPrompt } from '../utils/prompts.js';
import type { Sleep } from '../utils/retry.js';

export interface CommandContext {
  createProviders?: (region: string, config: DeploymentConfiguration) => DeploymentProviders;
  env?: Record<string, string | undefined>;
  confirm?: ConfirmPrompt;
  sleep?: Sleep;
  /** Base directory for stack lock files */
  lockDir?: string;
}

/**
 * Resolve the configuration for a command. A stack name passed in is
 * validated even when the required-key check is skipped, since it ends up
 * in resource, file and lock names.
 */
export function resolveCommandConfig(
  deploymentType: string | undefined,
  environment: string | undefined,
  overrides: Record<string, ConfigValue | undefined>,
  options: BaseOptions,
  context: CommandContext,
  allowIncomplete = false
): DeploymentConfiguration {
  const stackName = overrides['stack.name'];
  if (typeof stackName === 'string') {
    const problem = validateStackName(stackName);
    if (problem) throw new ConfigurationError(problem, ['stack.name']);
  }

  const rootDir = options.rootDir ?? process.cwd();
  return resolve(deploymentType, environment, overrides, {
    configDir: getProjectConfigDir(rootDir, options.configDir),
    env: context.env,
    allowIncomplete,
  });
}

export function providersFor(config: DeploymentConfiguration, context: CommandContext): DeploymentProviders {
  const region = getString(config, 'aws.region');
  if (context.createProviders) {
    return context.createProviders(region, config);
  }
  return createAwsProviders(region, {
    logGroupPrefix: getString(config, 'monitoring.log_group', '/aws/aistack'),
    sleep: context.sleep,
  });
}

export function confirmFor(context: CommandContext): ConfirmPrompt {
  return context.confirm ?? confirmWithYes;
}

/**
 * Commander hands numeric flags over as strings
 */
export function parseNumberFlag(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${flag} must be a number (got '${value}')`);
  }
  return parsed;
}
