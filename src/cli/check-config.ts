/**
 * Config Command
 *
 * Resolves and prints the configuration a deploy would use, including the
 * required-key check, without calling AWS.
 */

import type { CommandResult, ConfigCommandOptions } from '../types/index.js';
import { summarizeConfig } from '../utils/config-helpers.js';
import { errorMessage } from '../utils/errors.js';
import { resolveCommandConfig, type CommandContext } from './context.js';

export function checkConfig(
  stackName: string,
  options: ConfigCommandOptions = {},
  context: CommandContext = {}
): CommandResult {
  try {
    const config = resolveCommandConfig(
      options.deploymentType,
      options.environment,
      { 'stack.name': stackName, 'aws.region': options.region, 'instance.type': options.instanceType },
      options,
      context
    );

    console.log(summarizeConfig(config));

    if (options.verbose) {
      console.log('\nAll keys:');
      for (const key of Object.keys(config).sort()) {
        console.log(`  ${key} = ${String(config[key])}`);
      }
    }

    console.log('\n[OK] Configuration is valid');
    return { success: true };
  } catch (e) {
    const message = errorMessage(e);
    console.log(`[ERROR] ${message}`);
    return { success: false, error: message };
  }
}

export default checkConfig;
