/**
 * Deploy Command
 *
 * Resolves the configuration for a stack and hands it to the Deployer.
 * Errors are printed and returned, never thrown; the bin turns
 * success: false into a non-zero exit code.
 */

import type { DeployOptions, DeployResult } from '../types/index.js';
import { summarizeConfig } from '../utils/config-helpers.js';
import { errorMessage } from '../utils/errors.js';
import { Deployer } from './deployer.js';
import { confirmFor, providersFor, resolveCommandConfig, type CommandContext } from './context.js';

/**
 * Deploy the stack named stackName
 */
export async function deploy(
  stackName: string,
  options: DeployOptions = {},
  context: CommandContext = {}
): Promise<DeployResult> {
  console.log('════════════════════════════════════════════════════════════');
  console.log(`🚀 AISTACK DEPLOY${options.dryRun ? ' (DRY RUN)' : ''}`);
  console.log('════════════════════════════════════════════════════════════\n');

  try {
    const config = resolveCommandConfig(
      options.deploymentType,
      options.environment,
      {
        'stack.name': stackName,
        'aws.region': options.region,
        'instance.type': options.instanceType,
        'spot.max_price': options.spotPrice,
        'instance.key_name': options.keyName,
        'features.alb': options.setupAlb,
        'features.cloudfront': options.setupCloudfront,
        'images.use_latest': options.usePinnedImages ? false : undefined,
        'cleanup.on_failure': options.cleanupOnFailure,
      },
      options,
      context
    );

    console.log(summarizeConfig(config));

    const deployer = new Deployer(config, providersFor(config, context), {
      dryRun: options.dryRun,
      force: options.force,
      confirm: confirmFor(context),
      skipHealthCheck: options.skipHealthCheck,
      outputDir: options.outputDir,
      lockDir: context.lockDir,
      sleep: context.sleep,
      verbose: options.verbose,
    });
    const result = await deployer.deploy();

    if (result.success) {
      console.log(`\n✅ ${result.message ?? 'Deployment complete'}`);
    } else {
      console.log(`\n❌ Deployment failed: ${result.error}`);
    }
    return result;
  } catch (e) {
    const message = errorMessage(e);
    console.log(`\n❌ Deployment error: ${message}`);
    return { success: false, error: message };
  }
}

export default deploy;
