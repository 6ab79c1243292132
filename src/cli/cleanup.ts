/**
 * Cleanup Command
 *
 * Tears down every resource of a stack, in dependency order, under the
 * stack lock. Partial failures end up in the report and in a non-zero exit.
 */

import type { CleanupCommandOptions, CleanupCommandResult } from '../types/index.js';
import { CleanupEngine } from '../cleanup/cleanup-engine.js';
import { formatCleanupReport } from '../utils/deployment-report.js';
import { errorMessage } from '../utils/errors.js';
import { withStackLock } from '../utils/stack-lock.js';
import { confirmFor, providersFor, resolveCommandConfig, type CommandContext } from './context.js';

export async function cleanup(
  stackName: string,
  options: CleanupCommandOptions = {},
  context: CommandContext = {}
): Promise<CleanupCommandResult> {
  console.log('════════════════════════════════════════════════════════════');
  console.log(`🧹 AISTACK CLEANUP${options.dryRun ? ' (DRY RUN)' : ''}`);
  console.log('════════════════════════════════════════════════════════════');

  try {
    // Only the region and the log group prefix matter here
    const config = resolveCommandConfig(
      undefined,
      undefined,
      { 'stack.name': stackName, 'aws.region': options.region },
      options,
      context,
      true
    );

    const engine = new CleanupEngine(providersFor(config, context).stackResources, {
      confirm: confirmFor(context),
    });

    const report = await withStackLock(
      stackName,
      'cleanup',
      () =>
        engine.cleanup(stackName, {
          dryRun: options.dryRun,
          force: options.force,
          resourceTypes: options.types,
          verbose: options.verbose,
        }),
      context.lockDir
    );

    console.log('\n' + formatCleanupReport(report));

    if (report.cancelled) {
      return { success: false, error: 'Cleanup cancelled', report };
    }
    if (report.totals.failed > 0) {
      return { success: false, error: `${report.totals.failed} resource(s) could not be deleted`, report };
    }
    return { success: true, report };
  } catch (e) {
    const message = errorMessage(e);
    console.log(`\n[ERROR] ${message}`);
    return { success: false, error: message };
  }
}

export default cleanup;
