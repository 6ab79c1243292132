/**
 * Health Command
 *
 * Polls the n8n, Ollama, Qdrant and Crawl4AI endpoints on a host.
 */

import type { HealthCommandOptions, HealthCommandResult } from '../types/index.js';
import { allHealthy, buildServiceEndpoints, checkHealth, healthOptionsFromConfig, printHealthResults } from '../health/index.js';
import { errorMessage } from '../utils/errors.js';
import { parseNumberFlag, providersFor, resolveCommandConfig, type CommandContext } from './context.js';

export async function health(
  host: string,
  options: HealthCommandOptions = {},
  context: CommandContext = {}
): Promise<HealthCommandResult> {
  try {
    const config = resolveCommandConfig(
      undefined,
      options.environment,
      {
        'aws.region': options.region,
        'health.max_attempts': parseNumberFlag(options.attempts, '--attempts'),
        'health.interval_seconds': parseNumberFlag(options.interval, '--interval'),
      },
      options,
      context,
      true
    );

    const endpoints = buildServiceEndpoints(config, host);
    console.log(`\n🩺 Checking ${endpoints.length} services on ${host || '(no host)'}...`);

    const results = await checkHealth(
      endpoints,
      { ...healthOptionsFromConfig(config), verbose: options.verbose },
      providersFor(config, context).http,
      context.sleep
    );
    printHealthResults(results);

    if (!allHealthy(results)) {
      const failing = results.filter((r) => r.status !== 'healthy').map((r) => r.serviceName);
      return { success: false, error: `Not healthy: ${failing.join(', ')}`, results };
    }
    console.log('\n[OK] All services healthy');
    return { success: true, results };
  } catch (e) {
    const message = errorMessage(e);
    console.log(`\n[ERROR] ${message}`);
    return { success: false, error: message };
  }
}

export default health;
