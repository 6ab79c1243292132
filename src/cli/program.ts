/**
 * CLI Program
 *
 * Registers the aistack commands with Commander. Each action runs the
 * command function and sets a non-zero exit code when it reports failure.
 */

import { Command, InvalidArgumentError } from 'commander';

import { CLEANUP_CATEGORIES, type CleanupCategory } from '../types/index.js';
import type {
  CleanupCommandOptions,
  ConfigCommandOptions,
  DeployOptions,
  HealthCommandOptions,
  RenderOptions,
  SpotPricesOptions,
} from '../types/index.js';
import { checkConfig } from './check-config.js';
import { cleanup } from './cleanup.js';
import type { CommandContext } from './context.js';
import { deploy } from './deploy.js';
import { health } from './health.js';
import { render } from './render.js';
import { spotPrices } from './spot-prices.js';

function isCleanupCategory(value: string): value is CleanupCategory {
  return CLEANUP_CATEGORIES.some((c) => c === value);
}

/**
 * --types compute,network,...
 */
export function parseCategories(value: string): CleanupCategory[] {
  const categories: CleanupCategory[] = [];
  for (const part of value.split(',').map((p) => p.trim()).filter(Boolean)) {
    if (!isCleanupCategory(part)) {
      throw new InvalidArgumentError(`Unknown resource type '${part}'. Use: ${CLEANUP_CATEGORIES.join(', ')}`);
    }
    categories.push(part);
  }
  return categories;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function finish(result: { success: boolean }): void {
  if (!result.success) {
    process.exitCode = 1;
  }
}

export function buildProgram(context: CommandContext = {}): Command {
  const program = new Command();

  program
    .name('aistack')
    .description('Deploy n8n, Ollama, Qdrant and Crawl4AI onto AWS EC2')
    .version('0.1.0');

  program
    .command('deploy')
    .description('Provision an instance and start the stack on it')
    .argument('<stackName>', 'Stack name, used as the prefix of every resource')
    .option('-t, --deployment-type <type>', 'spot, ondemand or simple')
    .option('-i, --instance-type <type>', 'EC2 instance type')
    .option('-r, --region <region>', 'AWS region')
    .option('-p, --spot-price <price>', 'Maximum spot price per hour')
    .option('-e, --environment <name>', 'Environment (selects config/environments/<name>.yml)')
    .option('-k, --key-name <name>', 'Existing EC2 key pair to use')
    .option('--setup-alb', 'Create an application load balancer')
    .option('--setup-cloudfront', 'Create a CloudFront distribution (requires --setup-alb)')
    .option('--use-pinned-images', 'Use pinned image tags instead of latest')
    .option('--cleanup-on-failure', 'Tear the stack down if the launch fails')
    .option('--skip-health-check', 'Do not wait for the services')
    .option('--output-dir <dir>', 'Also write the rendered artifacts here')
    .option('--config-dir <dir>', 'Project config directory (default ./config)')
    .option('--dry-run', 'Resolve, price and render without launching')
    .option('-f, --force', 'Launch without asking for confirmation')
    .option('-v, --verbose', 'Show every poll and API retry')
    .action(async (stackName: string, options: DeployOptions) => {
      finish(await deploy(stackName, options, context));
    });

  program
    .command('cleanup')
    .description('Delete every resource of a stack')
    .argument('<stackName>', 'Stack to tear down')
    .option('-r, --region <region>', 'AWS region')
    .option('--types <list>', `Resource categories (${CLEANUP_CATEGORIES.join(',')})`, parseCategories)
    .option('--config-dir <dir>', 'Project config directory (default ./config)')
    .option('--dry-run', 'List what would be deleted')
    .option('-f, --force', 'Delete without asking for confirmation')
    .option('-v, --verbose', 'Show more detail')
    .action(async (stackName: string, options: CleanupCommandOptions) => {
      finish(await cleanup(stackName, options, context));
    });

  program
    .command('spot-prices')
    .description('Show current spot prices per availability zone')
    .argument('<instanceType>', 'EC2 instance type')
    .option('-r, --region <region>', 'AWS region')
    .option('--max-price <price>', 'Price ceiling per hour')
    .option('--zones <list>', 'Only these availability zones', parseList)
    .option('--config-dir <dir>', 'Project config directory (default ./config)')
    .action(async (instanceType: string, options: SpotPricesOptions) => {
      finish(await spotPrices(instanceType, options, context));
    });

  program
    .command('health')
    .description('Check the service endpoints on a host')
    .argument('<host>', 'Public IP or DNS name of the instance')
    .option('-e, --environment <name>', 'Environment whose ports and timings to use')
    .option('--attempts <n>', 'Attempts per service')
    .option('--interval <seconds>', 'Base delay between attempts')
    .option('--config-dir <dir>', 'Project config directory (default ./config)')
    .option('-v, --verbose', 'Show every attempt')
    .action(async (host: string, options: HealthCommandOptions) => {
      finish(await health(host, options, context));
    });

  program
    .command('config')
    .description('Print the resolved configuration for a stack')
    .argument('<stackName>', 'Stack name')
    .option('-t, --deployment-type <type>', 'spot, ondemand or simple')
    .option('-i, --instance-type <type>', 'EC2 instance type')
    .option('-r, --region <region>', 'AWS region')
    .option('-e, --environment <name>', 'Environment')
    .option('--config-dir <dir>', 'Project config directory (default ./config)')
    .option('-v, --verbose', 'Print every key')
    .action((stackName: string, options: ConfigCommandOptions) => {
      finish(checkConfig(stackName, options, context));
    });

  program
    .command('render')
    .description('Write the Compose file, .env and user-data script for review')
    .argument('<stackName>', 'Stack name')
    .option('-t, --deployment-type <type>', 'spot, ondemand or simple')
    .option('-e, --environment <name>', 'Environment')
    .option('--use-pinned-images', 'Use pinned image tags instead of latest')
    .option('-o, --output <dir>', 'Output directory (default .)')
    .option('--config-dir <dir>', 'Project config directory (default ./config)')
    .action((stackName: string, options: RenderOptions) => {
      finish(render(stackName, options, context));
    });

  return program;
}
