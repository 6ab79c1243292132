/**
 * CLI Commands Index
 *
 * Re-exports all CLI command modules.
 */

export { deploy } from './deploy.js';
export { cleanup } from './cleanup.js';
export { spotPrices } from './spot-prices.js';
export { health } from './health.js';
export { checkConfig } from './check-config.js';
export { render } from './render.js';
export { Deployer } from './deployer.js';
export type { DeployerOptions } from './deployer.js';
export type { CommandContext } from './context.js';
export { buildProgram } from './program.js';
