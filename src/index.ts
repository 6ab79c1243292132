/**
 * aistack-deploy
 * Main entry point for programmatic usage
 */

export * from './types/index.js';
export * from './utils/index.js';

export * from './bootstrap/index.js';
export * from './health/index.js';
export * from './spot/spot-pricing.js';
export * from './provisioner/instance-provisioner.js';
export * from './cleanup/cleanup-engine.js';

export * from './providers/index.js';
export * from './providers/aws/index.js';
export { NodeHttpClient } from './providers/http/node-http-client.js';

export * from './cli/index.js';
