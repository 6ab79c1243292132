/**
 * AWS Providers
 */

export * from './aws-helpers.js';
export * from './compute.js';
export * from './stack-resources.js';
export * from './infrastructure.js';
export * from './load-balancing.js';
export * from './monitoring.js';
