/**
 * Utilities Index
 *
 * Re-exports all utility modules.
 */

export * from './errors.js';
export * from './config-helpers.js';
export * from './config-resolver.js';
export * from './retry.js';
export * from './stack-lock.js';
export * from './prompts.js';
export * from './deployment-report.js';
