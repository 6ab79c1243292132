/**
 * Type Exports
 */

export * from './config.js';
export * from './compute.js';
export * from './cleanup.js';
export * from './health.js';
export * from './cli.js';
