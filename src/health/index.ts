export * from './endpoints.js';
export * from './health-check.js';
