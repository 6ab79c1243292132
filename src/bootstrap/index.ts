export * from './compose.js';
export * from './env-file.js';
export * from './template.js';
export * from './user-data.js';
export * from './artifacts.js';
