/**
 * @bgctl/shared
 * Types, errors, schemas and constants shared by every bgctl workspace
 */

export * from './errors/index.js';
export * from './types/pool.js';
export * from './types/deployment.js';
export * from './schemas/settings.js';
export * from './constants/index.js';
