/**
 * Configuration Module
 *
 * Layered configuration: defaults, `.blockstore/config.yaml`, BLOCKSTORE_*
 * environment variables and explicit overrides.
 */

export * from './types.js';
export * from './defaults.js';
export * from './duration.js';
export * from './env.js';
export * from './file.js';
export * from './merge.js';
export * from './validation.js';
export * from './config.js';
