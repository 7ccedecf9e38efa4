/**
 * @blockstore/core
 *
 * Block and relationship models, structured errors, and shared utilities.
 * This package provides the foundational building blocks used across
 * the block store packages.
 */

// Types - block, properties registry, relationship
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';

// Utils - logging
export * from './utils/index.js';
