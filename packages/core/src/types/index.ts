/**
 * Block store type definitions
 */

export * from './common.js';
export * from './block-type.js';
export * from './block-properties.js';
export * from './block.js';
export * from './relationship.js';
