/**
 * Repositories over the blocks and block_relationships tables
 */

export * from './block-repository.js';
export * from './relationship-repository.js';
