/**
 * @blockstore/store
 *
 * Block and relationship repositories, the filter expression engine, the
 * document store façade, and configuration for opening a store.
 */

// Filters - where clauses, property filters and their SQL compiler
export * from './filters/index.js';

// Repositories - persistence and structural mutation
export * from './repositories/index.js';

// API - document store façade
export * from './api/index.js';

// Services - workspace bootstrap
export { ensureWorkspace, type EnsureWorkspaceOptions } from './services/workspace.js';

// Configuration
export * from './config/index.js';

// Assembly
export { createBlockStore, resolveDatabasePath } from './block-store.js';
export type { BlockStore, CreateBlockStoreOptions } from './block-store.js';
