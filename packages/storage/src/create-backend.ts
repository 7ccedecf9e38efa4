/**
 * Storage Factory
 *
 * Opens a better-sqlite3 backend and brings its schema up to date.
 */

import { createLogger } from '@blockstore/core';
import type { StorageBackend } from './backend.js';
import type { StorageConfig } from './types.js';
import { createNodeStorage } from './node-backend.js';
import { initializeSchema } from './schema.js';

const logger = createLogger('storage');

export interface CreateStorageOptions {
  /** Apply pending migrations after opening (default: true) */
  migrate?: boolean;
}

/**
 * Create a storage backend.
 *
 * @example
 * ```typescript
 * import { createStorage } from '@blockstore/storage';
 *
 * const storage = createStorage({ path: './blocks.db' });
 * ```
 */
export function createStorage(config: StorageConfig, options: CreateStorageOptions = {}): StorageBackend {
  const backend = createNodeStorage(config);
  if (options.migrate === false) {
    return backend;
  }
  try {
    const result = initializeSchema(backend);
    if (result.applied.length > 0) {
      logger.info(`Schema at version ${result.toVersion} (was ${result.fromVersion})`);
    }
  } catch (error) {
    backend.close();
    throw error;
  }
  return backend;
}
