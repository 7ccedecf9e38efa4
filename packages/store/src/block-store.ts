/**
 * Block store assembly
 *
 * Resolves configuration, opens the database and wires the repositories and
 * the document store over one connection.
 */

import * as path from 'node:path';
import { createStorage, type StorageBackend } from '@blockstore/storage';
import { createLogger, type Block } from '@blockstore/core';
import { DocumentStoreImpl } from './api/document-store.js';
import type { DocumentStore } from './api/types.js';
import { getConfigDir, loadConfig } from './config/config.js';
import type { Configuration, LoadConfigOptions } from './config/types.js';
import { BlockRepository } from './repositories/block-repository.js';
import { RelationshipRepository } from './repositories/relationship-repository.js';
import { ensureWorkspace, type EnsureWorkspaceOptions } from './services/workspace.js';

const logger = createLogger('block-store');

const MEMORY_DATABASE = ':memory:';

// ============================================================================
// Types
// ============================================================================

export interface CreateBlockStoreOptions extends LoadConfigOptions {
  /** Database path; takes precedence over every configuration layer */
  database?: string;
}

export interface BlockStore {
  backend: StorageBackend;
  blocks: BlockRepository;
  relationships: RelationshipRepository;
  documents: DocumentStore;
  /** Configuration the store was opened with */
  config: Configuration;
  /** Workspace bootstrap; new workspaces are stamped with the configured actor */
  ensureWorkspace(options?: EnsureWorkspaceOptions): Block<'workspace'>;
  close(): void;
}

// ============================================================================
// Database Helpers
// ============================================================================

/**
 * Resolves a configured database path. Relative paths are taken from the
 * configuration directory when one was found, else from baseDir.
 */
export function resolveDatabasePath(database: string, baseDir: string): string {
  if (database === MEMORY_DATABASE || path.isAbsolute(database)) {
    return database;
  }
  return path.resolve(baseDir, database);
}

/**
 * Open a block store.
 *
 * @example
 * ```typescript
 * const store = createBlockStore({ database: ':memory:' });
 * const docs = store.documents.listDocuments();
 * store.close();
 * ```
 */
export function createBlockStore(options: CreateBlockStoreOptions = {}): BlockStore {
  const { database, ...loadOptions } = options;
  const config = loadConfig(
    database === undefined ? loadOptions : { ...loadOptions, overrides: { ...loadOptions.overrides, database } }
  );

  const baseDir = getConfigDir() ?? path.resolve(options.startDir ?? process.cwd());
  const dbPath = resolveDatabasePath(config.database, baseDir);

  const backend = createStorage({
    path: dbPath,
    pragmas: {
      journal_mode: config.storage.journalMode,
      busy_timeout: config.storage.busyTimeout,
    },
  });
  const blocks = new BlockRepository(backend);
  const relationships = new RelationshipRepository(backend);
  const documents = new DocumentStoreImpl(blocks, relationships, {
    rootTypes: config.documents.rootTypes,
    treeDepth: config.documents.treeDepth,
  });

  logger.info(`Opened block store at ${dbPath}`);

  return {
    backend,
    blocks,
    relationships,
    documents,
    config,
    ensureWorkspace: (workspaceOptions = {}) =>
      ensureWorkspace(documents, { actor: config.actor, ...workspaceOptions }),
    close: () => backend.close(),
  };
}
