/**
 * Configuration Defaults
 *
 * Lowest-precedence values, overridden by file, environment and overrides.
 */

import { DEFAULT_ROOT_TYPES } from '@blockstore/core';
import { DEFAULT_PRAGMAS } from '@blockstore/storage';
import type { Configuration, DocumentsSection, StorageSection } from './types.js';

// ============================================================================
// Time Constants (in milliseconds)
// ============================================================================

export const ONE_SECOND = 1000;

export const ONE_MINUTE = 60 * ONE_SECOND;

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_DATABASE = 'blocks.db';

export const DEFAULT_STORAGE_CONFIG: StorageSection = {
  journalMode: DEFAULT_PRAGMAS.journal_mode,
  busyTimeout: DEFAULT_PRAGMAS.busy_timeout,
};

export const DEFAULT_DOCUMENTS_CONFIG: DocumentsSection = {
  rootTypes: [...DEFAULT_ROOT_TYPES],
  treeDepth: 1,
  workspaceTitle: 'Default Workspace',
};

export const DEFAULT_CONFIG: Configuration = {
  actor: undefined,
  database: DEFAULT_DATABASE,
  storage: DEFAULT_STORAGE_CONFIG,
  documents: DEFAULT_DOCUMENTS_CONFIG,
};

// ============================================================================
// Validation Constants
// ============================================================================

/** Longest busy timeout accepted (10 minutes) */
export const MAX_BUSY_TIMEOUT = 10 * ONE_MINUTE;

// ============================================================================
// Deep Clone
// ============================================================================

/**
 * Creates a deep clone of the default configuration.
 * Use this instead of DEFAULT_CONFIG to avoid accidental mutation.
 */
export function getDefaultConfig(): Configuration {
  return {
    actor: undefined,
    database: DEFAULT_DATABASE,
    storage: { ...DEFAULT_STORAGE_CONFIG },
    documents: { ...DEFAULT_DOCUMENTS_CONFIG, rootTypes: [...DEFAULT_DOCUMENTS_CONFIG.rootTypes] },
  };
}
