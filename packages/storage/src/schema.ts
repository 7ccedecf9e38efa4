/**
 * Schema Management
 *
 * Defines the database schema migrations for the block store.
 * Schema version lives in PRAGMA user_version.
 */

import type { Migration, MigrationResult } from './types.js';
import type { StorageBackend } from './backend.js';

// ============================================================================
// Schema Constants
// ============================================================================

export const CURRENT_SCHEMA_VERSION = 2;

// ============================================================================
// Migrations
// ============================================================================

/**
 * Migration 1: block rows
 *
 * One row per block. children_ids, properties, metadata and content are JSON
 * text so the filter compiler can address them with json_extract.
 */
const migration001: Migration = {
  version: 1,
  description: 'Create blocks table',
  up: `
CREATE TABLE blocks (
    id TEXT PRIMARY KEY,
    type TEXT NOT NULL,
    parent_id TEXT,
    root_id TEXT NOT NULL,
    children_ids TEXT NOT NULL DEFAULT '[]',
    workspace_id TEXT,
    in_trash INTEGER NOT NULL DEFAULT 0,
    version INTEGER NOT NULL DEFAULT 0,
    created_time TEXT NOT NULL,
    last_edited_time TEXT NOT NULL,
    created_by TEXT,
    last_edited_by TEXT,
    properties TEXT NOT NULL DEFAULT '{}',
    metadata TEXT NOT NULL DEFAULT '{}',
    content TEXT,
    properties_version INTEGER,
    CHECK (in_trash IN (0, 1)),
    CHECK (version >= 0)
);

CREATE INDEX ix_blocks_root_type ON blocks(root_id, type);
CREATE INDEX ix_blocks_parent ON blocks(parent_id);
CREATE INDEX ix_blocks_workspace_root ON blocks(workspace_id, root_id);
CREATE INDEX ix_blocks_in_trash ON blocks(in_trash);
`,
  down: `
DROP INDEX IF EXISTS ix_blocks_in_trash;
DROP INDEX IF EXISTS ix_blocks_workspace_root;
DROP INDEX IF EXISTS ix_blocks_parent;
DROP INDEX IF EXISTS ix_blocks_root_type;
DROP TABLE IF EXISTS blocks;
`,
};

/**
 * Migration 2: relationships between blocks
 *
 * Hard-deleting either endpoint removes the edge.
 */
const migration002: Migration = {
  version: 2,
  description: 'Create block_relationships table',
  up: `
CREATE TABLE block_relationships (
    id TEXT PRIMARY KEY,
    workspace_id TEXT,
    source_block_id TEXT NOT NULL REFERENCES blocks(id) ON DELETE CASCADE,
    target_block_id TEXT NOT NULL REFERENCES blocks(id) ON DELETE CASCADE,
    rel_type TEXT NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',
    version INTEGER NOT NULL DEFAULT 0,
    created_time TEXT NOT NULL,
    last_edited_time TEXT NOT NULL,
    created_by TEXT,
    last_edited_by TEXT
);

CREATE INDEX ix_relationships_source ON block_relationships(source_block_id);
CREATE INDEX ix_relationships_target ON block_relationships(target_block_id);
CREATE INDEX ix_relationships_type ON block_relationships(rel_type);
CREATE UNIQUE INDEX ix_relationships_unique
    ON block_relationships(source_block_id, target_block_id, rel_type);
`,
  down: `
DROP INDEX IF EXISTS ix_relationships_unique;
DROP INDEX IF EXISTS ix_relationships_type;
DROP INDEX IF EXISTS ix_relationships_target;
DROP INDEX IF EXISTS ix_relationships_source;
DROP TABLE IF EXISTS block_relationships;
`,
};

/**
 * All migrations in order
 */
export const MIGRATIONS: readonly Migration[] = [migration001, migration002];

// ============================================================================
// Schema Functions
// ============================================================================

/**
 * Apply all pending migrations
 */
export function initializeSchema(backend: StorageBackend): MigrationResult {
  return backend.migrate([...MIGRATIONS]);
}

export function isSchemaUpToDate(backend: StorageBackend): boolean {
  return backend.getSchemaVersion() === CURRENT_SCHEMA_VERSION;
}

export function getPendingMigrations(backend: StorageBackend): Migration[] {
  const currentVersion = backend.getSchemaVersion();
  return MIGRATIONS.filter((m) => m.version > currentVersion);
}

/**
 * Drop every table and reset the version. Test use only.
 */
export function resetSchema(backend: StorageBackend): void {
  for (const migration of [...MIGRATIONS].reverse()) {
    if (migration.down) {
      backend.exec(migration.down);
    }
  }
  backend.setSchemaVersion(0);
}

// ============================================================================
// Schema Validation
// ============================================================================

export const EXPECTED_TABLES = ['blocks', 'block_relationships'] as const;

/**
 * Compare the tables present against {@link EXPECTED_TABLES}
 */
export function validateSchema(backend: StorageBackend): {
  valid: boolean;
  missingTables: string[];
  extraTables: string[];
} {
  const rows = backend.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'"
  );

  const actualTables = new Set(rows.map((r) => r.name));
  const expectedSet = new Set<string>(EXPECTED_TABLES);

  const missingTables = EXPECTED_TABLES.filter((t) => !actualTables.has(t));
  const extraTables = [...actualTables].filter((t) => !expectedSet.has(t));

  return {
    valid: missingTables.length === 0,
    missingTables,
    extraTables,
  };
}

export function getTableColumns(
  backend: StorageBackend,
  tableName: string
): Array<{
  name: string;
  type: string;
  notnull: boolean;
  pk: boolean;
}> {
  const rows = backend.query<{
    name: string;
    type: string;
    notnull: number;
    pk: number;
  }>(`PRAGMA table_info(${tableName})`);

  return rows.map((r) => ({
    name: r.name,
    type: r.type,
    notnull: r.notnull === 1,
    pk: r.pk === 1,
  }));
}

export function getTableIndexes(backend: StorageBackend, tableName: string): string[] {
  const rows = backend.query<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND name NOT LIKE 'sqlite_%'`,
    [tableName]
  );
  return rows.map((r) => r.name);
}
