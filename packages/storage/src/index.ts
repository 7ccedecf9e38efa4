/**
 * @blockstore/storage
 *
 * Synchronous SQLite storage layer for the block store, backed by
 * better-sqlite3.
 */

// Type definitions
export type {
  Row,
  MutationResult,
  PreparedStatement,
  IsolationLevel,
  TransactionOptions,
  Transaction,
  SqlitePragmas,
  JournalMode,
  StorageConfig,
  SqlValue,
  SqlFunction,
  SqlFunctionOptions,
  Migration,
  MigrationResult,
} from './types.js';

export { DEFAULT_PRAGMAS } from './types.js';

// Backend interface
export type { StorageBackend, StorageFactory } from './backend.js';

// Error mapping
export {
  SqliteResultCode,
  isBusyError,
  isConstraintViolation,
  isUniqueViolation,
  isForeignKeyViolation,
  isCorruptionError,
  mapStorageError,
  connectionError,
  migrationError,
} from './errors.js';
export type { StorageErrorContext } from './errors.js';

// Backends
export { NodeStorageBackend, createNodeStorage } from './node-backend.js';
export { createStorage } from './create-backend.js';
export type { CreateStorageOptions } from './create-backend.js';

// Schema management
export {
  CURRENT_SCHEMA_VERSION,
  MIGRATIONS,
  EXPECTED_TABLES,
  initializeSchema,
  isSchemaUpToDate,
  getPendingMigrations,
  resetSchema,
  validateSchema,
  getTableColumns,
  getTableIndexes,
} from './schema.js';
