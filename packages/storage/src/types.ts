/**
 * Storage Type Definitions
 *
 * Row, statement, transaction and configuration types for the SQLite
 * storage layer.
 */

// ============================================================================
// Query Result Types
// ============================================================================

/**
 * A single row result from a query
 */
export type Row = Record<string, unknown>;

/**
 * Result of a mutation (INSERT, UPDATE, DELETE)
 */
export interface MutationResult {
  /** Number of rows affected by the mutation */
  changes: number;
  /** Last inserted row ID */
  lastInsertRowid?: number | bigint;
}

// ============================================================================
// Prepared Statement Interface
// ============================================================================

/**
 * A prepared SQL statement that can be executed multiple times
 */
export interface PreparedStatement<T extends Row = Row> {
  all(...params: unknown[]): T[];
  get(...params: unknown[]): T | undefined;
  run(...params: unknown[]): MutationResult;
  /** Release resources associated with this statement */
  finalize(): void;
}

// ============================================================================
// Transaction Interface
// ============================================================================

/**
 * Transaction lock modes. Writers take 'immediate' so that concurrent
 * writers queue on the busy timeout instead of failing at commit.
 */
export type IsolationLevel = 'deferred' | 'immediate' | 'exclusive';

export interface TransactionOptions {
  /** Ignored for nested transactions, which always run as savepoints */
  isolation?: IsolationLevel;
}

/**
 * A database transaction context
 */
export interface Transaction {
  exec(sql: string): void;
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;
  run(sql: string, params?: unknown[]): MutationResult;

  /** Create a savepoint for nested transaction support */
  savepoint(name: string): void;
  /** Release a savepoint (commit nested transaction) */
  release(name: string): void;
  /** Rollback to a savepoint */
  rollbackTo(name: string): void;
}

// ============================================================================
// SQL Functions
// ============================================================================

/**
 * Values SQLite passes to and accepts from application-defined functions
 */
export type SqlValue = string | number | bigint | Buffer | null;

/**
 * Application-defined SQL function. Without `varargs` the declared parameter
 * count is the function's SQL arity.
 */
export type SqlFunction = (...args: SqlValue[]) => SqlValue;

export interface SqlFunctionOptions {
  /** Same inputs always give the same output (default: false) */
  deterministic?: boolean;
  /** Accept any number of arguments (default: false) */
  varargs?: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * SQLite pragma settings for database configuration
 */
export interface SqlitePragmas {
  /** Journal mode (default: WAL) */
  journal_mode?: 'delete' | 'truncate' | 'persist' | 'memory' | 'wal' | 'off';
  /** Synchronous mode (default: NORMAL) */
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  /** Foreign key enforcement (default: ON); relationship cascades depend on it */
  foreign_keys?: boolean;
  /** Busy timeout in milliseconds (default: 5000) */
  busy_timeout?: number;
  /** Cache size in pages (negative = KB) */
  cache_size?: number;
  temp_store?: 'default' | 'file' | 'memory';
}

export type JournalMode = NonNullable<SqlitePragmas['journal_mode']>;

/**
 * Configuration for storage backend initialization
 */
export interface StorageConfig {
  /** Path to the database file (or :memory: for in-memory) */
  path: string;
  pragmas?: SqlitePragmas;
  /** Create database if it doesn't exist (default: true) */
  create?: boolean;
  /** Open in read-only mode (default: false) */
  readonly?: boolean;
  /** Log every statement at DEBUG (default: false) */
  verbose?: boolean;
}

/**
 * Default pragma settings
 */
export const DEFAULT_PRAGMAS: Required<SqlitePragmas> = {
  journal_mode: 'wal',
  synchronous: 'normal',
  foreign_keys: true,
  busy_timeout: 5000,
  cache_size: -2000, // 2MB
  temp_store: 'memory',
};

// ============================================================================
// Schema Migration Types
// ============================================================================

/**
 * A database schema migration
 */
export interface Migration {
  version: number;
  description: string;
  /** SQL to apply the migration */
  up: string;
  /** SQL to rollback the migration */
  down?: string;
}

/**
 * Result of running migrations
 */
export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  /** Versions that were applied, in order */
  applied: number[];
  success: boolean;
}
