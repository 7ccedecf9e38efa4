/**
 * Storage Backend Interface
 *
 * The synchronous contract the repositories program against. SQLite calls
 * are synchronous, so the interface is too; callers that need async can wrap
 * it at the edge.
 */

import type {
  Row,
  MutationResult,
  PreparedStatement,
  Transaction,
  TransactionOptions,
  StorageConfig,
  SqlFunction,
  SqlFunctionOptions,
  Migration,
  MigrationResult,
} from './types.js';

// ============================================================================
// Storage Backend Interface
// ============================================================================

export interface StorageBackend {
  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  /**
   * Check if the database connection is open
   */
  readonly isOpen: boolean;

  /**
   * Get the path to the database file
   */
  readonly path: string;

  /**
   * Close the database connection.
   * After closing, no further operations can be performed.
   */
  close(): void;

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  /**
   * Execute a SQL statement without returning results.
   * Use for DDL statements and batch scripts.
   *
   * @throws StorageError on SQL syntax error or constraint violation
   */
  exec(sql: string): void;

  /**
   * Execute a parameterized query and return all matching rows.
   *
   * @param sql - The SQL query with ? placeholders
   * @param params - Parameter values to bind to placeholders
   * @throws StorageError on query error
   */
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];

  /**
   * Execute a parameterized query and return the first matching row,
   * or undefined if none match.
   */
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;

  /**
   * Execute a parameterized mutation (INSERT, UPDATE, DELETE).
   *
   * @throws ConflictError on unique violations, ConstraintError on other
   * constraint violations, StorageError otherwise
   */
  run(sql: string, params?: unknown[]): MutationResult;

  /**
   * Create a prepared statement for repeated execution.
   */
  prepare<T extends Row = Row>(sql: string): PreparedStatement<T>;

  /**
   * Register a function callable from SQL on this connection. Registering
   * the same name again replaces it. An error thrown by the function
   * propagates out of the statement that called it.
   */
  registerFunction(name: string, fn: SqlFunction, options?: SqlFunctionOptions): void;

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  /**
   * Execute a function within a database transaction.
   *
   * The transaction commits if the function returns and rolls back if it
   * throws. A call made while a transaction is already open runs inside a
   * savepoint, so a failing inner unit of work unwinds only its own writes.
   *
   * @returns The return value of the function
   * @throws The original error after rollback
   */
  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T;

  /**
   * Check if currently inside a transaction
   */
  readonly inTransaction: boolean;

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  getSchemaVersion(): number;

  setSchemaVersion(version: number): void;

  /**
   * Run pending migrations to bring schema up to date. Each migration runs
   * in its own transaction together with the version bump.
   */
  migrate(migrations: Migration[]): MigrationResult;

  // --------------------------------------------------------------------------
  // Utilities
  // --------------------------------------------------------------------------

  /**
   * Check database integrity
   *
   * @returns true if database passes integrity check
   */
  checkIntegrity(): boolean;
}

// ============================================================================
// Storage Factory
// ============================================================================

/**
 * Factory function type for creating storage backends
 */
export type StorageFactory = (config: StorageConfig) => StorageBackend;
