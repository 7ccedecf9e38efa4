/**
 * Node.js SQLite Backend Implementation
 *
 * Implements the StorageBackend interface using better-sqlite3.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement, RunResult } from 'better-sqlite3';
import { createLogger, invalidInput } from '@blockstore/core';
import type { StorageBackend, StorageFactory } from './backend.js';
import type {
  Row,
  MutationResult,
  PreparedStatement,
  Transaction,
  TransactionOptions,
  IsolationLevel,
  StorageConfig,
  SqlFunction,
  SqlFunctionOptions,
  Migration,
  MigrationResult,
  SqlitePragmas,
} from './types.js';
import { DEFAULT_PRAGMAS } from './types.js';
import { connectionError, mapStorageError, migrationError } from './errors.js';

const logger = createLogger('storage');

/** SQLite rejects undefined bindings */
function toBindings(params: unknown[] | undefined): unknown[] {
  return (params ?? []).map((p) => (p === undefined ? null : p));
}

// ============================================================================
// Prepared Statement Wrapper
// ============================================================================

/**
 * Wraps a better-sqlite3 Statement to implement PreparedStatement interface
 */
class NodePreparedStatement<T extends Row = Row> implements PreparedStatement<T> {
  constructor(private stmt: Statement<unknown[], T>) {}

  all(...params: unknown[]): T[] {
    return this.stmt.all(...toBindings(params));
  }

  get(...params: unknown[]): T | undefined {
    return this.stmt.get(...toBindings(params));
  }

  run(...params: unknown[]): MutationResult {
    const result: RunResult = this.stmt.run(...toBindings(params));
    return {
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    };
  }

  finalize(): void {
    // better-sqlite3 releases statements on GC
  }
}

// ============================================================================
// Transaction Implementation
// ============================================================================

/**
 * Transaction context for better-sqlite3
 */
class NodeTransaction implements Transaction {
  constructor(private backend: NodeStorageBackend) {}

  exec(sql: string): void {
    this.backend.exec(sql);
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    return this.backend.query<T>(sql, params);
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    return this.backend.queryOne<T>(sql, params);
  }

  run(sql: string, params?: unknown[]): MutationResult {
    return this.backend.run(sql, params);
  }

  savepoint(name: string): void {
    this.backend.exec(`SAVEPOINT ${name}`);
  }

  release(name: string): void {
    this.backend.exec(`RELEASE SAVEPOINT ${name}`);
  }

  rollbackTo(name: string): void {
    this.backend.exec(`ROLLBACK TO SAVEPOINT ${name}`);
  }
}

// ============================================================================
// Node.js Storage Backend
// ============================================================================

/**
 * Node.js SQLite storage backend implementation using better-sqlite3
 */
export class NodeStorageBackend implements StorageBackend {
  private db: DatabaseType | null;
  private readonly _path: string;
  /** Open transaction depth; anything above 1 is a savepoint */
  private depth = 0;

  constructor(config: StorageConfig) {
    this._path = config.path;

    try {
      this.db = new Database(config.path, {
        readonly: config.readonly ?? false,
        fileMustExist: config.create === false,
        verbose: config.verbose ? (message) => logger.debug(String(message)) : undefined,
      });
      this.applyPragmas(this.db, config.pragmas);
    } catch (error) {
      throw connectionError(config.path, error);
    }
    logger.debug(`Opened database at ${config.path}`);
  }

  private applyPragmas(db: DatabaseType, pragmas?: SqlitePragmas): void {
    const settings = { ...DEFAULT_PRAGMAS, ...pragmas };

    // In-memory databases report 'memory' regardless of the requested mode
    db.pragma(`journal_mode = ${settings.journal_mode}`);
    db.pragma(`synchronous = ${settings.synchronous}`);
    db.pragma(`foreign_keys = ${settings.foreign_keys ? 'ON' : 'OFF'}`);
    db.pragma(`busy_timeout = ${settings.busy_timeout}`);
    db.pragma(`cache_size = ${settings.cache_size}`);

    const tempStoreValue = settings.temp_store === 'memory' ? 2 : settings.temp_store === 'file' ? 1 : 0;
    db.pragma(`temp_store = ${tempStoreValue}`);
  }

  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  get isOpen(): boolean {
    return this.db !== null;
  }

  get path(): string {
    return this._path;
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.debug(`Closed database at ${this._path}`);
    }
  }

  private ensureOpen(): DatabaseType {
    if (!this.db) {
      throw connectionError(this._path, new Error('Database is closed'));
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // SQL Execution
  // --------------------------------------------------------------------------

  exec(sql: string): void {
    try {
      this.ensureOpen().exec(sql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'exec' });
    }
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    try {
      const stmt = this.ensureOpen().prepare(sql);
      return stmt.all(...toBindings(params)) as T[];
    } catch (error) {
      throw mapStorageError(error, { operation: 'query' });
    }
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    try {
      const stmt = this.ensureOpen().prepare(sql);
      return stmt.get(...toBindings(params)) as T | undefined;
    } catch (error) {
      throw mapStorageError(error, { operation: 'queryOne' });
    }
  }

  run(sql: string, params?: unknown[]): MutationResult {
    try {
      const stmt = this.ensureOpen().prepare(sql);
      const result = stmt.run(...toBindings(params));
      return {
        changes: result.changes,
        lastInsertRowid: result.lastInsertRowid,
      };
    } catch (error) {
      throw mapStorageError(error, { operation: 'run' });
    }
  }

  // --------------------------------------------------------------------------
  // Prepared Statements
  // --------------------------------------------------------------------------

  prepare<T extends Row = Row>(sql: string): PreparedStatement<T> {
    try {
      const stmt = this.ensureOpen().prepare<unknown[], T>(sql);
      return new NodePreparedStatement<T>(stmt);
    } catch (error) {
      throw mapStorageError(error, { operation: 'prepare' });
    }
  }

  registerFunction(name: string, fn: SqlFunction, options: SqlFunctionOptions = {}): void {
    try {
      this.ensureOpen().function(
        name,
        { deterministic: options.deterministic ?? false, varargs: options.varargs ?? false },
        fn
      );
    } catch (error) {
      throw mapStorageError(error, { operation: 'registerFunction' });
    }
  }

  // --------------------------------------------------------------------------
  // Transactions
  // --------------------------------------------------------------------------

  transaction<T>(fn: (tx: Transaction) => T, options?: TransactionOptions): T {
    const db = this.ensureOpen();
    const tx = new NodeTransaction(this);

    if (this.depth > 0) {
      return this.nested(tx, fn);
    }

    try {
      db.exec(this.getBeginSql(options?.isolation ?? 'deferred'));
    } catch (error) {
      throw mapStorageError(error, { operation: 'begin' });
    }
    this.depth = 1;
    try {
      const result = fn(tx);
      db.exec('COMMIT');
      return result;
    } catch (error) {
      this.rollback(() => db.exec('ROLLBACK'));
      throw mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.depth = 0;
    }
  }

  private nested<T>(tx: NodeTransaction, fn: (tx: Transaction) => T): T {
    const name = `sp_${this.depth}`;
    tx.savepoint(name);
    this.depth += 1;
    try {
      const result = fn(tx);
      tx.release(name);
      return result;
    } catch (error) {
      this.rollback(() => {
        tx.rollbackTo(name);
        tx.release(name);
      });
      throw mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.depth -= 1;
    }
  }

  /**
   * Runs a rollback step. SQLite may already have rolled back on its own
   * (for example after SQLITE_FULL), in which case the statement fails.
   */
  private rollback(step: () => void): void {
    try {
      step();
    } catch (error) {
      logger.warn('Rollback failed', error instanceof Error ? error.message : String(error));
    }
  }

  private getBeginSql(isolation: IsolationLevel): string {
    switch (isolation) {
      case 'immediate':
        return 'BEGIN IMMEDIATE';
      case 'exclusive':
        return 'BEGIN EXCLUSIVE';
      case 'deferred':
      default:
        return 'BEGIN DEFERRED';
    }
  }

  // --------------------------------------------------------------------------
  // Schema Management
  // --------------------------------------------------------------------------

  getSchemaVersion(): number {
    const result: unknown = this.ensureOpen().pragma('user_version', { simple: true });
    return typeof result === 'number' ? result : 0;
  }

  setSchemaVersion(version: number): void {
    if (!Number.isInteger(version) || version < 0) {
      throw invalidInput('version', version, 'non-negative integer');
    }
    this.ensureOpen().pragma(`user_version = ${version}`);
  }

  migrate(migrations: Migration[]): MigrationResult {
    const fromVersion = this.getSchemaVersion();
    const pending = migrations
      .filter((m) => m.version > fromVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      return { fromVersion, toVersion: fromVersion, applied: [], success: true };
    }

    const applied: number[] = [];
    for (const migration of pending) {
      try {
        this.transaction(() => {
          this.exec(migration.up);
          this.setSchemaVersion(migration.version);
        }, { isolation: 'immediate' });
      } catch (error) {
        throw migrationError(migration.version, error);
      }
      applied.push(migration.version);
      logger.info(`Applied migration ${migration.version}: ${migration.description}`);
    }

    return {
      fromVersion,
      toVersion: this.getSchemaVersion(),
      applied,
      success: true,
    };
  }

  // --------------------------------------------------------------------------
  // Utilities
  // --------------------------------------------------------------------------

  checkIntegrity(): boolean {
    try {
      const result: unknown = this.ensureOpen().pragma('integrity_check', { simple: true });
      return result === 'ok';
    } catch (error) {
      logger.warn('Integrity check failed', error instanceof Error ? error.message : String(error));
      return false;
    }
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new Node.js storage backend
 */
export const createNodeStorage: StorageFactory = (config: StorageConfig): StorageBackend => {
  return new NodeStorageBackend(config);
};
