/**
 * Storage Error Mapping
 *
 * Maps SQLite driver errors onto the block store error hierarchy so callers
 * never see a raw driver exception.
 */

import {
  BlockStoreError,
  StorageError,
  ConflictError,
  ConstraintError,
  ErrorCode,
  databaseError,
  migrationFailed,
} from '@blockstore/core';

// ============================================================================
// SQLite Error Codes
// ============================================================================

/**
 * Primary SQLite result codes the mapper distinguishes
 * @see https://www.sqlite.org/rescode.html
 */
export const SqliteResultCode = {
  ERROR: 1,
  /** Database file is locked */
  BUSY: 5,
  /** Table in the database is locked */
  LOCKED: 6,
  READONLY: 8,
  /** Database disk image is malformed */
  CORRUPT: 11,
  CANTOPEN: 14,
  CONSTRAINT: 19,
  /** File opened that is not a database file */
  NOTADB: 26,
} as const;

export type SqliteResultCode = (typeof SqliteResultCode)[keyof typeof SqliteResultCode];

/**
 * better-sqlite3 reports extended codes as strings ('SQLITE_CONSTRAINT_UNIQUE');
 * other drivers report the numeric primary code.
 */
function driverCode(error: Error): string | number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

function hasCode(error: Error, numeric: SqliteResultCode, name: string): boolean {
  const code = driverCode(error);
  if (typeof code === 'number') {
    return code === numeric;
  }
  return code === name || (code?.startsWith(`${name}_`) ?? false);
}

// ============================================================================
// Constraint Violation Detection
// ============================================================================

const CONSTRAINT_PATTERNS = {
  UNIQUE: /UNIQUE constraint failed/i,
  PRIMARY_KEY: /PRIMARY KEY constraint failed/i,
  FOREIGN_KEY: /FOREIGN KEY constraint failed/i,
  NOT_NULL: /NOT NULL constraint failed/i,
  CHECK: /CHECK constraint failed/i,
} as const;

/**
 * Extract table and column from constraint error message
 */
function parseConstraintError(message: string): { table?: string; column?: string } {
  // SQLite format: "UNIQUE constraint failed: tablename.columnname"
  const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
  if (match) {
    return { table: match[1], column: match[2] };
  }
  return {};
}

// ============================================================================
// Error Detection
// ============================================================================

/**
 * Check if an error is a SQLite busy/locked error
 */
export function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    hasCode(error, SqliteResultCode.BUSY, 'SQLITE_BUSY') ||
    hasCode(error, SqliteResultCode.LOCKED, 'SQLITE_LOCKED') ||
    /database is locked/i.test(error.message)
  );
}

/**
 * Check if an error is a SQLite constraint violation of any kind
 */
export function isConstraintViolation(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (hasCode(error, SqliteResultCode.CONSTRAINT, 'SQLITE_CONSTRAINT')) {
    return true;
  }
  return Object.values(CONSTRAINT_PATTERNS).some((pattern) => pattern.test(error.message));
}

export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof Error) {
    return CONSTRAINT_PATTERNS.UNIQUE.test(error.message) || CONSTRAINT_PATTERNS.PRIMARY_KEY.test(error.message);
  }
  return false;
}

export function isForeignKeyViolation(error: unknown): boolean {
  return error instanceof Error && CONSTRAINT_PATTERNS.FOREIGN_KEY.test(error.message);
}

/**
 * Check if an error indicates database corruption
 */
export function isCorruptionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    hasCode(error, SqliteResultCode.CORRUPT, 'SQLITE_CORRUPT') ||
    hasCode(error, SqliteResultCode.NOTADB, 'SQLITE_NOTADB') ||
    /malformed|corrupt|not a database/i.test(error.message)
  );
}

// ============================================================================
// Error Conversion
// ============================================================================

export interface StorageErrorContext {
  operation?: string;
  blockId?: string;
  table?: string;
}

/**
 * Convert a driver error to a block store error.
 *
 * Errors that are already block store errors pass through unchanged, so a
 * NotFoundError raised inside a transaction reaches the caller as-is.
 */
export function mapStorageError(error: unknown, context: StorageErrorContext = {}): BlockStoreError {
  if (error instanceof BlockStoreError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return databaseError(`Storage operation failed: ${String(error)}`, undefined, {
      operation: context.operation,
    });
  }

  const message = error.message;

  if (isUniqueViolation(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConflictError(
      `Record already exists${column ? ` (duplicate ${column})` : ''}`,
      ErrorCode.ALREADY_EXISTS,
      {
        blockId: context.blockId,
        table: table ?? context.table,
        column,
        operation: context.operation,
      },
      error
    );
  }

  if (isForeignKeyViolation(error)) {
    return new ConstraintError(
      'Referenced block does not exist',
      ErrorCode.CONSTRAINT_VIOLATION,
      {
        blockId: context.blockId,
        operation: context.operation,
      },
      error
    );
  }

  if (isConstraintViolation(error)) {
    const { table, column } = parseConstraintError(message);
    return new ConstraintError(
      `Database constraint violation: ${message}`,
      ErrorCode.CONSTRAINT_VIOLATION,
      {
        table: table ?? context.table,
        column,
        operation: context.operation,
      },
      error
    );
  }

  if (isBusyError(error)) {
    return new StorageError(
      'Database is busy. Please retry the operation.',
      ErrorCode.DATABASE_BUSY,
      {
        operation: context.operation,
        retryable: true,
      },
      error
    );
  }

  if (isCorruptionError(error)) {
    return databaseError('Database is corrupted or not a valid database file', error, {
      operation: context.operation,
      corrupted: true,
    });
  }

  return databaseError(`Database operation failed: ${message}`, error, {
    sqliteCode: driverCode(error),
    operation: context.operation,
    blockId: context.blockId,
  });
}

// ============================================================================
// Error Helper Functions
// ============================================================================

/**
 * Create a storage error for connection failures
 */
export function connectionError(path: string, error: unknown): StorageError {
  if (!(error instanceof Error)) {
    return databaseError(`Failed to open database at ${path}: ${String(error)}`, undefined, { path });
  }
  return databaseError(`Failed to open database at ${path}: ${error.message}`, error, { path });
}

/**
 * Create a storage error for schema migration failures
 */
export function migrationError(version: number, error: unknown): StorageError {
  if (error instanceof Error) {
    return migrationFailed(version, error);
  }
  return migrationFailed(version, new Error(String(error)));
}
