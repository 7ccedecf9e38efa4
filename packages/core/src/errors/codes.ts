/**
 * Error codes for the block store.
 * Categorized by error type for consistent handling.
 */

/**
 * Validation error codes - Input validation failures
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** ID is not a UUID */
  INVALID_ID: 'INVALID_ID',
  /** Unknown block type */
  INVALID_BLOCK_TYPE: 'INVALID_BLOCK_TYPE',
  /** Properties do not match the schema registered for the block type */
  INVALID_PROPERTIES: 'INVALID_PROPERTIES',
  /** Content payload malformed */
  INVALID_CONTENT: 'INVALID_CONTENT',
  /** JSON column could not be decoded */
  INVALID_JSON: 'INVALID_JSON',
  /** Required field missing */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  /** Timestamp format invalid */
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  /** Metadata validation failed */
  INVALID_METADATA: 'INVALID_METADATA',
  /** Hydration depth negative or not an integer */
  INVALID_DEPTH: 'INVALID_DEPTH',
  /** Filter expression rejected at construction */
  INVALID_FILTER: 'INVALID_FILTER',
  /** Filter value type cannot be compared against its target */
  FILTER_TYPE_MISMATCH: 'FILTER_TYPE_MISMATCH',
  /** Configuration value rejected */
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Not Found error codes - Resource not found
 */
export const NotFoundErrorCode = {
  /** Generic resource not found */
  NOT_FOUND: 'NOT_FOUND',
  /** Referenced block missing (or hidden by trash visibility) */
  BLOCK_NOT_FOUND: 'BLOCK_NOT_FOUND',
  /** Relationship missing */
  RELATIONSHIP_NOT_FOUND: 'RELATIONSHIP_NOT_FOUND',
} as const;

export type NotFoundErrorCode = typeof NotFoundErrorCode[keyof typeof NotFoundErrorCode];

/**
 * Conflict error codes - State conflicts
 */
export const ConflictErrorCode = {
  /** Row with the same key already exists */
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  /** Optimistic concurrency precondition failed */
  VERSION_CONFLICT: 'VERSION_CONFLICT',
} as const;

export type ConflictErrorCode = typeof ConflictErrorCode[keyof typeof ConflictErrorCode];

/**
 * Constraint error codes - Structural rule violations
 */
export const ConstraintErrorCode = {
  /** Duplicate child, self-parenting, or otherwise malformed children list */
  INVALID_CHILDREN: 'INVALID_CHILDREN',
  /** Assignment would make a block its own ancestor */
  CYCLE_DETECTED: 'CYCLE_DETECTED',
  /** Parent and child belong to different roots */
  CROSS_ROOT: 'CROSS_ROOT',
  /** Backing store rejected a write on a constraint */
  CONSTRAINT_VIOLATION: 'CONSTRAINT_VIOLATION',
} as const;

export type ConstraintErrorCode = typeof ConstraintErrorCode[keyof typeof ConstraintErrorCode];

/**
 * Document store error codes - Façade policy violations
 */
export const DocumentStoreErrorCode = {
  /** Block exists but its type may not anchor a tree */
  INVALID_ROOT_TYPE: 'INVALID_ROOT_TYPE',
  /** insertAfter sibling is not a current child of the parent */
  INSERT_AFTER_NOT_FOUND: 'INSERT_AFTER_NOT_FOUND',
  /** Block required by the façade does not exist */
  BLOCK_MISSING: 'BLOCK_MISSING',
  /** Block is not a page group */
  NOT_A_SLICE: 'NOT_A_SLICE',
  /** Slice child is not a synced block, or its reference is unusable */
  SYNCED_REFERENCE_MISSING: 'SYNCED_REFERENCE_MISSING',
} as const;

export type DocumentStoreErrorCode = typeof DocumentStoreErrorCode[keyof typeof DocumentStoreErrorCode];

/**
 * Storage error codes - Database and persistence errors
 */
export const StorageErrorCode = {
  /** SQLite error */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Database is busy/locked */
  DATABASE_BUSY: 'DATABASE_BUSY',
  /** Schema migration failed */
  MIGRATION_FAILED: 'MIGRATION_FAILED',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...NotFoundErrorCode,
  ...ConflictErrorCode,
  ...ConstraintErrorCode,
  ...DocumentStoreErrorCode,
  ...StorageErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Maps error codes to HTTP status codes for callers that expose the store over HTTP
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_ID]: 400,
  [ErrorCode.INVALID_BLOCK_TYPE]: 400,
  [ErrorCode.INVALID_PROPERTIES]: 400,
  [ErrorCode.INVALID_CONTENT]: 400,
  [ErrorCode.INVALID_JSON]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_TIMESTAMP]: 400,
  [ErrorCode.INVALID_METADATA]: 400,
  [ErrorCode.INVALID_DEPTH]: 400,
  [ErrorCode.INVALID_FILTER]: 400,
  [ErrorCode.FILTER_TYPE_MISMATCH]: 400,
  [ErrorCode.INVALID_CONFIG]: 400,

  // Not Found errors -> 404
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.BLOCK_NOT_FOUND]: 404,
  [ErrorCode.RELATIONSHIP_NOT_FOUND]: 404,

  // Conflict errors -> 409
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.VERSION_CONFLICT]: 409,

  // Constraint errors -> 400/409
  [ErrorCode.INVALID_CHILDREN]: 400,
  [ErrorCode.CYCLE_DETECTED]: 409,
  [ErrorCode.CROSS_ROOT]: 400,
  [ErrorCode.CONSTRAINT_VIOLATION]: 409,

  // Document store errors -> 400/404/422
  [ErrorCode.INVALID_ROOT_TYPE]: 422,
  [ErrorCode.INSERT_AFTER_NOT_FOUND]: 400,
  [ErrorCode.BLOCK_MISSING]: 404,
  [ErrorCode.NOT_A_SLICE]: 422,
  [ErrorCode.SYNCED_REFERENCE_MISSING]: 422,

  // Storage errors -> 500/503
  [ErrorCode.DATABASE_ERROR]: 500,
  [ErrorCode.DATABASE_BUSY]: 503,
  [ErrorCode.MIGRATION_FAILED]: 500,
};

/**
 * Whether a caller may reasonably retry after re-reading state
 */
export function isRetryableCode(code: ErrorCode): boolean {
  return code === ErrorCode.VERSION_CONFLICT || code === ErrorCode.DATABASE_BUSY;
}
