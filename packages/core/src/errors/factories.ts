import { ErrorCode } from './codes.js';
import {
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  DocumentStoreError,
  StorageError,
  ErrorDetails,
} from './error.js';

// =============================================================================
// Not Found Factories
// =============================================================================

/**
 * Creates a NotFoundError for a resource that doesn't exist
 */
export function notFound(
  type: string,
  id: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(`${capitalize(type)} not found: ${id}`, ErrorCode.NOT_FOUND, {
    value: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError for a missing block
 */
export function blockNotFound(id: string, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(`Block not found: ${id}`, ErrorCode.BLOCK_NOT_FOUND, {
    blockId: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError listing every missing block of a batch
 */
export function blocksNotFound(ids: string[], details: ErrorDetails = {}): NotFoundError {
  if (ids.length === 1) {
    return blockNotFound(ids[0], { blockIds: ids, ...details });
  }
  return new NotFoundError(`Blocks not found: ${ids.join(', ')}`, ErrorCode.BLOCK_NOT_FOUND, {
    blockIds: ids,
    ...details,
  });
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(`Invalid ${field}: expected ${String(expected)}`, ErrorCode.INVALID_INPUT, {
    field,
    value,
    expected,
    ...details,
  });
}

/**
 * Creates a ValidationError for an ID that is not a UUID
 */
export function invalidId(value: unknown, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(`Invalid block ID: ${String(value)}`, ErrorCode.INVALID_ID, {
    value,
    expected: 'UUID',
    ...details,
  });
}

/**
 * Creates a ValidationError for an unknown block type
 */
export function invalidBlockType(value: unknown): ValidationError {
  return new ValidationError(`Unknown block type: ${String(value)}`, ErrorCode.INVALID_BLOCK_TYPE, {
    field: 'type',
    value,
  });
}

/**
 * Creates a ValidationError for properties rejected by a type's schema
 */
export function invalidProperties(
  blockType: string,
  reason: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid properties for ${blockType} block: ${reason}`,
    ErrorCode.INVALID_PROPERTIES,
    { blockType, ...details }
  );
}

/**
 * Creates a ValidationError for a JSON column that failed to decode
 */
export function invalidJson(field: string, value: unknown, cause?: Error): ValidationError {
  return new ValidationError(
    `Invalid JSON in ${field}`,
    ErrorCode.INVALID_JSON,
    { field, value },
    cause
  );
}

/**
 * Creates a ValidationError for a missing required field
 */
export function missingRequiredField(field: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(`Missing required field: ${field}`, ErrorCode.MISSING_REQUIRED_FIELD, {
    field,
    ...details,
  });
}

/**
 * Creates a ValidationError for an invalid timestamp
 */
export function invalidTimestamp(value: unknown, field: string): ValidationError {
  return new ValidationError(`Invalid timestamp for ${field}`, ErrorCode.INVALID_TIMESTAMP, {
    field,
    value,
    expected: 'ISO 8601 timestamp',
  });
}

/**
 * Creates a ValidationError for a hydration depth below zero
 */
export function invalidDepth(depth: number): ValidationError {
  return new ValidationError(`Depth must be a non-negative integer, got ${depth}`, ErrorCode.INVALID_DEPTH, {
    field: 'depth',
    value: depth,
  });
}

/**
 * Creates a ValidationError for a filter rejected at construction
 */
export function invalidFilter(reason: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(`Invalid filter: ${reason}`, ErrorCode.INVALID_FILTER, details);
}

/**
 * Creates a ValidationError for a filter value whose type cannot be compared
 */
export function filterTypeMismatch(
  path: string,
  expected: string,
  actual: unknown
): ValidationError {
  return new ValidationError(
    `Filter on '${path}' expects ${expected} values`,
    ErrorCode.FILTER_TYPE_MISMATCH,
    { field: path, expected, actual }
  );
}

// =============================================================================
// Conflict Factories
// =============================================================================

/**
 * Creates a ConflictError for a duplicate key
 */
export function alreadyExists(
  type: string,
  id: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(`${capitalize(type)} already exists: ${id}`, ErrorCode.ALREADY_EXISTS, {
    value: id,
    ...details,
  });
}

/**
 * Creates a ConflictError for an optimistic concurrency failure
 */
export function versionConflict(
  blockId: string,
  expected: number,
  actual: number,
  role: string = 'Block'
): ConflictError {
  return new ConflictError(
    `${role} ${blockId} version mismatch: expected ${expected}, found ${actual}.`,
    ErrorCode.VERSION_CONFLICT,
    { blockId, expected, actual }
  );
}

// =============================================================================
// Constraint Factories
// =============================================================================

/**
 * Creates a ConstraintError for a malformed children list
 */
export function invalidChildren(reason: string, details: ErrorDetails = {}): ConstraintError {
  return new ConstraintError(reason, ErrorCode.INVALID_CHILDREN, details);
}

/**
 * Creates a ConstraintError for an assignment that would create a cycle
 */
export function cycleDetected(parentId: string, childId: string): ConstraintError {
  return new ConstraintError(
    `Cannot place ${childId} under ${parentId}: ${childId} is an ancestor of ${parentId}.`,
    ErrorCode.CYCLE_DETECTED,
    { parentId, blockId: childId }
  );
}

/**
 * Creates a ConstraintError for a parent/child pair with different roots
 */
export function crossRoot(
  blockId: string,
  blockRootId: string,
  parentId: string,
  parentRootId: string
): ConstraintError {
  return new ConstraintError(
    `Block ${blockId} (root ${blockRootId}) cannot be placed under ${parentId} (root ${parentRootId}).`,
    ErrorCode.CROSS_ROOT,
    { blockId, parentId, expected: parentRootId, actual: blockRootId }
  );
}

// =============================================================================
// Document Store Factories
// =============================================================================

/**
 * Creates a DocumentStoreError for a block the façade requires
 */
export function blockMissing(id: string): DocumentStoreError {
  return new DocumentStoreError(`Block ${id} does not exist.`, ErrorCode.BLOCK_MISSING, {
    blockId: id,
  });
}

/**
 * Creates a DocumentStoreError for a block that may not anchor a tree
 */
export function invalidRootType(
  id: string,
  actual: string,
  allowed: readonly string[]
): DocumentStoreError {
  return new DocumentStoreError(
    `Block ${id} is a ${actual} block, not a root (${allowed.join(', ')}).`,
    ErrorCode.INVALID_ROOT_TYPE,
    { blockId: id, actual, expected: [...allowed] }
  );
}

/**
 * Creates a DocumentStoreError for an insertAfter sibling that is not a child
 */
export function insertAfterNotFound(siblingId: string, parentId: string): DocumentStoreError {
  return new DocumentStoreError(
    `Block ${siblingId} not found in parent ${parentId}.`,
    ErrorCode.INSERT_AFTER_NOT_FOUND,
    { blockId: siblingId, parentId }
  );
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for a general database error
 */
export function databaseError(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(message, ErrorCode.DATABASE_ERROR, details, cause);
}

/**
 * Creates a StorageError for a failed schema migration
 */
export function migrationFailed(version: number, cause?: Error): StorageError {
  return new StorageError(
    `Failed to apply migration version ${version}${cause ? `: ${cause.message}` : ''}`,
    ErrorCode.MIGRATION_FAILED,
    { version, operation: 'migrate' },
    cause
  );
}

// =============================================================================
// Helpers
// =============================================================================

function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}
