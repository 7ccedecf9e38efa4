/**
 * Error handling module for the block store
 *
 * Provides structured errors with codes, messages, and details
 * for consistent handling across the repositories, the document store,
 * and the storage layer.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  ConstraintErrorCode,
  DocumentStoreErrorCode,
  StorageErrorCode,
  ErrorHttpStatus,
  isRetryableCode,
} from './codes.js';

// Error classes
export {
  BlockStoreError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ConstraintError,
  DocumentStoreError,
  StorageError,
  isBlockStoreError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isConstraintError,
  isDocumentStoreError,
  isStorageError,
  hasErrorCode,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Not Found
  notFound,
  blockNotFound,
  blocksNotFound,
  // Validation
  invalidInput,
  invalidId,
  invalidBlockType,
  invalidProperties,
  invalidJson,
  missingRequiredField,
  invalidTimestamp,
  invalidDepth,
  invalidFilter,
  filterTypeMismatch,
  // Conflict
  alreadyExists,
  versionConflict,
  // Constraint
  invalidChildren,
  cycleDetected,
  crossRoot,
  // Document store
  blockMissing,
  invalidRootType,
  insertAfterNotFound,
  // Storage
  databaseError,
  migrationFailed,
} from './factories.js';
