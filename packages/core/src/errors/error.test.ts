import { describe, it, expect } from 'vitest';
import {
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
} from './error.js';
import { ErrorCode, ErrorHttpStatus, isRetryableCode } from './codes.js';

describe('BlockStoreError', () => {
  describe('constructor', () => {
    it('should create error with required parameters', () => {
      const error = new BlockStoreError('Test error', ErrorCode.INVALID_INPUT);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.details).toEqual({});
      expect(error.name).toBe('BlockStoreError');
      expect(error.httpStatus).toBe(400);
    });

    it('should keep details and cause', () => {
      const cause = new Error('Original error');
      const error = new BlockStoreError('Wrapped', ErrorCode.DATABASE_ERROR, { blockId: 'b1' }, cause);

      expect(error.details).toEqual({ blockId: 'b1' });
      expect(error.cause).toBe(cause);
      expect(error).toBeInstanceOf(Error);
    });

    it('should have correct HTTP status for each error code', () => {
      for (const code of Object.values(ErrorCode)) {
        const error = new BlockStoreError('Test', code);
        expect(error.httpStatus).toBe(ErrorHttpStatus[code]);
      }
    });
  });

  describe('toJSON', () => {
    it('should serialize error to JSON', () => {
      const error = new BlockStoreError('Missing', ErrorCode.BLOCK_NOT_FOUND, { blockId: 'b1' });

      expect(error.toJSON()).toEqual({
        name: 'BlockStoreError',
        message: 'Missing',
        code: 'BLOCK_NOT_FOUND',
        details: { blockId: 'b1' },
        httpStatus: 404,
      });
    });
  });
});

describe('Error subclasses', () => {
  it('should default ValidationError to INVALID_INPUT', () => {
    const error = new ValidationError('bad');
    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(error.name).toBe('ValidationError');
  });

  it('should default NotFoundError to NOT_FOUND', () => {
    const error = new NotFoundError('gone');
    expect(error.code).toBe(ErrorCode.NOT_FOUND);
    expect(error.httpStatus).toBe(404);
  });

  it('should default StorageError to DATABASE_ERROR', () => {
    const error = new StorageError('db');
    expect(error.code).toBe(ErrorCode.DATABASE_ERROR);
    expect(error.httpStatus).toBe(500);
  });

  it('should name each subclass', () => {
    expect(new ConflictError('x', ErrorCode.VERSION_CONFLICT).name).toBe('ConflictError');
    expect(new ConstraintError('x', ErrorCode.INVALID_CHILDREN).name).toBe('ConstraintError');
    expect(new DocumentStoreError('x', ErrorCode.INVALID_ROOT_TYPE).name).toBe('DocumentStoreError');
  });
});

describe('Type guards', () => {
  const errors = {
    validation: new ValidationError('v'),
    notFound: new NotFoundError('n'),
    conflict: new ConflictError('c', ErrorCode.VERSION_CONFLICT),
    constraint: new ConstraintError('c', ErrorCode.CYCLE_DETECTED),
    documentStore: new DocumentStoreError('d', ErrorCode.BLOCK_MISSING),
    storage: new StorageError('s'),
  };

  it('should recognise every subclass as a BlockStoreError', () => {
    for (const error of Object.values(errors)) {
      expect(isBlockStoreError(error)).toBe(true);
    }
    expect(isBlockStoreError(new Error('plain'))).toBe(false);
  });

  it('should distinguish error kinds', () => {
    expect(isValidationError(errors.validation)).toBe(true);
    expect(isNotFoundError(errors.notFound)).toBe(true);
    expect(isConflictError(errors.conflict)).toBe(true);
    expect(isConstraintError(errors.constraint)).toBe(true);
    expect(isDocumentStoreError(errors.documentStore)).toBe(true);
    expect(isStorageError(errors.storage)).toBe(true);

    expect(isConflictError(errors.constraint)).toBe(false);
    expect(isNotFoundError(errors.documentStore)).toBe(false);
  });

  it('should match on error code', () => {
    expect(hasErrorCode(errors.conflict, ErrorCode.VERSION_CONFLICT)).toBe(true);
    expect(hasErrorCode(errors.conflict, ErrorCode.ALREADY_EXISTS)).toBe(false);
    expect(hasErrorCode('VERSION_CONFLICT', ErrorCode.VERSION_CONFLICT)).toBe(false);
  });
});

describe('isRetryableCode', () => {
  it('should flag version conflicts and busy databases only', () => {
    expect(isRetryableCode(ErrorCode.VERSION_CONFLICT)).toBe(true);
    expect(isRetryableCode(ErrorCode.DATABASE_BUSY)).toBe(true);
    expect(isRetryableCode(ErrorCode.INVALID_CHILDREN)).toBe(false);
  });
});
