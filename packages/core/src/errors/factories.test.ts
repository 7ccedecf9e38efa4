import { describe, it, expect } from 'vitest';
import {
  notFound,
  blockNotFound,
  blocksNotFound,
  invalidProperties,
  invalidDepth,
  invalidFilter,
  filterTypeMismatch,
  versionConflict,
  invalidChildren,
  cycleDetected,
  crossRoot,
  blockMissing,
  invalidRootType,
  insertAfterNotFound,
  migrationFailed,
} from './factories.js';
import {
  NotFoundError,
  ValidationError,
  ConflictError,
  ConstraintError,
  DocumentStoreError,
  StorageError,
} from './error.js';
import { ErrorCode } from './codes.js';

describe('Not Found Factories', () => {
  it('should capitalize type in generic message', () => {
    const error = notFound('relationship', 'r-1');
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Relationship not found: r-1');
  });

  it('should create block not found errors', () => {
    const error = blockNotFound('b-1');
    expect(error.code).toBe(ErrorCode.BLOCK_NOT_FOUND);
    expect(error.message).toBe('Block not found: b-1');
    expect(error.details.blockId).toBe('b-1');
  });

  it('should list every missing id of a batch', () => {
    const error = blocksNotFound(['a', 'b']);
    expect(error.message).toBe('Blocks not found: a, b');
    expect(error.details.blockIds).toEqual(['a', 'b']);
  });

  it('should fall back to the single-block message for one id', () => {
    expect(blocksNotFound(['a']).message).toBe('Block not found: a');
  });
});

describe('Validation Factories', () => {
  it('should create property errors naming the block type', () => {
    const error = invalidProperties('heading', 'level must be between 1 and 6', { field: 'level' });
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe(ErrorCode.INVALID_PROPERTIES);
    expect(error.message).toBe('Invalid properties for heading block: level must be between 1 and 6');
    expect(error.details).toEqual({ blockType: 'heading', field: 'level' });
  });

  it('should create depth errors', () => {
    const error = invalidDepth(-1);
    expect(error.code).toBe(ErrorCode.INVALID_DEPTH);
    expect(error.message).toBe('Depth must be a non-negative integer, got -1');
  });

  it('should create filter errors', () => {
    expect(invalidFilter('path must not be empty').message).toBe('Invalid filter: path must not be empty');
    const mismatch = filterTypeMismatch('content.data.count', 'integer', 'ten');
    expect(mismatch.code).toBe(ErrorCode.FILTER_TYPE_MISMATCH);
    expect(mismatch.details.actual).toBe('ten');
  });
});

describe('Conflict Factories', () => {
  it('should describe the version mismatch', () => {
    const error = versionConflict('p-1', 0, 2, 'Parent');
    expect(error).toBeInstanceOf(ConflictError);
    expect(error.code).toBe(ErrorCode.VERSION_CONFLICT);
    expect(error.message).toBe('Parent p-1 version mismatch: expected 0, found 2.');
    expect(error.details).toEqual({ blockId: 'p-1', expected: 0, actual: 2 });
  });

  it('should default the role to Block', () => {
    expect(versionConflict('b-1', 1, 3).message).toBe('Block b-1 version mismatch: expected 1, found 3.');
  });
});

describe('Constraint Factories', () => {
  it('should create invalid children errors', () => {
    const error = invalidChildren('Duplicate child ids: a', { parentId: 'p' });
    expect(error).toBeInstanceOf(ConstraintError);
    expect(error.code).toBe(ErrorCode.INVALID_CHILDREN);
    expect(error.details.parentId).toBe('p');
  });

  it('should create cycle errors', () => {
    const error = cycleDetected('p', 'c');
    expect(error.code).toBe(ErrorCode.CYCLE_DETECTED);
    expect(error.message).toBe('Cannot place c under p: c is an ancestor of p.');
  });

  it('should create cross-root errors', () => {
    const error = crossRoot('b', 'r1', 'p', 'r2');
    expect(error.code).toBe(ErrorCode.CROSS_ROOT);
    expect(error.details).toEqual({ blockId: 'b', parentId: 'p', expected: 'r2', actual: 'r1' });
  });
});

describe('Document Store Factories', () => {
  it('should create missing block errors', () => {
    const error = blockMissing('b-9');
    expect(error).toBeInstanceOf(DocumentStoreError);
    expect(error.message).toBe('Block b-9 does not exist.');
  });

  it('should list allowed root types', () => {
    const error = invalidRootType('b-1', 'paragraph', ['document', 'dataset']);
    expect(error.message).toBe('Block b-1 is a paragraph block, not a root (document, dataset).');
    expect(error.details.expected).toEqual(['document', 'dataset']);
  });

  it('should report insertAfter misses', () => {
    expect(insertAfterNotFound('s', 'p').message).toBe('Block s not found in parent p.');
  });
});

describe('Storage Factories', () => {
  it('should include the cause message in migration failures', () => {
    const error = migrationFailed(2, new Error('syntax error'));
    expect(error).toBeInstanceOf(StorageError);
    expect(error.code).toBe(ErrorCode.MIGRATION_FAILED);
    expect(error.message).toBe('Failed to apply migration version 2: syntax error');
  });
});
