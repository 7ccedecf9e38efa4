import { describe, it, expect } from 'vitest';
import {
  generateId,
  isValidId,
  isValidTimestamp,
  validateMetadata,
  validateOptionalId,
  validateTimestamp,
} from './common.js';
import { ValidationError } from '../errors/error.js';

describe('identifiers', () => {
  it('should generate valid ids', () => {
    const id = generateId();
    expect(isValidId(id)).toBe(true);
    expect(generateId()).not.toBe(id);
  });

  it('should accept upper-case UUIDs', () => {
    expect(isValidId('123E4567-E89B-12D3-A456-426614174000')).toBe(true);
    expect(isValidId('123e4567')).toBe(false);
  });

  it('should normalise optional ids', () => {
    expect(validateOptionalId(undefined, 'parentId')).toBeNull();
    expect(validateOptionalId(null, 'parentId')).toBeNull();
    expect(() => validateOptionalId('x', 'parentId')).toThrow(ValidationError);
  });
});

describe('timestamps', () => {
  it('should accept ISO 8601 UTC timestamps', () => {
    expect(isValidTimestamp('2024-03-01T10:00:00.000Z')).toBe(true);
    expect(isValidTimestamp('2024-03-01T10:00:00Z')).toBe(true);
  });

  it('should reject rolled-over dates', () => {
    expect(isValidTimestamp('2024-02-30T10:00:00.000Z')).toBe(false);
    expect(() => validateTimestamp('yesterday', 'createdTime')).toThrow(ValidationError);
  });
});

describe('validateMetadata', () => {
  it('should default to an empty map', () => {
    expect(validateMetadata(undefined)).toEqual({});
  });

  it('should reject arrays', () => {
    expect(() => validateMetadata([1, 2])).toThrow('Metadata must be a plain object');
  });

  it('should reject values that cannot be serialized', () => {
    const loop: Record<string, unknown> = {};
    loop.self = loop;
    expect(() => validateMetadata(loop)).toThrow('Metadata must be JSON-serializable');
  });
});
