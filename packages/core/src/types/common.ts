/**
 * Shared primitives - identifiers, timestamps, and metadata
 *
 * Blocks and relationships are identified by UUIDs, stamped with ISO 8601
 * timestamps, and carry a free-form metadata map.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import { invalidId, invalidTimestamp } from '../errors/factories.js';

// ============================================================================
// Identifier Types
// ============================================================================

/**
 * Block identifier (UUID)
 */
export type BlockId = string;

/**
 * Identifier of the actor that created or edited a record (UUID)
 */
export type ActorId = string;

/**
 * Timestamp type - ISO 8601 formatted string
 * Format: YYYY-MM-DDTHH:mm:ss.sssZ
 */
export type Timestamp = string;

/**
 * Free-form metadata map, never validated against a schema
 */
export type Metadata = Record<string, unknown>;

// ============================================================================
// Validation Constants
// ============================================================================

/** Canonical 8-4-4-4-12 hex UUID */
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** ISO 8601 timestamp pattern */
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Generates a new random (v4) identifier
 */
export function generateId(): BlockId {
  return randomUUID();
}

/**
 * Checks whether a value is a UUID string
 */
export function isValidId(value: unknown): value is BlockId {
  return typeof value === 'string' && UUID_PATTERN.test(value);
}

/**
 * Validates an identifier and returns it
 */
export function validateId(value: unknown, field: string = 'id'): BlockId {
  if (!isValidId(value)) {
    throw invalidId(value, { field });
  }
  return value;
}

/**
 * Validates an optional identifier, normalising undefined to null
 */
export function validateOptionalId(value: unknown, field: string): BlockId | null {
  if (value === undefined || value === null) {
    return null;
  }
  return validateId(value, field);
}

// ============================================================================
// Timestamps
// ============================================================================

/**
 * Creates a timestamp for the current instant
 */
export function createTimestamp(): Timestamp {
  return new Date().toISOString();
}

/**
 * Validates a timestamp string is in ISO 8601 format
 */
export function isValidTimestamp(value: unknown): value is Timestamp {
  if (typeof value !== 'string' || !TIMESTAMP_PATTERN.test(value)) {
    return false;
  }
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    return false;
  }
  // Rejects dates JS silently rolls over (Feb 30 -> Mar 2)
  const normalizedInput = value.includes('.') ? value : value.replace('Z', '.000Z');
  return date.toISOString() === normalizedInput;
}

/**
 * Validates a timestamp and returns it
 */
export function validateTimestamp(value: unknown, field: string): Timestamp {
  if (!isValidTimestamp(value)) {
    throw invalidTimestamp(value, field);
  }
  return value;
}

// ============================================================================
// Metadata
// ============================================================================

/**
 * Checks if a value is a plain object (not array, null, etc.)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates metadata is a JSON-serializable plain object
 */
export function validateMetadata(metadata: unknown, field: string = 'metadata'): Metadata {
  if (metadata === undefined || metadata === null) {
    return {};
  }
  if (!isPlainObject(metadata)) {
    throw new ValidationError(
      'Metadata must be a plain object',
      ErrorCode.INVALID_METADATA,
      { field, value: metadata, expected: 'object' }
    );
  }
  try {
    JSON.stringify(metadata);
  } catch (err) {
    throw new ValidationError(
      'Metadata must be JSON-serializable',
      ErrorCode.INVALID_METADATA,
      { field },
      err instanceof Error ? err : undefined
    );
  }
  return metadata;
}
