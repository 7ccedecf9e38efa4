/**
 * Configuration Validation
 *
 * Validates configuration values for correctness and consistency.
 */

import { ValidationError, ErrorCode, isValidBlockType, isValidId } from '@blockstore/core';
import type { Configuration, PartialConfiguration } from './types.js';
import { isJournalMode, VALID_JOURNAL_MODES } from './types.js';
import { MAX_BUSY_TIMEOUT } from './defaults.js';
import { validateDurationRange } from './duration.js';

function invalid(field: string, message: string, value: unknown, expected?: unknown): ValidationError {
  return new ValidationError(message, ErrorCode.INVALID_CONFIG, { field, value, expected });
}

// ============================================================================
// Field Validators
// ============================================================================

/**
 * Validates the default actor id
 */
export function validateActor(value: unknown): string {
  if (!isValidId(value)) {
    throw invalid('actor', 'Actor must be a UUID', value, 'UUID');
  }
  return value;
}

/**
 * Validates the database path
 */
export function validateDatabase(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalid('database', 'Database path cannot be empty', value, 'non-empty string');
  }
  return value;
}

export function validateJournalMode(value: unknown): void {
  if (!isJournalMode(value)) {
    throw invalid(
      'storage.journalMode',
      `Journal mode must be one of: ${VALID_JOURNAL_MODES.join(', ')}`,
      value,
      VALID_JOURNAL_MODES
    );
  }
}

export function validateBusyTimeout(value: number): void {
  validateDurationRange(value, 0, MAX_BUSY_TIMEOUT, 'storage.busyTimeout');
}

export function validateRootTypes(value: readonly unknown[]): void {
  if (value.length === 0) {
    throw invalid('documents.rootTypes', 'At least one root type is required', value);
  }
  const unknownTypes = value.filter((type) => !isValidBlockType(type));
  if (unknownTypes.length > 0) {
    throw invalid('documents.rootTypes', `Unknown root types: ${unknownTypes.join(', ')}`, unknownTypes);
  }
}

export function validateTreeDepth(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw invalid('documents.treeDepth', 'Tree depth must be a non-negative integer', value);
  }
}

export function validateWorkspaceTitle(value: string): void {
  if (value.trim().length === 0) {
    throw invalid('documents.workspaceTitle', 'Workspace title cannot be empty', value);
  }
}

// ============================================================================
// Configuration Validators
// ============================================================================

/**
 * Validates the fields present in a partial configuration
 *
 * @throws ValidationError naming the first invalid field
 */
export function validatePartialConfiguration(config: PartialConfiguration): void {
  if (config.actor !== undefined) validateActor(config.actor);
  if (config.database !== undefined) validateDatabase(config.database);

  if (config.storage) {
    if (config.storage.journalMode !== undefined) validateJournalMode(config.storage.journalMode);
    if (config.storage.busyTimeout !== undefined) validateBusyTimeout(config.storage.busyTimeout);
  }

  if (config.documents) {
    if (config.documents.rootTypes !== undefined) validateRootTypes(config.documents.rootTypes);
    if (config.documents.treeDepth !== undefined) validateTreeDepth(config.documents.treeDepth);
    if (config.documents.workspaceTitle !== undefined) validateWorkspaceTitle(config.documents.workspaceTitle);
  }
}

/**
 * Validates a complete configuration
 */
export function validateConfiguration(config: Configuration): void {
  validatePartialConfiguration(config);
}
