/**
 * Duration Parsing and Formatting
 *
 * Converts between duration strings (e.g., '5s', '500ms') and milliseconds.
 */

import { ValidationError, ErrorCode } from '@blockstore/core';
import type { Duration, DurationString } from './types.js';

// ============================================================================
// Duration Units
// ============================================================================

/**
 * Duration unit multipliers (to milliseconds)
 */
export const DURATION_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

type DurationUnit = keyof typeof DURATION_UNITS;

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)$/;

function isDurationUnit(value: string): value is DurationUnit {
  return value in DURATION_UNITS;
}

// ============================================================================
// Parsing Functions
// ============================================================================

export function isDurationString(value: unknown): value is DurationString {
  return typeof value === 'string' && DURATION_PATTERN.test(value);
}

/**
 * Parses a duration string to milliseconds
 *
 * @throws ValidationError if format is invalid
 *
 * @example
 * parseDuration('500ms') // 500
 * parseDuration('5s')    // 5000
 * parseDuration('2m')    // 120000
 */
export function parseDuration(value: string): Duration {
  const match = value.match(DURATION_PATTERN);
  const numStr = match?.[1];
  const unit = match?.[2];
  if (numStr === undefined || unit === undefined || !isDurationUnit(unit)) {
    throw new ValidationError(
      `Invalid duration format: '${value}'. Expected format: <number><unit> (e.g., '500ms', '5s', '1m')`,
      ErrorCode.INVALID_INPUT,
      { field: 'duration', value, expected: '<number><unit> where unit is ms, s, m, h, or d' }
    );
  }

  const result = parseFloat(numStr) * DURATION_UNITS[unit];
  if (!Number.isFinite(result)) {
    throw new ValidationError(
      `Duration overflow: '${value}' produces non-finite value`,
      ErrorCode.INVALID_INPUT,
      { field: 'duration', value }
    );
  }

  return Math.round(result);
}

/**
 * Parses a duration value that may be string or number (milliseconds)
 */
export function parseDurationValue(value: string | number): Duration {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(
        `Invalid duration value: ${value}. Must be a non-negative finite number`,
        ErrorCode.INVALID_INPUT,
        { field: 'duration', value, expected: 'non-negative finite number' }
      );
    }
    return Math.round(value);
  }
  return parseDuration(value);
}

/**
 * Parses a duration, returning undefined on failure
 */
export function tryParseDuration(value: unknown): Duration | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.round(value) : undefined;
  }
  if (isDurationString(value)) {
    return parseDuration(value);
  }
  if (typeof value === 'string' && /^\d+(\.\d+)?$/.test(value)) {
    return Math.round(parseFloat(value));
  }
  return undefined;
}

// ============================================================================
// Formatting Functions
// ============================================================================

/**
 * Formats milliseconds using the largest unit that divides evenly
 *
 * @example
 * formatDuration(500)    // '500ms'
 * formatDuration(5000)   // '5s'
 * formatDuration(120000) // '2m'
 */
export function formatDuration(ms: Duration): string {
  if (ms < 0) {
    throw new ValidationError(
      `Cannot format negative duration: ${ms}`,
      ErrorCode.INVALID_INPUT,
      { field: 'duration', value: ms }
    );
  }

  for (const unit of ['d', 'h', 'm', 's'] as const) {
    const size = DURATION_UNITS[unit];
    if (ms >= size && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }
  return `${ms}ms`;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validates a duration is within an allowed range
 */
export function validateDurationRange(value: Duration, min: Duration, max: Duration, field: string): Duration {
  if (value < min) {
    throw new ValidationError(
      `${field} must be at least ${formatDuration(min)}, got ${formatDuration(value)}`,
      ErrorCode.INVALID_CONFIG,
      { field, value, expected: `>= ${formatDuration(min)}`, actual: formatDuration(value) }
    );
  }
  if (value > max) {
    throw new ValidationError(
      `${field} must be at most ${formatDuration(max)}, got ${formatDuration(value)}`,
      ErrorCode.INVALID_CONFIG,
      { field, value, expected: `<= ${formatDuration(max)}`, actual: formatDuration(value) }
    );
  }
  return value;
}
