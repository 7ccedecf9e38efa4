/**
 * SQL functions the compiled filters call
 *
 * Registered on a connection before any filtered query runs there.
 */

import { filterTypeMismatch } from '@blockstore/core';
import type { SqlValue, StorageBackend } from '@blockstore/storage';

/**
 * `blockstore_filter_type(json_type, expected, path)`: 1 when the JSON value
 * has the expected type, 0 when it is absent or JSON null, throws otherwise.
 */
export const FILTER_TYPE_FUNCTION = 'blockstore_filter_type';

const ACCEPTED_JSON_TYPES: Record<string, readonly string[]> = {
  number: ['integer', 'real'],
  boolean: ['true', 'false'],
};

/**
 * @throws ValidationError (FILTER_TYPE_MISMATCH) for a present value of another type
 */
export function checkFilterType(jsonType: SqlValue, expected: SqlValue, path: SqlValue): number {
  if (jsonType === null || jsonType === 'null') {
    return 0;
  }
  const kind = String(expected);
  const accepted = ACCEPTED_JSON_TYPES[kind] ?? [];
  if (typeof jsonType === 'string' && accepted.includes(jsonType)) {
    return 1;
  }
  throw filterTypeMismatch(String(path), kind, jsonType);
}

export function registerFilterFunctions(backend: StorageBackend): void {
  backend.registerFunction(FILTER_TYPE_FUNCTION, checkFilterType, { deterministic: true });
}
