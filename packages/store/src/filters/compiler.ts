/**
 * Filter Compiler
 *
 * Translates filter expressions into SQLite WHERE fragments over the
 * `blocks` table. Fragments reference a table alias and append their bound
 * values to a shared parameter list in placeholder order.
 *
 * JSON values are read with json_extract/json_type. The comparison type comes
 * from the filter's value and a string compares against the value rendered as
 * text. Number and boolean comparisons go through FILTER_TYPE_FUNCTION, so a
 * row holding a value of another type fails the query with
 * FILTER_TYPE_MISMATCH; an absent key or JSON null just does not match.
 */

import { filterTypeMismatch } from '@blockstore/core';
import {
  FilterOperator,
  LogicalOperator,
  type FilterExpression,
  type FilterScalar,
  type PropertyFilter,
  type RelatedFilter,
  type WhereClause,
} from './types.js';
import { FILTER_TYPE_FUNCTION } from './sql-functions.js';

// ============================================================================
// JSON Targets
// ============================================================================

/**
 * JSON columns addressable by the first path segment
 */
export const JSON_COLUMNS = ['properties', 'content', 'metadata'] as const;

export type JsonColumn = (typeof JSON_COLUMNS)[number];

function isJsonColumn(value: string): value is JsonColumn {
  return (JSON_COLUMNS as readonly string[]).includes(value);
}

export interface JsonTarget {
  column: JsonColumn;
  /** SQLite JSON path, e.g. `$."data"."category"` or `$."groups"[0]` */
  jsonPath: string;
}

/**
 * Splits a dotted filter path into its column and SQLite JSON path.
 * Numeric segments index arrays.
 */
export function resolveJsonTarget(path: string): JsonTarget {
  const segments = path.split('.').filter((segment) => segment.length > 0);
  const [first, ...rest] = segments;

  let column: JsonColumn = 'properties';
  let jsonSegments = segments;
  if (first !== undefined && isJsonColumn(first)) {
    column = first;
    jsonSegments = rest;
  }

  const jsonPath = jsonSegments
    .map((segment) => (/^\d+$/.test(segment) ? `[${segment}]` : `."${segment}"`))
    .join('');
  return { column, jsonPath: `$${jsonPath}` };
}

// ============================================================================
// Structural Filters
// ============================================================================

const WHERE_COLUMNS = {
  type: 'type',
  parentId: 'parent_id',
  rootId: 'root_id',
  workspaceId: 'workspace_id',
} as const satisfies Record<keyof WhereClause, string>;

const WHERE_KEYS: readonly (keyof WhereClause)[] = ['type', 'parentId', 'rootId', 'workspaceId'];

/**
 * Compiles a where clause into AND-able conditions
 */
export function compileWhere(where: WhereClause, alias: string, params: unknown[]): string[] {
  const conditions: string[] = [];

  for (const key of WHERE_KEYS) {
    const value = where[key];
    if (value === undefined) {
      continue;
    }
    const column = `${alias}.${WHERE_COLUMNS[key]}`;
    if (typeof value === 'string') {
      conditions.push(`${column} = ?`);
      params.push(value);
      continue;
    }
    const values: readonly string[] = value;
    if (values.length === 0) {
      conditions.push('1 = 0');
    } else {
      conditions.push(`${column} IN (${values.map(() => '?').join(', ')})`);
      params.push(...values);
    }
  }

  return conditions;
}

// ============================================================================
// Property Filters
// ============================================================================

type ScalarKind = 'string' | 'number' | 'boolean';

function scalarKind(value: FilterScalar): ScalarKind {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return 'number';
  return 'string';
}

function bindScalar(value: FilterScalar): FilterScalar {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return value;
}

function comparisonSql(filter: PropertyFilter): string {
  switch (filter.operator) {
    case FilterOperator.EQUALS:
      return '= ?';
    case FilterOperator.NOT_EQUALS:
      return '!= ?';
    case FilterOperator.IN:
      return `IN (${filter.value.map(() => '?').join(', ')})`;
    case FilterOperator.CONTAINS:
      return '> 0';
  }
}

function compileProperty(filter: PropertyFilter, alias: string, params: unknown[]): string {
  const { column, jsonPath } = resolveJsonTarget(filter.path);
  const col = `${alias}.${column}`;

  if (filter.operator === FilterOperator.CONTAINS) {
    params.push(jsonPath, filter.value);
    return `instr(CAST(json_extract(${col}, ?) AS TEXT), ?) > 0`;
  }

  const values: readonly FilterScalar[] = filter.operator === FilterOperator.IN ? filter.value : [filter.value];
  const [sample] = values;
  const kind = sample === undefined ? 'string' : scalarKind(sample);
  for (const value of values) {
    if (scalarKind(value) !== kind) {
      throw filterTypeMismatch(filter.path, kind, value);
    }
  }

  const op = comparisonSql(filter);
  const bound = values.map(bindScalar);

  switch (kind) {
    case 'number':
      params.push(jsonPath, filter.path, jsonPath, ...bound);
      return `(${FILTER_TYPE_FUNCTION}(json_type(${col}, ?), 'number', ?) AND json_extract(${col}, ?) ${op})`;
    case 'boolean':
      params.push(jsonPath, filter.path, jsonPath, ...bound);
      return `(${FILTER_TYPE_FUNCTION}(json_type(${col}, ?), 'boolean', ?) AND json_type(${col}, ?) ${op})`;
    case 'string':
      params.push(jsonPath, ...bound);
      return `(CAST(json_extract(${col}, ?) AS TEXT) ${op})`;
  }
}

/**
 * Compiles a property or boolean filter into a single condition
 *
 * @throws ValidationError (FILTER_TYPE_MISMATCH) when an `in` list mixes value types
 */
export function compileFilterExpression(expression: FilterExpression, alias: string, params: unknown[]): string {
  if (expression.kind === 'property') {
    return compileProperty(expression, alias, params);
  }

  const operands = expression.operands.map((operand) => compileFilterExpression(operand, alias, params));
  switch (expression.operator) {
    case LogicalOperator.AND:
      return `(${operands.join(' AND ')})`;
    case LogicalOperator.OR:
      return `(${operands.join(' OR ')})`;
    case LogicalOperator.NOT:
      return `(NOT ${operands.join('')})`;
  }
}

/**
 * Compiles where clause and property filter for one alias
 */
export function compileRelatedFilter(filter: RelatedFilter, alias: string, params: unknown[]): string[] {
  const conditions = filter.where ? compileWhere(filter.where, alias, params) : [];
  if (filter.propertyFilter) {
    conditions.push(compileFilterExpression(filter.propertyFilter, alias, params));
  }
  return conditions;
}
