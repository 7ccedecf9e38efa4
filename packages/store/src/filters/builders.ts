/**
 * Filter Builders
 *
 * Construct filter expressions, rejecting malformed ones immediately rather
 * than when the query runs.
 */

import { invalidFilter } from '@blockstore/core';
import {
  FilterOperator,
  LogicalOperator,
  type BooleanFilter,
  type FilterExpression,
  type FilterScalar,
  type PropertyFilter,
} from './types.js';

// ============================================================================
// Value Checks
// ============================================================================

export function isFilterScalar(value: unknown): value is FilterScalar {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' || typeof value === 'boolean';
}

function isFilterOperator(value: unknown): value is FilterOperator {
  return typeof value === 'string' && Object.values<string>(FilterOperator).includes(value);
}

function validatePath(path: unknown): string {
  if (typeof path !== 'string' || path.trim().length === 0) {
    throw invalidFilter('path cannot be empty', { field: 'path', value: path });
  }
  if (path.includes('"')) {
    throw invalidFilter('path cannot contain double quotes', { field: 'path', value: path });
  }
  if (path.split('.').every((segment) => segment.length === 0)) {
    throw invalidFilter('path has no segments', { field: 'path', value: path });
  }
  return path;
}

function toMembershipValues(value: unknown, path: string): FilterScalar[] {
  let values: unknown[];
  if (Array.isArray(value)) {
    values = [...value];
  } else if (value instanceof Set) {
    values = [...value];
  } else {
    throw invalidFilter("operator 'in' expects a non-string list of values", {
      field: path,
      value,
    });
  }
  if (values.length === 0) {
    throw invalidFilter("operator 'in' requires at least one value", { field: path });
  }
  return values.map((entry) => {
    if (!isFilterScalar(entry)) {
      throw invalidFilter('values must be strings, finite numbers or booleans', {
        field: path,
        value: entry,
      });
    }
    return entry;
  });
}

// ============================================================================
// Property Filters
// ============================================================================

/**
 * Creates a property filter
 *
 * @example
 * propertyFilter('content.data.category', 'Detective')
 * propertyFilter('level', [1, 2], 'in')
 * propertyFilter('content.plainText', 'control', 'contains')
 */
export function propertyFilter(path: string, value: unknown, operator: FilterOperator = FilterOperator.EQUALS): PropertyFilter {
  const validPath = validatePath(path);
  if (!isFilterOperator(operator)) {
    throw invalidFilter(`unsupported operator '${String(operator)}'`, { field: validPath, value: operator });
  }

  switch (operator) {
    case FilterOperator.IN:
      return { kind: 'property', path: validPath, operator, value: toMembershipValues(value, validPath) };
    case FilterOperator.CONTAINS:
      if (typeof value !== 'string') {
        throw invalidFilter("operator 'contains' expects a string value", { field: validPath, value });
      }
      return { kind: 'property', path: validPath, operator, value };
    case FilterOperator.EQUALS:
    case FilterOperator.NOT_EQUALS:
      if (!isFilterScalar(value)) {
        throw invalidFilter(`operator '${operator}' expects a string, finite number or boolean`, {
          field: validPath,
          value,
        });
      }
      return { kind: 'property', path: validPath, operator, value };
  }
}

// ============================================================================
// Boolean Filters
// ============================================================================

/**
 * Composes filter expressions
 */
export function booleanFilter(operator: LogicalOperator, operands: readonly FilterExpression[]): BooleanFilter {
  if (operands.length === 0) {
    throw invalidFilter('boolean filters require at least one operand', { field: 'operands' });
  }
  if (operator === LogicalOperator.NOT && operands.length !== 1) {
    throw invalidFilter('not requires exactly one operand', { field: 'operands', actual: operands.length });
  }
  if (operator !== LogicalOperator.NOT && operands.length < 2) {
    throw invalidFilter(`${operator} requires two or more operands`, { field: 'operands', actual: operands.length });
  }
  return { kind: 'boolean', operator, operands: [...operands] };
}

export function and(...operands: FilterExpression[]): BooleanFilter {
  return booleanFilter(LogicalOperator.AND, operands);
}

export function or(...operands: FilterExpression[]): BooleanFilter {
  return booleanFilter(LogicalOperator.OR, operands);
}

export function not(operand: FilterExpression): BooleanFilter {
  return booleanFilter(LogicalOperator.NOT, [operand]);
}
