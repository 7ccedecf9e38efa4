/**
 * Filter Expression Types
 *
 * A small intermediate representation for block queries. Structural
 * predicates ({@link WhereClause}) match row columns; semantic predicates
 * ({@link PropertyFilter}, {@link BooleanFilter}) match values addressed by a
 * dotted path inside the `properties`, `content` or `metadata` JSON columns.
 * The repository compiles these into SQL through `compiler.ts`.
 */

import type { BlockId, BlockType } from '@blockstore/core';

// ============================================================================
// Structural Filters
// ============================================================================

/**
 * A single value or a set of accepted values
 */
export type OneOrMany<T> = T | readonly T[];

/**
 * Conjunction of column constraints. A list value is a membership test; an
 * empty list matches nothing.
 */
export interface WhereClause {
  type?: OneOrMany<BlockType>;
  parentId?: OneOrMany<BlockId>;
  rootId?: OneOrMany<BlockId>;
  workspaceId?: OneOrMany<BlockId>;
}

// ============================================================================
// Property Filters
// ============================================================================

/**
 * Comparison operators for property filters
 */
export const FilterOperator = {
  EQUALS: 'equals',
  NOT_EQUALS: 'not_equals',
  /** Membership in a non-empty list of values */
  IN: 'in',
  /** Substring match against the value as text */
  CONTAINS: 'contains',
} as const;

export type FilterOperator = (typeof FilterOperator)[keyof typeof FilterOperator];

/**
 * Values a property filter can compare against
 */
export type FilterScalar = string | number | boolean;

interface PropertyFilterBase {
  readonly kind: 'property';
  /** Dotted path, e.g. `content.data.category`; no root prefix means `properties` */
  readonly path: string;
}

export interface ComparisonFilter extends PropertyFilterBase {
  readonly operator: typeof FilterOperator.EQUALS | typeof FilterOperator.NOT_EQUALS;
  readonly value: FilterScalar;
}

export interface MembershipFilter extends PropertyFilterBase {
  readonly operator: typeof FilterOperator.IN;
  readonly value: readonly FilterScalar[];
}

export interface ContainsFilter extends PropertyFilterBase {
  readonly operator: typeof FilterOperator.CONTAINS;
  readonly value: string;
}

export type PropertyFilter = ComparisonFilter | MembershipFilter | ContainsFilter;

// ============================================================================
// Boolean Composition
// ============================================================================

export const LogicalOperator = {
  AND: 'and',
  OR: 'or',
  NOT: 'not',
} as const;

export type LogicalOperator = (typeof LogicalOperator)[keyof typeof LogicalOperator];

/**
 * AND/OR take two or more operands, NOT exactly one
 */
export interface BooleanFilter {
  readonly kind: 'boolean';
  readonly operator: LogicalOperator;
  readonly operands: readonly FilterExpression[];
}

export type FilterExpression = PropertyFilter | BooleanFilter;

// ============================================================================
// Relational Filters
// ============================================================================

/**
 * Constraints evaluated against a joined row: the block's direct parent or
 * its root. Single hop, never recursive.
 */
export interface RelatedFilter {
  where?: WhereClause;
  propertyFilter?: FilterExpression;
}

export type ParentFilter = RelatedFilter;

export type RootFilter = RelatedFilter;
