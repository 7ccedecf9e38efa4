/**
 * Relationship - a directed, typed edge between two blocks
 *
 * Relationships live beside the tree rather than in it. At most one
 * relationship exists per (source, target, relType) triple.
 */

import { invalidInput } from '../errors/factories.js';
import {
  createTimestamp,
  generateId,
  validateId,
  validateMetadata,
  validateOptionalId,
  type ActorId,
  type BlockId,
  type Metadata,
  type Timestamp,
} from './common.js';

// ============================================================================
// Types
// ============================================================================

export interface Relationship {
  id: string;
  workspaceId: BlockId | null;
  sourceBlockId: BlockId;
  targetBlockId: BlockId;
  /** Free-form edge label, e.g. 'supports' */
  relType: string;
  metadata: Metadata;
  version: number;
  createdTime: Timestamp;
  lastEditedTime: Timestamp;
  createdBy: ActorId | null;
  lastEditedBy: ActorId | null;
}

/**
 * Composite key identifying a relationship
 */
export type RelationshipKey = Pick<Relationship, 'sourceBlockId' | 'targetBlockId' | 'relType'>;

/**
 * Which edges of a block to return
 */
export const RelationshipDirection = {
  OUTGOING: 'outgoing',
  INCOMING: 'incoming',
  ALL: 'all',
} as const;

export type RelationshipDirection = (typeof RelationshipDirection)[keyof typeof RelationshipDirection];

/**
 * Input for creating a relationship
 */
export interface CreateRelationshipInput {
  sourceBlockId: BlockId;
  targetBlockId: BlockId;
  relType: string;
  id?: string;
  workspaceId?: BlockId | null;
  metadata?: Metadata;
  createdBy?: ActorId | null;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validates a relationship type label
 */
export function validateRelType(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalidInput('relType', value, 'non-empty string');
  }
  return value;
}

/**
 * Type guard for relationship directions
 */
export function isRelationshipDirection(value: unknown): value is RelationshipDirection {
  return value === 'outgoing' || value === 'incoming' || value === 'all';
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Creates a new relationship at version 0
 */
export function createRelationship(input: CreateRelationshipInput): Relationship {
  const now = createTimestamp();
  const createdBy = validateOptionalId(input.createdBy, 'createdBy');
  return {
    id: input.id ?? generateId(),
    workspaceId: validateOptionalId(input.workspaceId, 'workspaceId'),
    sourceBlockId: validateId(input.sourceBlockId, 'sourceBlockId'),
    targetBlockId: validateId(input.targetBlockId, 'targetBlockId'),
    relType: validateRelType(input.relType),
    metadata: validateMetadata(input.metadata),
    version: 0,
    createdTime: now,
    lastEditedTime: now,
    createdBy,
    lastEditedBy: createdBy,
  };
}
