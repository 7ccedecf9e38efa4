/**
 * Relationship Repository - typed edges between blocks
 *
 * Edges are keyed by (source, target, relType). Upserting an existing key
 * updates its metadata and bumps its version instead of failing. Edges
 * touching a trashed block are hidden unless asked for; hard-deleting a block
 * removes its edges through the foreign key cascade.
 */

import type { Row, StorageBackend } from '@blockstore/storage';
import {
  createLogger,
  invalidInput,
  invalidJson,
  isRelationshipDirection,
  validateMetadata,
  RelationshipDirection,
  type BlockId,
  type Relationship,
  type RelationshipKey,
} from '@blockstore/core';

const logger = createLogger('relationship-repository');

// ============================================================================
// Database Row Types
// ============================================================================

interface RelationshipRow extends Row {
  id: string;
  workspace_id: string | null;
  source_block_id: string;
  target_block_id: string;
  rel_type: string;
  metadata: string;
  version: number;
  created_time: string;
  last_edited_time: string;
  created_by: string | null;
  last_edited_by: string | null;
}

export interface GetRelationshipsOptions {
  /** Default: all */
  direction?: RelationshipDirection;
  includeTrashed?: boolean;
}

// ============================================================================
// SQL
// ============================================================================

const UPSERT_RELATIONSHIP_SQL = `
INSERT INTO block_relationships (
  id, workspace_id, source_block_id, target_block_id, rel_type, metadata,
  version, created_time, last_edited_time, created_by, last_edited_by
) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
ON CONFLICT(source_block_id, target_block_id, rel_type) DO UPDATE SET
  metadata = excluded.metadata,
  last_edited_time = excluded.last_edited_time,
  last_edited_by = excluded.last_edited_by,
  version = block_relationships.version + 1
`;

const DELETE_RELATIONSHIP_SQL = `
DELETE FROM block_relationships
WHERE source_block_id = ? AND target_block_id = ? AND rel_type = ?
`;

function deserializeRelationship(row: RelationshipRow): Relationship {
  let metadata: unknown;
  try {
    metadata = JSON.parse(row.metadata);
  } catch (error) {
    throw invalidJson('metadata', row.id, error instanceof Error ? error : undefined);
  }
  return {
    id: row.id,
    workspaceId: row.workspace_id,
    sourceBlockId: row.source_block_id,
    targetBlockId: row.target_block_id,
    relType: row.rel_type,
    metadata: validateMetadata(metadata),
    version: row.version,
    createdTime: row.created_time,
    lastEditedTime: row.last_edited_time,
    createdBy: row.created_by,
    lastEditedBy: row.last_edited_by,
  };
}

// ============================================================================
// RelationshipRepository Class
// ============================================================================

export class RelationshipRepository {
  constructor(private readonly db: StorageBackend) {}

  /**
   * Insert relationships, updating any whose key already exists
   *
   * @throws ConstraintError when an endpoint block does not exist
   */
  upsertRelationships(relationships: readonly Relationship[]): void {
    if (relationships.length === 0) {
      return;
    }
    this.db.transaction(
      (tx) => {
        for (const rel of relationships) {
          tx.run(UPSERT_RELATIONSHIP_SQL, [
            rel.id,
            rel.workspaceId,
            rel.sourceBlockId,
            rel.targetBlockId,
            rel.relType,
            JSON.stringify(rel.metadata),
            rel.version,
            rel.createdTime,
            rel.lastEditedTime,
            rel.createdBy,
            rel.lastEditedBy,
          ]);
        }
      },
      { isolation: 'immediate' }
    );
    logger.debug(`Upserted ${relationships.length} relationship(s)`);
  }

  /**
   * Delete relationships by key
   *
   * @returns true when at least one row was removed
   */
  deleteRelationships(keys: readonly RelationshipKey[]): boolean {
    if (keys.length === 0) {
      return false;
    }
    const removed = this.db.transaction(
      (tx) =>
        keys.reduce(
          (total, key) =>
            total + tx.run(DELETE_RELATIONSHIP_SQL, [key.sourceBlockId, key.targetBlockId, key.relType]).changes,
          0
        ),
      { isolation: 'immediate' }
    );
    logger.debug(`Deleted ${removed} relationship(s)`);
    return removed > 0;
  }

  /**
   * Relationships touching a block in the given direction
   */
  getRelationships(blockId: BlockId, options: GetRelationshipsOptions = {}): Relationship[] {
    const direction = options.direction ?? RelationshipDirection.ALL;
    if (!isRelationshipDirection(direction)) {
      throw invalidInput('direction', direction, 'outgoing, incoming or all');
    }

    const params: unknown[] = [];
    const conditions: string[] = [];
    switch (direction) {
      case RelationshipDirection.OUTGOING:
        conditions.push('r.source_block_id = ?');
        params.push(blockId);
        break;
      case RelationshipDirection.INCOMING:
        conditions.push('r.target_block_id = ?');
        params.push(blockId);
        break;
      case RelationshipDirection.ALL:
        conditions.push('(r.source_block_id = ? OR r.target_block_id = ?)');
        params.push(blockId, blockId);
        break;
    }

    let sql = 'SELECT r.* FROM block_relationships AS r';
    if (!options.includeTrashed) {
      sql +=
        ' JOIN blocks AS source ON source.id = r.source_block_id' +
        ' JOIN blocks AS target ON target.id = r.target_block_id';
      conditions.push('source.in_trash = 0', 'target.in_trash = 0');
    }
    sql += ` WHERE ${conditions.join(' AND ')} ORDER BY r.created_time, r.id`;

    return this.db.query<RelationshipRow>(sql, params).map(deserializeRelationship);
  }
}
