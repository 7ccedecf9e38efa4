/**
 * Block row mapping
 *
 * Converts between `blocks` table rows and {@link Block} values. JSON columns
 * are decoded and re-validated against the block type on the way in.
 */

import type { Row } from '@blockstore/storage';
import {
  Block,
  invalidJson,
  validateBlockProperties,
  validateBlockType,
  validateContent,
  validateId,
  validateMetadata,
  validateOptionalId,
  type BlockResolver,
} from '@blockstore/core';

// ============================================================================
// Row Type
// ============================================================================

export interface BlockRow extends Row {
  id: string;
  type: string;
  parent_id: string | null;
  root_id: string;
  children_ids: string;
  workspace_id: string | null;
  in_trash: number;
  version: number;
  created_time: string;
  last_edited_time: string;
  created_by: string | null;
  last_edited_by: string | null;
  properties: string;
  metadata: string;
  content: string | null;
  properties_version: number | null;
}

/**
 * Column order used by inserts; matches {@link blockToParams}
 */
export const BLOCK_COLUMNS = [
  'id',
  'type',
  'parent_id',
  'root_id',
  'children_ids',
  'workspace_id',
  'in_trash',
  'version',
  'created_time',
  'last_edited_time',
  'created_by',
  'last_edited_by',
  'properties',
  'metadata',
  'content',
  'properties_version',
] as const;

// ============================================================================
// Decoding
// ============================================================================

function parseJsonColumn(value: string, field: string, blockId: string): unknown {
  try {
    return JSON.parse(value);
  } catch (err) {
    throw invalidJson(field, blockId, err instanceof Error ? err : undefined);
  }
}

function parseChildrenIds(value: string, blockId: string): string[] {
  const parsed = parseJsonColumn(value, 'children_ids', blockId);
  if (!Array.isArray(parsed)) {
    throw invalidJson('children_ids', blockId);
  }
  return parsed.map((childId: unknown) => validateId(childId, 'children_ids'));
}

/**
 * Builds a block from its row
 */
export function rowToBlock(row: BlockRow, resolver?: BlockResolver): Block {
  const type = validateBlockType(row.type);
  return new Block(
    {
      id: row.id,
      type,
      parentId: validateOptionalId(row.parent_id, 'parent_id'),
      rootId: row.root_id,
      childrenIds: parseChildrenIds(row.children_ids, row.id),
      workspaceId: validateOptionalId(row.workspace_id, 'workspace_id'),
      inTrash: row.in_trash === 1,
      version: row.version,
      createdTime: row.created_time,
      lastEditedTime: row.last_edited_time,
      createdBy: row.created_by,
      lastEditedBy: row.last_edited_by,
      properties: validateBlockProperties(type, parseJsonColumn(row.properties, 'properties', row.id)),
      metadata: validateMetadata(parseJsonColumn(row.metadata, 'metadata', row.id)),
      content: row.content === null ? null : validateContent(parseJsonColumn(row.content, 'content', row.id)),
      propertiesVersion: row.properties_version,
    },
    resolver
  );
}

/**
 * Reads the children list without building a block
 */
export function rowChildrenIds(row: BlockRow): string[] {
  return parseChildrenIds(row.children_ids, row.id);
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Bind parameters for a block, in {@link BLOCK_COLUMNS} order
 */
export function blockToParams(block: Block): unknown[] {
  return [
    block.id,
    block.type,
    block.parentId,
    block.rootId,
    JSON.stringify(block.childrenIds),
    block.workspaceId,
    block.inTrash ? 1 : 0,
    block.version,
    block.createdTime,
    block.lastEditedTime,
    block.createdBy,
    block.lastEditedBy,
    JSON.stringify(block.properties),
    JSON.stringify(block.metadata),
    block.content === null ? null : JSON.stringify(block.content),
    block.propertiesVersion,
  ];
}
