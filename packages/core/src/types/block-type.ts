/**
 * Block Type - the closed set of node kinds a tree may contain
 */

import { invalidBlockType } from '../errors/factories.js';

/**
 * All valid block types
 */
export const BlockType = {
  WORKSPACE: 'workspace',
  COLLECTION: 'collection',
  DOCUMENT: 'document',
  DATASET: 'dataset',
  DERIVED_CONTENT_CONTAINER: 'derived_content_container',
  HEADING: 'heading',
  PARAGRAPH: 'paragraph',
  BULLETED_LIST_ITEM: 'bulleted_list_item',
  NUMBERED_LIST_ITEM: 'numbered_list_item',
  RECORD: 'record',
  QUOTE: 'quote',
  CODE: 'code',
  TABLE: 'table',
  HTML: 'html',
  OBJECT: 'object',
  GROUP_INDEX: 'group_index',
  PAGE_GROUP: 'page_group',
  CHUNK_GROUP: 'chunk_group',
  SYSTEM_CONTAINER: 'system_container',
  PAGE: 'page',
  SYNCED: 'synced',
  UNSUPPORTED: 'unsupported',
} as const;

export type BlockType = (typeof BlockType)[keyof typeof BlockType];

const BLOCK_TYPES = new Set<string>(Object.values(BlockType));

/**
 * Block types allowed to anchor a tree returned by the document store
 */
export const DEFAULT_ROOT_TYPES: readonly BlockType[] = [BlockType.DOCUMENT, BlockType.DATASET];

/**
 * Type guard for block type strings
 */
export function isValidBlockType(value: unknown): value is BlockType {
  return typeof value === 'string' && BLOCK_TYPES.has(value);
}

/**
 * Validates a block type and returns it
 */
export function validateBlockType(value: unknown): BlockType {
  if (!isValidBlockType(value)) {
    throw invalidBlockType(value);
  }
  return value;
}
