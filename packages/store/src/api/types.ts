/**
 * Document Store API Type Definitions
 *
 * The document store is the coordination layer over the block and
 * relationship repositories. It adds root-type policy, fills in expected
 * versions from current state, and orchestrates multi-step attachment of
 * block batches under a parent.
 */

import type {
  Block,
  BlockId,
  BlockType,
  Relationship,
  RelationshipKey,
} from '@blockstore/core';
import type { HydrationDepth, QueryBlocksOptions } from '../repositories/block-repository.js';
import type { GetRelationshipsOptions } from '../repositories/relationship-repository.js';

// ============================================================================
// Settings
// ============================================================================

export interface DocumentStoreSettings {
  /** Types accepted by getRootTree (default: document, dataset) */
  rootTypes?: readonly BlockType[];
  /** Default depth for getRootTree (default: 1) */
  treeDepth?: HydrationDepth;
}

// ============================================================================
// Operation Options
// ============================================================================

export interface GetRootTreeOptions {
  depth?: HydrationDepth;
}

export interface GetSliceOptions {
  /** Hydration depth of the page group itself (default: 1) */
  depth?: HydrationDepth;
  /** Pair each synced child with its canonical block (default: true) */
  resolveSynced?: boolean;
  /** Hydration depth of each canonical block (default: 1) */
  targetDepth?: HydrationDepth;
}

export interface SetChildrenOptions {
  /** Read from the parent when omitted */
  expectedVersion?: number;
}

/**
 * Expected versions for a move; each omitted value is read from current state
 */
export interface MoveOptions {
  blockVersion?: number;
  newParentVersion?: number;
  oldParentVersion?: number;
}

export interface UpsertBlocksOptions {
  /** Attach the batch under this block */
  parentId?: BlockId;
  /** Existing child of parentId to insert after; appends when omitted */
  insertAfter?: BlockId;
  /**
   * Attach only blocks whose parent is not part of the batch (default: true).
   * When false every block in the batch becomes a direct child.
   */
  topLevelOnly?: boolean;
}

// ============================================================================
// Views
// ============================================================================

/**
 * A synced block paired with the canonical block it mirrors
 */
export interface ResolvedSyncedChild {
  synced: Block<'synced'>;
  target: Block;
}

/**
 * A page group with its synced entries
 */
export interface PageGroupView {
  pageGroup: Block<'page_group'>;
  syncedChildren: Block<'synced'>[];
  /** Empty when resolution was not requested */
  resolvedChildren: ResolvedSyncedChild[];
}

// ============================================================================
// DocumentStore Interface
// ============================================================================

export interface DocumentStore {
  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  /**
   * Load a tree anchored at a root-type block.
   *
   * @throws DocumentStoreError (BLOCK_MISSING) when the block does not exist
   * @throws DocumentStoreError (INVALID_ROOT_TYPE) when its type may not anchor a tree
   */
  getRootTree(rootId: BlockId, options?: GetRootTreeOptions): Block;

  /**
   * Load a page group and the canonical blocks its synced children mirror.
   *
   * @throws DocumentStoreError (NOT_A_SLICE) when the block is not a page group
   * @throws DocumentStoreError (SYNCED_REFERENCE_MISSING) for a non-synced child
   *   or an absent or dangling reference
   */
  getSlice(sliceId: BlockId, options?: GetSliceOptions): PageGroupView;

  getBlock(id: BlockId, depth?: HydrationDepth): Block | undefined;

  listDocuments(limit?: number): Block[];

  queryBlocks(options?: QueryBlocksOptions): Block[];

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /** Persist blocks as given; a no-op for an empty list */
  saveBlocks(blocks: readonly Block[]): void;

  /**
   * Persist a batch and optionally attach it under a parent.
   *
   * @throws DocumentStoreError (INSERT_AFTER_NOT_FOUND) when insertAfter is not a current child
   */
  upsertBlocks(blocks: readonly Block[], options?: UpsertBlocksOptions): void;

  setChildren(parentId: BlockId, childrenIds: readonly BlockId[], options?: SetChildrenOptions): void;

  moveBlock(blockId: BlockId, newParentId: BlockId, index: number, options?: MoveOptions): void;

  /** Trash or restore blocks together with their descendants */
  setInTrash(ids: readonly BlockId[], inTrash: boolean): void;

  // --------------------------------------------------------------------------
  // Relationships
  // --------------------------------------------------------------------------

  upsertRelationships(relationships: readonly Relationship[]): void;

  deleteRelationships(keys: readonly RelationshipKey[]): boolean;

  getRelationships(blockId: BlockId, options?: GetRelationshipsOptions): Relationship[];
}
