/**
 * Document Store Implementation
 *
 * Composes the block and relationship repositories. Convenience methods that
 * fill in expected versions read current state first and then write in a
 * separate transaction, so a concurrent writer can slip in between; callers
 * that need strict compare-and-set pass explicit versions.
 */

import type { StorageBackend } from '@blockstore/storage';
import {
  createLogger,
  blockMissing,
  insertAfterNotFound,
  invalidRootType,
  isBlockOfType,
  DEFAULT_ROOT_TYPES,
  DocumentStoreError,
  ErrorCode,
  type Block,
  type BlockId,
  type BlockType,
  type Relationship,
  type RelationshipKey,
} from '@blockstore/core';
import {
  BlockRepository,
  type HydrationDepth,
  type QueryBlocksOptions,
} from '../repositories/block-repository.js';
import { RelationshipRepository, type GetRelationshipsOptions } from '../repositories/relationship-repository.js';
import type {
  DocumentStore,
  DocumentStoreSettings,
  GetRootTreeOptions,
  GetSliceOptions,
  MoveOptions,
  PageGroupView,
  ResolvedSyncedChild,
  SetChildrenOptions,
  UpsertBlocksOptions,
} from './types.js';

const logger = createLogger('document-store');

const DEFAULT_TREE_DEPTH = 1;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Splices new ids into a children list, after a given sibling or at the end
 */
function insertChildren(
  current: readonly BlockId[],
  additions: readonly BlockId[],
  parentId: BlockId,
  insertAfter?: BlockId
): BlockId[] {
  if (insertAfter === undefined) {
    return [...current, ...additions];
  }
  const index = current.indexOf(insertAfter);
  if (index === -1) {
    throw insertAfterNotFound(insertAfter, parentId);
  }
  return [...current.slice(0, index + 1), ...additions, ...current.slice(index + 1)];
}

function syncedTargetId(synced: Block<'synced'>): BlockId {
  const target = synced.content?.syncedFrom ?? synced.properties.syncedFrom;
  if (target === undefined) {
    throw new DocumentStoreError(
      `Synced block ${synced.id} does not provide a reference to canonical content.`,
      ErrorCode.SYNCED_REFERENCE_MISSING,
      { blockId: synced.id }
    );
  }
  return target;
}

// ============================================================================
// DocumentStore Implementation
// ============================================================================

export class DocumentStoreImpl implements DocumentStore {
  private readonly rootTypes: readonly BlockType[];
  private readonly treeDepth: HydrationDepth;

  constructor(
    private readonly blocks: BlockRepository,
    private readonly relationships: RelationshipRepository,
    settings: DocumentStoreSettings = {}
  ) {
    this.rootTypes = [...(settings.rootTypes ?? DEFAULT_ROOT_TYPES)];
    this.treeDepth = settings.treeDepth === undefined ? DEFAULT_TREE_DEPTH : settings.treeDepth;
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  getRootTree(rootId: BlockId, options: GetRootTreeOptions = {}): Block {
    const depth = options.depth === undefined ? this.treeDepth : options.depth;
    const root = this.requireBlock(rootId, depth);
    if (!this.rootTypes.includes(root.type)) {
      throw invalidRootType(rootId, root.type, this.rootTypes);
    }
    return root;
  }

  getSlice(sliceId: BlockId, options: GetSliceOptions = {}): PageGroupView {
    const slice = this.requireBlock(sliceId, options.depth === undefined ? 1 : options.depth);
    if (!isBlockOfType(slice, 'page_group')) {
      throw new DocumentStoreError(`Block ${sliceId} is not a slice (page group).`, ErrorCode.NOT_A_SLICE, {
        blockId: sliceId,
        actual: slice.type,
      });
    }

    const syncedChildren = slice.childrenIds.map((childId) => {
      const child = this.requireBlock(childId);
      if (!isBlockOfType(child, 'synced')) {
        throw new DocumentStoreError(
          `Slice ${sliceId} has non-synced child ${childId}.`,
          ErrorCode.SYNCED_REFERENCE_MISSING,
          { blockId: childId, parentId: sliceId, actual: child.type }
        );
      }
      return child;
    });

    const resolvedChildren: ResolvedSyncedChild[] = [];
    if (options.resolveSynced ?? true) {
      const targetDepth = options.targetDepth === undefined ? 1 : options.targetDepth;
      for (const synced of syncedChildren) {
        resolvedChildren.push({ synced, target: this.resolveSynced(synced, targetDepth) });
      }
    }

    return { pageGroup: slice, syncedChildren, resolvedChildren };
  }

  getBlock(id: BlockId, depth: HydrationDepth = 0): Block | undefined {
    return this.blocks.getBlock(id, { depth });
  }

  listDocuments(limit?: number): Block[] {
    return this.blocks.queryBlocks({ where: { type: 'document' }, limit });
  }

  queryBlocks(options: QueryBlocksOptions = {}): Block[] {
    return this.blocks.queryBlocks(options);
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  saveBlocks(blocks: readonly Block[]): void {
    if (blocks.length === 0) {
      return;
    }
    this.blocks.upsertBlocks(blocks);
  }

  upsertBlocks(blocks: readonly Block[], options: UpsertBlocksOptions = {}): void {
    const { parentId } = options;
    if (parentId === undefined) {
      this.saveBlocks(blocks);
      return;
    }
    if (blocks.length === 0) {
      return;
    }

    const parent = this.requireBlock(parentId);
    if (options.insertAfter !== undefined && !parent.childrenIds.includes(options.insertAfter)) {
      throw insertAfterNotFound(options.insertAfter, parentId);
    }

    const batchIds = new Set(blocks.map((block) => block.id));
    const topLevelOnly = options.topLevelOnly ?? true;
    const attached = blocks
      .filter((block) => !topLevelOnly || block.parentId === null || !batchIds.has(block.parentId))
      .map((block) => block.id);

    // The whole batch joins the parent's tree; setChildren links the attached ones.
    this.blocks.upsertBlocks(blocks.map((block) => block.with({ rootId: parent.rootId })));

    const current = this.requireBlock(parentId);
    const existing = new Set(current.childrenIds);
    const additions = attached.filter((id) => !existing.has(id));
    const childrenIds = insertChildren(current.childrenIds, additions, parentId, options.insertAfter);
    this.blocks.setChildren(parentId, childrenIds, current.version);

    logger.info(`Attached ${additions.length} of ${blocks.length} block(s) under ${parentId}`);
  }

  setChildren(parentId: BlockId, childrenIds: readonly BlockId[], options: SetChildrenOptions = {}): void {
    const version = options.expectedVersion ?? this.requireBlock(parentId).version;
    this.blocks.setChildren(parentId, childrenIds, version);
  }

  moveBlock(blockId: BlockId, newParentId: BlockId, index: number, options: MoveOptions = {}): void {
    const block = this.requireBlock(blockId);
    const newParent = this.requireBlock(newParentId);

    let oldParentVersion = options.oldParentVersion;
    if (oldParentVersion === undefined && block.parentId !== null && block.parentId !== newParentId) {
      oldParentVersion = this.requireBlock(block.parentId).version;
    }

    this.blocks.moveBlock(blockId, newParentId, index, {
      expectedBlockVersion: options.blockVersion ?? block.version,
      expectedNewParentVersion: options.newParentVersion ?? newParent.version,
      expectedOldParentVersion: oldParentVersion,
    });
  }

  setInTrash(ids: readonly BlockId[], inTrash: boolean): void {
    this.blocks.setInTrash(ids, inTrash, { cascade: true });
    logger.info(`${inTrash ? 'Trashed' : 'Restored'} ${ids.length} block(s) with descendants`);
  }

  // --------------------------------------------------------------------------
  // Relationships
  // --------------------------------------------------------------------------

  upsertRelationships(relationships: readonly Relationship[]): void {
    this.relationships.upsertRelationships(relationships);
  }

  deleteRelationships(keys: readonly RelationshipKey[]): boolean {
    return this.relationships.deleteRelationships(keys);
  }

  getRelationships(blockId: BlockId, options: GetRelationshipsOptions = {}): Relationship[] {
    return this.relationships.getRelationships(blockId, options);
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private requireBlock(id: BlockId, depth: HydrationDepth = 0): Block {
    const block = this.blocks.getBlock(id, { depth });
    if (!block) {
      throw blockMissing(id);
    }
    return block;
  }

  private resolveSynced(synced: Block<'synced'>, depth: HydrationDepth): Block {
    const targetId = syncedTargetId(synced);
    const target = this.blocks.getBlock(targetId, { depth });
    if (!target) {
      throw new DocumentStoreError(
        `Synced block ${synced.id} references missing block ${targetId}.`,
        ErrorCode.SYNCED_REFERENCE_MISSING,
        { blockId: synced.id, value: targetId }
      );
    }
    return target;
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a document store over a storage backend
 */
export function createDocumentStore(backend: StorageBackend, settings?: DocumentStoreSettings): DocumentStore {
  return new DocumentStoreImpl(new BlockRepository(backend), new RelationshipRepository(backend), settings);
}
