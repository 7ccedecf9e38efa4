/**
 * Block Repository - persistence and structural mutation for block trees
 *
 * Provides:
 * - getBlock: fetch by id with depth-bounded or whole-root hydration
 * - queryBlocks: structural, semantic and parent/root-relative filtering
 * - upsertBlocks: last-write-wins batch persistence
 * - setChildren / reorderChildren / moveBlock: cycle-safe, version-checked
 *   structural edits
 * - setInTrash: soft delete and restore, optionally over whole subtrees
 *
 * Every mutation runs in one immediate transaction; a failed check aborts it
 * before anything is written.
 */

import type { StorageBackend, Transaction } from '@blockstore/storage';
import {
  createLogger,
  createTimestamp,
  blockNotFound,
  blocksNotFound,
  crossRoot,
  cycleDetected,
  invalidChildren,
  invalidDepth,
  invalidInput,
  versionConflict,
  type Block,
  type BlockId,
  type BlockResolver,
} from '@blockstore/core';
import {
  compileFilterExpression,
  compileRelatedFilter,
  compileWhere,
  registerFilterFunctions,
  type FilterExpression,
  type ParentFilter,
  type RootFilter,
  type WhereClause,
} from '../filters/index.js';
import { BLOCK_COLUMNS, blockToParams, rowChildrenIds, rowToBlock, type BlockRow } from './block-row.js';

const logger = createLogger('block-repository');

// ============================================================================
// Options
// ============================================================================

/**
 * Hydration depth: a non-negative integer, or null (or Infinity) for the whole root
 */
export type HydrationDepth = number | null;

export interface GetBlockOptions {
  /** Levels of descendants to hydrate (default: 0). null or Infinity loads the whole root. */
  depth?: HydrationDepth;
  includeTrashed?: boolean;
}

export interface QueryBlocksOptions {
  where?: WhereClause;
  propertyFilter?: FilterExpression;
  /** Constraints on the direct parent row */
  parent?: ParentFilter;
  /** Constraints on the root row */
  root?: RootFilter;
  limit?: number;
  includeTrashed?: boolean;
}

export interface SetInTrashOptions {
  /** Apply to every descendant as well (default: true) */
  cascade?: boolean;
}

export interface MoveBlockOptions {
  /** Checked when given */
  expectedBlockVersion?: number;
  expectedNewParentVersion: number;
  /** Checked when given and the block currently has a different parent */
  expectedOldParentVersion?: number;
}

// ============================================================================
// SQL
// ============================================================================

const INSERT_BLOCK_SQL = `
INSERT INTO blocks (${BLOCK_COLUMNS.join(', ')})
VALUES (${BLOCK_COLUMNS.map(() => '?').join(', ')})
ON CONFLICT(id) DO UPDATE SET
${BLOCK_COLUMNS.filter((column) => column !== 'id')
  .map((column) => `  ${column} = excluded.${column}`)
  .join(',\n')}
`;

const SELECT_BLOCK_SQL = 'SELECT * FROM blocks WHERE id = ?';

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

// ============================================================================
// BlockRepository Class
// ============================================================================

export class BlockRepository {
  /** Navigation for blocks returned outside a hydration pass */
  private readonly resolver: BlockResolver = {
    resolveOne: (id) => this.getBlock(id),
    resolveMany: (ids) => this.collect(ids, (id) => this.getBlock(id)),
  };

  constructor(private readonly db: StorageBackend) {
    registerFilterFunctions(db);
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  /**
   * Fetch a block by id.
   *
   * With depth 0 the block navigates lazily, one fetch per hop. With depth N
   * the block and N levels of non-trashed descendants share one cache, so
   * navigation within that range returns the same instances. A null depth
   * (or Infinity) loads every row of the block's root in one query.
   *
   * @returns undefined when the block is missing or hidden by the trash filter
   */
  getBlock(id: BlockId, options: GetBlockOptions = {}): Block | undefined {
    const requested = options.depth === undefined ? 0 : options.depth;
    const depth = requested === Number.POSITIVE_INFINITY ? null : requested;
    if (depth !== null && (!Number.isInteger(depth) || depth < 0)) {
      throw invalidDepth(depth);
    }
    const includeTrashed = options.includeTrashed ?? false;

    const row = this.db.queryOne<BlockRow>(SELECT_BLOCK_SQL, [id]);
    if (!row || (row.in_trash === 1 && !includeTrashed)) {
      return undefined;
    }

    if (depth === 0) {
      return rowToBlock(row, this.resolver);
    }

    if (depth === null) {
      return this.hydrateRoot(row, includeTrashed).get(row.id);
    }

    return this.db.transaction(
      (tx) => {
        const cache = new Map<BlockId, Block>();
        this.hydrateSubgraph(tx, row, depth, cache, includeTrashed);
        return this.wireCache(cache).get(row.id);
      },
      { isolation: 'deferred' }
    );
  }

  /**
   * Return blocks matching every supplied constraint
   */
  queryBlocks(options: QueryBlocksOptions = {}): Block[] {
    const params: unknown[] = [];
    const joins: string[] = [];
    const conditions: string[] = [];

    if (options.root) {
      joins.push('JOIN blocks AS root ON root.id = b.root_id');
      conditions.push(...compileRelatedFilter(options.root, 'root', params));
    }
    if (options.parent) {
      joins.push('JOIN blocks AS parent ON parent.id = b.parent_id');
      conditions.push(...compileRelatedFilter(options.parent, 'parent', params));
    }
    if (options.where) {
      conditions.push(...compileWhere(options.where, 'b', params));
    }
    if (options.propertyFilter) {
      conditions.push(compileFilterExpression(options.propertyFilter, 'b', params));
    }
    if (!options.includeTrashed) {
      conditions.push('b.in_trash = 0');
    }

    let sql = 'SELECT b.* FROM blocks AS b';
    if (joins.length > 0) {
      sql += ` ${joins.join(' ')}`;
    }
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    if (options.limit !== undefined) {
      if (!Number.isInteger(options.limit) || options.limit < 0) {
        throw invalidInput('limit', options.limit, 'non-negative integer');
      }
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    return this.db.query<BlockRow>(sql, params).map((row) => rowToBlock(row, this.resolver));
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /**
   * Insert or replace blocks by id. Rows are written as given: no version
   * check, and no other block's children list is touched.
   */
  upsertBlocks(blocks: readonly Block[]): void {
    if (blocks.length === 0) {
      return;
    }
    this.db.transaction(
      (tx) => {
        for (const block of blocks) {
          tx.run(INSERT_BLOCK_SQL, blockToParams(block));
        }
      },
      { isolation: 'immediate' }
    );
    logger.debug(`Upserted ${blocks.length} block(s)`);
  }

  /**
   * Set or clear the trash flag, bumping each affected block's version.
   *
   * @throws NotFoundError naming every requested id that does not exist
   */
  setInTrash(ids: readonly BlockId[], inTrash: boolean, options: SetInTrashOptions = {}): void {
    if (ids.length === 0) {
      return;
    }
    const cascade = options.cascade ?? true;

    const affected = this.db.transaction(
      (tx) => {
        const requested = [...new Set(ids)];
        const existing = new Set(
          tx
            .query<{ id: string }>(`SELECT id FROM blocks WHERE id IN (${placeholders(requested.length)})`, requested)
            .map((row) => row.id)
        );
        const missing = requested.filter((id) => !existing.has(id)).sort();
        if (missing.length > 0) {
          throw blocksNotFound(missing);
        }

        const targets = cascade ? this.collectDescendantIds(tx, requested) : requested;
        tx.run(
          `UPDATE blocks SET in_trash = ?, version = version + 1, last_edited_time = ?
           WHERE id IN (${placeholders(targets.length)})`,
          [inTrash ? 1 : 0, createTimestamp(), ...targets]
        );
        return targets.length;
      },
      { isolation: 'immediate' }
    );

    logger.debug(`${inTrash ? 'Trashed' : 'Restored'} ${affected} block(s)`, { ids, cascade });
  }

  /**
   * Replace a parent's canonical children list.
   *
   * Listed children are pointed at the parent (and detached from any other
   * parent's list); children dropped from the list are orphaned. The parent's
   * version is bumped; the children's versions are not.
   *
   * @throws ConstraintError for duplicates, self-reference, cycles or cross-root children
   * @throws NotFoundError when the parent or a child does not exist
   * @throws ConflictError when the parent's version differs from expectedVersion
   */
  setChildren(parentId: BlockId, childrenIds: readonly BlockId[], expectedVersion: number): void {
    if (new Set(childrenIds).size !== childrenIds.length) {
      throw invalidChildren('Duplicate child identifiers are not allowed.', {
        parentId,
        blockIds: [...childrenIds],
      });
    }

    this.db.transaction(
      (tx) => {
        const parent = this.requireRow(tx, parentId, 'Parent');
        if (parent.version !== expectedVersion) {
          throw versionConflict(parentId, expectedVersion, parent.version, 'Parent');
        }

        const children = this.loadChildren(tx, parent, childrenIds);
        const now = createTimestamp();

        const newSet = new Set(childrenIds);
        for (const removedId of rowChildrenIds(parent)) {
          if (!newSet.has(removedId)) {
            tx.run('UPDATE blocks SET parent_id = NULL WHERE id = ? AND parent_id = ?', [removedId, parentId]);
          }
        }

        for (const child of children) {
          if (child.parent_id !== null && child.parent_id !== parentId) {
            this.detachFromParent(tx, child.parent_id, child.id, now);
          }
        }

        if (children.length > 0) {
          tx.run(`UPDATE blocks SET parent_id = ? WHERE id IN (${placeholders(children.length)})`, [
            parentId,
            ...children.map((child) => child.id),
          ]);
        }
        tx.run('UPDATE blocks SET children_ids = ?, version = version + 1, last_edited_time = ? WHERE id = ?', [
          JSON.stringify(childrenIds),
          now,
          parentId,
        ]);
      },
      { isolation: 'immediate' }
    );

    logger.debug('setChildren', { parentId, count: childrenIds.length });
  }

  /**
   * Reorder a parent's current children.
   *
   * @throws ConstraintError when newOrder is not a permutation of the current children
   */
  reorderChildren(parentId: BlockId, newOrder: readonly BlockId[], expectedVersion: number): void {
    this.db.transaction(
      (tx) => {
        const parent = this.requireRow(tx, parentId, 'Parent');
        const current = rowChildrenIds(parent);
        const currentSet = new Set(current);
        const sameMembers =
          newOrder.length === current.length &&
          new Set(newOrder).size === currentSet.size &&
          newOrder.every((id) => currentSet.has(id));
        if (!sameMembers) {
          throw invalidChildren('Reorder must reference the same child ids as currently stored.', {
            parentId,
            expected: current,
            actual: [...newOrder],
          });
        }
        this.setChildren(parentId, newOrder, expectedVersion);
      },
      { isolation: 'immediate' }
    );
  }

  /**
   * Move a block under a parent in the same root, at a clamped index.
   *
   * Within the same parent this is a reorder: the parent and the block are
   * bumped once each. Across parents the old parent (if any), the new parent
   * and the block are each bumped once.
   */
  moveBlock(blockId: BlockId, newParentId: BlockId, index: number, options: MoveBlockOptions): void {
    this.db.transaction(
      (tx) => {
        const block = this.requireRow(tx, blockId, 'Block');
        if (options.expectedBlockVersion !== undefined && block.version !== options.expectedBlockVersion) {
          throw versionConflict(blockId, options.expectedBlockVersion, block.version, 'Block');
        }

        const newParent = this.requireRow(tx, newParentId, 'Parent');
        if (newParent.version !== options.expectedNewParentVersion) {
          throw versionConflict(newParentId, options.expectedNewParentVersion, newParent.version, 'Parent');
        }
        if (newParent.root_id !== block.root_id) {
          throw crossRoot(blockId, block.root_id, newParentId, newParent.root_id);
        }
        if (newParentId === blockId || this.collectAncestorIds(tx, newParent).has(blockId)) {
          throw cycleDetected(newParentId, blockId);
        }

        const now = createTimestamp();

        if (block.parent_id !== null && block.parent_id !== newParentId) {
          const oldParent = this.requireRow(tx, block.parent_id, 'Parent');
          if (
            options.expectedOldParentVersion !== undefined &&
            oldParent.version !== options.expectedOldParentVersion
          ) {
            throw versionConflict(oldParent.id, options.expectedOldParentVersion, oldParent.version, 'Parent');
          }
          this.detachFromParent(tx, oldParent.id, blockId, now);
        }

        const order = rowChildrenIds(newParent).filter((id) => id !== blockId);
        const position = Math.max(0, Math.min(Math.trunc(index), order.length));
        order.splice(position, 0, blockId);

        tx.run('UPDATE blocks SET children_ids = ?, version = version + 1, last_edited_time = ? WHERE id = ?', [
          JSON.stringify(order),
          now,
          newParentId,
        ]);
        tx.run('UPDATE blocks SET parent_id = ?, version = version + 1, last_edited_time = ? WHERE id = ?', [
          newParentId,
          now,
          blockId,
        ]);
      },
      { isolation: 'immediate' }
    );

    logger.debug('moveBlock', { blockId, newParentId, index });
  }

  // --------------------------------------------------------------------------
  // Structural Helpers
  // --------------------------------------------------------------------------

  private requireRow(tx: Transaction, id: BlockId, role: string): BlockRow {
    const row = tx.queryOne<BlockRow>(SELECT_BLOCK_SQL, [id]);
    if (!row) {
      throw blockNotFound(id, { role });
    }
    return row;
  }

  /**
   * Loads listed children in order, rejecting self-reference, missing rows,
   * foreign roots and ancestors of the parent
   */
  private loadChildren(tx: Transaction, parent: BlockRow, childrenIds: readonly BlockId[]): BlockRow[] {
    if (childrenIds.length === 0) {
      return [];
    }
    for (const childId of childrenIds) {
      if (childId === parent.id) {
        throw invalidChildren('A block cannot be a child of itself.', { parentId: parent.id, blockId: childId });
      }
    }

    const rows = tx.query<BlockRow>(
      `SELECT * FROM blocks WHERE id IN (${placeholders(childrenIds.length)})`,
      [...childrenIds]
    );
    const byId = new Map(rows.map((row) => [row.id, row]));
    const missing = childrenIds.filter((id) => !byId.has(id));
    if (missing.length > 0) {
      throw blocksNotFound(missing, { parentId: parent.id });
    }

    const ancestors = this.collectAncestorIds(tx, parent);
    return childrenIds.map((childId) => {
      const child = byId.get(childId);
      if (!child) {
        throw blockNotFound(childId, { parentId: parent.id });
      }
      if (child.root_id !== parent.root_id) {
        throw crossRoot(child.id, child.root_id, parent.id, parent.root_id);
      }
      if (ancestors.has(child.id)) {
        throw cycleDetected(parent.id, child.id);
      }
      return child;
    });
  }

  private detachFromParent(tx: Transaction, parentId: BlockId, childId: BlockId, now: string): void {
    const parent = tx.queryOne<BlockRow>(SELECT_BLOCK_SQL, [parentId]);
    if (!parent) {
      return;
    }
    const children = rowChildrenIds(parent);
    if (!children.includes(childId)) {
      return;
    }
    tx.run('UPDATE blocks SET children_ids = ?, version = version + 1, last_edited_time = ? WHERE id = ?', [
      JSON.stringify(children.filter((id) => id !== childId)),
      now,
      parentId,
    ]);
  }

  /**
   * Ids of every ancestor of a row, nearest first; stops on a repeat
   */
  private collectAncestorIds(tx: Transaction, row: BlockRow): Set<BlockId> {
    const ancestors = new Set<BlockId>();
    let current = row.parent_id;
    while (current !== null && !ancestors.has(current)) {
      ancestors.add(current);
      const parent = tx.queryOne<{ parent_id: string | null }>('SELECT parent_id FROM blocks WHERE id = ?', [
        current,
      ]);
      if (!parent) {
        break;
      }
      current = parent.parent_id;
    }
    return ancestors;
  }

  /**
   * The given ids plus every descendant reachable through children lists
   */
  private collectDescendantIds(tx: Transaction, rootIds: readonly BlockId[]): BlockId[] {
    const seen = new Set<BlockId>();
    const pending = [...rootIds];
    while (pending.length > 0) {
      const id = pending.pop();
      if (id === undefined || seen.has(id)) {
        continue;
      }
      seen.add(id);
      const row = tx.queryOne<BlockRow>(SELECT_BLOCK_SQL, [id]);
      if (row) {
        pending.push(...rowChildrenIds(row));
      }
    }
    return [...seen];
  }

  // --------------------------------------------------------------------------
  // Hydration
  // --------------------------------------------------------------------------

  private hydrateSubgraph(
    tx: Transaction,
    row: BlockRow,
    depth: number,
    cache: Map<BlockId, Block>,
    includeTrashed: boolean
  ): void {
    cache.set(row.id, rowToBlock(row));
    if (depth === 0) {
      return;
    }

    const childrenIds = rowChildrenIds(row);
    if (childrenIds.length === 0) {
      return;
    }
    const rows = tx.query<BlockRow>(
      `SELECT * FROM blocks WHERE id IN (${placeholders(childrenIds.length)})`,
      childrenIds
    );
    const byId = new Map(rows.map((child) => [child.id, child]));

    for (const childId of childrenIds) {
      const child = byId.get(childId);
      if (!child || cache.has(childId) || (child.in_trash === 1 && !includeTrashed)) {
        continue;
      }
      this.hydrateSubgraph(tx, child, depth - 1, cache, includeTrashed);
    }
  }

  private hydrateRoot(row: BlockRow, includeTrashed: boolean): Map<BlockId, Block> {
    const sql = includeTrashed
      ? 'SELECT * FROM blocks WHERE root_id = ?'
      : 'SELECT * FROM blocks WHERE root_id = ? AND in_trash = 0';
    const cache = new Map<BlockId, Block>();
    for (const member of this.db.query<BlockRow>(sql, [row.root_id])) {
      cache.set(member.id, rowToBlock(member));
    }
    logger.debug(`Hydrated ${cache.size} block(s) for root ${row.root_id}`);
    return this.wireCache(cache);
  }

  /**
   * Gives every cached block one shared resolver over the cache. Ids outside
   * the cache fall back to a depth-0 fetch.
   */
  private wireCache(cache: Map<BlockId, Block>): Map<BlockId, Block> {
    const wired = new Map<BlockId, Block>();
    const resolveOne = (id: BlockId): Block | undefined => wired.get(id) ?? this.getBlock(id);
    const resolver: BlockResolver = {
      resolveOne,
      resolveMany: (ids) => this.collect(ids, resolveOne),
    };
    for (const [id, block] of cache) {
      wired.set(id, block.withResolver(resolver));
    }
    return wired;
  }

  private collect(ids: readonly BlockId[], resolve: (id: BlockId) => Block | undefined): Block[] {
    const blocks: Block[] = [];
    for (const id of ids) {
      const block = resolve(id);
      if (block) {
        blocks.push(block);
      }
    }
    return blocks;
  }
}
