import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createStorage, type StorageBackend } from '@blockstore/storage';
import {
  createBlock,
  generateId,
  ConflictError,
  ConstraintError,
  ErrorCode,
  NotFoundError,
  ValidationError,
  type Block,
  type BlockType,
  type CreateBlockInput,
} from '@blockstore/core';
import { BlockRepository } from './block-repository.js';
import { propertyFilter, or, not, type FilterExpression } from '../filters/index.js';

const MISSING_A = '00000000-0000-4000-8000-000000000001';
const MISSING_B = '00000000-0000-4000-8000-000000000002';

function childOf<T extends BlockType>(parent: Block, type: T, input: Partial<CreateBlockInput<T>> = {}): Block<T> {
  return createBlock<T>({ ...input, type, parentId: parent.id, rootId: parent.rootId });
}

interface Tree {
  doc: Block<'document'>;
  heading: Block<'heading'>;
  intro: Block<'paragraph'>;
  detail: Block<'paragraph'>;
}

/**
 * doc -> [heading, intro]; heading -> [detail]
 */
function buildTree(title: string): Tree {
  const root = createBlock({ type: 'document', properties: { title } });
  const heading = childOf(root, 'heading', { properties: { level: 1 } });
  const intro = childOf(root, 'paragraph', { content: { plainText: 'Intro' } });
  const detail = childOf(heading, 'paragraph', { content: { plainText: 'Detail' } });
  return {
    doc: root.with({ childrenIds: [heading.id, intro.id] }),
    heading: heading.with({ childrenIds: [detail.id] }),
    intro,
    detail,
  };
}

function blocksOf(tree: Tree): Block[] {
  return [tree.doc, tree.heading, tree.intro, tree.detail];
}

describe('BlockRepository', () => {
  let db: StorageBackend;
  let repo: BlockRepository;
  let tree: Tree;

  function load(id: string): Block {
    const block = repo.getBlock(id, { includeTrashed: true });
    if (!block) {
      throw new Error(`expected block ${id} to exist`);
    }
    return block;
  }

  beforeEach(() => {
    db = createStorage({ path: ':memory:' });
    repo = new BlockRepository(db);
    tree = buildTree('Controls Handbook');
    repo.upsertBlocks(blocksOf(tree));
  });

  afterEach(() => {
    db.close();
  });

  // ==========================================================================
  // getBlock
  // ==========================================================================

  describe('getBlock', () => {
    it('should return undefined for an unknown id', () => {
      expect(repo.getBlock(generateId())).toBeUndefined();
    });

    it('should round-trip every stored field', () => {
      const loaded = load(tree.detail.id);

      expect(loaded.toData()).toEqual(tree.detail.toData());
    });

    it('should navigate lazily at depth 0', () => {
      const loaded = load(tree.doc.id);

      const first = loaded.children();
      const second = loaded.children();
      expect(first.map((block) => block.id)).toEqual([tree.heading.id, tree.intro.id]);
      expect(first[0]).not.toBe(second[0]);
      expect(first[0].parent()?.id).toBe(tree.doc.id);
    });

    it('should share instances within the hydrated depth', () => {
      const loaded = repo.getBlock(tree.doc.id, { depth: 1 });
      if (!loaded) throw new Error('missing document');

      const [heading] = loaded.children();
      expect(loaded.children()[0]).toBe(heading);
      expect(heading.parent()).toBe(loaded);

      // detail lies beyond depth 1 and is fetched on demand
      const detailA = heading.children()[0];
      const detailB = heading.children()[0];
      expect(detailA.id).toBe(tree.detail.id);
      expect(detailA).not.toBe(detailB);
    });

    it('should hydrate the whole root with an unbounded depth', () => {
      const heading = repo.getBlock(tree.heading.id, { depth: null });
      if (!heading) throw new Error('missing heading');

      const doc = heading.parent();
      expect(doc?.id).toBe(tree.doc.id);
      expect(heading.parent()).toBe(doc);
      expect(doc?.children()[0]).toBe(heading);
      expect(heading.children()[0]).toBe(heading.children()[0]);
      expect(heading.children()[0].content).toEqual({ plainText: 'Detail' });
    });

    it('should treat an infinite depth as the whole root', () => {
      const heading = repo.getBlock(tree.heading.id, { depth: Number.POSITIVE_INFINITY });
      if (!heading) throw new Error('missing heading');

      expect(heading.parent()?.id).toBe(tree.doc.id);
      expect(heading.parent()).toBe(heading.parent());
    });

    it('should reject a negative depth', () => {
      expect(() => repo.getBlock(tree.doc.id, { depth: -1 })).toThrow(ValidationError);
      expect(() => repo.getBlock(tree.doc.id, { depth: 1.5 })).toThrow(
        expect.objectContaining({ code: ErrorCode.INVALID_DEPTH })
      );
    });

    it('should hide trashed blocks unless asked', () => {
      repo.setInTrash([tree.intro.id], true);

      expect(repo.getBlock(tree.intro.id)).toBeUndefined();
      expect(repo.getBlock(tree.intro.id, { includeTrashed: true })?.inTrash).toBe(true);
    });

    it('should skip trashed children while hydrating', () => {
      repo.setInTrash([tree.intro.id], true);

      const bounded = repo.getBlock(tree.doc.id, { depth: 2 });
      const unbounded = repo.getBlock(tree.doc.id, { depth: null });

      expect(bounded?.children().map((block) => block.id)).toEqual([tree.heading.id]);
      expect(unbounded?.children().map((block) => block.id)).toEqual([tree.heading.id]);
    });
  });

  // ==========================================================================
  // queryBlocks
  // ==========================================================================

  describe('queryBlocks', () => {
    let other: Tree;

    beforeEach(() => {
      other = buildTree('Policies Handbook');
      repo.upsertBlocks(blocksOf(other));
    });

    function ids(blocks: Block[]): string[] {
      return blocks.map((block) => block.id).sort();
    }

    it('should filter records by a nested content value', () => {
      const dataset = createBlock({ type: 'dataset', properties: { datasetType: 'controls' } });
      const records = ['Preventive', 'Detective', 'Detective'].map((category) =>
        childOf(dataset, 'record', { content: { data: { category } } })
      );
      repo.upsertBlocks([dataset.with({ childrenIds: records.map((r) => r.id) }), ...records]);

      const result = repo.queryBlocks({
        propertyFilter: propertyFilter('content.data.category', 'Detective'),
      });

      expect(ids(result)).toEqual([records[1].id, records[2].id].sort());
    });

    it('should filter by type sets and root ids', () => {
      const result = repo.queryBlocks({ where: { type: ['heading', 'paragraph'], rootId: tree.doc.id } });

      expect(ids(result)).toEqual(ids([tree.heading, tree.intro, tree.detail]));
    });

    it('should match nothing for an empty type set', () => {
      expect(repo.queryBlocks({ where: { type: [] } })).toEqual([]);
    });

    it('should filter by attributes of the parent row', () => {
      const result = repo.queryBlocks({
        where: { rootId: tree.doc.id },
        parent: { where: { type: 'heading' } },
      });

      expect(ids(result)).toEqual([tree.detail.id]);
    });

    it('should filter by properties of the root row', () => {
      const result = repo.queryBlocks({
        root: { propertyFilter: propertyFilter('title', 'Policies Handbook') },
      });

      expect(ids(result)).toEqual(ids(blocksOf(other)));
    });

    it('should compose boolean filters', () => {
      const result = repo.queryBlocks({
        where: { rootId: tree.doc.id },
        propertyFilter: or(
          propertyFilter('content.plainText', 'Intro'),
          not(propertyFilter('content.plainText', 'Detail'))
        ),
      });

      // NOT over a missing value is NULL, so blocks without content drop out
      expect(ids(result)).toEqual([tree.intro.id]);
    });

    it('should apply a limit', () => {
      expect(repo.queryBlocks({ where: { rootId: tree.doc.id }, limit: 2 })).toHaveLength(2);
      expect(() => repo.queryBlocks({ limit: -1 })).toThrow(ValidationError);
    });

    it('should exclude trashed blocks by default', () => {
      repo.setInTrash([tree.heading.id], true);

      expect(ids(repo.queryBlocks({ where: { rootId: tree.doc.id } }))).toEqual(ids([tree.doc, tree.intro]));
      expect(repo.queryBlocks({ where: { rootId: tree.doc.id }, includeTrashed: true })).toHaveLength(4);
    });
  });

  // ==========================================================================
  // Typed property filters
  // ==========================================================================

  describe('typed property filters', () => {
    let audited: Block<'record'>;
    let imported: Block<'record'>;
    let sparse: Block<'record'>;

    beforeEach(() => {
      const dataset = createBlock({ type: 'dataset', properties: { datasetType: 'controls' } });
      audited = childOf(dataset, 'record', {
        content: { data: { score: 3, weight: 2.5, active: true, category: 'Preventive' } },
        metadata: { source: 'audit' },
      });
      imported = childOf(dataset, 'record', {
        content: { data: { score: 7, weight: 0.5, active: false, category: 'Detective Control' } },
        metadata: { source: 'import' },
      });
      sparse = childOf(dataset, 'record', { content: { data: { category: 'Detective', score: null } } });
      repo.upsertBlocks([dataset.with({ childrenIds: [audited.id, imported.id, sparse.id] }), audited, imported, sparse]);
    });

    function recordIds(filter: FilterExpression): string[] {
      return repo
        .queryBlocks({ where: { type: 'record' }, propertyFilter: filter })
        .map((block) => block.id)
        .sort();
    }

    it('should compare integers', () => {
      expect(recordIds(propertyFilter('content.data.score', 3))).toEqual([audited.id]);
      expect(recordIds(propertyFilter('content.data.score', 3, 'not_equals'))).toEqual([imported.id]);
    });

    it('should compare floats', () => {
      expect(recordIds(propertyFilter('content.data.weight', 2.5))).toEqual([audited.id]);
      expect(recordIds(propertyFilter('content.data.weight', 2.5, 'not_equals'))).toEqual([imported.id]);
    });

    it('should compare booleans', () => {
      expect(recordIds(propertyFilter('content.data.active', true))).toEqual([audited.id]);
      expect(recordIds(propertyFilter('content.data.active', false))).toEqual([imported.id]);
    });

    it('should test membership over numbers and strings', () => {
      expect(recordIds(propertyFilter('content.data.score', [3, 7, 9], 'in'))).toEqual(
        [audited.id, imported.id].sort()
      );
      expect(recordIds(propertyFilter('content.data.category', ['Preventive', 'Detective'], 'in'))).toEqual(
        [audited.id, sparse.id].sort()
      );
    });

    it('should compare strings with not_equals', () => {
      expect(recordIds(propertyFilter('content.data.category', 'Preventive', 'not_equals'))).toEqual(
        [imported.id, sparse.id].sort()
      );
    });

    it('should match substrings case-sensitively', () => {
      expect(recordIds(propertyFilter('content.data.category', 'Detective', 'contains'))).toEqual(
        [imported.id, sparse.id].sort()
      );
      expect(recordIds(propertyFilter('content.data.category', 'detective', 'contains'))).toEqual([]);
    });

    it('should filter on metadata paths', () => {
      expect(recordIds(propertyFilter('metadata.source', 'audit'))).toEqual([audited.id]);
    });

    it('should skip absent and null values without failing', () => {
      expect(recordIds(propertyFilter('content.data.weight', [0.5, 2.5], 'in'))).toEqual(
        [audited.id, imported.id].sort()
      );
      expect(recordIds(propertyFilter('content.data.score', 7))).toEqual([imported.id]);
    });

    it('should fail when a number filter meets a string value', () => {
      const graded = createBlock({ type: 'document', properties: { title: 'Graded', score: 'high' } });
      const scored = createBlock({ type: 'document', properties: { title: 'Scored', score: 2.5 } });
      repo.upsertBlocks([graded, scored]);

      expect(() => repo.queryBlocks({ propertyFilter: propertyFilter('score', 2.5) })).toThrow(
        expect.objectContaining({
          code: ErrorCode.FILTER_TYPE_MISMATCH,
          message: "Filter on 'score' expects number values",
        })
      );
    });

    it('should fail when a boolean filter meets a string value', () => {
      const flagged = createBlock({ type: 'document', properties: { title: 'Flagged', active: 'yes' } });
      repo.upsertBlocks([flagged]);

      expect(() =>
        repo.queryBlocks({ where: { type: 'document' }, propertyFilter: propertyFilter('active', true) })
      ).toThrow(ValidationError);
    });
  });

  // ==========================================================================
  // upsertBlocks
  // ==========================================================================

  describe('upsertBlocks', () => {
    it('should replace rows without a version check', () => {
      repo.upsertBlocks([tree.doc.with({ properties: { title: 'Renamed' }, version: 7 })]);

      const loaded = load(tree.doc.id);
      expect(loaded.properties).toEqual({ title: 'Renamed' });
      expect(loaded.version).toBe(7);
    });

    it('should not touch other blocks', () => {
      const extra = childOf(tree.doc, 'paragraph');
      repo.upsertBlocks([extra]);

      expect(load(tree.doc.id).childrenIds).toEqual([tree.heading.id, tree.intro.id]);
    });
  });

  // ==========================================================================
  // setChildren
  // ==========================================================================

  describe('setChildren', () => {
    it('should replace the order and bump only the parent', () => {
      repo.setChildren(tree.doc.id, [tree.intro.id, tree.heading.id], 0);

      const doc = load(tree.doc.id);
      expect(doc.childrenIds).toEqual([tree.intro.id, tree.heading.id]);
      expect(doc.version).toBe(1);
      expect(load(tree.intro.id).version).toBe(0);
      expect(load(tree.heading.id).version).toBe(0);
    });

    it('should orphan dropped children', () => {
      repo.setChildren(tree.doc.id, [tree.heading.id], 0);

      const intro = load(tree.intro.id);
      expect(intro.parentId).toBeNull();
      expect(intro.version).toBe(0);
    });

    it('should detach children from a previous parent', () => {
      repo.setChildren(tree.heading.id, [tree.detail.id, tree.intro.id], 0);

      expect(load(tree.intro.id).parentId).toBe(tree.heading.id);
      expect(load(tree.heading.id).childrenIds).toEqual([tree.detail.id, tree.intro.id]);
      const doc = load(tree.doc.id);
      expect(doc.childrenIds).toEqual([tree.heading.id]);
      expect(doc.version).toBe(1);
    });

    it('should reject a stale version', () => {
      repo.setChildren(tree.doc.id, [tree.intro.id, tree.heading.id], 0);

      expect(() => repo.setChildren(tree.doc.id, [tree.heading.id, tree.intro.id], 0)).toThrow(ConflictError);
      expect(() => repo.setChildren(tree.doc.id, [tree.heading.id, tree.intro.id], 0)).toThrow(
        `Parent ${tree.doc.id} version mismatch: expected 0, found 1.`
      );
    });

    it('should reject duplicates whether or not they exist', () => {
      expect(() => repo.setChildren(tree.doc.id, [MISSING_A, MISSING_A], 0)).toThrow(
        'Duplicate child identifiers are not allowed.'
      );
      expect(() => repo.setChildren(tree.doc.id, [tree.intro.id, tree.intro.id], 0)).toThrow(ConstraintError);
    });

    it('should reject the parent as its own child', () => {
      expect(() => repo.setChildren(tree.doc.id, [tree.doc.id], 0)).toThrow('A block cannot be a child of itself.');
    });

    it('should reject missing parents and children', () => {
      expect(() => repo.setChildren(MISSING_A, [], 0)).toThrow(NotFoundError);
      expect(() => repo.setChildren(tree.doc.id, [tree.heading.id, MISSING_B, MISSING_A], 0)).toThrow(
        `Blocks not found: ${MISSING_B}, ${MISSING_A}`
      );
    });

    it('should report malformed child ids as not found', () => {
      expect(() => repo.setChildren(tree.doc.id, ['not-a-block'], 0)).toThrow(
        expect.objectContaining({ code: ErrorCode.BLOCK_NOT_FOUND, message: 'Block not found: not-a-block' })
      );
      expect(load(tree.doc.id).version).toBe(0);
    });

    it('should reject a cycle and leave state unchanged', () => {
      let error: unknown;
      try {
        repo.setChildren(tree.heading.id, [tree.detail.id, tree.doc.id], 0);
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ConstraintError);
      expect(error).toMatchObject({ code: ErrorCode.CYCLE_DETECTED });
      const heading = load(tree.heading.id);
      expect(heading.childrenIds).toEqual([tree.detail.id]);
      expect(heading.version).toBe(0);
      expect(load(tree.doc.id).parentId).toBeNull();
    });

    it('should reject children from another root', () => {
      const other = buildTree('Policies Handbook');
      repo.upsertBlocks(blocksOf(other));

      expect(() => repo.setChildren(tree.doc.id, [tree.heading.id, other.intro.id], 0)).toThrow(
        expect.objectContaining({ code: ErrorCode.CROSS_ROOT })
      );
      expect(load(other.intro.id).parentId).toBe(other.doc.id);
    });
  });

  // ==========================================================================
  // reorderChildren
  // ==========================================================================

  describe('reorderChildren', () => {
    it('should reorder a permutation of the current children', () => {
      repo.reorderChildren(tree.doc.id, [tree.intro.id, tree.heading.id], 0);

      const doc = load(tree.doc.id);
      expect(doc.childrenIds).toEqual([tree.intro.id, tree.heading.id]);
      expect(doc.version).toBe(1);
    });

    it('should reject a different member set', () => {
      expect(() => repo.reorderChildren(tree.doc.id, [tree.intro.id], 0)).toThrow(
        'Reorder must reference the same child ids as currently stored.'
      );
      expect(load(tree.doc.id).version).toBe(0);
    });
  });

  // ==========================================================================
  // moveBlock
  // ==========================================================================

  describe('moveBlock', () => {
    it('should reorder within the same parent', () => {
      repo.moveBlock(tree.intro.id, tree.doc.id, 0, { expectedBlockVersion: 0, expectedNewParentVersion: 0 });

      const doc = load(tree.doc.id);
      expect(doc.childrenIds).toEqual([tree.intro.id, tree.heading.id]);
      expect(doc.version).toBe(1);
      expect(load(tree.intro.id).version).toBe(1);
    });

    it('should move across parents and bump all three', () => {
      repo.moveBlock(tree.intro.id, tree.heading.id, 0, {
        expectedBlockVersion: 0,
        expectedNewParentVersion: 0,
        expectedOldParentVersion: 0,
      });

      const doc = load(tree.doc.id);
      const heading = load(tree.heading.id);
      const intro = load(tree.intro.id);
      expect(doc.childrenIds).toEqual([tree.heading.id]);
      expect(doc.version).toBe(1);
      expect(heading.childrenIds).toEqual([tree.intro.id, tree.detail.id]);
      expect(heading.version).toBe(1);
      expect(intro.parentId).toBe(tree.heading.id);
      expect(intro.version).toBe(1);
    });

    it('should clamp the index', () => {
      repo.moveBlock(tree.intro.id, tree.heading.id, 99, { expectedNewParentVersion: 0 });
      expect(load(tree.heading.id).childrenIds).toEqual([tree.detail.id, tree.intro.id]);

      repo.moveBlock(tree.intro.id, tree.heading.id, -5, { expectedNewParentVersion: 1 });
      expect(load(tree.heading.id).childrenIds).toEqual([tree.intro.id, tree.detail.id]);
    });

    it('should reject moving a block under its own descendant', () => {
      expect(() => repo.moveBlock(tree.doc.id, tree.heading.id, 0, { expectedNewParentVersion: 0 })).toThrow(
        expect.objectContaining({ code: ErrorCode.CYCLE_DETECTED })
      );
      expect(() => repo.moveBlock(tree.heading.id, tree.heading.id, 0, { expectedNewParentVersion: 0 })).toThrow(
        expect.objectContaining({ code: ErrorCode.CYCLE_DETECTED })
      );
      expect(load(tree.heading.id).version).toBe(0);
    });

    it('should reject a cross-root move and leave the block unchanged', () => {
      const other = buildTree('Policies Handbook');
      repo.upsertBlocks(blocksOf(other));

      expect(() => repo.moveBlock(tree.intro.id, other.doc.id, 0, { expectedNewParentVersion: 0 })).toThrow(
        ConstraintError
      );
      const intro = load(tree.intro.id);
      expect(intro.parentId).toBe(tree.doc.id);
      expect(intro.version).toBe(0);
    });

    it('should check every supplied version', () => {
      expect(() =>
        repo.moveBlock(tree.intro.id, tree.heading.id, 0, { expectedBlockVersion: 3, expectedNewParentVersion: 0 })
      ).toThrow(`Block ${tree.intro.id} version mismatch: expected 3, found 0.`);
      expect(() => repo.moveBlock(tree.intro.id, tree.heading.id, 0, { expectedNewParentVersion: 2 })).toThrow(
        ConflictError
      );
      expect(() =>
        repo.moveBlock(tree.intro.id, tree.heading.id, 0, {
          expectedNewParentVersion: 0,
          expectedOldParentVersion: 4,
        })
      ).toThrow(`Parent ${tree.doc.id} version mismatch: expected 4, found 0.`);
      expect(load(tree.doc.id).childrenIds).toEqual([tree.heading.id, tree.intro.id]);
    });
  });

  // ==========================================================================
  // setInTrash
  // ==========================================================================

  describe('setInTrash', () => {
    function trashedIds(): string[] {
      return repo
        .queryBlocks({ where: { rootId: tree.doc.id }, includeTrashed: true })
        .filter((block) => block.inTrash)
        .map((block) => block.id)
        .sort();
    }

    it('should cascade to descendants', () => {
      repo.setInTrash([tree.heading.id], true);

      expect(trashedIds()).toEqual([tree.heading.id, tree.detail.id].sort());
      expect(load(tree.detail.id).version).toBe(1);
      expect(load(tree.doc.id).version).toBe(0);
    });

    it('should be idempotent over the trashed set', () => {
      repo.setInTrash([tree.heading.id], true);
      const first = trashedIds();
      repo.setInTrash([tree.heading.id], true);

      expect(trashedIds()).toEqual(first);
      expect(load(tree.heading.id).version).toBe(2);
    });

    it('should restore the whole closure', () => {
      repo.setInTrash([tree.doc.id], true);
      expect(trashedIds()).toHaveLength(4);

      repo.setInTrash([tree.doc.id], false);
      expect(trashedIds()).toEqual([]);
    });

    it('should touch only the listed blocks without cascade', () => {
      repo.setInTrash([tree.heading.id], true, { cascade: false });

      expect(trashedIds()).toEqual([tree.heading.id]);
    });

    it('should reject missing ids without writing', () => {
      expect(() => repo.setInTrash([MISSING_B, tree.intro.id, MISSING_A], true)).toThrow(
        `Blocks not found: ${MISSING_A}, ${MISSING_B}`
      );
      expect(trashedIds()).toEqual([]);
    });
  });
});
