/**
 * Block - a typed node in a document tree
 *
 * A Block is an immutable snapshot of one stored row. Hierarchy is expressed
 * through `parentId`, `rootId` and the ordered `childrenIds`; navigation goes
 * through an injected {@link BlockResolver} so that a hydrated subgraph can wire
 * blocks to each other without any block owning another.
 *
 * Mutation never happens in place: {@link Block.with} and {@link Block.revise}
 * produce new values.
 */

import { missingRequiredField } from '../errors/factories.js';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import { validateBlockType, type BlockType } from './block-type.js';
import { validateBlockProperties, type BlockPropertiesMap } from './block-properties.js';
import {
  createTimestamp,
  generateId,
  isPlainObject,
  validateId,
  validateMetadata,
  validateOptionalId,
  type ActorId,
  type BlockId,
  type Metadata,
  type Timestamp,
} from './common.js';

// ============================================================================
// Content
// ============================================================================

/**
 * Unstructured payload carried alongside typed properties
 */
export interface BlockContent {
  /** Plain text body */
  plainText?: string;
  /** Nested object map */
  object?: Record<string, unknown>;
  /** Tabular/record data map */
  data?: Record<string, unknown>;
  /** Canonical block this block mirrors */
  syncedFrom?: BlockId;
}

/**
 * Validates a content payload, normalising undefined to null
 */
export function validateContent(value: unknown): BlockContent | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (!isPlainObject(value)) {
    throw new ValidationError('Content must be an object', ErrorCode.INVALID_CONTENT, { value });
  }
  const { plainText, object, data, syncedFrom } = value;
  if (plainText !== undefined && plainText !== null && typeof plainText !== 'string') {
    throw new ValidationError('content.plainText must be a string', ErrorCode.INVALID_CONTENT, {
      field: 'content.plainText',
      value: plainText,
    });
  }
  for (const [field, map] of [['object', object], ['data', data]] as const) {
    if (map !== undefined && map !== null && !isPlainObject(map)) {
      throw new ValidationError(`content.${field} must be an object`, ErrorCode.INVALID_CONTENT, {
        field: `content.${field}`,
        value: map,
      });
    }
  }

  const content: BlockContent = {};
  if (typeof plainText === 'string') content.plainText = plainText;
  if (isPlainObject(object)) content.object = object;
  if (isPlainObject(data)) content.data = data;
  const synced = validateOptionalId(syncedFrom, 'content.syncedFrom');
  if (synced !== null) content.syncedFrom = synced;
  return content;
}

// ============================================================================
// Block Data
// ============================================================================

/**
 * Plain field set of a block
 */
export interface BlockData<T extends BlockType = BlockType> {
  id: BlockId;
  type: T;
  /** Null only for roots */
  parentId: BlockId | null;
  /** Topmost ancestor; equals id when parentId is null */
  rootId: BlockId;
  /** Canonical child order */
  childrenIds: readonly BlockId[];
  workspaceId: BlockId | null;
  inTrash: boolean;
  /** Optimistic concurrency token, starts at 0 */
  version: number;
  createdTime: Timestamp;
  lastEditedTime: Timestamp;
  createdBy: ActorId | null;
  lastEditedBy: ActorId | null;
  properties: BlockPropertiesMap[T];
  metadata: Metadata;
  content: BlockContent | null;
  /** Schema-version tag for property migrations */
  propertiesVersion: number | null;
}

/**
 * Field delta accepted by {@link Block.with}; identity and type are fixed
 */
export type BlockDelta<T extends BlockType = BlockType> = Partial<Omit<BlockData<T>, 'id' | 'type'>>;

/**
 * Navigation capability injected into blocks
 */
export interface BlockResolver {
  resolveOne(id: BlockId): Block | undefined;
  resolveMany(ids: readonly BlockId[]): Block[];
}

// ============================================================================
// Block
// ============================================================================

export class Block<T extends BlockType = BlockType> implements BlockData<T> {
  readonly id: BlockId;
  readonly type: T;
  readonly parentId: BlockId | null;
  readonly rootId: BlockId;
  readonly childrenIds: readonly BlockId[];
  readonly workspaceId: BlockId | null;
  readonly inTrash: boolean;
  readonly version: number;
  readonly createdTime: Timestamp;
  readonly lastEditedTime: Timestamp;
  readonly createdBy: ActorId | null;
  readonly lastEditedBy: ActorId | null;
  readonly properties: BlockPropertiesMap[T];
  readonly metadata: Metadata;
  readonly content: BlockContent | null;
  readonly propertiesVersion: number | null;

  private readonly resolver: BlockResolver | undefined;

  constructor(data: BlockData<T>, resolver?: BlockResolver) {
    this.id = data.id;
    this.type = data.type;
    this.parentId = data.parentId;
    this.rootId = data.rootId;
    this.childrenIds = Object.freeze([...data.childrenIds]);
    this.workspaceId = data.workspaceId;
    this.inTrash = data.inTrash;
    this.version = data.version;
    this.createdTime = data.createdTime;
    this.lastEditedTime = data.lastEditedTime;
    this.createdBy = data.createdBy;
    this.lastEditedBy = data.lastEditedBy;
    this.properties = data.properties;
    this.metadata = data.metadata;
    this.content = data.content;
    this.propertiesVersion = data.propertiesVersion;
    this.resolver = resolver;
  }

  /**
   * Resolves the parent block, or undefined for roots and unwired blocks
   */
  parent(): Block | undefined {
    if (this.parentId === null || this.resolver === undefined) {
      return undefined;
    }
    return this.resolver.resolveOne(this.parentId);
  }

  /**
   * Resolves the children in canonical order; unresolvable ids are skipped
   */
  children(): Block[] {
    if (this.childrenIds.length === 0 || this.resolver === undefined) {
      return [];
    }
    return this.resolver.resolveMany(this.childrenIds);
  }

  /**
   * Whether navigation is wired
   */
  get isResolvable(): boolean {
    return this.resolver !== undefined;
  }

  /**
   * Returns a copy wired to the given resolver
   */
  withResolver(resolver: BlockResolver): Block<T> {
    return new Block(this.toData(), resolver);
  }

  /**
   * Returns a copy with the given fields replaced. Version and timestamps
   * are left alone; see {@link revise} for an edit.
   */
  with(delta: BlockDelta<T>): Block<T> {
    return new Block({ ...this.toData(), ...delta }, this.resolver);
  }

  /**
   * Returns the next version of this block: fields replaced, version bumped,
   * lastEditedTime refreshed.
   */
  revise(delta: BlockDelta<T> = {}, editedBy?: ActorId): Block<T> {
    return this.with({
      ...delta,
      version: this.version + 1,
      lastEditedTime: createTimestamp(),
      lastEditedBy: editedBy ?? delta.lastEditedBy ?? this.lastEditedBy,
    });
  }

  toData(): BlockData<T> {
    return {
      id: this.id,
      type: this.type,
      parentId: this.parentId,
      rootId: this.rootId,
      childrenIds: [...this.childrenIds],
      workspaceId: this.workspaceId,
      inTrash: this.inTrash,
      version: this.version,
      createdTime: this.createdTime,
      lastEditedTime: this.lastEditedTime,
      createdBy: this.createdBy,
      lastEditedBy: this.lastEditedBy,
      properties: this.properties,
      metadata: this.metadata,
      content: this.content,
      propertiesVersion: this.propertiesVersion,
    };
  }

  toJSON(): BlockData<T> {
    return this.toData();
  }
}

/**
 * Narrows a block to a specific type
 */
export function isBlockOfType<K extends BlockType>(block: Block, type: K): block is Block<K> {
  return block.type === type;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Input for creating a new block
 */
export interface CreateBlockInput<T extends BlockType = BlockType> {
  type: T;
  id?: BlockId;
  parentId?: BlockId | null;
  /** Required when parentId is given */
  rootId?: BlockId;
  childrenIds?: readonly BlockId[];
  workspaceId?: BlockId | null;
  inTrash?: boolean;
  properties?: Partial<BlockPropertiesMap[T]>;
  metadata?: Metadata;
  content?: BlockContent | null;
  createdBy?: ActorId | null;
  createdTime?: Timestamp;
  propertiesVersion?: number | null;
}

/**
 * Creates a new block at version 0 with validated properties.
 * A block without a parent is its own root.
 */
export function createBlock<T extends BlockType>(input: CreateBlockInput<T>): Block<T> {
  validateBlockType(input.type);
  const id = input.id === undefined ? generateId() : validateId(input.id);
  const parentId = validateOptionalId(input.parentId, 'parentId');

  let rootId: BlockId;
  if (input.rootId !== undefined) {
    rootId = validateId(input.rootId, 'rootId');
  } else if (parentId === null) {
    rootId = id;
  } else {
    throw missingRequiredField('rootId', { blockId: id, parentId });
  }

  const childrenIds = (input.childrenIds ?? []).map((childId) => validateId(childId, 'childrenIds'));
  const createdTime = input.createdTime ?? createTimestamp();
  const createdBy = validateOptionalId(input.createdBy, 'createdBy');

  return new Block<T>({
    id,
    type: input.type,
    parentId,
    rootId,
    childrenIds,
    workspaceId: validateOptionalId(input.workspaceId, 'workspaceId'),
    inTrash: input.inTrash ?? false,
    version: 0,
    createdTime,
    lastEditedTime: createdTime,
    createdBy,
    lastEditedBy: createdBy,
    properties: validateBlockProperties(input.type, input.properties ?? {}),
    metadata: validateMetadata(input.metadata),
    content: validateContent(input.content),
    propertiesVersion: input.propertiesVersion ?? null,
  });
}
