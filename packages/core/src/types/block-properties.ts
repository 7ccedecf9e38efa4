/**
 * Block Properties - per-type property schemas and their registry
 *
 * Every block type maps to one properties interface. The registry is a
 * dispatch table from type to validator: validators check the known fields,
 * apply defaults, and pass unknown keys through untouched so property maps
 * stay open to extension.
 */

import { invalidProperties } from '../errors/factories.js';
import { BlockType } from './block-type.js';
import { isPlainObject, isValidId, type BlockId } from './common.js';

// ============================================================================
// Property Interfaces
// ============================================================================

/**
 * Base shape shared by all property maps
 */
export interface OpenProperties {
  [key: string]: unknown;
}

export interface TitledProperties extends OpenProperties {
  title: string;
}

export interface DocumentProperties extends OpenProperties {
  title?: string;
  category?: string;
}

export interface DatasetProperties extends OpenProperties {
  datasetType?: string;
}

export interface CategorizedProperties extends OpenProperties {
  category: string;
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingProperties extends OpenProperties {
  level: HeadingLevel;
}

/**
 * Properties of blocks that can be grouped into page or chunk groups
 */
export interface GroupedProperties extends OpenProperties {
  groups: BlockId[];
}

export interface CodeProperties extends GroupedProperties {
  language?: string;
}

export interface ObjectProperties extends GroupedProperties {
  category?: string;
}

export type GroupIndexType = 'page' | 'chunk';

export interface GroupIndexProperties extends OpenProperties {
  groupIndexType: GroupIndexType;
}

export interface PageGroupProperties extends OpenProperties {
  pageNumber: number;
}

export interface OptionalTitleProperties extends OpenProperties {
  title?: string;
}

export interface SyncedProperties extends OpenProperties {
  syncedFrom?: BlockId;
}

/**
 * Maps each block type to its properties interface
 */
export interface BlockPropertiesMap {
  workspace: TitledProperties;
  collection: TitledProperties;
  document: DocumentProperties;
  dataset: DatasetProperties;
  derived_content_container: CategorizedProperties;
  heading: HeadingProperties;
  paragraph: OpenProperties;
  bulleted_list_item: OpenProperties;
  numbered_list_item: OpenProperties;
  record: OpenProperties;
  quote: GroupedProperties;
  code: CodeProperties;
  table: GroupedProperties;
  html: GroupedProperties;
  object: ObjectProperties;
  group_index: GroupIndexProperties;
  page_group: PageGroupProperties;
  chunk_group: OptionalTitleProperties;
  system_container: CategorizedProperties;
  page: OptionalTitleProperties;
  synced: SyncedProperties;
  unsupported: OpenProperties;
}

export type BlockProperties<T extends BlockType = BlockType> = BlockPropertiesMap[T];

// ============================================================================
// Field Readers
// ============================================================================

/** Heading level applied when none is given */
export const DEFAULT_HEADING_LEVEL: HeadingLevel = 2;

type PropertiesValidator<P> = (raw: Record<string, unknown>, type: BlockType) => P;

function requiredString(raw: Record<string, unknown>, key: string, type: BlockType): string {
  const value = raw[key];
  if (typeof value !== 'string') {
    throw invalidProperties(type, `${key} is required and must be a string`, { field: key, value });
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string, type: BlockType): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalidProperties(type, `${key} must be a string`, { field: key, value });
  }
  return value;
}

function groupIds(raw: Record<string, unknown>, type: BlockType): BlockId[] {
  const value = raw.groups;
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((id) => isValidId(id))) {
    throw invalidProperties(type, 'groups must be a list of block ids', { field: 'groups', value });
  }
  return [...value];
}

function isHeadingLevel(value: unknown): value is HeadingLevel {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 6;
}

// ============================================================================
// Validators
// ============================================================================

const openProperties: PropertiesValidator<OpenProperties> = (raw) => ({ ...raw });

const titled: PropertiesValidator<TitledProperties> = (raw, type) => ({
  ...raw,
  title: requiredString(raw, 'title', type),
});

const optionalTitle: PropertiesValidator<OptionalTitleProperties> = (raw, type) => ({
  ...raw,
  title: optionalString(raw, 'title', type),
});

const categorized: PropertiesValidator<CategorizedProperties> = (raw, type) => ({
  ...raw,
  category: requiredString(raw, 'category', type),
});

const grouped: PropertiesValidator<GroupedProperties> = (raw, type) => ({
  ...raw,
  groups: groupIds(raw, type),
});

/**
 * Registry mapping each block type to its properties validator
 */
export const PROPERTIES_REGISTRY: { readonly [K in BlockType]: PropertiesValidator<BlockPropertiesMap[K]> } = {
  workspace: titled,
  collection: titled,
  document: (raw, type) => ({
    ...raw,
    title: optionalString(raw, 'title', type),
    category: optionalString(raw, 'category', type),
  }),
  dataset: (raw, type) => ({
    ...raw,
    datasetType: optionalString(raw, 'datasetType', type),
  }),
  derived_content_container: categorized,
  heading: (raw, type) => {
    const level = raw.level ?? DEFAULT_HEADING_LEVEL;
    if (!isHeadingLevel(level)) {
      throw invalidProperties(type, 'level must be an integer between 1 and 6', { field: 'level', value: level });
    }
    return { ...raw, level };
  },
  paragraph: openProperties,
  bulleted_list_item: openProperties,
  numbered_list_item: openProperties,
  record: openProperties,
  quote: grouped,
  code: (raw, type) => ({
    ...raw,
    language: optionalString(raw, 'language', type),
    groups: groupIds(raw, type),
  }),
  table: grouped,
  html: grouped,
  object: (raw, type) => ({
    ...raw,
    category: optionalString(raw, 'category', type),
    groups: groupIds(raw, type),
  }),
  group_index: (raw, type) => {
    const groupIndexType = raw.groupIndexType;
    if (groupIndexType !== 'page' && groupIndexType !== 'chunk') {
      throw invalidProperties(type, "groupIndexType must be 'page' or 'chunk'", {
        field: 'groupIndexType',
        value: groupIndexType,
      });
    }
    return { ...raw, groupIndexType };
  },
  page_group: (raw, type) => {
    const pageNumber = raw.pageNumber;
    if (typeof pageNumber !== 'number' || !Number.isInteger(pageNumber) || pageNumber < 1) {
      throw invalidProperties(type, 'pageNumber must be an integer >= 1', { field: 'pageNumber', value: pageNumber });
    }
    return { ...raw, pageNumber };
  },
  chunk_group: optionalTitle,
  system_container: categorized,
  page: optionalTitle,
  synced: (raw, type) => {
    const syncedFrom = raw.syncedFrom;
    if (syncedFrom !== undefined && syncedFrom !== null && !isValidId(syncedFrom)) {
      throw invalidProperties(type, 'syncedFrom must be a block id', { field: 'syncedFrom', value: syncedFrom });
    }
    return { ...raw, syncedFrom: isValidId(syncedFrom) ? syncedFrom : undefined };
  },
  unsupported: openProperties,
};

/**
 * Validates raw properties against the schema registered for a block type.
 * Missing properties are treated as an empty map.
 */
export function validateBlockProperties<K extends BlockType>(type: K, raw: unknown): BlockPropertiesMap[K] {
  const input = raw ?? {};
  if (!isPlainObject(input)) {
    throw invalidProperties(type, 'properties must be an object', { value: raw });
  }
  const validator = PROPERTIES_REGISTRY[type];
  return validator(input, type);
}
