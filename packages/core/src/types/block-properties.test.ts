import { describe, it, expect } from 'vitest';
import { validateBlockProperties, DEFAULT_HEADING_LEVEL, PROPERTIES_REGISTRY } from './block-properties.js';
import { BlockType } from './block-type.js';
import { generateId } from './common.js';
import { ValidationError } from '../errors/error.js';

describe('PROPERTIES_REGISTRY', () => {
  it('should register a validator for every block type', () => {
    for (const type of Object.values(BlockType)) {
      expect(typeof PROPERTIES_REGISTRY[type]).toBe('function');
    }
  });
});

describe('validateBlockProperties', () => {
  it('should treat missing properties as an empty map', () => {
    expect(validateBlockProperties('paragraph', undefined)).toEqual({});
    expect(validateBlockProperties('paragraph', null)).toEqual({});
  });

  it('should reject non-object properties', () => {
    expect(() => validateBlockProperties('paragraph', ['a'])).toThrow(
      'Invalid properties for paragraph block: properties must be an object'
    );
  });

  it('should pass unknown keys through', () => {
    const props = validateBlockProperties('document', { title: 'Handbook', owner: 'ops' });
    expect(props.title).toBe('Handbook');
    expect(props.owner).toBe('ops');
  });

  it('should require a title for workspaces and collections', () => {
    expect(() => validateBlockProperties('workspace', {})).toThrow(
      'Invalid properties for workspace block: title is required and must be a string'
    );
    expect(validateBlockProperties('collection', { title: 'Shelf' }).title).toBe('Shelf');
  });

  it('should require a category for containers', () => {
    expect(() => validateBlockProperties('system_container', {})).toThrow(ValidationError);
    expect(validateBlockProperties('derived_content_container', { category: 'summaries' }).category).toBe(
      'summaries'
    );
  });

  it('should default heading level', () => {
    expect(validateBlockProperties('heading', {}).level).toBe(DEFAULT_HEADING_LEVEL);
    expect(validateBlockProperties('heading', { level: 4 }).level).toBe(4);
  });

  it('should reject heading levels outside 1..6', () => {
    expect(() => validateBlockProperties('heading', { level: 7 })).toThrow(
      'Invalid properties for heading block: level must be an integer between 1 and 6'
    );
    expect(() => validateBlockProperties('heading', { level: 1.5 })).toThrow(ValidationError);
  });

  it('should default groups to an empty list', () => {
    expect(validateBlockProperties('table', {}).groups).toEqual([]);
    expect(validateBlockProperties('code', { language: 'sql' })).toEqual({ language: 'sql', groups: [] });
  });

  it('should reject groups that are not block ids', () => {
    expect(() => validateBlockProperties('quote', { groups: ['page-1'] })).toThrow(
      'Invalid properties for quote block: groups must be a list of block ids'
    );
    const group = generateId();
    expect(validateBlockProperties('object', { groups: [group] }).groups).toEqual([group]);
  });

  it('should accept only page or chunk group indexes', () => {
    expect(validateBlockProperties('group_index', { groupIndexType: 'chunk' }).groupIndexType).toBe('chunk');
    expect(() => validateBlockProperties('group_index', { groupIndexType: 'section' })).toThrow(ValidationError);
  });

  it('should require positive page numbers', () => {
    expect(validateBlockProperties('page_group', { pageNumber: 3 }).pageNumber).toBe(3);
    expect(() => validateBlockProperties('page_group', { pageNumber: 0 })).toThrow(
      'Invalid properties for page_group block: pageNumber must be an integer >= 1'
    );
    expect(() => validateBlockProperties('page_group', {})).toThrow(ValidationError);
  });

  it('should validate synced references', () => {
    const target = generateId();
    expect(validateBlockProperties('synced', { syncedFrom: target }).syncedFrom).toBe(target);
    expect(validateBlockProperties('synced', {}).syncedFrom).toBeUndefined();
    expect(() => validateBlockProperties('synced', { syncedFrom: 42 })).toThrow(ValidationError);
  });
});
