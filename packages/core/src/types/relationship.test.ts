import { describe, it, expect } from 'vitest';
import { createRelationship, isRelationshipDirection, validateRelType } from './relationship.js';
import { generateId } from './common.js';

describe('createRelationship', () => {
  it('should create an edge at version 0', () => {
    const source = generateId();
    const target = generateId();
    const actor = generateId();
    const rel = createRelationship({
      sourceBlockId: source,
      targetBlockId: target,
      relType: 'supports',
      metadata: { weight: 2 },
      createdBy: actor,
    });

    expect(rel.sourceBlockId).toBe(source);
    expect(rel.targetBlockId).toBe(target);
    expect(rel.relType).toBe('supports');
    expect(rel.version).toBe(0);
    expect(rel.metadata).toEqual({ weight: 2 });
    expect(rel.workspaceId).toBeNull();
    expect(rel.lastEditedBy).toBe(actor);
    expect(rel.createdTime).toBe(rel.lastEditedTime);
  });

  it('should reject endpoints that are not ids', () => {
    expect(() =>
      createRelationship({ sourceBlockId: 'a', targetBlockId: generateId(), relType: 'supports' })
    ).toThrow('Invalid block ID: a');
  });

  it('should reject blank relationship types', () => {
    expect(() => validateRelType('  ')).toThrow('Invalid relType: expected non-empty string');
    expect(validateRelType('mirrors')).toBe('mirrors');
  });
});

describe('isRelationshipDirection', () => {
  it('should recognise the three directions', () => {
    expect(isRelationshipDirection('outgoing')).toBe(true);
    expect(isRelationshipDirection('incoming')).toBe(true);
    expect(isRelationshipDirection('all')).toBe(true);
    expect(isRelationshipDirection('both')).toBe(false);
  });
});
