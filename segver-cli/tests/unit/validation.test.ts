import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'segver-core';
import { validateRelation } from '../../src/utils/validation.js';

describe('validateRelation', () => {
  it.each(['gt', 'ge', 'lt', 'le', 'eq'])('accepts %s', (relation) => {
    expect(validateRelation(relation)).toBe(relation);
  });

  it('normalizes case', () => {
    expect(validateRelation('LE')).toBe('le');
  });

  it('rejects anything else', () => {
    expect(() => validateRelation('>=')).toThrow(InvalidArgumentError);
    expect(() => validateRelation('>=')).toThrow('Invalid relation: >=');
  });
});
