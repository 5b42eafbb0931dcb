import { describe, it, expect } from 'vitest';
import { classifySegment, compareIgnoreCase, compareSegments } from '../../src/versioning/segment.js';

describe('classifySegment', () => {
  it('classifies digit-only tokens as numeric, leading zeros included', () => {
    expect(classifySegment('42')).toEqual({ kind: 'numeric', text: '42', value: 42n });
    expect(classifySegment('042')).toEqual({ kind: 'numeric', text: '042', value: 42n });
    expect(classifySegment('0')).toEqual({ kind: 'numeric', text: '0', value: 0n });
  });

  it('classifies anything with a non-digit as alpha', () => {
    expect(classifySegment('1a')).toEqual({ kind: 'alpha', text: '1a' });
    expect(classifySegment('SNAPSHOT')).toEqual({ kind: 'alpha', text: 'SNAPSHOT' });
    expect(classifySegment('٣')).toEqual({ kind: 'alpha', text: '٣' });
  });

  it('keeps arbitrarily long numbers exact', () => {
    const segment = classifySegment('123456789012345678901234567890');
    expect(segment).toEqual({
      kind: 'numeric',
      text: '123456789012345678901234567890',
      value: 123456789012345678901234567890n,
    });
  });
});

describe('compareSegments', () => {
  const compare = (left: string, right: string) =>
    compareSegments(classifySegment(left), classifySegment(right));

  it('compares two numeric segments by magnitude', () => {
    expect(compare('10', '2')).toBe(1);
    expect(compare('2', '10')).toBe(-1);
    expect(compare('042', '42')).toBe(0);
  });

  it('compares two alpha segments ignoring case', () => {
    expect(compare('alpha', 'Beta')).toBe(-1);
    expect(compare('C', 'd')).toBe(-1);
    expect(compare('Final', 'FINAL')).toBe(0);
    expect(compare('SNAPSHOT', 'Final')).toBe(1);
  });

  it('compares a numeric segment against an alpha one as text', () => {
    expect(compare('3', 'b')).toBe(-1);
    expect(compare('b', '3')).toBe(1);
    expect(compare('10', '1a')).toBe(-1);
    expect(compare('2', '10a')).toBe(1);
  });

  it('keeps the leading zeros of a numeric segment when comparing it as text', () => {
    expect(compare('01', '1a')).toBe(-1);
    expect(compare('1', '1a')).toBe(-1);
  });
});

describe('compareIgnoreCase', () => {
  it('orders a proper prefix first', () => {
    expect(compareIgnoreCase('beta', 'beta2')).toBe(-1);
    expect(compareIgnoreCase('RC10', 'rc1')).toBe(1);
  });

  it('folds ASCII letters only', () => {
    expect(compareIgnoreCase('É', 'é')).toBe(-1);
  });

  it('compares by code point rather than UTF-16 unit', () => {
    expect(compareIgnoreCase('\u{1F600}', '\uFFFD')).toBe(1);
  });
});
