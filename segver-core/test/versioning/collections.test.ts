import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../../src/domain/common/Errors.js';
import { highestVersion, sortVersions } from '../../src/versioning/collections.js';

describe('sortVersions', () => {
  const versions = ['1.10', '1.2', '1.2.0', '1.2-beta', '0.9', '1.2-Alpha'];

  it('sorts lowest first by default', () => {
    expect(sortVersions(versions)).toEqual(['0.9', '1.2', '1.2.0', '1.2-Alpha', '1.2-beta', '1.10']);
  });

  it('sorts highest first for desc', () => {
    expect(sortVersions(versions, 'desc')).toEqual(['1.10', '1.2-beta', '1.2-Alpha', '1.2.0', '1.2', '0.9']);
  });

  it('keeps input order for equal versions', () => {
    expect(sortVersions(['1.01', '1.1', '1.001'])).toEqual(['1.01', '1.1', '1.001']);
    expect(sortVersions(['1.01', '1.1', '1.001'], 'desc')).toEqual(['1.01', '1.1', '1.001']);
  });

  it('does not modify its input', () => {
    const input = ['2', '1'];
    sortVersions(input);
    expect(input).toEqual(['2', '1']);
  });

  it('returns an empty array for no versions', () => {
    expect(sortVersions([])).toEqual([]);
  });

  it('names the index of a blank version', () => {
    expect(() => sortVersions(['1.0', ' '])).toThrow('version at index 1 cannot be blank');
  });
});

describe('highestVersion', () => {
  it('returns the highest version', () => {
    expect(highestVersion(['1.2', '1.10', '1.9.9'])).toBe('1.10');
  });

  it('returns the earliest of equal highest versions', () => {
    expect(highestVersion(['1.0-rc', '1.0-RC', '0.1'])).toBe('1.0-rc');
  });

  it('rejects an empty list', () => {
    expect(() => highestVersion([])).toThrow(InvalidArgumentError);
    expect(() => highestVersion([])).toThrow('versions cannot be empty');
  });
});
