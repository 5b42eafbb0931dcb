import { InvalidArgumentError } from '../domain/common/Errors.js';
import { compareSegmentSequences } from './comparator.js';
import type { Segment } from './segment.js';
import { parseVersion } from './tokenizer.js';

export type SortDirection = 'asc' | 'desc';

interface ParsedEntry {
  version: string;
  segments: Segment[];
}

function parseAll(versions: readonly string[]): ParsedEntry[] {
  return versions.map((version, index) => ({
    version,
    segments: parseVersion(version, `version at index ${index}`)
  }));
}

/**
 * Returns a new array of the versions ordered lowest first (or highest first for
 * "desc"). Versions that compare equal keep their input order.
 */
export function sortVersions(versions: readonly string[], direction: SortDirection = 'asc'): string[] {
  const factor = direction === 'desc' ? -1 : 1;

  return parseAll(versions)
    .sort((a, b) => factor * compareSegmentSequences(a.segments, b.segments))
    .map((entry) => entry.version);
}

/**
 * Returns the highest version of a non-empty list; the earliest one wins a tie.
 */
export function highestVersion(versions: readonly string[]): string {
  const [first, ...rest] = parseAll(versions);
  if (!first) {
    throw new InvalidArgumentError('versions cannot be empty');
  }

  let highest = first;
  for (const entry of rest) {
    if (compareSegmentSequences(entry.segments, highest.segments) > 0) {
      highest = entry;
    }
  }
  return highest.version;
}
