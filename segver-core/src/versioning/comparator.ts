import { InvalidArgumentError } from '../domain/common/Errors.js';
import { isBlank } from '../domain/common/preconditions.js';
import { signum, type ComparisonResult } from './ordering.js';
import { compareSegments, type Segment } from './segment.js';
import { parseVersion } from './tokenizer.js';

/**
 * Compares two parsed versions segment by segment, most significant first. When every
 * shared segment is equal the version with more segments is higher, whatever the value
 * of the extra segments ("1.0" > "1", "1.0.0.0" > "1.0.0").
 */
export function compareSegmentSequences(left: readonly Segment[], right: readonly Segment[]): ComparisonResult {
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const result = compareSegments(left[i], right[i]);
    if (result !== 0) {
      return result;
    }
  }
  return signum(left.length - right.length);
}

/**
 * Performs a <=> comparison of two version strings (e.g. "1.2.3" and "1.2.4-SNAPSHOT").
 * Numeric segments compare by magnitude; anything else compares as text ignoring case.
 *
 * @returns -1 if `left` is lower than `right`, 0 if they are equal, 1 if `left` is higher
 * @throws {InvalidArgumentError} if either version is null or blank
 */
export function compareVersions(left: string, right: string): ComparisonResult {
  if (isBlank(left) && isBlank(right)) {
    throw new InvalidArgumentError('left and right version cannot be blank', { argument: 'both' });
  }

  const leftSegments = parseVersion(left, 'left version');
  const rightSegments = parseVersion(right, 'right version');

  return compareSegmentSequences(leftSegments, rightSegments);
}
