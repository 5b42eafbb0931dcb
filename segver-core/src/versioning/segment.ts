import { signum, type ComparisonResult } from './ordering.js';

/**
 * A token made only of ASCII digits, compared by integer magnitude.
 */
export interface NumericSegment {
  readonly kind: 'numeric';
  readonly text: string;
  readonly value: bigint;
}

/**
 * A token containing at least one non-digit character, compared case-insensitively.
 */
export interface AlphaSegment {
  readonly kind: 'alpha';
  readonly text: string;
}

export type Segment = NumericSegment | AlphaSegment;

const DIGITS_ONLY = /^[0-9]+$/;

export function classifySegment(token: string): Segment {
  if (DIGITS_ONLY.test(token)) {
    return { kind: 'numeric', text: token, value: BigInt(token) };
  }
  return { kind: 'alpha', text: token };
}

/**
 * Two numeric segments compare by magnitude. Any other pair, including a numeric
 * segment against an alpha one, compares the original token texts ignoring ASCII case.
 */
export function compareSegments(left: Segment, right: Segment): ComparisonResult {
  if (left.kind === 'numeric' && right.kind === 'numeric') {
    if (left.value === right.value) return 0;
    return left.value > right.value ? 1 : -1;
  }
  return compareIgnoreCase(left.text, right.text);
}

function foldCase(text: string): string {
  return text.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) + 32));
}

/**
 * Code point order of the case-folded texts; a proper prefix sorts first.
 */
export function compareIgnoreCase(left: string, right: string): ComparisonResult {
  const leftPoints = Array.from(foldCase(left), (c) => c.codePointAt(0) ?? 0);
  const rightPoints = Array.from(foldCase(right), (c) => c.codePointAt(0) ?? 0);
  const length = Math.min(leftPoints.length, rightPoints.length);

  for (let i = 0; i < length; i++) {
    if (leftPoints[i] !== rightPoints[i]) {
      return signum(leftPoints[i] - rightPoints[i]);
    }
  }
  return signum(leftPoints.length - rightPoints.length);
}
