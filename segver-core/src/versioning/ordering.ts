/**
 * Result of a three-way comparison, narrowed to exactly -1, 0 or 1.
 */
export type ComparisonResult = -1 | 0 | 1;

export function signum(value: number): ComparisonResult {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}
