import { compareVersions } from './comparator.js';

/**
 * Given two versions, return the higher one. When they are equal `left` is returned.
 */
export function higherVersion(left: string, right: string): string {
  return compareVersions(left, right) >= 0 ? left : right;
}

/**
 * Returns true if the "left" version is strictly higher than the "right" version.
 */
export function isStrictlyHigherVersion(left: string, right: string): boolean {
  return compareVersions(left, right) > 0;
}

/**
 * Returns true if the "left" version is higher than or equal to the "right" version.
 */
export function isHigherOrSameVersion(left: string, right: string): boolean {
  return compareVersions(left, right) >= 0;
}

/**
 * Returns true if the "left" version is strictly lower than the "right" version.
 */
export function isStrictlyLowerVersion(left: string, right: string): boolean {
  return compareVersions(left, right) < 0;
}

/**
 * Returns true if the "left" version is lower than or equal to the "right" version.
 */
export function isLowerOrSameVersion(left: string, right: string): boolean {
  return compareVersions(left, right) <= 0;
}

/**
 * Returns true if the two versions compare equal. This is not string equality:
 * "1.042" and "1.42" are the same version.
 */
export function isSameVersion(left: string, right: string): boolean {
  return compareVersions(left, right) === 0;
}
