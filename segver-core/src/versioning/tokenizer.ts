import { InvalidArgumentError } from '../domain/common/Errors.js';
import { checkArgumentNotBlank } from '../domain/common/preconditions.js';
import { classifySegment, type Segment } from './segment.js';

// Any run of ASCII characters other than letters and digits. Non-ASCII stays in the token.
const DELIMITERS = /[\x00-\x2F\x3A-\x40\x5B-\x60\x7B-\x7F]+/;

/**
 * Splits a version into its alphanumeric tokens, keeping order and casing.
 *
 * @example
 * tokenizeVersion('1.1.1-SNAPSHOT') // ['1', '1', '1', 'SNAPSHOT']
 * tokenizeVersion('.1..0_')         // ['1', '0']
 */
export function tokenizeVersion(version: string): string[] {
  return version.split(DELIMITERS).filter((token) => token.length > 0);
}

/**
 * Validates, tokenizes and classifies a version.
 *
 * @param label - Names the version in error messages, e.g. "left version"
 * @throws {InvalidArgumentError} when the version is blank or has no tokens
 */
export function parseVersion(version: string, label: string = 'version'): Segment[] {
  checkArgumentNotBlank(version, `${label} cannot be blank`, { version });

  const tokens = tokenizeVersion(version);
  if (tokens.length === 0) {
    throw new InvalidArgumentError(`${label} cannot be blank or consist only of delimiters`, { version });
  }
  return tokens.map(classifySegment);
}
