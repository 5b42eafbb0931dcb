import { InvalidArgumentError } from './Errors.js';

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}

/**
 * Throws an {@link InvalidArgumentError} carrying `message` when `value` is null,
 * undefined, empty or whitespace only.
 */
export function checkArgumentNotBlank(
  value: string | null | undefined,
  message: string,
  details?: Record<string, unknown>
): asserts value is string {
  if (isBlank(value)) {
    throw new InvalidArgumentError(message, details);
  }
}
