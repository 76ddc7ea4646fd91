/**
 * Number utilities
 *
 * Type guards that never coerce: strings, null and booleans are rejected
 * instead of being converted the way the global isFinite() would.
 */

/**
 * Check if a value is a finite number
 *
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Parse a decimal integer from configuration text
 *
 * @param text - Raw text, e.g. from an environment variable
 * @returns Parsed integer, or null if the text is not a plain integer
 */
export function parseIntStrict(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}
