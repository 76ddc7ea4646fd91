/**
 * Field decoder helper functions
 */

import type { FieldKind } from './types';

const UNSIGNED_PATTERN = /^\d+$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Split a payload into raw fields
 *
 * An empty payload has no fields rather than one empty field.
 *
 * @param payload - Comma delimited text
 * @returns Raw field strings in wire order
 */
export function splitFields(payload: string): string[] {
  if (payload === '') {
    return [];
  }
  return payload.split(',');
}

/**
 * Parse a raw field as the given kind
 * @param raw - Raw field text (surrounding whitespace ignored)
 * @param kind - Expected numeric kind
 * @returns Parsed number, or null if the text is not of that kind
 */
export function parseField(raw: string, kind: FieldKind): number | null {
  const text = raw.trim();

  let valid = false;
  if (kind === 'unsigned') valid = UNSIGNED_PATTERN.test(text);
  if (kind === 'integer') valid = INTEGER_PATTERN.test(text);
  if (kind === 'decimal') valid = DECIMAL_PATTERN.test(text);

  if (!valid) {
    return null;
  }

  const value = Number(text);
  return isFinite(value) ? value : null;
}

/**
 * Validate a plan's skip count and scale
 * @throws {Error} If the plan entry cannot describe a wire layout
 */
export function validatePlanEntry(name: string, skip: number, scale: number): void {
  if (!Number.isInteger(skip) || skip < 0) {
    throw new Error("Plan entry " + name + ": skip must be a non-negative integer, got " + skip);
  }
  if (!isFinite(scale) || scale === 0) {
    throw new Error("Plan entry " + name + ": scale must be a finite non-zero number, got " + scale);
  }
}
