/**
 * Positional field decoder
 *
 * Turns an extracted payload into typed values by walking a decode plan.
 * Missing and unparseable fields are terminal for the leg and carry the
 * offending field's name and wire position.
 */

import { FieldMissingError, FieldUnparseableError } from '$types/errors';
import { parseField, splitFields, validatePlanEntry } from './helpers';
import type { DecodedRecord, FieldSpec, SeriesSpec } from './types';

/**
 * Decode a fixed sequence of fields into a record
 *
 * @param payload - Comma delimited payload
 * @param plan - Ordered field specs matching the firmware layout
 * @returns Values keyed by field name, each divided by its scale
 * @throws {FieldMissingError} If the payload has fewer fields than the plan needs
 * @throws {FieldUnparseableError} If a field does not parse as its kind
 */
export function decodeRecord<K extends string>(
  payload: string,
  plan: readonly FieldSpec<K>[]
): DecodedRecord<K> {
  const fields = splitFields(payload);
  const decoded = new Map<K, number>();
  let position = 0;

  for (const spec of plan) {
    validatePlanEntry(spec.name, spec.skip, spec.scale);
    position += spec.skip;

    if (position >= fields.length) {
      throw new FieldMissingError(spec.name, position);
    }

    const raw = fields[position];
    const value = parseField(raw, spec.kind);
    if (value === null) {
      throw new FieldUnparseableError(spec.name, position, raw);
    }

    decoded.set(spec.name, value / spec.scale);
    position++;
  }

  return createRecord(decoded);
}

/**
 * Decode the repeated tail of a payload into an ordered series
 *
 * @param payload - Comma delimited payload
 * @param spec - Series plan
 * @returns Scaled values in wire order (empty if only the skipped fields exist)
 * @throws {FieldMissingError} If the payload is shorter than the skip count
 * @throws {FieldUnparseableError} If a value does not parse and no placeholder is set
 */
export function decodeSeries(payload: string, spec: SeriesSpec): number[] {
  validatePlanEntry(spec.name, spec.skip, spec.scale);

  const fields = splitFields(payload);
  if (fields.length < spec.skip) {
    throw new FieldMissingError(spec.name, fields.length);
  }

  const values: number[] = [];
  for (let position = spec.skip; position < fields.length; position++) {
    const raw = fields[position];
    const value = parseField(raw, spec.kind);

    if (value !== null) {
      values.push(value / spec.scale);
    } else if (spec.invalidAs !== undefined) {
      values.push(spec.invalidAs);
    } else {
      throw new FieldUnparseableError(spec.name, position, raw);
    }
  }

  return values;
}

function createRecord<K extends string>(decoded: Map<K, number>): DecodedRecord<K> {
  return {
    get: function(name: K): number {
      const value = decoded.get(name);
      if (value === undefined) {
        throw new FieldMissingError(name, -1);
      }
      return value;
    },
    names: function(): K[] {
      return Array.from(decoded.keys());
    }
  };
}
