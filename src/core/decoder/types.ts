/**
 * Field decoder type definitions
 *
 * A decode plan is a private contract with the controller firmware: fields
 * are positional, so the plan names each one, how many unlabeled separators
 * precede it, how to parse it and what to divide it by.
 */

/**
 * Numeric kind a raw field must parse as
 * - unsigned: digits only
 * - integer: optional sign, digits
 * - decimal: any finite decimal literal
 */
export type FieldKind = 'unsigned' | 'integer' | 'decimal';

/**
 * One positional field of a record plan
 */
export interface FieldSpec<K extends string = string> {
  /** Name the decoded value is stored under */
  name: K;

  /** Fields to discard before this one */
  skip: number;

  /** How the raw text must parse */
  kind: FieldKind;

  /** Divisor applied to the parsed value (1 for none) */
  scale: number;
}

/**
 * Plan for a repeated tail of same-typed fields
 */
export interface SeriesSpec {
  /** Series name used in diagnostics */
  name: string;

  /** Leading fields to discard before the repeated values */
  skip: number;

  kind: FieldKind;

  scale: number;

  /** Placeholder for unparseable entries; when absent they fail the decode */
  invalidAs?: number;
}

/**
 * Decoded record keyed by the plan's field names
 */
export interface DecodedRecord<K extends string> {
  /** Scaled value of a planned field */
  get(name: K): number;

  /** Field names in plan order */
  names(): K[];
}
