/**
 * Value Model
 *
 * Rows arrive as already-parsed JSON objects, so every field holds one of a
 * small closed set of shapes. The coercion helpers below encode the
 * "numeric if it parses, else text" policy that filter, sort and aggregate
 * all share.
 */

import { CoercionError } from './errors.js';

// ---
// TYPES
// ---

export type Value = number | string | boolean | null | readonly Value[] | Row;

/**
 * A data row. Transforms treat rows as immutable except for the bin
 * transform, which writes its two output fields onto the rows it receives.
 */
export interface Row {
  [field: string]: Value;
}

// ---
// COERCION
// ---

// plain decimal literal: sign, digits, fraction, exponent (no hex, no Infinity)
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Try to read a value as a number.
 * Returns null for anything that is not a finite number or numeric text.
 */
export function asNumber(value: Value | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!NUMERIC_TEXT.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Text form of a value, used for group keys, categories and text comparison.
 */
export function asText(value: Value | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isValueList(value)) return value.map(v => asText(v)).join(',');
  return JSON.stringify(value);
}

/**
 * Coerce a value where a number is required.
 * Booleans count as 1/0; anything else that is not numeric throws.
 *
 * @param field - field the value was read from (reported on failure)
 * @param op - operation that needed the number (reported on failure)
 */
export function toNumberStrict(value: Value | undefined, field: string, op: string): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  const n = asNumber(value);
  if (n === null) {
    throw new CoercionError(field, op, value);
  }
  return n;
}

export function isValueList(value: Value | undefined): value is readonly Value[] {
  return Array.isArray(value);
}

export function hasField(row: Row, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(row, field);
}

// ---
// COMPARISON
// ---

/**
 * Case-insensitive ordinal comparison of two strings.
 */
export function compareText(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  return 0;
}

/**
 * Compare two values: numerically when both parse as numbers,
 * otherwise as case-insensitive text.
 */
export function compareValues(a: Value | undefined, b: Value | undefined): number {
  const na = asNumber(a);
  const nb = asNumber(b);
  if (na !== null && nb !== null) {
    return na < nb ? -1 : na > nb ? 1 : 0;
  }
  return compareText(asText(a), asText(b));
}
