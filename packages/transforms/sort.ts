/**
 * Sort transform - stable multi-key ordering.
 *
 * Each key compares numerically when both values parse as numbers and as
 * case-insensitive text otherwise. Missing (absent or null) values sort
 * first ascending and last descending. Later keys only break ties left by
 * earlier ones; full ties keep input order.
 */

import { compareValues } from '../data/value.js';
import type { Row, Value } from '../data/value.js';
import type { SortFieldSpec } from '../spec/chart-spec.js';

export interface SortKey {
  field: string;
  descending: boolean;
}

export function toSortKeys(specs: readonly SortFieldSpec[]): SortKey[] {
  return specs.map(spec => ({
    field: spec.field,
    descending: spec.order?.toLowerCase() === 'descending',
  }));
}

function isMissing(value: Value | undefined): boolean {
  return value === undefined || value === null;
}

function compareSortValues(a: Value | undefined, b: Value | undefined): number {
  const aMissing = isMissing(a);
  const bMissing = isMissing(b);
  if (aMissing && bMissing) return 0;
  if (aMissing) return -1;
  if (bMissing) return 1;
  return compareValues(a, b);
}

export function compareRows(a: Row, b: Row, keys: readonly SortKey[]): number {
  for (const key of keys) {
    let result = compareSortValues(a[key.field], b[key.field]);
    if (key.descending) result = -result;
    if (result !== 0) return result;
  }
  return 0;
}

/**
 * Return a new, sorted copy of `rows`. Array.prototype.sort is stable.
 */
export function sortRows(rows: readonly Row[], specs: readonly SortFieldSpec[]): Row[] {
  const keys = toSortKeys(specs);
  if (keys.length === 0) {
    return [...rows];
  }
  return [...rows].sort((a, b) => compareRows(a, b, keys));
}
