/**
 * Bin transform - assigns each row of a numeric field to a fixed-width bin.
 *
 * Unlike the other transforms this one writes onto the rows it is given:
 * every row carrying the field gains `{as}` (bin start) and `{as}_end`.
 * Bins are half-open [start, end); a value equal to the extent maximum
 * opens a bin of its own starting at the maximum.
 */

import { hasField, toNumberStrict } from '../data/value.js';
import type { Row } from '../data/value.js';
import type { BinSpec } from '../spec/chart-spec.js';

export const DEFAULT_MAXBINS = 10;

export interface BinOptions {
  field: string;
  /** Output field for the bin start (default `{field}_bin`) */
  as?: string;
  bin?: BinSpec;
}

export interface BinExtent {
  min: number;
  max: number;
  step: number;
}

export function binFieldNames(field: string, as?: string): { start: string; end: string } {
  const start = as ?? `${field}_bin`;
  return { start, end: `${start}_end` };
}

function carriesField(row: Row, field: string): boolean {
  return hasField(row, field) && row[field] !== null;
}

/**
 * Work out [min, max] and the step for a field. Returns null when no row
 * carries the field and the extent is not given explicitly.
 *
 * @throws CoercionError when a row carries a non-numeric value for the field
 */
export function computeBinExtent(rows: readonly Row[], field: string, bin: BinSpec = {}): BinExtent | null {
  let dataMin = Infinity;
  let dataMax = -Infinity;
  let count = 0;
  for (const row of rows) {
    if (!carriesField(row, field)) continue;
    const n = toNumberStrict(row[field], field, 'bin');
    if (n < dataMin) dataMin = n;
    if (n > dataMax) dataMax = n;
    count++;
  }

  const min = bin.extent_min ?? (count > 0 ? dataMin : null);
  const max = bin.extent_max ?? (count > 0 ? dataMax : null);
  if (min === null || max === null) {
    return null;
  }
  const maxbins = bin.maxbins ?? DEFAULT_MAXBINS;

  let step = bin.step ?? (max - min) / maxbins;
  // zero, negative or non-finite steps (e.g. maxbins 0) fall back to 1
  if (!Number.isFinite(step) || step <= 0) {
    step = 1;
  }

  return { min, max, step };
}

/**
 * Bin the rows in place and return the same array.
 *
 * @throws CoercionError when a row carries a non-numeric value for the field
 */
export function binRows(rows: Row[], options: BinOptions): Row[] {
  const { field } = options;
  const extent = computeBinExtent(rows, field, options.bin);
  if (!extent) {
    return rows;
  }

  const names = binFieldNames(field, options.as);
  for (const row of rows) {
    if (!carriesField(row, field)) continue;
    const v = toNumberStrict(row[field], field, 'bin');
    const index = Math.floor((v - extent.min) / extent.step);
    const start = extent.min + index * extent.step;
    row[names.start] = start;
    row[names.end] = start + extent.step;
  }

  return rows;
}
