/**
 * Aggregate transform - groups rows and reduces each group to one row.
 *
 * Groups are keyed by the text of each group-by field joined with '|'.
 * A row missing a group-by field contributes '' for it. Values that
 * themselves contain '|' can therefore collide with another group's key;
 * such input is ambiguous and is not rewritten here.
 */

import { asText, hasField, toNumberStrict } from '../data/value.js';
import type { Row } from '../data/value.js';
import type { AggregateOpSpec } from '../spec/chart-spec.js';

export type AggregateOp = 'count' | 'sum' | 'mean' | 'min' | 'max' | 'median';

export const GROUP_KEY_DELIMITER = '|';

/**
 * Map an op name to its reducer. Unrecognized names reduce as 'sum'.
 */
export function normalizeAggregateOp(op: string | undefined): AggregateOp {
  switch (op?.toLowerCase()) {
    case 'count':
      return 'count';
    case 'mean':
    case 'average':
    case 'avg':
      return 'mean';
    case 'min':
      return 'min';
    case 'max':
      return 'max';
    case 'median':
      return 'median';
    default:
      return 'sum';
  }
}

export function aggregateOutputField(spec: AggregateOpSpec): string {
  return spec.as ?? `${spec.op}_${spec.field}`;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

function numericValues(rows: readonly Row[], field: string, op: string): number[] {
  const values: number[] = [];
  for (const row of rows) {
    if (!hasField(row, field) || row[field] === null) continue;
    values.push(toNumberStrict(row[field], field, op));
  }
  return values;
}

/**
 * Reduce one group for one op. Empty value sets reduce to 0.
 *
 * @throws CoercionError when a present, non-null value is not numeric
 */
export function computeAggregate(rows: readonly Row[], spec: AggregateOpSpec): number {
  const op = normalizeAggregateOp(spec.op);

  // count is the group size, whatever the field holds
  if (op === 'count') {
    return rows.length;
  }

  const values = numericValues(rows, spec.field, spec.op);
  if (values.length === 0) {
    return 0;
  }

  switch (op) {
    case 'sum':
      return values.reduce((acc, v) => acc + v, 0);
    case 'mean':
      return values.reduce((acc, v) => acc + v, 0) / values.length;
    case 'min':
      return values.reduce((acc, v) => (v < acc ? v : acc), values[0]);
    case 'max':
      return values.reduce((acc, v) => (v > acc ? v : acc), values[0]);
    case 'median':
      return median(values);
  }
}

export function groupKey(row: Row, groupby: readonly string[]): string {
  return groupby
    .map(field => (hasField(row, field) ? asText(row[field]) : ''))
    .join(GROUP_KEY_DELIMITER);
}

/**
 * Partition rows by group key, keeping groups in first-seen order.
 */
export function groupRows(rows: readonly Row[], groupby: readonly string[]): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const key = groupKey(row, groupby);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

/**
 * Group `rows` by `groupby` and compute each op per group.
 * Each output row carries the group-by values of its group's first row
 * plus one field per op.
 */
export function aggregateRows(
  rows: readonly Row[],
  ops: readonly AggregateOpSpec[],
  groupby: readonly string[] = []
): Row[] {
  const result: Row[] = [];

  for (const group of groupRows(rows, groupby).values()) {
    const first = group[0];
    const out: Row = {};

    for (const field of groupby) {
      if (hasField(first, field)) {
        out[field] = first[field];
      }
    }

    for (const spec of ops) {
      out[aggregateOutputField(spec)] = computeAggregate(group, spec);
    }

    result.push(out);
  }

  return result;
}
