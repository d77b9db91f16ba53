/**
 * Transform Pipeline Test Suite
 *
 * Filter, aggregate, sort and bin on their own, then resolution priority
 * and chained execution through executeTransforms.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Row } from '../packages/data/value.js';
import { CoercionError } from '../packages/data/errors.js';
import {
  aggregateRows,
  binRows,
  compileTransforms,
  computeBinExtent,
  executeTransforms,
  filterRows,
  resolveTransform,
  sortRows,
} from '../packages/transforms/index.js';

describe('Filter', () => {
  it('keeps rows above a numeric threshold', () => {
    const rows = [{ value: 5 }, { value: 15 }, { value: 20 }];
    expect(filterRows(rows, 'value > 10')).toEqual([{ value: 15 }, { value: 20 }]);
  });

  it('compares numeric text as numbers', () => {
    const rows = [{ v: '12' }, { v: '9' }, { v: 100 }];
    expect(filterRows(rows, 'datum.v > 10')).toEqual([{ v: '12' }, { v: 100 }]);
  });

  it('compares text case-insensitively', () => {
    const rows = [{ city: 'Paris' }, { city: 'paris' }, { city: 'Rome' }];
    expect(filterRows(rows, "city == 'PARIS'")).toEqual([{ city: 'Paris' }, { city: 'paris' }]);
  });

  it('orders text for relational operators', () => {
    const rows = [{ name: 'apple' }, { name: 'Banana' }, { name: 'cherry' }];
    expect(filterRows(rows, 'name < c')).toEqual([{ name: 'apple' }, { name: 'Banana' }]);
  });

  it('splits a multi-operator expression by operator priority', () => {
    const rows: Row[] = [{ 'a < b': 5 }, { a: 'z' }];
    expect(filterRows(rows, 'a < b >= 3')).toEqual([{ 'a < b': 5 }]);
  });

  it('treats numbers within epsilon as equal', () => {
    const rows = [{ v: 0.1 + 0.2 }, { v: 0.4 }];
    expect(filterRows(rows, 'v == 0.3')).toEqual([{ v: 0.1 + 0.2 }]);
  });

  it('excludes rows missing the field', () => {
    const rows: Row[] = [{ value: 1 }, { other: 2 }];
    expect(filterRows(rows, 'value < 5')).toEqual([{ value: 1 }]);
  });

  it('keeps every row when the expression does not parse', () => {
    const rows = [{ value: 1 }, { value: 2 }];
    expect(filterRows(rows, '> 3')).toEqual(rows);
    expect(filterRows(rows, 'no operator here')).toEqual(rows);
  });

  it('returns a subsequence in input order', () => {
    const rows = [{ v: 3 }, { v: 1 }, { v: 4 }, { v: 1 }, { v: 5 }];
    const result = filterRows(rows, 'v != 1');
    expect(result).toEqual([{ v: 3 }, { v: 4 }, { v: 5 }]);
    expect(result[0]).toBe(rows[0]);
  });
});

describe('Aggregate', () => {
  const sales = [
    { category: 'A', sales: 10 },
    { category: 'A', sales: 20 },
    { category: 'B', sales: 5 },
  ];

  it('sums per group', () => {
    expect(aggregateRows(sales, [{ op: 'sum', field: 'sales' }], ['category'])).toEqual([
      { category: 'A', sum_sales: 30 },
      { category: 'B', sum_sales: 5 },
    ]);
  });

  it('computes every op with custom output names', () => {
    const rows = [{ v: 4 }, { v: 1 }, { v: 3 }, { v: 2 }];
    const result = aggregateRows(rows, [
      { op: 'count', field: 'v', as: 'n' },
      { op: 'average', field: 'v', as: 'avg' },
      { op: 'min', field: 'v', as: 'lo' },
      { op: 'max', field: 'v', as: 'hi' },
      { op: 'median', field: 'v', as: 'mid' },
    ]);
    expect(result).toEqual([{ n: 4, avg: 2.5, lo: 1, hi: 4, mid: 2.5 }]);
  });

  it('takes the middle value for odd-sized medians', () => {
    const rows = [{ v: 9 }, { v: 1 }, { v: 5 }];
    expect(aggregateRows(rows, [{ op: 'median', field: 'v' }])).toEqual([{ median_v: 5 }]);
  });

  it('accepts op names in any case', () => {
    expect(aggregateRows(sales, [{ op: 'MEAN', field: 'sales', as: 'm' }])).toEqual([{ m: 35 / 3 }]);
  });

  it('reduces a group with no values to 0', () => {
    const rows = [{ g: 'x', v: null }];
    expect(aggregateRows(rows, [{ op: 'sum', field: 'v' }, { op: 'mean', field: 'v' }], ['g'])).toEqual([
      { g: 'x', sum_v: 0, mean_v: 0 },
    ]);
  });

  it('counts rows without reading the field', () => {
    const rows = [{ v: 'abc' }, { v: null }];
    expect(aggregateRows(rows, [{ op: 'count', field: 'v' }])).toEqual([{ count_v: 2 }]);
  });

  it('throws CoercionError for non-numeric values', () => {
    const rows = [{ v: 1 }, { v: 'abc' }];
    expect(() => aggregateRows(rows, [{ op: 'sum', field: 'v' }])).toThrow(CoercionError);
  });

  it('names the field and op in the error', () => {
    try {
      aggregateRows([{ price: 'n/a' }], [{ op: 'max', field: 'price' }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CoercionError);
      if (error instanceof CoercionError) {
        expect(error.field).toBe('price');
        expect(error.op).toBe('max');
        expect(error.message).toBe("cannot coerce field 'price' to a number for 'max'");
      }
    }
  });

  it('reduces unknown ops as sum', () => {
    expect(aggregateRows(sales, [{ op: 'total', field: 'sales' }])).toEqual([{ total_sales: 35 }]);
  });

  it('groups rows missing a group-by field together', () => {
    const rows: Row[] = [{ g: 'a', v: 1 }, { v: 2 }, { v: 3 }];
    expect(aggregateRows(rows, [{ op: 'sum', field: 'v' }], ['g'])).toEqual([
      { g: 'a', sum_v: 1 },
      { sum_v: 5 },
    ]);
  });

  it('partitions the input: group counts add up to the row count', () => {
    const rows = [{ k: 'x' }, { k: 'y' }, { k: 'x' }, { k: 'z' }, { k: 'x' }];
    const result = aggregateRows(rows, [{ op: 'count', field: 'k', as: 'n' }], ['k']);
    expect(result).toEqual([
      { k: 'x', n: 3 },
      { k: 'y', n: 1 },
      { k: 'z', n: 1 },
    ]);
    expect(result.reduce((total, row) => total + Number(row.n), 0)).toBe(rows.length);
  });
});

describe('Sort', () => {
  it('sorts descending', () => {
    const rows = [{ value: 3 }, { value: 1 }, { value: 2 }];
    expect(sortRows(rows, [{ field: 'value', order: 'descending' }])).toEqual([
      { value: 3 },
      { value: 2 },
      { value: 1 },
    ]);
  });

  it('puts missing values first ascending', () => {
    const rows: Row[] = [{ v: 2 }, { v: null }, {}, { v: 1 }];
    expect(sortRows(rows, [{ field: 'v' }])).toEqual([{ v: null }, {}, { v: 1 }, { v: 2 }]);
  });

  it('puts missing values last descending', () => {
    const rows: Row[] = [{ v: 2 }, { v: null }, { v: 1 }];
    expect(sortRows(rows, [{ field: 'v', order: 'DESCENDING' }])).toEqual([{ v: 2 }, { v: 1 }, { v: null }]);
  });

  it('breaks ties with later keys', () => {
    const rows = [
      { a: 'x', b: 2 },
      { a: 'y', b: 1 },
      { a: 'x', b: 1 },
    ];
    expect(
      sortRows(rows, [
        { field: 'a', order: 'ascending' },
        { field: 'b', order: 'descending' },
      ])
    ).toEqual([
      { a: 'x', b: 2 },
      { a: 'x', b: 1 },
      { a: 'y', b: 1 },
    ]);
  });

  it('orders text case-insensitively and numbers numerically', () => {
    const words = [{ w: 'banana' }, { w: 'Apple' }, { w: 'cherry' }];
    expect(sortRows(words, [{ field: 'w' }]).map(r => r.w)).toEqual(['Apple', 'banana', 'cherry']);

    const mixed = [{ n: '10' }, { n: 9 }, { n: '2' }];
    expect(sortRows(mixed, [{ field: 'n' }]).map(r => r.n)).toEqual(['2', 9, '10']);
  });

  it('keeps input order for ties', () => {
    const rows = [
      { k: 1, id: 'first' },
      { k: 0, id: 'zero' },
      { k: 1, id: 'second' },
    ];
    expect(sortRows(rows, [{ field: 'k' }]).map(r => r.id)).toEqual(['zero', 'first', 'second']);
  });

  it('is idempotent and leaves the input untouched', () => {
    const rows = [{ v: 3 }, { v: 1 }, { v: 2 }];
    const once = sortRows(rows, [{ field: 'v' }]);
    expect(sortRows(once, [{ field: 'v' }])).toEqual(once);
    expect(rows).toEqual([{ v: 3 }, { v: 1 }, { v: 2 }]);
  });
});

describe('Bin', () => {
  it('assigns fixed-width half-open bins', () => {
    const rows: Row[] = [0, 10, 20, 30, 40].map(value => ({ value }));
    binRows(rows, { field: 'value', bin: { extent_min: 0, extent_max: 40, maxbins: 5 } });
    expect(rows.map(r => [r.value_bin, r.value_bin_end])).toEqual([
      [0, 8],
      [8, 16],
      [16, 24],
      [24, 32],
      [40, 48],
    ]);
  });

  it('keeps start <= value < end for every binned row', () => {
    const rows: Row[] = [0, 3, 7.5, 12, 19.99, 20].map(v => ({ v }));
    binRows(rows, { field: 'v', bin: { maxbins: 4 } });
    for (const row of rows) {
      expect(Number(row.v_bin)).toBeLessThanOrEqual(Number(row.v));
      expect(Number(row.v_bin_end)).toBeGreaterThan(Number(row.v));
    }
  });

  it('writes onto the input rows', () => {
    const rows: Row[] = [{ x: 1 }];
    expect(binRows(rows, { field: 'x', as: 'bucket', bin: { step: 5 } })).toBe(rows);
    expect(rows[0]).toEqual({ x: 1, bucket: 1, bucket_end: 6 });
  });

  it('uses 10 bins by default', () => {
    const rows: Row[] = [{ x: 0 }, { x: 55 }, { x: 100 }];
    binRows(rows, { field: 'x' });
    expect(rows.map(r => r.x_bin)).toEqual([0, 50, 100]);
    expect(rows.map(r => r.x_bin_end)).toEqual([10, 60, 110]);
  });

  it('falls back to a step of 1 when the extent is empty', () => {
    const rows = [{ x: 5 }, { x: 5 }];
    expect(computeBinExtent(rows, 'x')).toEqual({ min: 5, max: 5, step: 1 });
    binRows(rows, { field: 'x' });
    expect(rows[0]).toEqual({ x: 5, x_bin: 5, x_bin_end: 6 });
  });

  it('falls back to a step of 1 for a non-positive step', () => {
    expect(computeBinExtent([{ x: 0 }, { x: 10 }], 'x', { step: -2 })).toEqual({ min: 0, max: 10, step: 1 });
    expect(computeBinExtent([{ x: 0 }, { x: 10 }], 'x', { maxbins: 0 })).toEqual({ min: 0, max: 10, step: 1 });
  });

  it('leaves null and absent values untouched', () => {
    const rows: Row[] = [{ x: 2 }, { x: null }, { y: 1 }];
    binRows(rows, { field: 'x', bin: { step: 2 } });
    expect(rows).toEqual([{ x: 2, x_bin: 2, x_bin_end: 4 }, { x: null }, { y: 1 }]);
  });

  it('passes rows through when no row carries the field', () => {
    const rows: Row[] = [{ y: 1 }, { x: null }];
    expect(binRows(rows, { field: 'x' })).toEqual([{ y: 1 }, { x: null }]);
  });

  it('throws CoercionError for a non-numeric value', () => {
    const rows: Row[] = [{ x: 1 }, { x: 'abc' }];
    expect(() => binRows(rows, { field: 'x' })).toThrow(CoercionError);
  });

  it('throws CoercionError when every carried value is non-numeric', () => {
    expect(() => binRows([{ x: 'abc' }, { x: 'def' }], { field: 'x' })).toThrow(CoercionError);
    expect(() => binRows([{ x: 'abc' }], { field: 'x', bin: { extent_min: 0, extent_max: 10 } })).toThrow(
      CoercionError
    );
    expect(() =>
      executeTransforms([{ x: 'abc' }], [{ bin: { extent_min: 0, extent_max: 10 }, binField: 'x' }])
    ).toThrow(CoercionError);
  });

  it('uses an explicit extent without data values', () => {
    expect(computeBinExtent([{ y: 1 }], 'x', { extent_min: 0, extent_max: 10, maxbins: 5 })).toEqual({
      min: 0,
      max: 10,
      step: 2,
    });
  });

  it('counts booleans as 1 and 0 for the extent and the bins alike', () => {
    const rows: Row[] = [{ x: true }, { x: false }, { x: 5 }];
    expect(computeBinExtent(rows, 'x', { step: 2 })).toEqual({ min: 0, max: 5, step: 2 });
    binRows(rows, { field: 'x', bin: { step: 2 } });
    expect(rows).toEqual([
      { x: true, x_bin: 0, x_bin_end: 2 },
      { x: false, x_bin: 0, x_bin_end: 2 },
      { x: 5, x_bin: 4, x_bin_end: 6 },
    ]);
  });
});

describe('Transform Resolution', () => {
  it('prefers filter over every other payload', () => {
    const t = resolveTransform({
      filter: 'v > 1',
      aggregate: [{ op: 'sum', field: 'v' }],
      sort: [{ field: 'v' }],
    });
    expect(t?.kind).toBe('filter');
  });

  it('prefers aggregate over sort and bin', () => {
    const t = resolveTransform({
      aggregate: [{ op: 'sum', field: 'v' }],
      sort: [{ field: 'v' }],
      bin: { maxbins: 5 },
      binField: 'v',
    });
    expect(t?.kind).toBe('aggregate');
  });

  it('skips empty payloads', () => {
    expect(resolveTransform({ filter: '', aggregate: [], sort: [{ field: 'v' }] })?.kind).toBe('sort');
  });

  it('takes the bin field from binField or bin.field', () => {
    expect(resolveTransform({ bin: { maxbins: 5 }, binField: 'price' })).toEqual({
      kind: 'bin',
      field: 'price',
      as: 'price_bin',
      bin: { maxbins: 5 },
    });
    expect(resolveTransform({ bin: { field: 'age' }, as: 'age_group' })).toEqual({
      kind: 'bin',
      field: 'age',
      as: 'age_group',
      bin: { field: 'age' },
    });
  });

  it('returns null for a spec with nothing to do', () => {
    expect(resolveTransform({})).toBeNull();
    expect(resolveTransform(null)).toBeNull();
    expect(resolveTransform({ bin: { maxbins: 5 } })).toBeNull();
  });
});

describe('Transform Pipeline', () => {
  afterEach(() => {
    delete process.env.DEBUG_TRANSFORMS;
    vi.restoreAllMocks();
  });

  it('returns the input for a null or empty spec list', () => {
    const rows = [{ v: 1 }];
    expect(executeTransforms(rows, null)).toBe(rows);
    expect(executeTransforms(rows, undefined)).toBe(rows);
    expect(executeTransforms(rows, [])).toBe(rows);
  });

  it('feeds each step the previous output', () => {
    const rows = [
      { category: 'A', sales: 10 },
      { category: 'A', sales: 20 },
      { category: 'B', sales: 5 },
      { category: 'C', sales: 1 },
      { category: 'B', sales: 40 },
    ];
    const result = executeTransforms(rows, [
      { filter: 'datum.sales > 1' },
      { aggregate: [{ op: 'sum', field: 'sales' }], groupby: ['category'] },
      { sort: [{ field: 'sum_sales', order: 'descending' }] },
    ]);
    expect(result).toEqual([
      { category: 'B', sum_sales: 45 },
      { category: 'A', sum_sales: 30 },
    ]);
  });

  it('bins after filtering', () => {
    const rows = [{ v: 1 }, { v: 6 }, { v: 11 }];
    const result = executeTransforms(rows, [{ filter: 'v > 2' }, { bin: { step: 5 }, binField: 'v' }]);
    expect(result).toEqual([
      { v: 6, v_bin: 6, v_bin_end: 11 },
      { v: 11, v_bin: 11, v_bin_end: 16 },
    ]);
  });

  it('skips specs with no recognized payload', () => {
    const compiled = compileTransforms([{ filter: 'v > 1' }, {}, { sort: [{ field: 'v' }] }]);
    expect(compiled.map(t => t.kind)).toEqual(['filter', 'sort']);
  });

  it('logs each step when DEBUG_TRANSFORMS is set', () => {
    process.env.DEBUG_TRANSFORMS = 'true';
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    executeTransforms([{ v: 1 }, { v: 5 }, { v: 9 }], [{ filter: 'v > 4' }]);
    expect(log).toHaveBeenCalledWith('  filter: 3 → 2 rows');
  });

  it('stays quiet without DEBUG_TRANSFORMS', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    executeTransforms([{ v: 1 }], [{ filter: 'v > 4' }]);
    expect(log).not.toHaveBeenCalled();
  });
});
