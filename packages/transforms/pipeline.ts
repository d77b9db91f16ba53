/**
 * Transform Pipeline
 *
 * pipeline: TransformSpec[] → Transform[] (resolved) → CompiledTransform[] → rows
 *
 * Specs are resolved and compiled once (filters are parsed here, not per
 * row), then applied in list order, each consuming the previous output.
 */

import type { Row } from '../data/value.js';
import type { TransformSpec } from '../spec/chart-spec.js';
import { resolveTransform } from './transform.js';
import type { Transform, TransformKind } from './transform.js';
import { compileFilter } from './filter.js';
import { aggregateRows } from './aggregate.js';
import { sortRows } from './sort.js';
import { binRows } from './bin.js';

export interface CompiledTransform {
  readonly kind: TransformKind;
  apply(rows: Row[]): Row[];
}

export function compileTransform(transform: Transform): CompiledTransform {
  switch (transform.kind) {
    case 'filter': {
      const predicate = compileFilter(transform.expression);
      return { kind: 'filter', apply: rows => rows.filter(predicate) };
    }
    case 'aggregate':
      return { kind: 'aggregate', apply: rows => aggregateRows(rows, transform.ops, transform.groupby) };
    case 'sort':
      return { kind: 'sort', apply: rows => sortRows(rows, transform.keys) };
    case 'bin':
      return {
        kind: 'bin',
        apply: rows => binRows(rows, { field: transform.field, as: transform.as, bin: transform.bin }),
      };
  }
}

/**
 * Resolve and compile a spec list. Specs with no recognized payload are dropped.
 */
export function compileTransforms(specs: readonly TransformSpec[] | null | undefined): CompiledTransform[] {
  const DEBUG = process.env.DEBUG_TRANSFORMS === 'true';
  const compiled: CompiledTransform[] = [];
  if (!specs) return compiled;

  specs.forEach((spec, i) => {
    const transform = resolveTransform(spec);
    if (!transform) {
      if (DEBUG) {
        console.log(`  transform[${i}]: no recognized payload, skipped`);
      }
      return;
    }
    compiled.push(compileTransform(transform));
  });
  return compiled;
}

/**
 * Run `rows` through every spec in order.
 * A null or empty spec list returns the input unchanged.
 */
export function executeTransforms(rows: Row[], specs: readonly TransformSpec[] | null | undefined): Row[] {
  if (!specs || specs.length === 0) {
    return rows;
  }

  const DEBUG = process.env.DEBUG_TRANSFORMS === 'true';
  let result = rows;
  for (const transform of compileTransforms(specs)) {
    const before = result.length;
    result = transform.apply(result);
    if (DEBUG) {
      console.log(`  ${transform.kind}: ${before} → ${result.length} rows`);
    }
  }
  return result;
}
