/**
 * Transform Resolution
 *
 * A `TransformSpec` says which step it is only by which payload it carries.
 * This module turns it into an explicit tagged union so the rest of the
 * pipeline never has to re-check payload presence.
 *
 * Priority when several payloads are present on one spec:
 *   filter > aggregate > sort > bin
 * Only the winning payload is honored; the others are ignored.
 */

import type {
  AggregateOpSpec,
  BinSpec,
  SortFieldSpec,
  TransformSpec,
} from '../spec/chart-spec.js';

// ---
// TRANSFORM VARIANTS
// ---

export type Transform = FilterTransform | AggregateTransform | SortTransform | BinTransform;

export type TransformKind = Transform['kind'];

export interface FilterTransform {
  readonly kind: 'filter';
  readonly expression: string;
}

export interface AggregateTransform {
  readonly kind: 'aggregate';
  readonly ops: readonly AggregateOpSpec[];
  readonly groupby: readonly string[];
}

export interface SortTransform {
  readonly kind: 'sort';
  readonly keys: readonly SortFieldSpec[];
}

export interface BinTransform {
  readonly kind: 'bin';
  /** Input field */
  readonly field: string;
  /** Output field for the bin start; the end goes to `{as}_end` */
  readonly as: string;
  readonly bin: BinSpec;
}

// ---
// RESOLUTION
// ---

/**
 * Resolve a spec to its transform variant, or null when no payload is recognized.
 */
export function resolveTransform(spec: TransformSpec | null | undefined): Transform | null {
  if (!spec) return null;

  if (spec.filter) {
    return { kind: 'filter', expression: spec.filter };
  }

  if (spec.aggregate && spec.aggregate.length > 0) {
    return { kind: 'aggregate', ops: spec.aggregate, groupby: spec.groupby ?? [] };
  }

  if (spec.sort && spec.sort.length > 0) {
    return { kind: 'sort', keys: spec.sort };
  }

  const binField = spec.binField || spec.bin?.field;
  if (spec.bin && binField) {
    return { kind: 'bin', field: binField, as: spec.as ?? `${binField}_bin`, bin: spec.bin };
  }

  return null;
}
