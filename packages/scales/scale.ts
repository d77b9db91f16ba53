import type { Value } from '../data/value.js';

export type ScaleKind = 'linear' | 'band' | 'log';

/**
 * A positional scale: maps a data value to a coordinate in
 * [rangeMin, rangeMax]. Values the scale cannot place map to NaN.
 */
export interface Scale {
  readonly kind: ScaleKind;
  readonly rangeMin: number;
  readonly rangeMax: number;
  map(value: Value | undefined): number;
}

export function interpolate(t: number, rangeMin: number, rangeMax: number): number {
  return rangeMin + t * (rangeMax - rangeMin);
}
