/**
 * Base-10 log scale. Only strictly positive values take part in the
 * domain; with none the domain is [1, 10].
 */

import { asNumber } from '../data/value.js';
import type { Value } from '../data/value.js';
import { interpolate } from './scale.js';
import type { Scale } from './scale.js';

export class LogScale implements Scale {
  readonly kind = 'log';
  readonly domainMin: number;
  readonly domainMax: number;
  readonly rangeMin: number;
  readonly rangeMax: number;

  constructor(values: Iterable<number>, rangeMin: number, rangeMax: number) {
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
      if (!(v > 0) || !Number.isFinite(v)) continue;
      if (v < min) min = v;
      if (v > max) max = v;
    }
    if (min > max) {
      min = 1;
      max = 10;
    }

    this.domainMin = min;
    this.domainMax = max;
    this.rangeMin = rangeMin;
    this.rangeMax = rangeMax;
  }

  map(value: Value | undefined): number {
    const v = asNumber(value);
    if (v === null || v <= 0) return NaN;

    const logMin = Math.log10(this.domainMin);
    const logSpan = Math.log10(this.domainMax) - logMin;
    if (logSpan === 0) {
      return (this.rangeMin + this.rangeMax) / 2;
    }
    return interpolate((Math.log10(v) - logMin) / logSpan, this.rangeMin, this.rangeMax);
  }
}
