/**
 * Linear scale over a numeric domain.
 *
 * The domain is the value extent, optionally widened to include zero and
 * rounded outward to nice bounds. No values gives [0, 1].
 */

import { asNumber } from '../data/value.js';
import type { Value } from '../data/value.js';
import { DEFAULT_TICK_COUNT, niceExtent, niceStep, roundTo } from './nice.js';
import { interpolate } from './scale.js';
import type { Scale } from './scale.js';

export class LinearScale implements Scale {
  readonly kind = 'linear';
  readonly domainMin: number;
  readonly domainMax: number;
  readonly rangeMin: number;
  readonly rangeMax: number;

  constructor(
    values: Iterable<number>,
    rangeMin: number,
    rangeMax: number,
    includeZero: boolean = true,
    nice: boolean = true
  ) {
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
      if (!Number.isFinite(v)) continue;
      if (v < min) min = v;
      if (v > max) max = v;
    }

    if (min > max) {
      min = 0;
      max = 1;
    } else {
      if (includeZero) {
        min = Math.min(min, 0);
        max = Math.max(max, 0);
      }
      if (nice) {
        [min, max] = niceExtent(min, max);
      }
    }

    this.domainMin = min;
    this.domainMax = max;
    this.rangeMin = rangeMin;
    this.rangeMax = rangeMax;
  }

  /**
   * A scale over exactly [domainMin, domainMax], with no zero or nice rounding.
   */
  static fromDomain(domainMin: number, domainMax: number, rangeMin: number, rangeMax: number): LinearScale {
    return new LinearScale([domainMin, domainMax], rangeMin, rangeMax, false, false);
  }

  map(value: Value | undefined): number {
    const v = asNumber(value);
    if (v === null) return NaN;

    const span = this.domainMax - this.domainMin;
    if (span === 0) {
      return (this.rangeMin + this.rangeMax) / 2;
    }
    return interpolate((v - this.domainMin) / span, this.rangeMin, this.rangeMax);
  }

  /**
   * Round tick values inside the domain.
   */
  ticks(count: number = DEFAULT_TICK_COUNT): number[] {
    const span = this.domainMax - this.domainMin;
    if (span <= 0) {
      return [this.domainMin];
    }
    const step = niceStep(span, count);
    const first = Math.ceil(this.domainMin / step);
    const last = Math.floor(this.domainMax / step);
    const ticks: number[] = [];
    for (let i = first; i <= last; i++) {
      ticks.push(roundTo(i * step));
    }
    return ticks;
  }
}
