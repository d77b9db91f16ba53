/**
 * Band scale for categorical values.
 *
 * The range splits into N equal steps plus padding:
 *
 *   step      = (rangeMax - rangeMin) / (N - paddingInner + 2·paddingOuter)
 *   bandWidth = step · (1 - paddingInner)
 *   start(i)  = rangeMin + paddingOuter·step + i·step
 *
 * Categories are compared by their text form and kept in first-seen order.
 */

import { asText } from '../data/value.js';
import type { Value } from '../data/value.js';
import type { Scale } from './scale.js';

export const DEFAULT_PADDING_INNER = 0.1;
export const DEFAULT_PADDING_OUTER = 0.05;

export class BandScale implements Scale {
  readonly kind = 'band';
  readonly categories: readonly string[];
  readonly rangeMin: number;
  readonly rangeMax: number;
  readonly paddingInner: number;
  readonly paddingOuter: number;
  readonly step: number;
  readonly bandWidth: number;

  private readonly indexOf = new Map<string, number>();

  constructor(
    categories: Iterable<Value | undefined>,
    rangeMin: number,
    rangeMax: number,
    paddingInner: number = DEFAULT_PADDING_INNER,
    paddingOuter: number = DEFAULT_PADDING_OUTER
  ) {
    const distinct: string[] = [];
    for (const category of categories) {
      const key = asText(category);
      if (!this.indexOf.has(key)) {
        this.indexOf.set(key, distinct.length);
        distinct.push(key);
      }
    }

    this.categories = distinct;
    this.rangeMin = rangeMin;
    this.rangeMax = rangeMax;
    this.paddingInner = paddingInner;
    this.paddingOuter = paddingOuter;

    const n = distinct.length;
    const denominator = n - paddingInner + 2 * paddingOuter;
    this.step = n > 0 && denominator > 0 ? (rangeMax - rangeMin) / denominator : 0;
    this.bandWidth = this.step * (1 - paddingInner);
  }

  /** Start of the category's band, or NaN for an unknown category */
  mapBandStart(category: Value | undefined): number {
    const index = this.indexOf.get(asText(category));
    if (index === undefined) return NaN;
    return this.rangeMin + this.paddingOuter * this.step + index * this.step;
  }

  /** Centre of the category's band */
  map(category: Value | undefined): number {
    return this.mapBandStart(category) + this.bandWidth / 2;
  }
}
