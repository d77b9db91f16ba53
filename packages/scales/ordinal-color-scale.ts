/**
 * Categorical color assignment. The i-th distinct value (first-seen order)
 * gets palette[i % palette.length].
 */

import { asText } from '../data/value.js';
import type { Value } from '../data/value.js';

/** Tableau 10 */
export const DEFAULT_PALETTE: readonly string[] = [
  '#4e79a7',
  '#f28e2c',
  '#e15759',
  '#76b7b2',
  '#59a14f',
  '#edc949',
  '#af7aa1',
  '#ff9da7',
  '#9c755f',
  '#bab0ab',
];

export const DEFAULT_FALLBACK_COLOR = '#4e79a7';

export class OrdinalColorScale {
  readonly domain: readonly string[];
  readonly palette: readonly string[];
  readonly fallback: string;

  private readonly colors = new Map<string, string>();

  constructor(
    categories: Iterable<Value | undefined>,
    palette: readonly string[] = DEFAULT_PALETTE,
    fallback: string = DEFAULT_FALLBACK_COLOR
  ) {
    this.palette = palette;
    this.fallback = fallback;

    const domain: string[] = [];
    for (const category of categories) {
      const key = asText(category);
      if (this.colors.has(key)) continue;
      const color = palette.length > 0 ? palette[domain.length % palette.length] : fallback;
      this.colors.set(key, color);
      domain.push(key);
    }
    this.domain = domain;
  }

  static fromData(
    values: Iterable<Value | undefined>,
    palette?: readonly string[],
    fallback?: string
  ): OrdinalColorScale {
    return new OrdinalColorScale(values, palette, fallback);
  }

  map(value: Value | undefined): string {
    return this.colors.get(asText(value)) ?? this.fallback;
  }
}
