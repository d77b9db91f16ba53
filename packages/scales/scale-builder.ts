/**
 * Scale Builder
 *
 * Chooses and constructs the scale for each encoding channel from the
 * processed rows:
 *
 *   ordinal/nominal field, or band/point scale → BandScale
 *   log scale                                   → LogScale (positive values)
 *   anything else                               → LinearScale
 *
 * and lays out the x/y/z ranges of a chart from its size and padding.
 */

import { asText, hasField, toNumberStrict } from '../data/value.js';
import type { Row, Value } from '../data/value.js';
import type { ChannelSpec, ChartSpec } from '../spec/chart-spec.js';
import { DEFAULT_CHART, isOrdinalType, toMarkType } from '../spec/defaults.js';
import { BandScale, DEFAULT_PADDING_INNER, DEFAULT_PADDING_OUTER } from './band-scale.js';
import { LinearScale } from './linear-scale.js';
import { LogScale } from './log-scale.js';
import { OrdinalColorScale } from './ordinal-color-scale.js';
import type { Scale } from './scale.js';

export type RenderMode = '2d' | '3d';

export interface ScaleSurface {
  renderMode: RenderMode;
  /** world units per chart pixel, applied to ranges in 3D */
  pixelScale: number;
  palette?: readonly string[];
  fallbackColor?: string;
}

export interface ChartScales {
  x: Scale;
  y: Scale;
  z: Scale;
  /** null when the color channel has no field */
  color: OrdinalColorScale | null;
}

export interface PlotArea {
  width: number;
  height: number;
}

export const Z_RANGE_FACTOR = 0.75;
export const DEFAULT_Z_CATEGORY = '_default';

// ---
// CHANNEL SCALES
// ---

function fieldValues(rows: readonly Row[], field: string | undefined): Value[] {
  if (field === undefined) return [];
  const values: Value[] = [];
  for (const row of rows) {
    if (hasField(row, field)) {
      values.push(row[field]);
    }
  }
  return values;
}

function numericValues(values: readonly Value[], field: string, op: string): number[] {
  return values.filter(v => v !== null).map(v => toNumberStrict(v, field, op));
}

function explicitRange(channel: ChannelSpec, rangeMin: number, rangeMax: number): [number, number] {
  const range = channel.scale?.range;
  if (range && range.length >= 2 && Number.isFinite(range[0]) && Number.isFinite(range[1])) {
    return [range[0], range[1]];
  }
  return [rangeMin, rangeMax];
}

/**
 * Build the scale for one channel. An explicit `scale.domain` replaces the
 * data-derived domain and an explicit two-number `scale.range` replaces the
 * given range.
 *
 * @throws CoercionError when a continuous scale meets a non-numeric value
 */
export function buildScale(
  channel: ChannelSpec | undefined,
  rows: readonly Row[],
  rangeMin: number,
  rangeMax: number
): Scale {
  if (!channel) {
    return LinearScale.fromDomain(0, 1, rangeMin, rangeMax);
  }

  const [r0, r1] = explicitRange(channel, rangeMin, rangeMax);
  const field = channel.field ?? '';
  const scaleType = channel.scale?.type?.toLowerCase() ?? 'linear';
  const domain = channel.scale?.domain;

  if (isOrdinalType(channel.type) || scaleType === 'band' || scaleType === 'point') {
    const categories = domain ?? fieldValues(rows, channel.field);
    return new BandScale(
      categories,
      r0,
      r1,
      channel.scale?.paddingInner ?? DEFAULT_PADDING_INNER,
      channel.scale?.paddingOuter ?? DEFAULT_PADDING_OUTER
    );
  }

  if (scaleType === 'log') {
    const values = numericValues(domain ?? fieldValues(rows, channel.field), field, 'log scale');
    return new LogScale(values.filter(v => v > 0), r0, r1);
  }

  if (domain && domain.length > 0) {
    const bounds = numericValues(domain, field, 'scale domain');
    if (bounds.length > 0) {
      return LinearScale.fromDomain(Math.min(...bounds), Math.max(...bounds), r0, r1);
    }
  }

  const values = numericValues(fieldValues(rows, channel.field), field, 'linear scale');
  return new LinearScale(values, r0, r1, channel.scale?.zero ?? true, channel.scale?.nice ?? true);
}

// ---
// CHART SCALES
// ---

/**
 * Chart size minus padding, never negative.
 */
export function computePlotArea(spec: ChartSpec): PlotArea {
  const defaults = DEFAULT_CHART.padding;
  const top = spec.padding?.top ?? defaults.top;
  const right = spec.padding?.right ?? defaults.right;
  const bottom = spec.padding?.bottom ?? defaults.bottom;
  const left = spec.padding?.left ?? defaults.left;

  const width = (spec.width ?? DEFAULT_CHART.width) - left - right;
  const height = (spec.height ?? DEFAULT_CHART.height) - top - bottom;
  return { width: Math.max(0, width), height: Math.max(0, height) };
}

/**
 * Bars stack when they are split by color, have no z field, and the y
 * channel names a stack mode other than 'null'.
 */
export function isStackedBarChart(spec: ChartSpec): boolean {
  const encoding = spec.encoding;
  const stack = encoding?.y?.stack;
  return (
    toMarkType(spec.mark) === 'bar' &&
    encoding?.color?.field !== undefined &&
    encoding.z?.field === undefined &&
    typeof stack === 'string' &&
    stack !== '' &&
    stack.toLowerCase() !== 'null'
  );
}

/**
 * Largest per-category sum of y, grouping rows by the text of x.
 * Rows missing either field are left out. No rows gives 1.
 */
export function maxStackedTotal(rows: readonly Row[], xField: string, yField: string): number {
  const totals = new Map<string, number>();
  for (const row of rows) {
    if (!hasField(row, xField) || !hasField(row, yField)) continue;
    const category = asText(row[xField]);
    const y = row[yField] === null ? 0 : toNumberStrict(row[yField], yField, 'stack');
    totals.set(category, (totals.get(category) ?? 0) + y);
  }
  return totals.size > 0 ? Math.max(...totals.values()) : 1;
}

function buildYScale(spec: ChartSpec, rows: readonly Row[], rangeMax: number): Scale {
  const y = spec.encoding?.y;
  if (y && isStackedBarChart(spec)) {
    const total = maxStackedTotal(rows, spec.encoding?.x?.field ?? '', y.field ?? '');
    return new LinearScale([0, total], 0, rangeMax, y.scale?.zero ?? true, y.scale?.nice ?? true);
  }
  return buildScale(y, rows, 0, rangeMax);
}

/**
 * Build the x, y, z and color scales for one render pass.
 */
export function buildChartScales(spec: ChartSpec, rows: readonly Row[], surface: ScaleSurface): ChartScales {
  const area = computePlotArea(spec);
  const unit = surface.renderMode === '3d' ? surface.pixelScale : 1;

  const xMax = area.width * unit;
  const yMax = area.height * unit;
  const zMax = surface.renderMode === '3d' ? xMax * Z_RANGE_FACTOR : 0;

  const encoding = spec.encoding;
  const x = buildScale(encoding?.x, rows, 0, xMax);
  const y = buildYScale(spec, rows, yMax);
  const z =
    encoding?.z?.field !== undefined && encoding.z.field !== ''
      ? buildScale(encoding.z, rows, 0, zMax)
      : new BandScale([DEFAULT_Z_CATEGORY], 0, zMax);

  const colorField = encoding?.color?.field;
  const color =
    colorField !== undefined
      ? OrdinalColorScale.fromData(fieldValues(rows, colorField), surface.palette, surface.fallbackColor)
      : null;

  return { x, y, z, color };
}
