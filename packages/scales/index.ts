/**
 * scales package - positional and color scales
 */

export type { Scale, ScaleKind } from './scale.js';
export { LinearScale } from './linear-scale.js';
export { BandScale, DEFAULT_PADDING_INNER, DEFAULT_PADDING_OUTER } from './band-scale.js';
export { LogScale } from './log-scale.js';
export { OrdinalColorScale, DEFAULT_PALETTE, DEFAULT_FALLBACK_COLOR } from './ordinal-color-scale.js';
export { niceStep, niceExtent, DEFAULT_TICK_COUNT } from './nice.js';
export {
  buildScale,
  buildChartScales,
  computePlotArea,
  isStackedBarChart,
  maxStackedTotal,
  Z_RANGE_FACTOR,
  DEFAULT_Z_CATEGORY,
  type ChartScales,
  type PlotArea,
  type RenderMode,
  type ScaleSurface,
} from './scale-builder.js';
