/**
 * plotcore - data transforms, scales and graph layout for declarative charts
 *
 * Takes an already-parsed, Vega-Lite-like chart spec and produces what a
 * renderer needs: the processed rows, one scale per channel, and (for graph
 * marks) a 3D position for every node.
 *
 * @example
 * ```typescript
 * import { createPlotCore } from 'plotcore';
 *
 * const core = createPlotCore({ renderMode: '3d' });
 *
 * const { rows, scales } = core.run({
 *   data: { values: [{ category: 'A', sales: 10 }, { category: 'B', sales: 5 }] },
 *   mark: 'bar',
 *   encoding: {
 *     x: { field: 'category', type: 'nominal' },
 *     y: { field: 'sales', type: 'quantitative' },
 *   },
 *   transform: [{ filter: 'datum.sales > 1' }],
 * });
 *
 * scales.x.map('A'); // band centre in world units
 * ```
 */

// data
export {
  asNumber,
  asText,
  toNumberStrict,
  compareValues,
  PlotcoreError,
  CoercionError,
  FilterSyntaxError,
} from './data/index.js';
export type { Value, Row } from './data/index.js';

// spec
export { DEFAULT_CHART, toMarkType, isOrdinalType } from './spec/index.js';
export type {
  ChartSpec,
  DataSpec,
  EncodingSpec,
  ChannelSpec,
  ScaleSpec,
  TransformSpec,
  AggregateOpSpec,
  SortFieldSpec,
  BinSpec,
  LayoutSpec,
  LayoutParamsSpec,
  MarkType,
} from './spec/index.js';

// parser
export { parseFilter, tryParseFilter, formatFilter } from './parser/index.js';
export type { FilterExpression, ComparisonOperator } from './parser/index.js';

// transforms
export { executeTransforms, compileTransforms, resolveTransform } from './transforms/index.js';
export type { Transform, CompiledTransform } from './transforms/index.js';

// scales
export {
  LinearScale,
  BandScale,
  LogScale,
  OrdinalColorScale,
  DEFAULT_PALETTE,
  buildScale,
  buildChartScales,
} from './scales/index.js';
export type { Scale, ChartScales, RenderMode } from './scales/index.js';

// layout
export { computeLayout, normalizePositions, DEFAULT_LAYOUT_PARAMS } from './layout/index.js';
export type { LayoutBounds, LayoutResult, Vec3 } from './layout/index.js';

// --- internal imports ---

import type { Row } from './data/index.js';
import type { ChartSpec, LayoutSpec, TransformSpec } from './spec/index.js';
import { DEFAULT_CHART, toMarkType } from './spec/index.js';
import { executeTransforms } from './transforms/index.js';
import { buildChartScales, DEFAULT_FALLBACK_COLOR, DEFAULT_PALETTE } from './scales/index.js';
import type { ChartScales, RenderMode } from './scales/index.js';
import { computeLayout } from './layout/index.js';
import type { LayoutBounds, LayoutResult } from './layout/index.js';

/**
 * Options for creating a PlotCore instance
 */
export interface PlotCoreOptions {
  /** '3d' scales ranges to world units and gives z a range (default '2d') */
  renderMode?: RenderMode;
  /** world units per chart pixel (default 0.01) */
  pixelScale?: number;
  /** colors for the ordinal color scale (default Tableau 10) */
  palette?: readonly string[];
  /** color for values outside the color scale's domain */
  fallbackColor?: string;
}

export const DEFAULT_PIXEL_SCALE = 0.01;

/**
 * Output of one render pass
 */
export interface RenderPass {
  /** rows after every transform */
  rows: Row[];
  scales: ChartScales;
  /** graph marks only */
  graph: LayoutResult | null;
}

/**
 * Runs the transform, scale and layout stages for chart specs.
 * Holds only its options; every call works on fresh inputs.
 */
export class PlotCore {
  readonly renderMode: RenderMode;
  readonly pixelScale: number;
  readonly palette: readonly string[];
  readonly fallbackColor: string;

  constructor(options: PlotCoreOptions = {}) {
    this.renderMode = options.renderMode ?? '2d';
    const pixelScale = options.pixelScale ?? DEFAULT_PIXEL_SCALE;
    this.pixelScale = Number.isFinite(pixelScale) && pixelScale > 0 ? pixelScale : DEFAULT_PIXEL_SCALE;
    this.palette = options.palette ?? DEFAULT_PALETTE;
    this.fallbackColor = options.fallbackColor ?? DEFAULT_FALLBACK_COLOR;
  }

  /** run rows through a transform list */
  transform(rows: Row[], specs: readonly TransformSpec[] | null | undefined): Row[] {
    return executeTransforms(rows, specs);
  }

  /** build the x, y, z and color scales for processed rows */
  scales(spec: ChartSpec, rows: readonly Row[]): ChartScales {
    return buildChartScales(spec, rows, {
      renderMode: this.renderMode,
      pixelScale: this.pixelScale,
      palette: this.palette,
      fallbackColor: this.fallbackColor,
    });
  }

  /** lay out graph nodes; bounds default to the graph defaults at this pixel scale */
  layout(
    nodes: readonly Row[],
    edges: readonly Row[] | undefined,
    layout: LayoutSpec | undefined,
    bounds: Partial<LayoutBounds> = {}
  ): LayoutResult {
    return computeLayout(nodes, edges, layout, {
      width: bounds.width ?? DEFAULT_CHART.graphWidth,
      height: bounds.height ?? DEFAULT_CHART.graphHeight,
      depth: bounds.depth,
      pixelScale: bounds.pixelScale ?? this.pixelScale,
      presetScale: bounds.presetScale ?? (this.renderMode === '3d' ? 1 : this.pixelScale),
    });
  }

  /**
   * One full render pass: transforms on `data.values`, then scales, then
   * (for graph marks) the node layout.
   */
  run(spec: ChartSpec): RenderPass {
    const rows = this.transform(spec.data?.values ?? [], spec.transform);
    const scales = this.scales(spec, rows);

    let graph: LayoutResult | null = null;
    if (toMarkType(spec.mark) === 'graph') {
      graph = this.layout(spec.data?.nodes ?? [], spec.data?.edges, spec.layout, {
        width: spec.width,
        height: spec.height,
        depth: spec.depth,
      });
    }

    return { rows, scales, graph };
  }
}

/**
 * Create a PlotCore instance.
 */
export function createPlotCore(options: PlotCoreOptions = {}): PlotCore {
  return new PlotCore(options);
}
