/**
 * Graph Layout Engine
 *
 * computeLayout: nodes + edges → LayoutGraph → raw positions (one algorithm)
 *                → normalized positions
 *
 * Sizes are in world units: the chart's pixel size times `pixelScale`.
 */

import type { Row } from '../data/value.js';
import type { LayoutSpec, LayoutType } from '../spec/chart-spec.js';
import { boundingBox } from './geometry.js';
import type { Vec3 } from './geometry.js';
import { buildLayoutGraph } from './graph.js';
import type { LayoutGraph } from './graph.js';
import { DEFAULT_LAYOUT_PARAMS, resolveLayoutParams } from './params.js';
import { forceLayout } from './force-layout.js';
import { circularLayout } from './circular-layout.js';
import { hierarchicalLayout } from './hierarchical-layout.js';
import { gridLayout } from './grid-layout.js';
import { randomLayout } from './random-layout.js';
import { presetLayout } from './preset-layout.js';
import { normalizePositions } from './normalize.js';

export interface LayoutBounds {
  width: number;
  height: number;
  /** 0 or absent: same as width */
  depth?: number;
  pixelScale: number;
  /** unit scale for preset coordinates */
  presetScale?: number;
}

export interface LayoutResult {
  positions: Map<string, Vec3>;
  graphSize: number;
  nodeSize: number;
  availableRadius: number;
}

const NODE_SIZE_FACTOR = 0.03;
const MIN_NODE_SIZE = 0.02;
const MAX_NODE_SIZE_FACTOR = 0.1;
const RADIUS_FACTOR = 0.4;

export function toLayoutType(type: string | undefined): LayoutType | null {
  switch (type?.toLowerCase() ?? 'force') {
    case 'force':
      return 'force';
    case 'circular':
      return 'circular';
    case 'hierarchical':
      return 'hierarchical';
    case 'grid':
      return 'grid';
    case 'random':
      return 'random';
    case 'preset':
      return 'preset';
    default:
      return null;
  }
}

export function computeGraphSize(bounds: LayoutBounds): number {
  const depth = bounds.depth !== undefined && bounds.depth > 0 ? bounds.depth : bounds.width;
  return Math.min(bounds.width, bounds.height, depth) * bounds.pixelScale;
}

/**
 * Node size shrinks with the square root of the node count, clamped to
 * [0.02, 10% of the container].
 */
export function computeNodeSize(bounds: LayoutBounds, nodeCount: number): number {
  const container = Math.min(bounds.width, bounds.height) * bounds.pixelScale;
  const size = nodeCount > 0 ? (container * NODE_SIZE_FACTOR) / Math.sqrt(nodeCount) : MIN_NODE_SIZE;
  return Math.min(Math.max(size, MIN_NODE_SIZE), container * MAX_NODE_SIZE_FACTOR);
}

export function computeAvailableRadius(graphSize: number, nodeSize: number): number {
  return Math.max(graphSize * RADIUS_FACTOR - nodeSize, nodeSize * 2);
}

function rawPositions(
  graph: LayoutGraph,
  layout: LayoutSpec | undefined,
  bounds: LayoutBounds,
  graphSize: number
): Map<string, Vec3> {
  const type = toLayoutType(layout?.type);
  const params = type === null ? { ...DEFAULT_LAYOUT_PARAMS } : resolveLayoutParams(layout?.params);

  switch (type) {
    case 'circular':
      return circularLayout(graph, params, graphSize);
    case 'hierarchical':
      return hierarchicalLayout(graph, params);
    case 'grid':
      return gridLayout(graph, params, graphSize);
    case 'random':
      return randomLayout(graph, graphSize);
    case 'preset':
      return presetLayout(graph, bounds.presetScale ?? bounds.pixelScale);
    case 'force':
    case null:
      return forceLayout(graph, params, graphSize);
  }
}

/**
 * Lay out a graph and fit it inside the available radius.
 * Unknown or missing layout types run force with default parameters.
 */
export function computeLayout(
  nodes: readonly Row[],
  edges: readonly Row[] | undefined,
  layout: LayoutSpec | undefined,
  bounds: LayoutBounds
): LayoutResult {
  const DEBUG = process.env.DEBUG_LAYOUT === 'true';

  const graph = buildLayoutGraph(nodes, edges);
  const graphSize = computeGraphSize(bounds);
  const nodeSize = computeNodeSize(bounds, graph.ids.length);
  const availableRadius = computeAvailableRadius(graphSize, nodeSize);

  if (DEBUG) {
    console.log(
      `  layout ${layout?.type ?? 'force'}: ${graph.ids.length} nodes, ${graph.edges.length} edges, ` +
        `graphSize=${graphSize}, nodeSize=${nodeSize}, availableRadius=${availableRadius}`
    );
  }

  const raw = rawPositions(graph, layout, bounds, graphSize);
  const { positions, scaleFactor } = normalizePositions(raw, availableRadius);

  if (DEBUG) {
    const before = boundingBox(raw.values());
    const after = boundingBox(positions.values());
    console.log(`  before normalize: ${JSON.stringify(before)}`);
    console.log(`  after normalize (×${scaleFactor}): ${JSON.stringify(after)}`);
  }

  return { positions, graphSize, nodeSize, availableRadius };
}
