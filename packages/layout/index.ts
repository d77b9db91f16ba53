/**
 * layout package - graph node positions in 3D
 */

export {
  computeLayout,
  computeGraphSize,
  computeNodeSize,
  computeAvailableRadius,
  toLayoutType,
  type LayoutBounds,
  type LayoutResult,
} from './layout-engine.js';
export { buildLayoutGraph, type LayoutGraph, type LayoutEdge } from './graph.js';
export {
  DEFAULT_LAYOUT_PARAMS,
  resolveLayoutParams,
  toHierarchyDirection,
  type LayoutParams,
  type HierarchyDirection,
} from './params.js';
export { forceLayout } from './force-layout.js';
export { circularLayout } from './circular-layout.js';
export { hierarchicalLayout, assignLevels } from './hierarchical-layout.js';
export { gridLayout } from './grid-layout.js';
export { randomLayout } from './random-layout.js';
export { presetLayout } from './preset-layout.js';
export { normalizePositions, MIN_EXTENT, type NormalizeResult } from './normalize.js';
export { mulberry32, FORCE_SEED, type RandomSource } from './random.js';
export {
  boundingBox,
  boxCenter,
  boxExtent,
  distance,
  magnitude,
  vec3,
  type BoundingBox,
  type Vec3,
} from './geometry.js';
