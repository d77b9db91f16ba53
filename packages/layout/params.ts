/**
 * Layout parameters with defaults applied.
 *
 * Out-of-range input degrades instead of failing: non-finite numbers take
 * the default, negative iteration counts become 0, and a non-positive
 * radius, column count or spacing means "work it out from the graph size".
 */

import type { LayoutParamsSpec } from '../spec/chart-spec.js';

export type HierarchyDirection = 'TB' | 'BT' | 'LR' | 'RL';

export interface LayoutParams {
  iterations: number;
  repulsion: number;
  attraction: number;
  damping: number;
  gravity: number;
  /** undefined: 40% of the graph size */
  radius: number | undefined;
  /** degrees */
  startAngle: number;
  endAngle: number;
  direction: HierarchyDirection;
  levelSeparation: number;
  nodeSeparation: number;
  /** undefined: ceil(sqrt(nodeCount)) */
  columns: number | undefined;
  /** undefined: graphSize / columns */
  spacing: number | undefined;
}

export const DEFAULT_LAYOUT_PARAMS: Readonly<LayoutParams> = {
  iterations: 100,
  repulsion: 100,
  attraction: 0.1,
  damping: 0.9,
  gravity: 0.1,
  radius: undefined,
  startAngle: 0,
  endAngle: 360,
  direction: 'TB',
  levelSeparation: 1,
  nodeSeparation: 0.5,
  columns: undefined,
  spacing: undefined,
};

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

function positiveOrAuto(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : undefined;
}

export function toHierarchyDirection(direction: string | undefined): HierarchyDirection {
  switch (direction?.toLowerCase().replace(/[\s_-]/g, '')) {
    case 'bt':
    case 'bottomtop':
    case 'bottomtotop':
      return 'BT';
    case 'lr':
    case 'leftright':
    case 'lefttoright':
      return 'LR';
    case 'rl':
    case 'rightleft':
    case 'righttoleft':
      return 'RL';
    default:
      return 'TB';
  }
}

export function resolveLayoutParams(spec: LayoutParamsSpec | undefined): LayoutParams {
  const d = DEFAULT_LAYOUT_PARAMS;
  const p = spec ?? {};
  const columns = positiveOrAuto(p.columns);

  return {
    iterations: Math.max(0, Math.floor(finiteOr(p.iterations, d.iterations))),
    repulsion: finiteOr(p.repulsion, d.repulsion),
    attraction: finiteOr(p.attraction, d.attraction),
    damping: finiteOr(p.damping, d.damping),
    gravity: finiteOr(p.gravity, d.gravity),
    radius: positiveOrAuto(p.radius),
    startAngle: finiteOr(p.startAngle, d.startAngle),
    endAngle: finiteOr(p.endAngle, d.endAngle),
    direction: toHierarchyDirection(p.direction),
    levelSeparation: finiteOr(p.levelSeparation, d.levelSeparation),
    nodeSeparation: finiteOr(p.nodeSeparation, d.nodeSeparation),
    columns: columns === undefined ? undefined : Math.max(1, Math.floor(columns)),
    spacing: positiveOrAuto(p.spacing),
  };
}
