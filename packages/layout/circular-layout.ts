import { vec3 } from './geometry.js';
import type { Vec3 } from './geometry.js';
import type { LayoutGraph } from './graph.js';
import type { LayoutParams } from './params.js';

const DEFAULT_RADIUS_FACTOR = 0.4;

/**
 * Nodes spaced evenly along an arc in the z = 0 plane. The angle step is
 * arc / n, so a full circle never puts the last node on top of the first.
 */
export function circularLayout(graph: LayoutGraph, params: LayoutParams, graphSize: number): Map<string, Vec3> {
  const positions = new Map<string, Vec3>();
  const n = graph.ids.length;
  if (n === 0) return positions;

  const radius = params.radius ?? graphSize * DEFAULT_RADIUS_FACTOR;
  const start = (params.startAngle * Math.PI) / 180;
  const end = (params.endAngle * Math.PI) / 180;
  const step = (end - start) / n;

  graph.ids.forEach((id, i) => {
    const angle = start + i * step;
    positions.set(id, vec3(Math.cos(angle) * radius, Math.sin(angle) * radius, 0));
  });
  return positions;
}
