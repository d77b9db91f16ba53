import { vec3 } from './geometry.js';
import type { Vec3 } from './geometry.js';
import type { LayoutGraph } from './graph.js';
import type { LayoutParams } from './params.js';

/**
 * Row-major grid centred on the origin, first row at the top.
 */
export function gridLayout(graph: LayoutGraph, params: LayoutParams, graphSize: number): Map<string, Vec3> {
  const positions = new Map<string, Vec3>();
  const n = graph.ids.length;
  if (n === 0) return positions;

  const columns = params.columns ?? Math.ceil(Math.sqrt(n));
  const spacing = params.spacing ?? graphSize / columns;
  const rowCount = Math.ceil(n / columns);

  graph.ids.forEach((id, i) => {
    const row = Math.floor(i / columns);
    const col = i % columns;
    const x = (col - (columns - 1) / 2) * spacing;
    const y = -(row - (rowCount - 1) / 2) * spacing;
    positions.set(id, vec3(x, y, 0));
  });
  return positions;
}
