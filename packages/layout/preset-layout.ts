import { hasField, toNumberStrict } from '../data/value.js';
import type { Row } from '../data/value.js';
import { vec3 } from './geometry.js';
import type { Vec3 } from './geometry.js';
import type { LayoutGraph } from './graph.js';

function coordinate(node: Row, axis: 'x' | 'y' | 'z', unitScale: number): number {
  if (!hasField(node, axis) || node[axis] === null) return 0;
  return toNumberStrict(node[axis], axis, 'preset layout') * unitScale;
}

/**
 * Positions read from each node's own x/y/z fields, times `unitScale`.
 * A missing or null coordinate is 0.
 *
 * @throws CoercionError when a coordinate is not numeric
 */
export function presetLayout(graph: LayoutGraph, unitScale: number): Map<string, Vec3> {
  const positions = new Map<string, Vec3>();
  for (const [id, node] of graph.nodes) {
    positions.set(
      id,
      vec3(coordinate(node, 'x', unitScale), coordinate(node, 'y', unitScale), coordinate(node, 'z', unitScale))
    );
  }
  return positions;
}
