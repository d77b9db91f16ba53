import { vec3 } from './geometry.js';
import type { Vec3 } from './geometry.js';
import type { LayoutGraph } from './graph.js';
import type { RandomSource } from './random.js';

const DEPTH_SPREAD = 0.3;

/**
 * Uniform positions in a graphSize cube, flattened in z. Unseeded unless a
 * source is passed in.
 */
export function randomLayout(
  graph: LayoutGraph,
  graphSize: number,
  random: RandomSource = Math.random
): Map<string, Vec3> {
  const positions = new Map<string, Vec3>();
  for (const id of graph.ids) {
    positions.set(
      id,
      vec3(
        (random() - 0.5) * graphSize,
        (random() - 0.5) * graphSize,
        (random() - 0.5) * graphSize * DEPTH_SPREAD
      )
    );
  }
  return positions;
}
