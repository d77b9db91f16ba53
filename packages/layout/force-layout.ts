/**
 * Force-directed layout (Fruchterman-Reingold).
 *
 * k = sqrt(graphSize² / n) is the ideal edge length. Each round:
 *   - every node pair repels with k² / d, scaled by repulsion / 100
 *   - every edge pulls its endpoints together with d² / k · attraction
 *   - gravity pulls each node toward the origin
 *   - each node moves along its net force by at most the temperature,
 *     times damping; the temperature falls linearly from graphSize to 0
 *
 * Starting positions come from a PRNG with a fixed seed, so the result
 * only depends on the input.
 */

import { add, magnitude, normalize, scale, subtract, vec3 } from './geometry.js';
import type { Vec3 } from './geometry.js';
import type { LayoutGraph } from './graph.js';
import type { LayoutParams } from './params.js';
import { FORCE_SEED, mulberry32 } from './random.js';
import type { RandomSource } from './random.js';

const MIN_DISTANCE = 0.01;
const DEPTH_SPREAD = 0.5;

export function forceLayout(
  graph: LayoutGraph,
  params: LayoutParams,
  graphSize: number,
  random: RandomSource = mulberry32(FORCE_SEED)
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

  const n = graph.ids.length;
  if (n === 0) return positions;

  const k = Math.sqrt((graphSize * graphSize) / n);
  const repulsionScale = params.repulsion / 100;
  const at = (id: string): Vec3 => positions.get(id) ?? vec3(0, 0, 0);

  for (let iter = 0; iter < params.iterations; iter++) {
    const displacement = new Map<string, Vec3>();
    for (const id of graph.ids) {
      displacement.set(id, vec3(0, 0, 0));
    }
    const push = (id: string, force: Vec3): void => {
      displacement.set(id, add(displacement.get(id) ?? vec3(0, 0, 0), force));
    };

    // repulsion, sequential pair order
    for (let i = 0; i < n; i++) {
      const a = graph.ids[i];
      for (let j = i + 1; j < n; j++) {
        const b = graph.ids[j];
        const delta = subtract(at(a), at(b));
        const d = Math.max(magnitude(delta), MIN_DISTANCE);
        const force = scale(normalize(delta), ((k * k) / d) * repulsionScale);
        push(a, force);
        push(b, scale(force, -1));
      }
    }

    // attraction
    for (const edge of graph.edges) {
      const delta = subtract(at(edge.source), at(edge.target));
      const d = Math.max(magnitude(delta), MIN_DISTANCE);
      const force = scale(normalize(delta), ((d * d) / k) * params.attraction);
      push(edge.source, scale(force, -1));
      push(edge.target, force);
    }

    // gravity
    for (const id of graph.ids) {
      push(id, scale(at(id), -params.gravity));
    }

    const temperature = graphSize * (1 - iter / params.iterations);
    for (const id of graph.ids) {
      const disp = displacement.get(id) ?? vec3(0, 0, 0);
      const length = magnitude(disp);
      if (length > 0) {
        const step = Math.min(length, temperature) * params.damping;
        positions.set(id, add(at(id), scale(normalize(disp), step)));
      }
    }
  }

  return positions;
}
