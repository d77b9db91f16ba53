import { boundingBox, boxCenter, boxExtent, scale, subtract } from './geometry.js';
import type { Vec3 } from './geometry.js';

/** below this the box counts as a point */
export const MIN_EXTENT = 0.01;

export interface NormalizeResult {
  positions: Map<string, Vec3>;
  scaleFactor: number;
}

/**
 * Centre the bounding box on the origin and shrink it so its longest side
 * fits in 2 · availableRadius. Positions are never scaled up.
 */
export function normalizePositions(positions: ReadonlyMap<string, Vec3>, availableRadius: number): NormalizeResult {
  const box = boundingBox(positions.values());
  if (!box) {
    return { positions: new Map(), scaleFactor: 1 };
  }

  const center = boxCenter(box);
  let extent = boxExtent(box);
  if (extent < MIN_EXTENT) extent = 1;

  const scaleFactor = Math.min((2 * availableRadius) / extent, 1);

  const normalized = new Map<string, Vec3>();
  for (const [id, p] of positions) {
    normalized.set(id, scale(subtract(p, center), scaleFactor));
  }
  return { positions: normalized, scaleFactor };
}
