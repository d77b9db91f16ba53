/**
 * 3D vector helpers shared by the layout algorithms.
 */

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface BoundingBox {
  min: Vec3;
  max: Vec3;
}

export function vec3(x: number, y: number, z: number = 0): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, factor: number): Vec3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

export function magnitude(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/** Unit vector in the direction of `v`; the zero vector stays zero. */
export function normalize(v: Vec3): Vec3 {
  const length = magnitude(v);
  return length > 0 ? scale(v, 1 / length) : { x: 0, y: 0, z: 0 };
}

export function distance(a: Vec3, b: Vec3): number {
  return magnitude(subtract(a, b));
}

/**
 * Axis-aligned bounds of a set of points, or null when there are none.
 */
export function boundingBox(points: Iterable<Vec3>): BoundingBox | null {
  let box: BoundingBox | null = null;
  for (const p of points) {
    if (!box) {
      box = { min: { ...p }, max: { ...p } };
      continue;
    }
    box.min = { x: Math.min(box.min.x, p.x), y: Math.min(box.min.y, p.y), z: Math.min(box.min.z, p.z) };
    box.max = { x: Math.max(box.max.x, p.x), y: Math.max(box.max.y, p.y), z: Math.max(box.max.z, p.z) };
  }
  return box;
}

export function boxCenter(box: BoundingBox): Vec3 {
  return scale(add(box.min, box.max), 0.5);
}

/** Longest side of the box */
export function boxExtent(box: BoundingBox): number {
  const size = subtract(box.max, box.min);
  return Math.max(size.x, size.y, size.z);
}
