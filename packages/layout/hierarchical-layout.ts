/**
 * Layered tree layout.
 *
 * Roots are nodes no edge points at (the first node when every node has a
 * parent). Levels come from a breadth-first walk from the roots; a node
 * keeps the level it was first reached at. Within a level nodes are
 * centred on 0 and `nodeSeparation` apart; levels are `levelSeparation`
 * apart along the axis picked by `direction`:
 *
 *   TB: level k at y = -k·sep    BT: y = +k·sep
 *   LR: level k at x = +k·sep    RL: x = -k·sep
 *
 * Nodes no root reaches go in an overflow row at level index
 * `levelCount + 1`, laid out like any other level.
 */

import { vec3 } from './geometry.js';
import type { Vec3 } from './geometry.js';
import type { LayoutGraph } from './graph.js';
import type { LayoutParams } from './params.js';

export function assignLevels(graph: LayoutGraph): Map<string, number> {
  const children = new Map<string, string[]>();
  const hasParent = new Set<string>();
  for (const edge of graph.edges) {
    const list = children.get(edge.source);
    if (list) {
      list.push(edge.target);
    } else {
      children.set(edge.source, [edge.target]);
    }
    hasParent.add(edge.target);
  }

  const roots = graph.ids.filter(id => !hasParent.has(id));
  if (roots.length === 0 && graph.ids.length > 0) {
    roots.push(graph.ids[0]);
  }

  const levels = new Map<string, number>();
  const queue: string[] = [];
  for (const root of roots) {
    levels.set(root, 0);
    queue.push(root);
  }

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const level = levels.get(current) ?? 0;
    for (const child of children.get(current) ?? []) {
      if (!levels.has(child)) {
        levels.set(child, level + 1);
        queue.push(child);
      }
    }
  }

  return levels;
}

export function hierarchicalLayout(graph: LayoutGraph, params: LayoutParams): Map<string, Vec3> {
  const levels = assignLevels(graph);

  // level → ids, in the order the walk reached them
  const rows = new Map<number, string[]>();
  for (const [id, level] of levels) {
    const row = rows.get(level);
    if (row) {
      row.push(id);
    } else {
      rows.set(level, [id]);
    }
  }

  const overflow = graph.ids.filter(id => !levels.has(id));
  if (overflow.length > 0) {
    rows.set(rows.size + 1, overflow);
  }

  const vertical = params.direction === 'TB' || params.direction === 'BT';
  const reversed = params.direction === 'BT' || params.direction === 'RL';

  const positions = new Map<string, Vec3>();
  for (const [level, ids] of rows) {
    const along = level * params.levelSeparation * (reversed ? -1 : 1);
    ids.forEach((id, i) => {
      const across = (i - (ids.length - 1) / 2) * params.nodeSeparation;
      positions.set(id, vertical ? vec3(across, -along, 0) : vec3(along, across, 0));
    });
  }
  return positions;
}
