/**
 * Node and edge rows reduced to what the layout algorithms need.
 *
 * - Node ids are the text of the `id` field; nodes without one are skipped.
 * - A repeated id keeps its first row.
 * - Edges need both `source` and `target`, each naming a known node.
 */

import { asText, hasField } from '../data/value.js';
import type { Row } from '../data/value.js';

export interface LayoutEdge {
  source: string;
  target: string;
}

export interface LayoutGraph {
  /** node ids in input order */
  ids: string[];
  nodes: Map<string, Row>;
  edges: LayoutEdge[];
}

function idOf(row: Row, field: string): string | null {
  if (!hasField(row, field) || row[field] === null) return null;
  return asText(row[field]);
}

export function buildLayoutGraph(nodes: readonly Row[], edges: readonly Row[] = []): LayoutGraph {
  const ids: string[] = [];
  const byId = new Map<string, Row>();

  for (const node of nodes) {
    const id = idOf(node, 'id');
    if (id === null || byId.has(id)) continue;
    byId.set(id, node);
    ids.push(id);
  }

  const links: LayoutEdge[] = [];
  for (const edge of edges) {
    const source = idOf(edge, 'source');
    const target = idOf(edge, 'target');
    if (source === null || target === null) continue;
    if (!byId.has(source) || !byId.has(target)) continue;
    links.push({ source, target });
  }

  return { ids, nodes: byId, edges: links };
}
