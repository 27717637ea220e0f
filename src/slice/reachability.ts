import type { EdgeRecord, NodeId } from "../dot/types.js";

export type Adjacency = ReadonlyMap<NodeId, readonly NodeId[]>;

export function buildAdjacency(edges: Iterable<EdgeRecord>): Adjacency {
  const adjacency = new Map<NodeId, NodeId[]>();
  for (const edge of edges) {
    const targets = adjacency.get(edge.sourceId);
    if (targets) {
      targets.push(edge.targetId);
    } else {
      adjacency.set(edge.sourceId, [edge.targetId]);
    }
  }
  return adjacency;
}

/**
 * Forward closure of `seeds` over `cfgEdges`: every seed plus every node
 * reachable from one by following edges source to target.
 *
 * One visited set is shared by all seeds, so overlapping regions are walked
 * once. Cycles end when they revisit a node.
 */
export function computeCfgClosure(
  cfgEdges: Iterable<EdgeRecord>,
  seeds: Iterable<NodeId>,
): Set<NodeId> {
  const adjacency = buildAdjacency(cfgEdges);
  const visited = new Set<NodeId>();
  const queue: NodeId[] = [];

  for (const seed of seeds) {
    if (visited.has(seed)) continue;
    visited.add(seed);
    queue.push(seed);

    for (let head = queue.length - 1; head < queue.length; head++) {
      const current = queue[head];
      for (const next of adjacency.get(current) ?? []) {
        if (!visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }
  }

  return visited;
}
