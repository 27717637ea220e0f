import type { EdgeRecord, NodeId } from "../dot/types.js";
import { DEFAULT_CALL_EDGE_TYPE, DEFAULT_CFG_EDGE_TYPE } from "../config/constants.js";

export interface EdgeTypeNames {
  cfg: string;
  call: string;
}

export const DEFAULT_EDGE_TYPE_NAMES: EdgeTypeNames = {
  cfg: DEFAULT_CFG_EDGE_TYPE,
  call: DEFAULT_CALL_EDGE_TYPE,
};

/**
 * Decides whether one edge survives UDF filtering.
 *
 * CFG edges need both endpoints kept. CALL edges need a kept source and a
 * target that is itself a seed: a call into a node that is merely reachable
 * from some other UDF is dropped. Every other edge type is dropped.
 */
export function isEdgeRetained(
  edge: EdgeRecord,
  keptNodes: ReadonlySet<NodeId>,
  seeds: ReadonlySet<NodeId>,
  types: EdgeTypeNames = DEFAULT_EDGE_TYPE_NAMES,
): boolean {
  if (edge.edgeType === types.cfg) {
    return keptNodes.has(edge.sourceId) && keptNodes.has(edge.targetId);
  }
  if (edge.edgeType === types.call) {
    return keptNodes.has(edge.sourceId) && seeds.has(edge.targetId);
  }
  return false;
}

/** Retained edges in their original relative order. */
export function retainEdges(
  edges: readonly EdgeRecord[],
  keptNodes: ReadonlySet<NodeId>,
  seeds: ReadonlySet<NodeId>,
  types: EdgeTypeNames = DEFAULT_EDGE_TYPE_NAMES,
): EdgeRecord[] {
  return edges.filter((edge) => isEdgeRetained(edge, keptNodes, seeds, types));
}
