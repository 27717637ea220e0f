/**
 * UDF filtering: seeds from the classifier, closure from the slicer, edges
 * from the retention rule.
 *
 * @module slice/udfFilter
 */

import type { Graph, NodeId, NodeRecord, EdgeRecord } from "../dot/types.js";
import { compareIds } from "../dot/types.js";
import { isUserDefinedFunction, isMethodNode } from "./udf.js";
import { computeCfgClosure } from "./reachability.js";
import {
  DEFAULT_EDGE_TYPE_NAMES,
  retainEdges,
  type EdgeTypeNames,
} from "./retention.js";

export interface SliceResult {
  readonly seeds: ReadonlySet<NodeId>;
  readonly methodCount: number;
  readonly keptNodeIds: ReadonlySet<NodeId>;
  /** Declared nodes among `keptNodeIds`. */
  readonly nodes: ReadonlyMap<NodeId, NodeRecord>;
  readonly keptEdges: readonly EdgeRecord[];
  /** Kept ids with no declaration, sorted. */
  readonly missingNodeIds: readonly NodeId[];
}

export function findUserDefinedFunctions(graph: Graph): {
  seeds: Set<NodeId>;
  methodCount: number;
} {
  const seeds = new Set<NodeId>();
  let methodCount = 0;
  for (const node of graph.nodes.values()) {
    if (!isMethodNode(node.attributes)) continue;
    methodCount++;
    if (isUserDefinedFunction(node.attributes)) {
      seeds.add(node.id);
    }
  }
  return { seeds, methodCount };
}

export function filterUserDefinedFunctions(
  graph: Graph,
  types: EdgeTypeNames = DEFAULT_EDGE_TYPE_NAMES,
): SliceResult {
  const { seeds, methodCount } = findUserDefinedFunctions(graph);
  const cfgEdges = graph.edges.filter((edge) => edge.edgeType === types.cfg);
  const keptNodeIds = computeCfgClosure(cfgEdges, seeds);
  const keptEdges = retainEdges(graph.edges, keptNodeIds, seeds, types);

  const nodes = new Map<NodeId, NodeRecord>();
  const missingNodeIds: NodeId[] = [];
  for (const id of keptNodeIds) {
    const node = graph.nodes.get(id);
    if (node) {
      nodes.set(id, node);
    } else {
      missingNodeIds.push(id);
    }
  }
  missingNodeIds.sort(compareIds);

  return Object.freeze({
    seeds,
    methodCount,
    keptNodeIds,
    nodes,
    keptEdges,
    missingNodeIds,
  });
}
