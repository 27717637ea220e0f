/**
 * Edge-type subgraph extraction.
 *
 * @module slice/extract
 */

import type { EdgeRecord, Graph, NodeId, NodeRecord } from "../dot/types.js";
import { compareIds } from "../dot/types.js";

export interface SubgraphExtraction {
  readonly edges: readonly EdgeRecord[];
  /** Every endpoint of a kept edge, declared or not. */
  readonly nodeIds: ReadonlySet<NodeId>;
  /** Declared nodes among `nodeIds`. */
  readonly nodes: ReadonlyMap<NodeId, NodeRecord>;
  /** Endpoints with no declaration, sorted. Omitted from output. */
  readonly missingNodeIds: readonly NodeId[];
}

export function extractSubgraph(
  graph: Graph,
  edgeTypes: ReadonlySet<string>,
): SubgraphExtraction {
  const edges = graph.edges.filter((edge) => edgeTypes.has(edge.edgeType));

  const nodeIds = new Set<NodeId>();
  for (const edge of edges) {
    nodeIds.add(edge.sourceId);
    nodeIds.add(edge.targetId);
  }

  const nodes = new Map<NodeId, NodeRecord>();
  const missingNodeIds: NodeId[] = [];
  for (const id of nodeIds) {
    const node = graph.nodes.get(id);
    if (node) {
      nodes.set(id, node);
    } else {
      missingNodeIds.push(id);
    }
  }
  missingNodeIds.sort(compareIds);

  return Object.freeze({ edges, nodeIds, nodes, missingNodeIds });
}

/** Subgraph name used for artifacts, e.g. `CFG_CALL`. */
export function edgeTypesLabel(edgeTypes: Iterable<string>): string {
  return Array.from(edgeTypes).join("_");
}
