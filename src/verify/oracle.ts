/**
 * Independent re-derivation of what UDF filtering should keep.
 *
 * The verifier does not import the producer's classifier or slicer. The rules
 * are restated here as a table so a failing node can be explained rule by
 * rule, and reachability is recomputed one seed at a time.
 *
 * @module verify/oracle
 */

import type { EdgeRecord, NodeId } from "../dot/types.js";

type Attributes = ReadonlyMap<string, string>;

function attr(attributes: Attributes, key: string): string {
  return attributes.get(key) ?? "";
}

export interface UdfRule {
  description: string;
  holds(attributes: Attributes): boolean;
}

export const UDF_RULES: readonly UdfRule[] = [
  {
    description: "label is METHOD",
    holds: (a) => attr(a, "label") === "METHOD",
  },
  {
    description: "IS_EXTERNAL is not true",
    holds: (a) => (a.get("IS_EXTERNAL") ?? "false").toLowerCase() !== "true",
  },
  {
    description: "NAME and FULL_NAME are not operators",
    holds: (a) =>
      !attr(a, "NAME").startsWith("<operator>") &&
      !attr(a, "FULL_NAME").startsWith("<operator>"),
  },
  {
    description: "NAME is not <clinit> or <global>",
    holds: (a) => !["<clinit>", "<global>"].includes(attr(a, "NAME")),
  },
  {
    description: "FILENAME is a real source file",
    holds: (a) => !["<includes>", "<empty>", ""].includes(attr(a, "FILENAME")),
  },
  {
    description: "AST_PARENT_FULL_NAME is not under <includes>",
    holds: (a) => attr(a, "AST_PARENT_FULL_NAME").indexOf("<includes>") === -1,
  },
];

export function failedUdfRules(attributes: Attributes): string[] {
  return UDF_RULES.filter((rule) => !rule.holds(attributes)).map(
    (rule) => rule.description,
  );
}

export function oracleIsUdf(attributes: Attributes): boolean {
  return failedUdfRules(attributes).length === 0;
}

export function oracleSeeds(
  nodes: ReadonlyMap<NodeId, { attributes: Attributes }>,
): Set<NodeId> {
  const seeds = new Set<NodeId>();
  for (const [id, node] of nodes) {
    if (oracleIsUdf(node.attributes)) {
      seeds.add(id);
    }
  }
  return seeds;
}

/** Union of per-seed breadth-first searches over edges of `edgeType`. */
export function oracleClosure(
  edges: readonly EdgeRecord[],
  edgeType: string,
  seeds: Iterable<NodeId>,
): Set<NodeId> {
  const successors = new Map<NodeId, NodeId[]>();
  for (const edge of edges) {
    if (edge.edgeType !== edgeType) continue;
    const list = successors.get(edge.sourceId) ?? [];
    list.push(edge.targetId);
    successors.set(edge.sourceId, list);
  }

  const result = new Set<NodeId>();
  for (const seed of seeds) {
    const seen = new Set<NodeId>([seed]);
    const queue: NodeId[] = [seed];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of successors.get(current) ?? []) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }
    for (const id of seen) {
      result.add(id);
    }
  }
  return result;
}
