/**
 * Writes nodes and edges back out by copying their original text.
 *
 * Declarations are never rebuilt from parsed attributes. Each node's raw
 * text is written after a two-space indent, which only lands on its first
 * physical line; continuation lines inside multi-line values are copied
 * unchanged.
 *
 * @module slice/serializer
 */

import type { EdgeRecord, NodeId, NodeRecord } from "../dot/types.js";
import { compareIds } from "../dot/types.js";

export const DECLARATION_INDENT = "  ";

export interface SerializeInput {
  name: string;
  /** Comment lines for the header, without the `//` prefix. */
  comments?: readonly string[];
  nodes: ReadonlyMap<NodeId, Pick<NodeRecord, "rawText">>;
  edges: readonly Pick<EdgeRecord, "rawText">[];
}

export function serializeGraph(input: SerializeInput): string {
  const ids = Array.from(input.nodes.keys()).sort(compareIds);
  const out: string[] = [];

  out.push(`digraph ${input.name} {\n`);
  for (const comment of input.comments ?? []) {
    out.push(`${DECLARATION_INDENT}// ${comment}\n`);
  }
  out.push(
    `${DECLARATION_INDENT}// Nodes: ${ids.length}, Edges: ${input.edges.length}\n\n`,
  );

  out.push(`${DECLARATION_INDENT}// Node definitions\n`);
  for (const id of ids) {
    const node = input.nodes.get(id);
    if (node) {
      out.push(`${DECLARATION_INDENT}${node.rawText}\n`);
    }
  }

  out.push(`\n${DECLARATION_INDENT}// Edge definitions\n`);
  for (const edge of input.edges) {
    out.push(`${DECLARATION_INDENT}${edge.rawText}\n`);
  }

  out.push("}\n");
  return out.join("");
}

/** Graph names must stay a bare DOT identifier. */
export function toGraphIdentifier(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned || "graph";
}
