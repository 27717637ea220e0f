import { decodeAttributes, type DecodeOptions } from "./attributes.js";
import { scanDeclarations } from "./scanner.js";
import type {
  EdgeRecord,
  GraphDiagnostic,
  NodeId,
  NodeRecord,
  ParsedGraph,
} from "./types.js";

export interface ParseOptions {
  /** Restricts decoded attributes; edges always keep `label`. */
  attributeKeys?: ReadonlySet<string>;
}

/**
 * Parses one graph's text into its node table and ordered edge list.
 *
 * A node id declared twice keeps the later declaration. Edges whose
 * endpoints are never declared are kept and reported as dangling.
 */
export function parseGraph(text: string, options: ParseOptions = {}): ParsedGraph {
  const scan = scanDeclarations(text);
  const diagnostics: GraphDiagnostic[] = scan.diagnostics.map((d) => ({
    kind: "malformed_declaration",
    line: d.line,
    message: d.message,
  }));

  const nodeDecode: DecodeOptions = { only: options.attributeKeys };
  const edgeDecode: DecodeOptions = options.attributeKeys
    ? { only: new Set([...options.attributeKeys, "label"]) }
    : {};

  const nodes = new Map<NodeId, NodeRecord>();
  const edges: EdgeRecord[] = [];

  for (const decl of scan.declarations) {
    const decoded = decodeAttributes(
      decl.attributeText,
      decl.kind === "edge" ? edgeDecode : nodeDecode,
    );
    for (const fragment of decoded.skipped) {
      diagnostics.push({
        kind: "malformed_declaration",
        line: decl.line,
        message: `skipped attribute fragment ${JSON.stringify(fragment)}`,
      });
    }

    if (decl.kind === "edge" && decl.targetId !== null) {
      edges.push({
        sourceId: decl.sourceId,
        targetId: decl.targetId,
        edgeType: decoded.attributes.get("label") ?? "",
        attributes: decoded.attributes,
        rawText: decl.rawText,
        line: decl.line,
      });
    } else {
      nodes.set(decl.sourceId, {
        id: decl.sourceId,
        attributes: decoded.attributes,
        rawText: decl.rawText,
        line: decl.line,
      });
    }
  }

  const dangling = new Set<NodeId>();
  for (const edge of edges) {
    for (const id of [edge.sourceId, edge.targetId]) {
      if (!nodes.has(id) && !dangling.has(id)) {
        dangling.add(id);
        diagnostics.push({ kind: "dangling_reference", nodeId: id });
      }
    }
  }

  return {
    graph: { name: scan.graphName, nodes, edges },
    diagnostics,
  };
}

export function countDiagnostics(
  diagnostics: readonly GraphDiagnostic[],
): { malformed: number; dangling: number } {
  let malformed = 0;
  let dangling = 0;
  for (const d of diagnostics) {
    if (d.kind === "malformed_declaration") malformed++;
    else dangling++;
  }
  return { malformed, dangling };
}
