/**
 * Shared data model for graphs read from the DOT-like export format.
 *
 * Records are created once by the parser and never mutated afterward; every
 * stage that needs different contents builds new values instead.
 *
 * @module dot/types
 */

export type NodeId = string;

export type DeclarationKind = "node" | "edge";

export interface NodeRecord {
  readonly id: NodeId;
  readonly attributes: ReadonlyMap<string, string>;
  /** Exact source span, from the opening quote of the id through the `;`. */
  readonly rawText: string;
  /** 1-based line the declaration starts on. */
  readonly line: number;
}

export interface EdgeRecord {
  readonly sourceId: NodeId;
  readonly targetId: NodeId;
  /** Value of the edge's `label` attribute, or "" when it has none. */
  readonly edgeType: string;
  readonly attributes: ReadonlyMap<string, string>;
  readonly rawText: string;
  readonly line: number;
}

export interface Graph {
  /** Name from the `digraph NAME {` header, when one was found. */
  readonly name: string | null;
  readonly nodes: ReadonlyMap<NodeId, NodeRecord>;
  readonly edges: readonly EdgeRecord[];
}

export type GraphDiagnostic =
  | { kind: "malformed_declaration"; line: number; message: string }
  | { kind: "dangling_reference"; nodeId: NodeId };

export interface ParsedGraph {
  readonly graph: Graph;
  readonly diagnostics: readonly GraphDiagnostic[];
}

export function edgeSignature(edge: EdgeRecord): string {
  return `${edge.sourceId}->${edge.targetId}:${edge.edgeType}`;
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function diagnosticToMessage(diagnostic: GraphDiagnostic): string {
  switch (diagnostic.kind) {
    case "malformed_declaration":
      return `line ${diagnostic.line}: ${diagnostic.message}`;
    case "dangling_reference":
      return `node ${diagnostic.nodeId} is referenced by an edge but never declared`;
  }
}
