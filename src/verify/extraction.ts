/**
 * Checks a produced subgraph against the graph it was extracted from.
 *
 * @module verify/extraction
 */

import { parseGraph } from "../dot/graph.js";
import { compareIds, edgeSignature, type EdgeRecord, type NodeId } from "../dot/types.js";
import { SPAN_NAMES, withSpanSync } from "../util/tracing.js";
import {
  VerificationReportBuilder,
  type CategoryRecorder,
  type VerificationOutcome,
} from "./report.js";

export interface VerifyExtractionOptions {
  maxIssuesPerCategory?: number;
}

function countByType(edges: readonly EdgeRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const edge of edges) {
    counts.set(edge.edgeType, (counts.get(edge.edgeType) ?? 0) + 1);
  }
  return counts;
}

function reportSetDifference(
  recorder: CategoryRecorder,
  expected: ReadonlySet<string>,
  actual: ReadonlySet<string>,
  noun: string,
): void {
  const missing = [...expected].filter((x) => !actual.has(x)).sort(compareIds);
  const extra = [...actual].filter((x) => !expected.has(x)).sort(compareIds);
  for (const id of missing) recorder.fail(`Missing ${noun} ${id}`);
  for (const id of extra) recorder.fail(`Extra ${noun} ${id}`);
}

export function verifyExtraction(
  originalText: string,
  subgraphText: string,
  edgeTypes: readonly string[],
  options: VerifyExtractionOptions = {},
): VerificationOutcome {
  return withSpanSync(SPAN_NAMES.VERIFY_EXTRACTION, () => {
    const original = parseGraph(originalText).graph;
    const subgraph = parseGraph(subgraphText).graph;
    const wanted = new Set(edgeTypes);
    const builder = new VerificationReportBuilder(options.maxIssuesPerCategory);

    const expectedEdges = original.edges.filter((e) => wanted.has(e.edgeType));

    builder.run("edges", (recorder) => {
      const expectedCounts = countByType(expectedEdges);
      const actualCounts = countByType(subgraph.edges);

      for (const type of wanted) {
        const expected = expectedCounts.get(type) ?? 0;
        const actual = actualCounts.get(type) ?? 0;
        if (expected !== actual) {
          recorder.fail(
            `${type}: count mismatch (${expected} expected, ${actual} extracted)`,
          );
        }
      }

      const unwanted = [...actualCounts.keys()]
        .filter((type) => !wanted.has(type))
        .sort(compareIds);
      for (const type of unwanted) {
        recorder.fail(`Unwanted edge type ${type} (${actualCounts.get(type) ?? 0} edges)`);
      }

      reportSetDifference(
        recorder,
        new Set(expectedEdges.map(edgeSignature)),
        new Set(subgraph.edges.map(edgeSignature)),
        "edge",
      );
    });

    builder.run("nodes", (recorder) => {
      const expected = new Set<NodeId>();
      for (const edge of expectedEdges) {
        for (const id of [edge.sourceId, edge.targetId]) {
          if (original.nodes.has(id)) expected.add(id);
        }
      }
      reportSetDifference(recorder, expected, new Set(subgraph.nodes.keys()), "node");
    });

    builder.run("attributes", (recorder) => {
      const common = [...subgraph.nodes.keys()]
        .filter((id) => original.nodes.has(id))
        .sort(compareIds);

      for (const id of common) {
        const before = original.nodes.get(id)?.attributes ?? new Map<string, string>();
        const after = subgraph.nodes.get(id)?.attributes ?? new Map<string, string>();
        const keys = new Set([...before.keys(), ...after.keys()]);

        for (const key of [...keys].sort(compareIds)) {
          const expected = before.get(key);
          const actual = after.get(key);
          if (actual === undefined) {
            recorder.fail(`Node ${id}: attribute ${key} missing`);
          } else if (expected === undefined) {
            recorder.fail(`Node ${id}: unexpected attribute ${key}`);
          } else if (expected !== actual) {
            recorder.fail(`Node ${id}: attribute ${key} differs`);
          }
        }
      }
    });

    return {
      report: builder.build(),
      counts: {
        original: { nodes: original.nodes.size, edges: original.edges.length },
        filtered: { nodes: subgraph.nodes.size, edges: subgraph.edges.length },
      },
    };
  });
}
