/**
 * Checks a UDF-filtered graph against the graph it was filtered from.
 *
 * Seeds and reachability come from {@link ./oracle}, never from the slicer
 * being checked.
 *
 * @module verify/udfFilter
 */

import { parseGraph } from "../dot/graph.js";
import {
  compareIds,
  edgeSignature,
  type EdgeRecord,
  type NodeId,
} from "../dot/types.js";
import {
  DEFAULT_CALL_EDGE_TYPE,
  DEFAULT_CFG_EDGE_TYPE,
  INTEGRITY_DIFF_CONTEXT_CHARS,
} from "../config/constants.js";
import { SPAN_NAMES, withSpanSync } from "../util/tracing.js";
import { failedUdfRules, oracleClosure, oracleSeeds } from "./oracle.js";
import { VerificationReportBuilder, type VerificationOutcome } from "./report.js";

export interface VerifyUdfFilterOptions {
  cfgEdgeType?: string;
  callEdgeType?: string;
  maxIssuesPerCategory?: number;
}

export function firstDifference(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return i;
  }
  return a.length === b.length ? -1 : length;
}

function excerpt(text: string, offset: number): string {
  return JSON.stringify(
    text.slice(
      Math.max(0, offset - INTEGRITY_DIFF_CONTEXT_CHARS),
      offset + INTEGRITY_DIFF_CONTEXT_CHARS,
    ),
  );
}

function nameOf(attributes: ReadonlyMap<string, string>): string {
  return attributes.get("NAME") ?? "";
}

export function verifyUdfFilter(
  preFilterText: string,
  filteredText: string,
  options: VerifyUdfFilterOptions = {},
): VerificationOutcome {
  const cfgType = options.cfgEdgeType ?? DEFAULT_CFG_EDGE_TYPE;
  const callType = options.callEdgeType ?? DEFAULT_CALL_EDGE_TYPE;

  return withSpanSync(SPAN_NAMES.VERIFY_UDF_FILTER, () => {
    const pre = parseGraph(preFilterText).graph;
    const output = parseGraph(filteredText).graph;
    const builder = new VerificationReportBuilder(options.maxIssuesPerCategory);

    const seeds = oracleSeeds(pre.nodes);
    const closure = oracleClosure(pre.edges, cfgType, seeds);
    const outputIds = new Set(output.nodes.keys());
    // An undeclared id cannot be emitted as a node, so it counts as present
    // when the closure reaches it.
    const present = (id: NodeId): boolean =>
      outputIds.has(id) || (!pre.nodes.has(id) && closure.has(id));

    const isRequired = (edge: EdgeRecord): boolean => {
      if (edge.edgeType === cfgType) {
        return closure.has(edge.sourceId) && closure.has(edge.targetId);
      }
      if (edge.edgeType === callType) {
        return closure.has(edge.sourceId) && seeds.has(edge.targetId);
      }
      return false;
    };

    builder.run("udf_identification", (recorder) => {
      for (const id of [...seeds].sort(compareIds)) {
        const node = output.nodes.get(id);
        if (!node || failedUdfRules(node.attributes).length > 0) {
          const attributes = pre.nodes.get(id)?.attributes ?? new Map<string, string>();
          recorder.fail(`Missing UDF method ${id} (${nameOf(attributes)})`);
        }
      }

      for (const id of [...outputIds].sort(compareIds)) {
        const node = output.nodes.get(id);
        if (!node || node.attributes.get("label") !== "METHOD" || seeds.has(id)) {
          continue;
        }
        const failed = failedUdfRules(node.attributes);
        const reason =
          failed.length > 0 ? failed.join("; ") : "not a UDF in the pre-filter graph";
        recorder.fail(`Non-UDF method ${id} (${nameOf(node.attributes)}) present: ${reason}`);
      }
    });

    builder.run("cfg_reachability", (recorder) => {
      const expected = [...closure].filter((id) => pre.nodes.has(id));
      const expectedSet = new Set(expected);
      for (const id of expected.sort(compareIds)) {
        if (!outputIds.has(id)) recorder.fail(`Reachable node ${id} missing`);
      }
      for (const id of [...outputIds].sort(compareIds)) {
        if (!expectedSet.has(id)) recorder.fail(`Unreachable node ${id} present`);
      }
    });

    builder.run("edge_filtering", (recorder) => {
      for (const edge of output.edges) {
        const signature = edgeSignature(edge);
        if (edge.edgeType === cfgType) {
          if (!present(edge.sourceId) || !present(edge.targetId)) {
            recorder.fail(`${cfgType} edge ${signature} has an endpoint outside the output`);
          }
        } else if (edge.edgeType === callType) {
          if (!present(edge.sourceId)) {
            recorder.fail(`${callType} edge ${signature} has a source outside the output`);
          }
          if (!seeds.has(edge.targetId)) {
            recorder.fail(`${callType} edge ${signature} targets a non-UDF node`);
          }
        } else {
          recorder.fail(`Unexpected edge ${signature}`);
        }
      }

      const required = pre.edges.filter(isRequired);
      const produced = new Map<string, number>();
      for (const edge of output.edges) {
        const signature = edgeSignature(edge);
        produced.set(signature, (produced.get(signature) ?? 0) + 1);
      }
      for (const edge of required) {
        const signature = edgeSignature(edge);
        const remaining = produced.get(signature) ?? 0;
        if (remaining === 0) {
          recorder.fail(`Missing retained edge ${signature}`);
        } else {
          produced.set(signature, remaining - 1);
        }
      }
    });

    builder.run("node_integrity", (recorder) => {
      for (const id of [...outputIds].sort(compareIds)) {
        const actual = output.nodes.get(id)?.rawText ?? "";
        const source = pre.nodes.get(id);
        if (!source) {
          recorder.fail(`Node ${id} not found in pre-filter graph`);
          continue;
        }
        const offset = firstDifference(source.rawText, actual);
        if (offset >= 0) {
          recorder.fail(
            `Node ${id}: raw text differs at offset ${offset} ` +
              `(expected ${excerpt(source.rawText, offset)}, found ${excerpt(actual, offset)})`,
          );
        }
      }
    });

    return {
      report: builder.build(),
      counts: {
        original: { nodes: pre.nodes.size, edges: pre.edges.length },
        filtered: { nodes: output.nodes.size, edges: output.edges.length },
      },
    };
  });
}
