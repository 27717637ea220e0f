import { describe, it } from "node:test";
import assert from "node:assert";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { parseGraph } from "../../src/dot/graph.js";
import { serializeGraph } from "../../src/slice/serializer.js";
import { filterGraphText } from "../../src/pipeline/stages.js";
import { verifyUdfFilter, firstDifference } from "../../src/verify/udfFilter.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pre = readFileSync(resolve(__dirname, "../fixtures/abc.dot"), "utf-8");
const preGraph = parseGraph(pre).graph;

function output(nodeIds: string[], edgeSignatures: string[]): string {
  const nodes = new Map(
    nodeIds.flatMap((id) => {
      const node = preGraph.nodes.get(id);
      return node ? [[id, node] as const] : [];
    }),
  );
  const edges = preGraph.edges.filter((edge) =>
    edgeSignatures.includes(`${edge.sourceId}->${edge.targetId}`),
  );
  return serializeGraph({ name: "udf_abc", nodes, edges });
}

function issues(filtered: string, maxIssuesPerCategory?: number): Record<string, readonly string[]> {
  const { report } = verifyUdfFilter(pre, filtered, { maxIssuesPerCategory });
  return Object.fromEntries(
    Object.entries(report.categories).map(([name, result]) => [name, result.issues]),
  );
}

describe("verifyUdfFilter", () => {
  it("passes the filter's own output with CFG cycle and no CALL edge", () => {
    const filtered = filterGraphText(pre).text;
    const outcome = verifyUdfFilter(pre, filtered);

    assert.strictEqual(outcome.report.overallPassed, true);
    assert.strictEqual(outcome.report.categories.edge_filtering.passed, true);
    assert.deepStrictEqual(Object.keys(outcome.report.categories), [
      "udf_identification",
      "cfg_reachability",
      "edge_filtering",
      "node_integrity",
    ]);
    assert.deepStrictEqual(outcome.counts.filtered, { nodes: 2, edges: 2 });
  });

  it("detects a single changed character in exactly one node", () => {
    const filtered = filterGraphText(pre).text.replace('printf(\\"hi\\")', 'printf(\\"ho\\")');

    assert.deepStrictEqual(issues(filtered), {
      udf_identification: [],
      cfg_reachability: [],
      edge_filtering: [],
      node_integrity: [
        `Node C: raw text differs at offset 35 (expected ${JSON.stringify('K CODE="{ printf(\\"hi\\"); }"];')}, found ${JSON.stringify('K CODE="{ printf(\\"ho\\"); }"];')})`,
      ],
    });
  });

  it("flags a leaked external method and the CALL edge into it", () => {
    const filtered = output(["A", "B", "C"], ["A->C", "C->A", "A->B"]);

    assert.deepStrictEqual(issues(filtered), {
      udf_identification: [
        "Non-UDF method B (printf) present: IS_EXTERNAL is not true; FILENAME is a real source file",
      ],
      cfg_reachability: ["Unreachable node B present"],
      edge_filtering: ["CALL edge A->B:CALL targets a non-UDF node"],
      node_integrity: [],
    });
  });

  it("requires every retained edge to be present", () => {
    const filtered = output(["A", "C"], ["A->C"]);

    assert.deepStrictEqual(issues(filtered), {
      udf_identification: [],
      cfg_reachability: [],
      edge_filtering: ["Missing retained edge C->A:CFG"],
      node_integrity: [],
    });
  });

  it("reports a missing seed in every category it affects", () => {
    const filtered = output(["C"], []);

    assert.deepStrictEqual(issues(filtered), {
      udf_identification: ["Missing UDF method A (foo)"],
      cfg_reachability: ["Reachable node A missing"],
      edge_filtering: ["Missing retained edge A->C:CFG", "Missing retained edge C->A:CFG"],
      node_integrity: [],
    });
  });

  it("caps issues per category", () => {
    assert.deepStrictEqual(issues(output(["C"], []), 1).edge_filtering, [
      "Missing retained edge A->C:CFG",
      "... and 1 more",
    ]);
  });

  it("accepts edges to nodes the pre-filter graph never declared", () => {
    const preWithGhost = '"m" [label=METHOD NAME="f" FILENAME="f.c"];\n"m" -> "ghost" [label=CFG];\n';
    const filtered = filterGraphText(preWithGhost).text;
    const { report } = verifyUdfFilter(preWithGhost, filtered);

    assert.strictEqual(report.overallPassed, true);
  });

  it("rejects edges whose undeclared endpoints the closure never reaches", () => {
    const filtered = output(["A", "C"], ["A->C", "C->A"]).replace(
      /}\n$/,
      '  "X" -> "Y" [label=CFG];\n  "X" -> "A" [label=CALL];\n}\n',
    );

    assert.deepStrictEqual(issues(filtered), {
      udf_identification: [],
      cfg_reachability: [],
      edge_filtering: [
        "CFG edge X->Y:CFG has an endpoint outside the output",
        "CALL edge X->A:CALL has a source outside the output",
      ],
      node_integrity: [],
    });
  });

  it("flags a node that is not in the pre-filter graph", () => {
    const filtered = output(["A", "C"], ["A->C", "C->A"]).replace(
      "  // Edge definitions\n",
      '  "Z" [label=BLOCK];\n  // Edge definitions\n',
    );

    assert.deepStrictEqual(issues(filtered).node_integrity, ["Node Z not found in pre-filter graph"]);
  });

  it("uses configured edge type names", () => {
    const renamed = pre.replace(/label=CFG/g, "label=FLOW").replace(/label=CALL/g, "label=INVOKE");
    const filtered = filterGraphText(renamed, { cfg: "FLOW", call: "INVOKE" }).text;
    const { report } = verifyUdfFilter(renamed, filtered, {
      cfgEdgeType: "FLOW",
      callEdgeType: "INVOKE",
    });

    assert.strictEqual(report.overallPassed, true);
    assert.strictEqual(parseGraph(filtered).graph.edges.length, 2);
  });
});

describe("firstDifference", () => {
  it("returns -1 for equal strings", () => {
    assert.strictEqual(firstDifference("abc", "abc"), -1);
  });

  it("returns the first differing index or the shorter length", () => {
    assert.strictEqual(firstDifference("abc", "abd"), 2);
    assert.strictEqual(firstDifference("abc", "ab"), 2);
  });
});
