import { describe, it } from "node:test";
import assert from "node:assert";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { parseGraph } from "../../src/dot/graph.js";
import { edgeSignature } from "../../src/dot/types.js";
import {
  filterUserDefinedFunctions,
  findUserDefinedFunctions,
} from "../../src/slice/udfFilter.js";
import { filterGraphText } from "../../src/pipeline/stages.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string): string =>
  readFileSync(resolve(__dirname, "../fixtures", name), "utf-8");

describe("filterUserDefinedFunctions", () => {
  it("keeps a UDF, its CFG cycle and no CALL into an external method", () => {
    const { graph } = parseGraph(fixture("abc.dot"));
    const result = filterUserDefinedFunctions(graph);

    assert.deepStrictEqual([...result.seeds], ["A"]);
    assert.strictEqual(result.methodCount, 2);
    assert.deepStrictEqual([...result.keptNodeIds].sort(), ["A", "C"]);
    assert.deepStrictEqual(result.keptEdges.map(edgeSignature), ["A->C:CFG", "C->A:CFG"]);
    assert.deepStrictEqual(result.missingNodeIds, []);
  });

  it("slices the sample export down to main and helper", () => {
    const { graph } = parseGraph(fixture("sample_cpg.dot"));
    const result = filterUserDefinedFunctions(graph);

    assert.deepStrictEqual([...result.seeds].sort(), ["100", "200"]);
    assert.strictEqual(result.methodCount, 4);
    assert.deepStrictEqual([...result.nodes.keys()].sort(), [
      "100",
      "101",
      "102",
      "103",
      "104",
      "200",
      "201",
    ]);
    assert.deepStrictEqual(result.keptEdges.map(edgeSignature), [
      "100->101:CFG",
      "101->102:CFG",
      "102->103:CFG",
      "103->104:CFG",
      "102->200:CALL",
      "200->201:CFG",
    ]);
  });

  it("reports kept ids with no declaration", () => {
    const { graph } = parseGraph(
      '"m" [label=METHOD NAME="f" FILENAME="f.c"];\n"m" -> "ghost" [label=CFG];\n',
    );
    const result = filterUserDefinedFunctions(graph);

    assert.deepStrictEqual(result.missingNodeIds, ["ghost"]);
    assert.deepStrictEqual([...result.nodes.keys()], ["m"]);
    assert.strictEqual(result.keptEdges.length, 1);
  });
});

describe("findUserDefinedFunctions", () => {
  it("counts METHOD nodes separately from seeds", () => {
    const { graph } = parseGraph(fixture("sample_cpg.dot"));
    const { seeds, methodCount } = findUserDefinedFunctions(graph);

    assert.strictEqual(seeds.size, 2);
    assert.strictEqual(methodCount, 4);
  });
});

describe("filterGraphText", () => {
  it("writes the filtered graph from raw text", () => {
    const { text } = filterGraphText(fixture("abc.dot"));

    assert.strictEqual(
      text,
      [
        "digraph udf_abc {",
        "  // UDF-filtered subgraph",
        "  // Only user-defined functions and their bodies",
        "  // Nodes: 2, Edges: 2",
        "",
        "  // Node definitions",
        '  "A" [label=METHOD NAME="foo" FULL_NAME="foo" FILENAME="foo.c" IS_EXTERNAL="false" AST_PARENT_FULL_NAME="foo.c:<global>"];',
        String.raw`  "C" [label=BLOCK CODE="{ printf(\"hi\"); }"];`,
        "",
        "  // Edge definitions",
        '  "A" -> "C" [label=CFG];',
        '  "C" -> "A" [label=CFG];',
        "}",
        "",
      ].join("\n"),
    );
  });
});
