import { describe, it } from "node:test";
import assert from "node:assert";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { countDiagnostics, parseGraph } from "../../src/dot/graph.js";
import { UDF_ATTRIBUTE_KEYS } from "../../src/dot/attributes.js";
import { diagnosticToMessage, edgeSignature } from "../../src/dot/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string): string =>
  readFileSync(resolve(__dirname, "../fixtures", name), "utf-8");

describe("parseGraph", () => {
  it("builds the node table and edge list of the sample export", () => {
    const { graph, diagnostics } = parseGraph(fixture("sample_cpg.dot"));

    assert.strictEqual(graph.name, "main.c");
    assert.strictEqual(graph.nodes.size, 11);
    assert.strictEqual(graph.edges.length, 11);
    assert.deepStrictEqual(diagnostics, []);

    assert.strictEqual(graph.nodes.get("101")?.attributes.get("CODE"), "{\n  return helper(1);\n}");
    assert.strictEqual(graph.nodes.get("103")?.attributes.get("CODE"), 'return "a[0];";');
    assert.strictEqual(
      graph.nodes.get("103")?.rawText,
      String.raw`"103" [label=RETURN CODE="return \"a[0];\";"];`,
    );
    assert.deepStrictEqual(graph.edges.slice(0, 3).map(edgeSignature), [
      "100->101:AST",
      "100->105:AST",
      "100->101:CFG",
    ]);
  });

  it("keeps the later declaration of a duplicate id", () => {
    const { graph, diagnostics } = parseGraph('"1" [label=A];\n"1" [label=B];\n');

    assert.strictEqual(graph.nodes.size, 1);
    assert.strictEqual(graph.nodes.get("1")?.attributes.get("label"), "B");
    assert.deepStrictEqual(diagnostics, []);
  });

  it("reports each dangling endpoint once, in edge order", () => {
    const { graph, diagnostics } = parseGraph(
      '"1" [label=A];\n"1" -> "2" [label=CFG];\n"3" -> "2" [label=CFG];\n',
    );

    assert.strictEqual(graph.edges.length, 2);
    assert.deepStrictEqual(diagnostics, [
      { kind: "dangling_reference", nodeId: "2" },
      { kind: "dangling_reference", nodeId: "3" },
    ]);
  });

  it("collects malformed declarations without stopping", () => {
    const { graph, diagnostics } = parseGraph(fixture("malformed.dot"));

    assert.deepStrictEqual([...graph.nodes.keys()], ["1", "3"]);
    assert.deepStrictEqual(diagnostics.map(diagnosticToMessage), [
      'line 3: expected "[" after "2"',
      'line 4: skipped attribute fragment "stray"',
      "node 9 is referenced by an edge but never declared",
    ]);
    assert.deepStrictEqual(countDiagnostics(diagnostics), { malformed: 2, dangling: 1 });
  });

  it("decodes only the requested keys but always keeps edge labels", () => {
    const { graph } = parseGraph(
      '"1" [label=METHOD CODE="x" NAME=f];\n"1" -> "1" [label=CFG weight=3];\n',
      { attributeKeys: UDF_ATTRIBUTE_KEYS },
    );

    assert.deepStrictEqual([...(graph.nodes.get("1")?.attributes.keys() ?? [])], ["label", "NAME"]);
    assert.strictEqual(graph.edges[0].edgeType, "CFG");
    assert.strictEqual(graph.edges[0].attributes.has("weight"), false);
  });

  it("gives edges without a label an empty type", () => {
    const { graph } = parseGraph('"1" -> "2" [weight=1];\n');
    assert.strictEqual(graph.edges[0].edgeType, "");
  });
});
