import { describe, it } from "node:test";
import assert from "node:assert";
import {
  scanAttributeBlock,
  scanDeclarations,
} from "../../src/dot/scanner.js";

describe("scanDeclarations", () => {
  it("reads the graph name and a single-line node", () => {
    const result = scanDeclarations(
      'digraph g {\n  "1" [label=METHOD NAME="main"];\n}\n',
    );

    assert.strictEqual(result.graphName, "g");
    assert.deepStrictEqual(result.diagnostics, []);
    assert.strictEqual(result.declarations.length, 1);
    const [decl] = result.declarations;
    assert.strictEqual(decl.kind, "node");
    assert.strictEqual(decl.sourceId, "1");
    assert.strictEqual(decl.targetId, null);
    assert.strictEqual(decl.line, 2);
    assert.strictEqual(decl.attributeText, 'label=METHOD NAME="main"');
    assert.strictEqual(decl.rawText, '"1" [label=METHOD NAME="main"];');
  });

  it("reads a quoted graph name", () => {
    const result = scanDeclarations('digraph "main.c" {\n}\n');
    assert.strictEqual(result.graphName, "main.c");
  });

  it("reads edges with source and target ids", () => {
    const result = scanDeclarations('  "1" -> "2" [label=CFG];\n');
    const [decl] = result.declarations;

    assert.strictEqual(decl.kind, "edge");
    assert.strictEqual(decl.sourceId, "1");
    assert.strictEqual(decl.targetId, "2");
    assert.strictEqual(decl.rawText, '"1" -> "2" [label=CFG];');
  });

  it("keeps a node whose quoted value spans lines and resumes after it", () => {
    const text = 'digraph g {\n"1" [CODE="a\nb"];\n"2" [label=X];\n}';
    const result = scanDeclarations(text);

    assert.strictEqual(result.declarations.length, 2);
    assert.strictEqual(result.declarations[0].rawText, '"1" [CODE="a\nb"];');
    assert.strictEqual(result.declarations[1].sourceId, "2");
    assert.strictEqual(result.declarations[1].line, 4);
  });

  it("ignores ]; inside a quoted value", () => {
    const result = scanDeclarations('"1" [CODE="x[0];" label=Y];');
    assert.strictEqual(result.declarations[0].attributeText, 'CODE="x[0];" label=Y');
  });

  it("treats backslash-quote as part of the string", () => {
    const result = scanDeclarations(String.raw`"1" [CODE="say \"hi\"];" label=Y];`);
    assert.strictEqual(
      result.declarations[0].attributeText,
      String.raw`CODE="say \"hi\"];" label=Y`,
    );
  });

  it("closes a string after an even run of backslashes", () => {
    const result = scanDeclarations(String.raw`"1" [CODE="a\\" label=Y];`);
    assert.strictEqual(result.declarations[0].attributeText, String.raw`CODE="a\\" label=Y`);
  });

  it("accepts whitespace and newlines between ] and ;", () => {
    const result = scanDeclarations('"1" [label=X]\n;\n"2" [label=Y];');

    assert.strictEqual(result.declarations[0].rawText, '"1" [label=X]\n;');
    assert.strictEqual(result.declarations[0].attributeText, "label=X");
    assert.strictEqual(result.declarations[1].line, 3);
  });

  it("reports an unterminated quoted value and resumes on the next line", () => {
    const result = scanDeclarations('"1" [CODE="abc];\n"2" [label=X];\n');

    assert.deepStrictEqual(result.diagnostics, [
      { line: 1, message: 'node "1" has an unterminated quoted value' },
    ]);
    assert.strictEqual(result.declarations.length, 1);
    assert.strictEqual(result.declarations[0].sourceId, "2");
  });

  it("requires an edge to end on its own line", () => {
    const result = scanDeclarations('"1" -> "2" [label=CFG\n"3" [label=X];\n');

    assert.deepStrictEqual(result.diagnostics, [
      { line: 1, message: 'edge from "1" is not terminated by "];" on its line' },
    ]);
    assert.strictEqual(result.declarations[0].sourceId, "3");
  });

  it("reports a declaration without an attribute block", () => {
    const result = scanDeclarations('"1" label=X;\n');
    assert.deepStrictEqual(result.diagnostics, [
      { line: 1, message: 'expected "[" after "1"' },
    ]);
  });

  it("rejects an empty id", () => {
    const result = scanDeclarations('"" [label=X];\n');
    assert.deepStrictEqual(result.diagnostics, [{ line: 1, message: "empty node id" }]);
    assert.strictEqual(result.declarations.length, 0);
  });

  it("skips comments and braces", () => {
    const result = scanDeclarations('digraph g {\n  // Nodes: 0, Edges: 0\n}\n');
    assert.strictEqual(result.declarations.length, 0);
    assert.strictEqual(result.diagnostics.length, 0);
  });
});

describe("scanAttributeBlock", () => {
  it("finds the terminating bracket outside quotes", () => {
    const result = scanAttributeBlock('a="]" ];', 0);
    assert.deepStrictEqual(result, {
      ok: true,
      closeBracket: 6,
      semicolon: 7,
      newlines: 0,
    });
  });

  it("stops at the limit", () => {
    const result = scanAttributeBlock("a=b\n];", 0, 3);
    assert.deepStrictEqual(result, { ok: false, state: "inNodeBlock" });
  });

  it("reports the escape state when input ends after a backslash", () => {
    const result = scanAttributeBlock('a="x\\', 0);
    assert.deepStrictEqual(result, { ok: false, state: "inQuotedStringEscape" });
  });
});
