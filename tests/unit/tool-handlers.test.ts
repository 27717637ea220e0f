import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { MCPServer } from "../../src/server.js";
import { registerTools } from "../../src/mcp/tools/index.js";
import { handleExtract, handleFilter } from "../../src/mcp/tools/graph.js";
import { handleVerifyFilter } from "../../src/mcp/tools/verify.js";
import { ErrorCode, ValidationError } from "../../src/mcp/errors.js";
import { setLogSink } from "../../src/util/logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const samplePath = resolve(__dirname, "../fixtures/sample_cpg.dot");

const SMALL = [
  '"1" [label=METHOD NAME="f"];',
  '"2" [label=RETURN CODE="return"];',
  '"1" -> "2" [label=CFG];',
  '"1" -> "3" [label=CALL];',
  '"1" -> "2" [label=AST];',
  "",
].join("\n");

describe("MCP tool handlers", () => {
  let restoreLogs: () => void = () => {};

  before(() => {
    restoreLogs = setLogSink(() => {});
  });

  after(() => {
    restoreLogs();
  });

  it("extracts inline text and reports missing endpoints", async () => {
    const result = await handleExtract({
      graph: { text: SMALL },
      edgeTypes: ["CFG", "CALL"],
    });

    assert.deepStrictEqual(result.counts, { nodes: 2, edges: 2 });
    assert.deepStrictEqual(result.missingNodeIds, ["3"]);
    assert.deepStrictEqual(result.diagnostics, [
      "node 3 is referenced by an edge but never declared",
    ]);
  });

  it("rejects a graph given both as text and path", async () => {
    await assert.rejects(
      handleExtract({ graph: { text: SMALL, path: samplePath } }),
      (err: unknown) =>
        err instanceof ValidationError &&
        err.message === "Invalid arguments: graph: Provide exactly one of text or path",
    );
  });

  it("rejects a graph given neither as text nor path", async () => {
    await assert.rejects(handleFilter({ graph: {} }), ValidationError);
  });

  it("filters an extracted graph read from a path", async () => {
    const extracted = await handleExtract({ graph: { path: samplePath } });
    const filtered = await handleFilter({ graph: { text: extracted.text } });

    assert.deepStrictEqual(filtered.seeds, ["100", "200"]);
    assert.strictEqual(filtered.methodCount, 4);
    assert.deepStrictEqual(filtered.counts, { nodes: 7, edges: 6 });

    const report = await handleVerifyFilter({
      preFilter: { text: extracted.text },
      filtered: { text: filtered.text },
    });
    assert.strictEqual(report.overall_passed, true);
    assert.strictEqual(report.files.original_dot, "<inline>");
  });
});

describe("MCPServer", () => {
  const server = new MCPServer();
  registerTools(server);
  let restoreLogs: () => void = () => {};

  before(() => {
    restoreLogs = setLogSink(() => {});
  });

  after(() => {
    restoreLogs();
  });

  it("lists every registered tool with an object schema", () => {
    const tools = server.listTools();
    assert.deepStrictEqual(
      tools.map((tool) => tool.name),
      ["cpg.extract", "cpg.filter", "cpg.verify.extraction", "cpg.verify.filter", "cpg.run"],
    );
    for (const tool of tools) {
      assert.strictEqual(tool.inputSchema.type, "object");
    }
  });

  it("answers unknown tools with an error result", async () => {
    assert.deepStrictEqual(await server.callTool("cpg.nope", {}), {
      content: [{ type: "text", text: "Tool 'cpg.nope' not found" }],
      isError: true,
    });
  });

  it("serializes handler errors with their code", async () => {
    const result = await server.callTool("cpg.extract", { graph: {} });

    assert.strictEqual(result.isError, true);
    assert.deepStrictEqual(JSON.parse(result.content[0].text), {
      error: {
        message: "Invalid arguments: graph: Provide exactly one of text or path",
        code: ErrorCode.VALIDATION_ERROR,
      },
    });
  });

  it("returns handler results as JSON text", async () => {
    const result = await server.callTool("cpg.extract", {
      graph: { text: SMALL },
      edgeTypes: ["AST"],
    });

    assert.strictEqual(result.isError, undefined);
    const body = JSON.parse(result.content[0].text);
    assert.deepStrictEqual(body.counts, { nodes: 2, edges: 1 });
  });
});
