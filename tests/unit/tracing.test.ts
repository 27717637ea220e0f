import { describe, it, afterEach, mock } from "node:test";
import assert from "node:assert";
import { SpanStatusCode } from "@opentelemetry/api";
import {
  SPAN_NAMES,
  getMemoryExporter,
  initTracing,
  isTracingEnabled,
  resetTracingForTest,
  withSpanSync,
} from "../../src/util/tracing.js";
import { extractGraphText } from "../../src/pipeline/stages.js";

const GRAPH = '"1" [label=METHOD];\n"2" [label=RETURN];\n"1" -> "2" [label=CFG];\n';

describe("tracing", () => {
  afterEach(async () => {
    await resetTracingForTest();
  });

  it("stays disabled unless configured", () => {
    initTracing({ enabled: false, exporterType: "memory" });
    assert.strictEqual(isTracingEnabled(), false);
    assert.strictEqual(getMemoryExporter(), null);
  });

  it("records stage spans with flattened counts", () => {
    initTracing({ enabled: true, exporterType: "memory" });
    assert.strictEqual(isTracingEnabled(), true);

    extractGraphText(GRAPH, ["CFG"]);

    const spans = getMemoryExporter()?.getFinishedSpans() ?? [];
    assert.deepStrictEqual(
      spans.map((span) => span.name),
      [SPAN_NAMES.PARSE, SPAN_NAMES.EXTRACT],
    );
    const extract = spans[1];
    assert.strictEqual(extract?.attributes["counts.nodes"], 2);
    assert.strictEqual(extract?.attributes["counts.edges"], 1);
    assert.strictEqual(extract?.attributes["edgeTypes"], "CFG");
  });

  it("prints console spans to stderr and leaves stdout to the graph text", () => {
    initTracing({ enabled: true, exporterType: "console" });

    const stdout = mock.method(process.stdout, "write", (_chunk: unknown) => true);
    const stderr = mock.method(process.stderr, "write", (_chunk: unknown) => true);
    let output = "";
    try {
      output = extractGraphText(GRAPH, ["CFG"]).text;
    } finally {
      stdout.mock.restore();
      stderr.mock.restore();
    }

    assert.ok(output.startsWith("digraph subgraph_CFG {\n"));
    assert.strictEqual(stdout.mock.callCount(), 0);
    const names = stderr.mock.calls.map(
      (call) => JSON.parse(String(call.arguments[0])).name,
    );
    assert.deepStrictEqual(names, [SPAN_NAMES.PARSE, SPAN_NAMES.EXTRACT]);
  });

  it("marks failed spans with the error", () => {
    initTracing({ enabled: true, exporterType: "memory" });
    assert.throws(
      () =>
        withSpanSync(SPAN_NAMES.PIPELINE, () => {
          throw new Error("stage failed");
        }),
      /stage failed/,
    );

    const [span] = getMemoryExporter()?.getFinishedSpans() ?? [];
    assert.strictEqual(span?.name, SPAN_NAMES.PIPELINE);
    assert.deepStrictEqual(span?.status, {
      code: SpanStatusCode.ERROR,
      message: "stage failed",
    });
  });

  it("forgets the provider after a reset", async () => {
    initTracing({ enabled: true, exporterType: "memory" });
    await resetTracingForTest();
    assert.strictEqual(isTracingEnabled(), false);
    assert.strictEqual(getMemoryExporter(), null);
  });
});
