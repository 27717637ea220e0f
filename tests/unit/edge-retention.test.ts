import { describe, it } from "node:test";
import assert from "node:assert";
import type { EdgeRecord } from "../../src/dot/types.js";
import { isEdgeRetained, retainEdges } from "../../src/slice/retention.js";

function edge(sourceId: string, targetId: string, edgeType: string): EdgeRecord {
  return {
    sourceId,
    targetId,
    edgeType,
    attributes: new Map([["label", edgeType]]),
    rawText: `"${sourceId}" -> "${targetId}" [label=${edgeType}];`,
    line: 1,
  };
}

describe("isEdgeRetained", () => {
  const kept = new Set(["f", "f_body", "g", "g_body"]);
  const seeds = new Set(["f", "g"]);

  it("keeps CFG edges with both endpoints kept", () => {
    assert.strictEqual(isEdgeRetained(edge("f", "f_body", "CFG"), kept, seeds), true);
    assert.strictEqual(isEdgeRetained(edge("f_body", "other", "CFG"), kept, seeds), false);
    assert.strictEqual(isEdgeRetained(edge("other", "f", "CFG"), kept, seeds), false);
  });

  it("keeps CALL edges from a kept source into a seed", () => {
    assert.strictEqual(isEdgeRetained(edge("f_body", "g", "CALL"), kept, seeds), true);
  });

  it("drops CALL edges whose target is kept but not a seed", () => {
    assert.strictEqual(isEdgeRetained(edge("f_body", "g_body", "CALL"), kept, seeds), false);
  });

  it("drops CALL edges whose source is not kept", () => {
    assert.strictEqual(isEdgeRetained(edge("outside", "g", "CALL"), kept, seeds), false);
  });

  it("drops every other edge type", () => {
    assert.strictEqual(isEdgeRetained(edge("f", "f_body", "AST"), kept, seeds), false);
    assert.strictEqual(isEdgeRetained(edge("f", "f_body", ""), kept, seeds), false);
  });

  it("uses configured type names", () => {
    const types = { cfg: "FLOWS_TO", call: "INVOKES" };
    assert.strictEqual(isEdgeRetained(edge("f", "f_body", "FLOWS_TO"), kept, seeds, types), true);
    assert.strictEqual(isEdgeRetained(edge("f_body", "g", "INVOKES"), kept, seeds, types), true);
    assert.strictEqual(isEdgeRetained(edge("f", "f_body", "CFG"), kept, seeds, types), false);
  });
});

describe("retainEdges", () => {
  it("preserves relative order", () => {
    const edges = [
      edge("g", "g_body", "CFG"),
      edge("f", "x", "CFG"),
      edge("f_body", "g", "CALL"),
      edge("f", "f_body", "CFG"),
    ];
    const result = retainEdges(edges, new Set(["f", "f_body", "g", "g_body"]), new Set(["f", "g"]));

    assert.deepStrictEqual(
      result.map((e) => `${e.sourceId}->${e.targetId}`),
      ["g->g_body", "f_body->g", "f->f_body"],
    );
  });
});
