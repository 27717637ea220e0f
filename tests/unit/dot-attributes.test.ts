import { describe, it } from "node:test";
import assert from "node:assert";
import { decodeAttributes } from "../../src/dot/attributes.js";

describe("decodeAttributes", () => {
  it("decodes bare and quoted values", () => {
    const { attributes, skipped } = decodeAttributes(
      'label=METHOD NAME="main" IS_EXTERNAL=false',
    );

    assert.deepStrictEqual(
      [...attributes],
      [
        ["label", "METHOD"],
        ["NAME", "main"],
        ["IS_EXTERNAL", "false"],
      ],
    );
    assert.deepStrictEqual(skipped, []);
  });

  it("accepts commas and spaces around =", () => {
    const { attributes } = decodeAttributes("label = CFG, weight=2");
    assert.strictEqual(attributes.get("label"), "CFG");
    assert.strictEqual(attributes.get("weight"), "2");
  });

  it("unescapes \\n, \\t and escaped characters", () => {
    const { attributes } = decodeAttributes(
      String.raw`CODE="line1\nline2\ttab \"q\" \\ back"`,
    );
    assert.strictEqual(attributes.get("CODE"), 'line1\nline2\ttab "q" \\ back');
  });

  it("keeps real newlines inside quoted values", () => {
    const { attributes } = decodeAttributes('CODE="a\nb"');
    assert.strictEqual(attributes.get("CODE"), "a\nb");
  });

  it("keeps the last value of a repeated key", () => {
    const { attributes } = decodeAttributes('NAME="a" NAME="b"');
    assert.strictEqual(attributes.get("NAME"), "b");
    assert.strictEqual(attributes.size, 1);
  });

  it("reads an empty bare value", () => {
    const { attributes } = decodeAttributes("NAME=");
    assert.strictEqual(attributes.get("NAME"), "");
  });

  it("drops keys outside `only`", () => {
    const { attributes } = decodeAttributes('label=METHOD CODE="x" NAME=f', {
      only: new Set(["label", "NAME"]),
    });
    assert.deepStrictEqual([...attributes.keys()], ["label", "NAME"]);
  });

  it("reports fragments that are not pairs and keeps going", () => {
    const { attributes, skipped } = decodeAttributes("label=X orphan 123 NAME=y");

    assert.deepStrictEqual(skipped, ["orphan", "123"]);
    assert.strictEqual(attributes.get("label"), "X");
    assert.strictEqual(attributes.get("NAME"), "y");
  });

  it("stops at an unterminated quoted value", () => {
    const { attributes, skipped } = decodeAttributes('label=X CODE="abc');

    assert.deepStrictEqual(skipped, ['CODE="abc']);
    assert.deepStrictEqual([...attributes.keys()], ["label"]);
  });

  it("stores keys that collide with object prototype names", () => {
    const { attributes } = decodeAttributes('__proto__="x" constructor=y');
    assert.strictEqual(attributes.get("__proto__"), "x");
    assert.strictEqual(attributes.get("constructor"), "y");
  });
});
