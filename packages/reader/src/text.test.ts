import { describe, it, expect } from "vitest";
import { collectText, valueAfter } from "./text.js";
import { nest, node, text } from "./__tests__/nodes.js";

describe("collectText", () => {
  it("returns text then label, parents before children, siblings in order", () => {
    const root = node(
      { text: "root" },
      node({ text: "a", contentDescription: "a-label" }, text("a1"), text("a2")),
      text("b")
    );
    expect(collectText(root)).toEqual(["root", "a", "a-label", "a1", "a2", "b"]);
  });

  it("skips missing and blank strings", () => {
    const root = node({}, text("  "), node({ contentDescription: "" }), text("kept"));
    expect(collectText(root)).toEqual(["kept"]);
  });

  it("keeps nodes at the depth limit and drops deeper ones", () => {
    expect(collectText(nest(20, text("deep")))).toEqual(["deep"]);
    expect(collectText(nest(21, text("too deep")))).toEqual([]);
  });

  it("accepts a custom limit", () => {
    expect(collectText(nest(3, text("x")), 2)).toEqual([]);
  });
});

describe("valueAfter", () => {
  it("returns the next string or null at the end", () => {
    const texts = ["Anlage seit", "5d 6h", "last"];
    expect(valueAfter(texts, 0)).toBe("5d 6h");
    expect(valueAfter(texts, 2)).toBeNull();
  });
});
