import { describe, it, expect } from "vitest";
import { buildKeywordTable, defaultKeywords } from "./keywords.js";

describe("defaultKeywords", () => {
  const table = defaultKeywords();

  it("lowercases and merges languages", () => {
    expect(table.signalLoss).toContain("signalverlust");
    expect(table.signalLoss).toContain("no signal");
    expect(table.signalLoss).toContain("pas de signal");
    expect(table.signalLoss).toContain("---");
    expect(table.elements.close.labels).toContain("schließen");
  });

  it("removes duplicates across languages", () => {
    expect(table.appMarkers.filter((marker) => marker === "boost")).toHaveLength(1);
  });

  it("keeps the rotate button on the deepest strategy only", () => {
    expect(table.elements.rotate.strategy).toBe("deepest");
    expect(table.elements.info.strategy).toBe("first");
    expect(table.elements.close.strategy).toBe("first");
    expect(table.elements.menu.strategy).toBe("first");
    expect(table.elements.back.strategy).toBe("first");
  });

  it("lists double arrows before single ones", () => {
    const order = table.trends.map((entry) => entry.trend);
    expect(order.indexOf("doubleUp")).toBeLessThan(order.indexOf("singleUp"));
    expect(order.indexOf("doubleDown")).toBeLessThan(order.indexOf("singleDown"));
  });

  it("is loaded once", () => {
    expect(defaultKeywords()).toBe(table);
  });
});

describe("buildKeywordTable", () => {
  it("rejects a malformed file", () => {
    expect(() => buildKeywordTable({ unitMarkers: {} })).toThrow();
  });
});
