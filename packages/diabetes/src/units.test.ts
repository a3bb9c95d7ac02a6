import { describe, it, expect } from "vitest";
import {
  convertGlucose,
  formatGlucose,
  mgdlToMmol,
  mmolToMgdl,
  readingToMgdl,
  trendToDirection,
} from "./units.js";

describe("unit conversion", () => {
  it("round-trips every integer mg/dL value on the screen", () => {
    for (let mgdl = 40; mgdl <= 400; mgdl++) {
      expect(Math.round(mmolToMgdl(mgdlToMmol(mgdl)))).toBe(mgdl);
    }
  });

  it("converts without rounding", () => {
    expect(mgdlToMmol(180.182)).toBeCloseTo(10, 10);
    expect(convertGlucose(10, "mmol/L", "mg/dL")).toBeCloseTo(180.182, 10);
    expect(convertGlucose(120, "mg/dL", "mg/dL")).toBe(120);
  });

  it("converts readings to whole mg/dL", () => {
    expect(readingToMgdl({ value: 7, unit: "mmol/L" })).toBe(126);
    expect(readingToMgdl({ value: 126, unit: "mg/dL" })).toBe(126);
  });

  it("formats per unit", () => {
    expect(formatGlucose(126.4, "mg/dL")).toBe("126");
    expect(formatGlucose(7, "mmol/L")).toBe("7.0");
  });
});

describe("trendToDirection", () => {
  it("maps trends to Nightscout names", () => {
    expect(trendToDirection("slightUp")).toBe("FortyFiveUp");
    expect(trendToDirection("doubleDown")).toBe("DoubleDown");
    expect(trendToDirection("unknown")).toBe("NOT COMPUTABLE");
  });
});

