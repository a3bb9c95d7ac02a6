import { describe, it, expect } from "vitest";
import { createGlucoseReading, checkGlucoseValue, withPumpDetails, withoutBolus } from "./validation.js";

const base = {
  unit: "mg/dL" as const,
  trend: "flat" as const,
  source: "com.example.pump",
  timestamp: 1_700_000_000_000,
};

describe("createGlucoseReading", () => {
  it("builds a reading for values inside the screen range", () => {
    const result = createGlucoseReading({ ...base, value: 142 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.reading.value).toBe(142);
      expect(Object.isFrozen(result.reading)).toBe(true);
    }
  });

  it("accepts both bounds", () => {
    expect(createGlucoseReading({ ...base, value: 40 }).ok).toBe(true);
    expect(createGlucoseReading({ ...base, value: 400 }).ok).toBe(true);
  });

  it.each([0, -5, 30, 39, 401, 999])("refuses %d", (value) => {
    expect(createGlucoseReading({ ...base, value }).ok).toBe(false);
  });

  it("refuses non-integers and NaN", () => {
    expect(checkGlucoseValue(120.5)).toBe("value 120.5 is not an integer");
    expect(checkGlucoseValue(Number.NaN)).toBe("value NaN is not a number");
  });

  it("explains the rejection", () => {
    expect(createGlucoseReading({ ...base, value: 30 })).toEqual({
      ok: false,
      reason: "value 30 is below 40",
    });
  });
});

describe("withPumpDetails / withoutBolus", () => {
  it("merges defined dialog fields and strips bolus fields", () => {
    const created = createGlucoseReading({ ...base, value: 120 });
    if (!created.ok) throw new Error("expected a reading");

    const augmented = withPumpDetails(created.reading, {
      activeInsulin: 1.5,
      bolusAmount: 2,
      bolusMinutesAgo: 31,
      reservoir: undefined,
    });
    expect(augmented.activeInsulin).toBe(1.5);
    expect(augmented.bolusAmount).toBe(2);
    expect("reservoir" in augmented).toBe(false);

    const stripped = withoutBolus(augmented);
    expect(stripped.bolusAmount).toBeUndefined();
    expect(stripped.bolusMinutesAgo).toBeUndefined();
    expect(stripped.activeInsulin).toBe(1.5);
    expect(stripped.value).toBe(120);
  });
});
