import { describe, it, expect, beforeEach, vi } from "vitest";
import { createGlucoseReading, withPumpDetails } from "@pumpscreen/diabetes";
import type { GlucoseReading } from "@pumpscreen/diabetes";
import { BolusDeduplicator, EventDeduplicator, MealDeduplicator } from "./dedup.js";

const T0 = Date.UTC(2026, 9, 18, 12, 0);
const MINUTE = 60_000;

function readingWithBolus(amount: number, minutesAgo: number, timestamp: number): GlucoseReading {
  const created = createGlucoseReading({ value: 150, unit: "mg/dL", trend: "flat", source: "test", timestamp });
  if (!created.ok) throw new Error(created.reason);
  return withPumpDetails(created.reading, { bolusAmount: amount, bolusMinutesAgo: minutesAgo, reservoir: 120 });
}

describe("BolusDeduplicator", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("recognizes the same bolus seen two minutes later", () => {
    const dedup = new BolusDeduplicator();
    expect(dedup.isDuplicate(2.0, 31, T0)).toBe(false);
    expect(dedup.isDuplicate(2.0, 33, T0 + 2 * MINUTE)).toBe(true);
    expect(dedup.isDuplicate(3.5, 1, T0 + 2 * MINUTE)).toBe(false);
  });

  it("strips bolus fields from a repeated observation only", () => {
    const dedup = new BolusDeduplicator();
    const first = dedup.filter(readingWithBolus(2.0, 31, T0));
    const repeat = dedup.filter(readingWithBolus(2.0, 33, T0 + 2 * MINUTE));
    const next = dedup.filter(readingWithBolus(3.5, 1, T0 + 2 * MINUTE));

    expect(first.bolusAmount).toBe(2.0);
    expect(repeat.bolusAmount).toBeUndefined();
    expect(repeat.bolusMinutesAgo).toBeUndefined();
    expect(repeat.reservoir).toBe(120);
    expect(next.bolusAmount).toBe(3.5);
    expect(next.bolusMinutesAgo).toBe(1);
  });

  it("treats a different amount at the same time as new", () => {
    const dedup = new BolusDeduplicator();
    dedup.isDuplicate(2.0, 10, T0);
    expect(dedup.isDuplicate(2.5, 10, T0)).toBe(false);
  });

  it("passes readings without a bolus through", () => {
    const created = createGlucoseReading({ value: 150, unit: "mg/dL", trend: "flat", source: "test", timestamp: T0 });
    if (!created.ok) throw new Error(created.reason);
    expect(new BolusDeduplicator().filter(created.reading)).toBe(created.reading);
  });

  it("forgets state on reset", () => {
    const dedup = new BolusDeduplicator();
    dedup.isDuplicate(2.0, 31, T0);
    dedup.reset();
    expect(dedup.isDuplicate(2.0, 31, T0)).toBe(false);
  });
});

describe("EventDeduplicator", () => {
  it("uses a strict window", () => {
    const events = new EventDeduplicator(2 * MINUTE);
    events.isDuplicate(2, T0);
    expect(events.isDuplicate(2, T0 + 2 * MINUTE - 1)).toBe(true);
    expect(events.isDuplicate(2, T0 + 2 * MINUTE)).toBe(false);
    expect(events.lastAccepted()).toEqual({ amount: 2, timestamp: T0 + 2 * MINUTE });
  });
});

describe("MealDeduplicator", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  const meal = (grams: number, timestamp: number) => ({ insulinUnits: null, carbsGrams: grams, timestamp });

  it("drops the same meal within thirty minutes", () => {
    const dedup = new MealDeduplicator();
    expect(dedup.filter(meal(30, T0))).toEqual(meal(30, T0));
    expect(dedup.filter(meal(30, T0 + 20 * MINUTE))).toBeNull();
    expect(dedup.filter(meal(30, T0 + 45 * MINUTE))).toEqual(meal(30, T0 + 45 * MINUTE));
    expect(dedup.filter(meal(45, T0 + 45 * MINUTE))).toEqual(meal(45, T0 + 45 * MINUTE));
  });

  it("ignores treatments without carbs", () => {
    expect(new MealDeduplicator().filter({ insulinUnits: 2, carbsGrams: null, timestamp: T0 })).toBeNull();
  });
});
