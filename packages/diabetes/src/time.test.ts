import { describe, it, expect } from "vitest";
import { addDays, atTimeOfDay, formatDateInTimezone, zoneOffsetMs } from "./time.js";

describe("formatDateInTimezone", () => {
  it("uses the zone's calendar date", () => {
    const lateUtc = Date.UTC(2026, 9, 18, 2, 0);
    expect(formatDateInTimezone(lateUtc, "UTC")).toBe("2026-10-18");
    expect(formatDateInTimezone(lateUtc, "America/New_York")).toBe("2026-10-17");
  });
});

describe("zoneOffsetMs", () => {
  it("follows daylight saving", () => {
    expect(zoneOffsetMs(Date.UTC(2026, 6, 1, 12, 0), "Europe/Berlin")).toBe(2 * 60 * 60 * 1000);
    expect(zoneOffsetMs(Date.UTC(2026, 11, 1, 12, 0), "Europe/Berlin")).toBe(60 * 60 * 1000);
    expect(zoneOffsetMs(Date.UTC(2026, 9, 18, 12, 0), "America/New_York")).toBe(-4 * 60 * 60 * 1000);
  });
});

describe("addDays", () => {
  it("crosses month boundaries", () => {
    expect(addDays("2026-03-01", -1)).toBe("2026-02-28");
    expect(addDays("2026-12-31", 1)).toBe("2027-01-01");
  });
});

describe("atTimeOfDay", () => {
  it("places a minute of day on the reference date", () => {
    const reference = Date.UTC(2026, 9, 18, 23, 0);
    expect(atTimeOfDay(reference, 21 * 60 + 30, "UTC")).toBe(Date.UTC(2026, 9, 18, 21, 30));
    expect(atTimeOfDay(reference, 21 * 60 + 30, "UTC", -1)).toBe(Date.UTC(2026, 9, 17, 21, 30));
  });

  // Berlin leaves summer time at 03:00 on 2026-10-25 and enters it at 02:00 on 2026-03-29
  it("resolves the wall clock on the day summer time ends", () => {
    const reference = Date.UTC(2026, 9, 25, 21, 0);
    expect(atTimeOfDay(reference, 21 * 60 + 30, "Europe/Berlin")).toBe(Date.UTC(2026, 9, 25, 20, 30));
    expect(atTimeOfDay(reference, 60, "Europe/Berlin")).toBe(Date.UTC(2026, 9, 24, 23, 0));
  });

  it("resolves the wall clock on the day summer time starts", () => {
    const reference = Date.UTC(2026, 2, 29, 18, 0);
    expect(atTimeOfDay(reference, 12 * 60, "Europe/Berlin")).toBe(Date.UTC(2026, 2, 29, 10, 0));
    expect(atTimeOfDay(reference, 60, "Europe/Berlin")).toBe(Date.UTC(2026, 2, 29, 0, 0));
  });
});
