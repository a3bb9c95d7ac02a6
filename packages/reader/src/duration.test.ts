import { describe, it, expect } from "vitest";
import { parseDuration } from "./duration.js";

const DAY = 86_400_000;
const HOUR = 3_600_000;
const MINUTE = 60_000;

describe("parseDuration", () => {
  it("parses the compact form exactly", () => {
    expect(parseDuration("5d 6h 58min")).toBe(5 * DAY + 6 * HOUR + 58 * MINUTE);
    expect(parseDuration("2d")).toBe(2 * DAY);
    expect(parseDuration("1d 0h 5min")).toBe(DAY + 5 * MINUTE);
  });

  it.each(["5 Tage 6 Stunden", "5 days 6 hours", "5 jours 6 heures"])(
    "parses the verbose form %s",
    (text) => {
      expect(parseDuration(text)).toBe(5 * DAY + 6 * HOUR);
    }
  );

  it("parses verbose days without hours", () => {
    expect(parseDuration("3 Tage")).toBe(3 * DAY);
    expect(parseDuration("1 day")).toBe(DAY);
  });

  it("parses hours with optional minutes", () => {
    expect(parseDuration("12h 30min")).toBe(12 * HOUR + 30 * MINUTE);
    expect(parseDuration("6 heures 30 minutes")).toBe(6 * HOUR + 30 * MINUTE);
    expect(parseDuration("6 Stunden 30 Minuten")).toBe(6 * HOUR + 30 * MINUTE);
    expect(parseDuration("4 hours")).toBe(4 * HOUR);
  });

  it("parses bare minutes", () => {
    expect(parseDuration("45 min")).toBe(45 * MINUTE);
    expect(parseDuration("1 Minute")).toBe(MINUTE);
  });

  it("returns null for blank, placeholder and unknown text", () => {
    expect(parseDuration("")).toBeNull();
    expect(parseDuration("  ")).toBeNull();
    expect(parseDuration("---")).toBeNull();
    expect(parseDuration("soon")).toBeNull();
  });
});
