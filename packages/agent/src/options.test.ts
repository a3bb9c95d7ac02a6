import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseCount, parseHours, parseTime } from "./options.js";

describe("parseTime", () => {
  it("reads ISO 8601", () => {
    expect(parseTime("2026-10-18T08:00:00Z")).toBe(Date.UTC(2026, 9, 18, 8, 0));
  });

  it("rejects anything else", () => {
    expect(() => parseTime("yesterday")).toThrow(InvalidArgumentError);
    expect(() => parseTime("yesterday")).toThrow("Invalid time: yesterday");
  });
});

describe("parseCount", () => {
  it("accepts positive whole numbers", () => {
    expect(parseCount("25")).toBe(25);
  });

  it.each(["abc", "", "0", "-3", "2.5"])("rejects %j", (value) => {
    expect(() => parseCount(value)).toThrow(`Not a positive whole number: ${value}`);
  });
});

describe("parseHours", () => {
  it("accepts fractional hours", () => {
    expect(parseHours("1.5")).toBe(1.5);
  });

  it.each(["abc", "0", "-1", "Infinity"])("rejects %j", (value) => {
    expect(() => parseHours(value)).toThrow(`Not a positive number of hours: ${value}`);
  });
});
