import { describe, it, expect } from "vitest";
import { parseConfig } from "./config.js";

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig({ TIMEZONE: "Europe/Berlin" });

    expect(config).toEqual({
      nightscout: null,
      readingIntervalMs: 300_000,
      minReadGapMs: 30_000,
      ageCheckIntervalMs: 14_400_000,
      ageToleranceHours: 1.5,
      graphScanEnabled: true,
      source: "com.camdiab.fx.camaps",
      thresholds: { low: 70, high: 180 },
      safetyAlertThreshold: 3,
      readingsTable: null,
      retentionDays: 90,
      dynamoEndpoint: null,
      timezone: "Europe/Berlin",
    });
  });

  it("reads Nightscout and store settings", () => {
    const config = parseConfig({
      NIGHTSCOUT_URL: "https://ns.example.test/api/v1",
      NIGHTSCOUT_API_SECRET: "test-secret",
      READINGS_TABLE: "pump-readings",
      READING_INTERVAL_MINUTES: "2",
      GRAPH_SCAN_ENABLED: "No",
      GLUCOSE_LOW: "80",
      GLUCOSE_HIGH: "160",
    });

    expect(config.nightscout).toEqual({
      baseUrl: "https://ns.example.test/api/v1",
      apiSecret: "test-secret",
    });
    expect(config.readingsTable).toBe("pump-readings");
    expect(config.readingIntervalMs).toBe(120_000);
    expect(config.graphScanEnabled).toBe(false);
    expect(config.thresholds).toEqual({ low: 80, high: 160 });
  });

  it("treats empty values as unset", () => {
    const config = parseConfig({ NIGHTSCOUT_URL: "", READINGS_TABLE: "  ", TIMEZONE: "UTC" });
    expect(config.nightscout).toBeNull();
    expect(config.readingsTable).toBeNull();
  });

  it("lists every invalid variable", () => {
    expect(() =>
      parseConfig({
        READING_INTERVAL_MINUTES: "30",
        NIGHTSCOUT_URL: "not a url",
        TIMEZONE: "Mars/Olympus",
      })
    ).toThrow(/NIGHTSCOUT_URL: .*READING_INTERVAL_MINUTES: .*TIMEZONE: unknown time zone/);
  });

  it("rejects a low threshold above the high one", () => {
    expect(() => parseConfig({ GLUCOSE_LOW: "200", TIMEZONE: "UTC" })).toThrow(
      "Invalid configuration: GLUCOSE_LOW: must be below GLUCOSE_HIGH"
    );
  });

  it("rejects a malformed flag", () => {
    expect(() => parseConfig({ GRAPH_SCAN_ENABLED: "maybe", TIMEZONE: "UTC" })).toThrow(/GRAPH_SCAN_ENABLED/);
  });
});
