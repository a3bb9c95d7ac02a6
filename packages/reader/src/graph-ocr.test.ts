import { describe, it, expect, beforeEach, vi } from "vitest";
import type { OcrBlock } from "@pumpscreen/diabetes";
import {
  DEFAULT_AXIS_THRESHOLD,
  findAxisThreshold,
  findCarbMarkers,
  findTimeLabels,
  interpolateGraphTreatments,
  interpolateMinuteOfDay,
} from "./graph-ocr.js";

/** Block 40px wide centered on `x` */
function block(text: string, x: number, top: number): OcrBlock {
  return { text, boundingBox: { left: x - 20, top, right: x + 20, bottom: top + 30 } };
}

const AXIS_TOP = 900;
const MARKER_TOP = 300;

describe("findAxisThreshold", () => {
  it("uses the most populated band of time-shaped blocks", () => {
    const blocks = [block("21:00", 100, 905), block("22:00", 300, 915), block("Last 12:34", 500, 120)];
    // mean(905, 915) - 100
    expect(findAxisThreshold(blocks)).toBe(810);
  });

  it("falls back to the default without time labels", () => {
    expect(findAxisThreshold([block("30 g", 200, MARKER_TOP)])).toBe(DEFAULT_AXIS_THRESHOLD);
  });
});

describe("findTimeLabels / findCarbMarkers", () => {
  it("splits blocks around the threshold", () => {
    const blocks = [
      block("22:00", 300, AXIS_TOP),
      block("21:00", 100, AXIS_TOP),
      block("12:34", 150, MARKER_TOP),
      block("30 g", 200, MARKER_TOP),
      block("45g", 250, AXIS_TOP),
    ];
    expect(findTimeLabels(blocks, 800)).toEqual([
      { hour: 21, minute: 0, x: 100 },
      { hour: 22, minute: 0, x: 300 },
    ]);
    expect(findCarbMarkers(blocks, 800)).toEqual([{ grams: 30, x: 200 }]);
  });

  it("ignores mg values, words, out-of-range grams and blocks without boxes", () => {
    const blocks: OcrBlock[] = [
      block("150 mg", 100, MARKER_TOP),
      block("Glukose", 120, MARKER_TOP),
      block("250 g", 140, MARKER_TOP),
      block("0 g", 160, MARKER_TOP),
      { text: "20 g", boundingBox: null },
      block("12 G", 180, MARKER_TOP),
    ];
    expect(findCarbMarkers(blocks, 800)).toEqual([{ grams: 12, x: 180 }]);
  });

  it("rejects impossible times", () => {
    expect(findTimeLabels([block("25:00", 100, AXIS_TOP), block("10:75", 200, AXIS_TOP)], 800)).toEqual([]);
  });
});

describe("interpolateMinuteOfDay", () => {
  const labels = [
    { hour: 21, minute: 0, x: 100 },
    { hour: 22, minute: 0, x: 300 },
  ];

  it("interpolates between bracketing labels", () => {
    expect(interpolateMinuteOfDay(200, labels)).toBe(21 * 60 + 30);
    expect(interpolateMinuteOfDay(100, labels)).toBe(21 * 60);
  });

  it("extrapolates from the nearest pair", () => {
    expect(interpolateMinuteOfDay(400, labels)).toBe(22 * 60 + 30);
    expect(interpolateMinuteOfDay(0, labels)).toBe(20 * 60 + 30);
  });

  it("handles an axis that crosses midnight", () => {
    const wrap = [
      { hour: 23, minute: 0, x: 100 },
      { hour: 0, minute: 0, x: 300 },
    ];
    expect(interpolateMinuteOfDay(200, wrap)).toBe(23 * 60 + 30);
    expect(interpolateMinuteOfDay(400, wrap)).toBe(30);
  });

  it("picks the pair around the marker among several labels", () => {
    const three = [...labels, { hour: 23, minute: 0, x: 500 }];
    expect(interpolateMinuteOfDay(450, three)).toBe(22 * 60 + 45);
  });

  it("returns null without two distinct label positions", () => {
    expect(interpolateMinuteOfDay(200, [labels[0]])).toBeNull();
    expect(interpolateMinuteOfDay(200, [labels[0], { hour: 22, minute: 0, x: 100 }])).toBeNull();
  });
});

describe("interpolateGraphTreatments", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  const graph = [block("21:00", 100, AXIS_TOP), block("22:00", 300, AXIS_TOP), block("30 g", 200, MARKER_TOP)];

  it("dates a marker at the midpoint to 21:30 today", () => {
    const now = Date.UTC(2026, 9, 18, 23, 0);
    expect(interpolateGraphTreatments(graph, { now, timezone: "UTC" })).toEqual([
      { insulinUnits: null, carbsGrams: 30, timestamp: Date.UTC(2026, 9, 18, 21, 30) },
    ]);
  });

  it("moves a time more than ten minutes ahead to yesterday", () => {
    const now = Date.UTC(2026, 9, 18, 10, 0);
    const [treatment] = interpolateGraphTreatments(graph, { now, timezone: "UTC" });
    expect(treatment.timestamp).toBe(Date.UTC(2026, 9, 17, 21, 30));
  });

  it("keeps today within the ten minute allowance", () => {
    const now = Date.UTC(2026, 9, 18, 21, 25);
    const [treatment] = interpolateGraphTreatments(graph, { now, timezone: "UTC" });
    expect(treatment.timestamp).toBe(Date.UTC(2026, 9, 18, 21, 30));
  });

  it("dates a marker across midnight to 23:30", () => {
    const blocks = [block("23:00", 100, AXIS_TOP), block("00:00", 300, AXIS_TOP), block("30 g", 200, MARKER_TOP)];
    const now = Date.UTC(2026, 9, 19, 0, 10);
    const [treatment] = interpolateGraphTreatments(blocks, { now, timezone: "UTC" });
    expect(treatment.timestamp).toBe(Date.UTC(2026, 9, 18, 23, 30));
  });

  it("discards every marker with fewer than two axis labels", () => {
    const now = Date.UTC(2026, 9, 18, 23, 0);
    expect(interpolateGraphTreatments([block("30 g", 200, MARKER_TOP)], { now, timezone: "UTC" })).toEqual([]);
    expect(
      interpolateGraphTreatments([block("21:00", 100, AXIS_TOP), block("30 g", 200, MARKER_TOP)], {
        now,
        timezone: "UTC",
      })
    ).toEqual([]);
  });
});
