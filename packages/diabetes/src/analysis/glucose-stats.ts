/**
 * Glucose statistics over stored readings
 */

import type { GlucoseReading } from "../models/index.js";
import { readingToMgdl } from "../units.js";

/**
 * Default target range (mg/dL)
 */
export const TARGET = {
  LOW: 70,
  HIGH: 180,
} as const;

export interface RangeThresholds {
  /** Lowest in-range value (mg/dL) */
  low: number;
  /** Highest in-range value (mg/dL) */
  high: number;
}

type ReadingValue = Pick<GlucoseReading, "value" | "unit">;

export interface TimeInRange {
  /** Percent of readings below `low` */
  below: number;
  /** Percent of readings within [low, high] */
  inRange: number;
  /** Percent of readings above `high` */
  above: number;
  readingCount: number;
}

export interface GlucoseStats extends TimeInRange {
  min: number;
  max: number;
  mean: number;
  stdDev: number;
  /** Coefficient of variation (stdDev/mean * 100) */
  cv: number;
  /** Glucose Management Indicator */
  gmi: number;
}

const DEFAULT_THRESHOLDS: RangeThresholds = { low: TARGET.LOW, high: TARGET.HIGH };

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Classify a mg/dL value against the thresholds
 */
export function classifyGlucose(
  mgdl: number,
  thresholds: RangeThresholds = DEFAULT_THRESHOLDS
): "low" | "in_range" | "high" {
  if (mgdl < thresholds.low) return "low";
  if (mgdl <= thresholds.high) return "in_range";
  return "high";
}

/**
 * Percent of readings below, within and above the range
 */
export function calculateTimeInRange(
  readings: ReadingValue[],
  thresholds: RangeThresholds = DEFAULT_THRESHOLDS
): TimeInRange {
  const n = readings.length;
  if (n === 0) {
    return { below: 0, inRange: 0, above: 0, readingCount: 0 };
  }

  let below = 0;
  let inRange = 0;
  let above = 0;
  for (const reading of readings) {
    const band = classifyGlucose(readingToMgdl(reading), thresholds);
    if (band === "low") below++;
    else if (band === "in_range") inRange++;
    else above++;
  }

  return {
    below: round1((below / n) * 100),
    inRange: round1((inRange / n) * 100),
    above: round1((above / n) * 100),
    readingCount: n,
  };
}

/**
 * Mean glucose in mg/dL, or null with no readings
 */
export function calculateAverageGlucose(readings: ReadingValue[]): number | null {
  if (readings.length === 0) return null;
  const sum = readings.reduce((total, reading) => total + readingToMgdl(reading), 0);
  return round1(sum / readings.length);
}

/**
 * Summary statistics in mg/dL
 */
export function calculateGlucoseStats(
  readings: ReadingValue[],
  thresholds: RangeThresholds = DEFAULT_THRESHOLDS
): GlucoseStats {
  const tir = calculateTimeInRange(readings, thresholds);
  if (readings.length === 0) {
    return { ...tir, min: 0, max: 0, mean: 0, stdDev: 0, cv: 0, gmi: 0 };
  }

  const values = readings.map(readingToMgdl);
  const n = values.length;
  const mean = values.reduce((a, b) => a + b, 0) / n;
  const variance = values.reduce((total, v) => total + Math.pow(v - mean, 2), 0) / n;
  const stdDev = Math.sqrt(variance);

  return {
    ...tir,
    min: Math.min(...values),
    max: Math.max(...values),
    mean: round1(mean),
    stdDev: round1(stdDev),
    cv: mean > 0 ? round1((stdDev / mean) * 100) : 0,
    // GMI = 3.31 + 0.02392 × mean mg/dL
    gmi: round1(3.31 + 0.02392 * mean),
  };
}
