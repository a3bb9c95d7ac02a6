/**
 * Glucose unit conversion and trend naming for the remote service
 */

import type { GlucoseReading, GlucoseTrend, GlucoseUnit } from "./models/index.js";

/** mg/dL per mmol/L */
export const MGDL_PER_MMOL = 18.0182;

export function mgdlToMmol(mgdl: number): number {
  return mgdl / MGDL_PER_MMOL;
}

export function mmolToMgdl(mmol: number): number {
  return mmol * MGDL_PER_MMOL;
}

/**
 * Convert between units without rounding
 */
export function convertGlucose(value: number, from: GlucoseUnit, to: GlucoseUnit): number {
  if (from === to) return value;
  return from === "mg/dL" ? mgdlToMmol(value) : mmolToMgdl(value);
}

/**
 * Reading value as whole mg/dL
 */
export function readingToMgdl(reading: Pick<GlucoseReading, "value" | "unit">): number {
  return Math.round(convertGlucose(reading.value, reading.unit, "mg/dL"));
}

/**
 * Format for display: whole numbers for mg/dL, one decimal for mmol/L
 */
export function formatGlucose(value: number, unit: GlucoseUnit): string {
  return unit === "mg/dL" ? `${Math.round(value)}` : (Math.round(value * 10) / 10).toFixed(1);
}

/**
 * Nightscout direction names
 */
export const NIGHTSCOUT_DIRECTIONS: Record<GlucoseTrend, string> = {
  doubleUp: "DoubleUp",
  singleUp: "SingleUp",
  slightUp: "FortyFiveUp",
  flat: "Flat",
  slightDown: "FortyFiveDown",
  singleDown: "SingleDown",
  doubleDown: "DoubleDown",
  unknown: "NOT COMPUTABLE",
};

export function trendToDirection(trend: GlucoseTrend): string {
  return NIGHTSCOUT_DIRECTIONS[trend];
}
