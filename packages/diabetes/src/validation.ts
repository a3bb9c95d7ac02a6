/**
 * The single place a GlucoseReading is constructed and range-checked
 */

import type { GlucoseReading, GlucoseTrend, GlucoseUnit, PumpDetails } from "./models/index.js";

/**
 * Bounds for a value read off the main screen, in display units
 */
export const SCREEN_GLUCOSE = {
  MIN: 40,
  MAX: 400,
} as const;

export interface GlucoseReadingInput {
  value: number;
  unit: GlucoseUnit;
  trend: GlucoseTrend;
  source: string;
  timestamp: number;
}

export type CreateReadingResult =
  | { ok: true; reading: GlucoseReading }
  | { ok: false; reason: string };

/**
 * Why a value cannot become a reading, or null if it can
 */
export function checkGlucoseValue(value: number): string | null {
  if (!Number.isFinite(value)) return `value ${value} is not a number`;
  if (value <= 0) return `value ${value} is not positive`;
  if (!Number.isInteger(value)) return `value ${value} is not an integer`;
  if (value < SCREEN_GLUCOSE.MIN) return `value ${value} is below ${SCREEN_GLUCOSE.MIN}`;
  if (value > SCREEN_GLUCOSE.MAX) return `value ${value} is above ${SCREEN_GLUCOSE.MAX}`;
  return null;
}

/**
 * Build a reading, refusing anything outside the screen range.
 * Out-of-range values are never clamped.
 */
export function createGlucoseReading(input: GlucoseReadingInput): CreateReadingResult {
  const reason = checkGlucoseValue(input.value);
  if (reason !== null) {
    return { ok: false, reason };
  }
  return {
    ok: true,
    reading: Object.freeze({
      value: input.value,
      unit: input.unit,
      trend: input.trend,
      source: input.source,
      timestamp: input.timestamp,
    }),
  };
}

/**
 * Copy of a reading with dialog fields merged in. Undefined fields are skipped.
 */
export function withPumpDetails(reading: GlucoseReading, details: PumpDetails): GlucoseReading {
  const merged: PumpDetails = {};
  for (const [key, value] of Object.entries(details)) {
    if (value !== undefined && isPumpDetailKey(key)) {
      merged[key] = value;
    }
  }
  return Object.freeze({ ...reading, ...merged });
}

/**
 * Copy of a reading without its bolus fields
 */
export function withoutBolus(reading: GlucoseReading): GlucoseReading {
  const { bolusAmount: _amount, bolusMinutesAgo: _minutes, ...rest } = reading;
  return Object.freeze(rest);
}

const PUMP_DETAIL_KEYS: ReadonlySet<string> = new Set<keyof PumpDetails>([
  "activeInsulin",
  "basalRate",
  "reservoir",
  "pumpBattery",
  "bolusAmount",
  "bolusMinutesAgo",
  "pumpConnectionMinutesAgo",
  "sensorDataMinutesAgo",
  "glucoseTarget",
  "insulinToday",
  "insulinYesterday",
]);

function isPumpDetailKey(key: string): key is keyof PumpDetails {
  return PUMP_DETAIL_KEYS.has(key);
}
