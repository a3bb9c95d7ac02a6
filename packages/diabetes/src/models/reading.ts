/**
 * Glucose reading types scraped from the pump app's main screen
 */

export type GlucoseUnit = "mg/dL" | "mmol/L";

/**
 * Trend arrow shown next to the glucose value
 */
export type GlucoseTrend =
  | "doubleUp"
  | "singleUp"
  | "slightUp"
  | "flat"
  | "slightDown"
  | "singleDown"
  | "doubleDown"
  | "unknown";

export const GLUCOSE_TRENDS: readonly GlucoseTrend[] = [
  "doubleUp",
  "singleUp",
  "slightUp",
  "flat",
  "slightDown",
  "singleDown",
  "doubleDown",
  "unknown",
];

/**
 * Auxiliary pump fields read from the detail dialog.
 * Every field is optional; a dialog that could not be read leaves them all unset.
 */
export interface PumpDetails {
  /** Insulin on board (U) */
  activeInsulin?: number;
  /** Current basal delivery rate (U/h) */
  basalRate?: number;
  /** Insulin left in the reservoir (U) */
  reservoir?: number;
  /** Pump battery (%) */
  pumpBattery?: number;
  /** Last bolus amount (U) */
  bolusAmount?: number;
  /** Minutes since the last bolus */
  bolusMinutesAgo?: number;
  /** Minutes since the pump last talked to the phone */
  pumpConnectionMinutesAgo?: number;
  /** Minutes since the last sensor value */
  sensorDataMinutesAgo?: number;
  /** Glucose target in display units */
  glucoseTarget?: number;
  /** Total daily insulin so far (U) */
  insulinToday?: number;
  /** Total daily insulin yesterday (U) */
  insulinYesterday?: number;
}

export type PumpDetailField = keyof PumpDetails;

/**
 * A validated glucose reading. Only `createGlucoseReading` produces these.
 */
export interface GlucoseReading extends Readonly<PumpDetails> {
  /** Value in display units */
  readonly value: number;
  readonly unit: GlucoseUnit;
  readonly trend: GlucoseTrend;
  /** Package name of the app the value was read from */
  readonly source: string;
  /** Capture time, Unix ms */
  readonly timestamp: number;
}
