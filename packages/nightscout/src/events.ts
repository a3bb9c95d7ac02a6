/**
 * Pump event detection from consecutive readings
 */

import type { GlucoseReading } from "@pumpscreen/diabetes";
import {
  buildBatteryChangeTreatment,
  buildReservoirChangeTreatment,
  type NightscoutTreatment,
} from "./payloads.js";

/** Battery rise in percentage points that counts as a new battery */
export const BATTERY_CHANGE_THRESHOLD = 10;

/** Reservoir rise in units that counts as a refill */
export const RESERVOIR_CHANGE_THRESHOLD = 50;

export interface PumpEventDetector {
  /** Treatments implied by this reading relative to the previous one */
  detect: (reading: GlucoseReading) => NightscoutTreatment[];
  /** Forget the remembered levels */
  reset: () => void;
}

/**
 * Create a detector that remembers the last battery and reservoir levels.
 * The first reading with a level only primes it.
 */
export function createPumpEventDetector(): PumpEventDetector {
  let lastBattery: number | null = null;
  let lastReservoir: number | null = null;

  return {
    detect: (reading) => {
      const events: NightscoutTreatment[] = [];

      if (reading.pumpBattery !== undefined) {
        if (lastBattery !== null && reading.pumpBattery > lastBattery + BATTERY_CHANGE_THRESHOLD) {
          events.push(buildBatteryChangeTreatment(reading.timestamp, lastBattery, reading.pumpBattery));
        }
        lastBattery = reading.pumpBattery;
      }

      if (reading.reservoir !== undefined) {
        if (lastReservoir !== null && reading.reservoir > lastReservoir + RESERVOIR_CHANGE_THRESHOLD) {
          events.push(buildReservoirChangeTreatment(reading.timestamp, lastReservoir, reading.reservoir));
        }
        lastReservoir = reading.reservoir;
      }

      return events;
    },

    reset: () => {
      lastBattery = null;
      lastReservoir = null;
    },
  };
}
