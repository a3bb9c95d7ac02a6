/**
 * Nightscout API v1 documents built from readings and detected events
 */

import {
  MINUTE_MS,
  readingToMgdl,
  trendToDirection,
  type GlucoseReading,
  type GraphTreatment,
  type InsulinInfo,
  type SensorInfo,
} from "@pumpscreen/diabetes";

/** Device string stamped on every uploaded document */
export const UPLOADER_DEVICE = "pumpscreen";

/** enteredBy value on uploaded treatments */
export const ENTERED_BY = "pumpscreen";

export type TreatmentEventType =
  | "Correction Bolus"
  | "Sensor Start"
  | "Insulin Change"
  | "Pump Battery Change"
  | "Carb Correction";

export interface NightscoutEntry {
  type: "sgv";
  /** Always mg/dL */
  sgv: number;
  direction: string;
  date: number;
  dateString: string;
  device: string;
}

export interface NightscoutDeviceStatus {
  device: string;
  created_at: string;
  pump: {
    clock: string;
    battery?: { percent: number };
    reservoir?: number;
    status: { status: string; timestamp: string };
  };
  openaps?: {
    iob?: { iob: number; timestamp: string };
    enacted?: { rate: number; duration: number; timestamp: string };
  };
}

export interface NightscoutTreatment {
  eventType: TreatmentEventType;
  created_at: string;
  date: number;
  enteredBy: string;
  notes?: string;
  insulin?: number;
  carbs?: number;
}

function isoString(timestampMs: number): string {
  return new Date(timestampMs).toISOString();
}

export function buildEntry(reading: GlucoseReading): NightscoutEntry {
  return {
    type: "sgv",
    sgv: readingToMgdl(reading),
    direction: trendToDirection(reading.trend),
    date: reading.timestamp,
    dateString: isoString(reading.timestamp),
    device: `${UPLOADER_DEVICE}/${reading.source}`,
  };
}

/**
 * Device status carrying the pump fields of a reading.
 * Sub-objects are left out when the dialog did not provide their field.
 */
export function buildDeviceStatus(reading: GlucoseReading): NightscoutDeviceStatus {
  const ts = isoString(reading.timestamp);
  const status: NightscoutDeviceStatus = {
    device: UPLOADER_DEVICE,
    created_at: ts,
    pump: {
      clock: ts,
      status: { status: "normal", timestamp: ts },
    },
  };

  if (reading.pumpBattery !== undefined) {
    status.pump.battery = { percent: reading.pumpBattery };
  }
  if (reading.reservoir !== undefined) {
    status.pump.reservoir = reading.reservoir;
  }

  if (reading.activeInsulin !== undefined || reading.basalRate !== undefined) {
    status.openaps = {};
    if (reading.activeInsulin !== undefined) {
      status.openaps.iob = { iob: reading.activeInsulin, timestamp: ts };
    }
    if (reading.basalRate !== undefined) {
      status.openaps.enacted = { rate: reading.basalRate, duration: 30, timestamp: ts };
    }
  }

  return status;
}

function treatment(
  eventType: TreatmentEventType,
  timestamp: number,
  extra: Partial<Pick<NightscoutTreatment, "notes" | "insulin" | "carbs">> = {}
): NightscoutTreatment {
  return {
    eventType,
    created_at: isoString(timestamp),
    date: timestamp,
    enteredBy: ENTERED_BY,
    ...extra,
  };
}

/**
 * Correction bolus placed at capture time minus the dialog's bolus age.
 * Returns null when the reading carries no bolus.
 */
export function buildBolusTreatment(reading: GlucoseReading): NightscoutTreatment | null {
  if (reading.bolusAmount === undefined || reading.bolusAmount <= 0) return null;
  const minutesAgo = reading.bolusMinutesAgo ?? 0;
  return treatment("Correction Bolus", reading.timestamp - minutesAgo * MINUTE_MS, {
    insulin: reading.bolusAmount,
    notes: "Bolus from pump app",
  });
}

export function buildSensorStartTreatment(sensor: SensorInfo): NightscoutTreatment {
  return treatment("Sensor Start", sensor.startTime, {
    notes: sensor.serial ? `Sensor ${sensor.serial}` : "Sensor from pump app",
  });
}

export function buildInsulinChangeTreatment(insulin: InsulinInfo): NightscoutTreatment {
  return treatment("Insulin Change", insulin.fillTime, { notes: "Reservoir filled" });
}

export function buildBatteryChangeTreatment(
  timestamp: number,
  previousPercent: number,
  currentPercent: number
): NightscoutTreatment {
  return treatment("Pump Battery Change", timestamp, {
    notes: `Battery changed: ${previousPercent}% -> ${currentPercent}%`,
  });
}

export function buildReservoirChangeTreatment(
  timestamp: number,
  previousUnits: number,
  currentUnits: number
): NightscoutTreatment {
  return treatment("Insulin Change", timestamp, {
    notes: `Reservoir changed: ${Math.trunc(previousUnits)} U -> ${Math.trunc(currentUnits)} U`,
  });
}

/**
 * Carb Correction for a graph marker. Returns null without carbs.
 */
export function buildCarbTreatment(graph: GraphTreatment): NightscoutTreatment | null {
  if (graph.carbsGrams === null || graph.carbsGrams <= 0) return null;
  return treatment("Carb Correction", graph.timestamp, {
    carbs: graph.carbsGrams,
    notes: "Carbs from pump graph",
  });
}
