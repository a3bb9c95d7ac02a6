/**
 * Apply age reconciliation decisions against Nightscout
 */

import type { InsulinInfo, SensorInfo } from "@pumpscreen/diabetes";
import { fetchLatestTreatmentTime, uploadTreatment, type AgeEventFilter, type NightscoutConfig } from "./client.js";
import {
  buildInsulinChangeTreatment,
  buildSensorStartTreatment,
  type NightscoutTreatment,
} from "./payloads.js";
import { describeAgeDecision, needsUpload, reconcileAge, type AgeDecision } from "./reconcile.js";

export type AgeSyncResult =
  | { ok: true; decision: AgeDecision; outcome: string }
  | { ok: false; error: string };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function syncAge(
  config: NightscoutConfig,
  filter: AgeEventFilter,
  label: string,
  localTime: number,
  treatment: NightscoutTreatment,
  toleranceHours: number | undefined
): Promise<AgeSyncResult> {
  try {
    const remoteTime = await fetchLatestTreatmentTime(config, filter);
    const decision = reconcileAge(localTime, remoteTime, toleranceHours);

    if (needsUpload(decision)) {
      await uploadTreatment(config, treatment);
    }

    const outcome = describeAgeDecision(decision, label);
    console.log(`[age] ${label} ${outcome}`);
    return { ok: true, decision, outcome };
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[age] ${label} sync failed: ${message}`);
    return { ok: false, error: message };
  }
}

export function syncSensorAge(
  config: NightscoutConfig,
  sensor: SensorInfo,
  toleranceHours?: number
): Promise<AgeSyncResult> {
  return syncAge(
    config,
    "Sensor",
    "SAGE",
    sensor.startTime,
    buildSensorStartTreatment(sensor),
    toleranceHours
  );
}

export function syncInsulinAge(
  config: NightscoutConfig,
  insulin: InsulinInfo,
  toleranceHours?: number
): Promise<AgeSyncResult> {
  return syncAge(
    config,
    "Insulin",
    "IAGE",
    insulin.fillTime,
    buildInsulinChangeTreatment(insulin),
    toleranceHours
  );
}
