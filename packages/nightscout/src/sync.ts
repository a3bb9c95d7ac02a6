/**
 * Reading and meal upload
 */

import type { GlucoseReading, GraphTreatment, ReadingStore } from "@pumpscreen/diabetes";
import { uploadDeviceStatus, uploadEntries, uploadTreatment, type NightscoutConfig } from "./client.js";
import type { PumpEventDetector } from "./events.js";
import {
  buildBolusTreatment,
  buildCarbTreatment,
  buildDeviceStatus,
  buildEntry,
  type NightscoutTreatment,
} from "./payloads.js";

export type ReadingSyncResult =
  | { ok: true; treatments: number; warnings: string[] }
  | { ok: false; error: string };

export interface SyncResult {
  uploaded: number;
  failed: number;
  errors: string[];
}

export interface SyncOptions {
  /** Event detector fed with every uploaded reading */
  detector?: PumpEventDetector;
  /** Maximum readings per run (default: 100) */
  limit?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Upload one reading: the entry, then its device status and any treatments.
 *
 * Only a failed entry upload fails the reading; device status and
 * treatment failures are reported as warnings.
 */
export async function syncReading(
  config: NightscoutConfig,
  reading: GlucoseReading,
  options: Pick<SyncOptions, "detector"> = {}
): Promise<ReadingSyncResult> {
  try {
    await uploadEntries(config, [buildEntry(reading)]);
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[sync] Entry upload failed for ${reading.timestamp}: ${message}`);
    return { ok: false, error: message };
  }

  const warnings: string[] = [];

  try {
    await uploadDeviceStatus(config, buildDeviceStatus(reading));
  } catch (error) {
    warnings.push(errorMessage(error));
  }

  const treatments: NightscoutTreatment[] = [];
  const bolus = buildBolusTreatment(reading);
  if (bolus) treatments.push(bolus);
  if (options.detector) treatments.push(...options.detector.detect(reading));

  let uploadedTreatments = 0;
  for (const treatment of treatments) {
    try {
      await uploadTreatment(config, treatment);
      uploadedTreatments++;
    } catch (error) {
      warnings.push(`${treatment.eventType}: ${errorMessage(error)}`);
    }
  }

  for (const warning of warnings) {
    console.error(`[sync] ${warning}`);
  }

  return { ok: true, treatments: uploadedTreatments, warnings };
}

/**
 * Upload readings the store has not synced yet, oldest first, and mark
 * each uploaded one as synced
 */
export async function syncPendingReadings(
  config: NightscoutConfig,
  store: Pick<ReadingStore, "listUnsynced" | "markSynced">,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const result: SyncResult = { uploaded: 0, failed: 0, errors: [] };
  const pending = await store.listUnsynced(options.limit ?? 100);

  if (pending.length === 0) {
    return result;
  }

  console.log(`[sync] Uploading ${pending.length} pending reading(s)`);

  for (const reading of pending) {
    const outcome = await syncReading(config, reading, options);
    if (!outcome.ok) {
      result.failed++;
      result.errors.push(`${reading.timestamp}: ${outcome.error}`);
      continue;
    }

    try {
      await store.markSynced(reading.timestamp);
      result.uploaded++;
    } catch (error) {
      result.failed++;
      result.errors.push(`${reading.timestamp}: mark synced failed: ${errorMessage(error)}`);
    }
  }

  console.log(`[sync] Uploaded ${result.uploaded}, failed ${result.failed}`);
  return result;
}

export type MealSyncResult =
  | { ok: true; carbs: number; timestamp: number }
  | { ok: false; error: string };

/**
 * Upload a graph carb marker as a Carb Correction
 */
export async function syncMeal(config: NightscoutConfig, meal: GraphTreatment): Promise<MealSyncResult> {
  const treatment = buildCarbTreatment(meal);
  if (!treatment || treatment.carbs === undefined) {
    return { ok: false, error: "no carbs on graph treatment" };
  }

  try {
    await uploadTreatment(config, treatment);
    console.log(`[sync] Meal uploaded: ${treatment.carbs} g at ${treatment.created_at}`);
    return { ok: true, carbs: treatment.carbs, timestamp: treatment.date };
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[sync] Meal upload failed: ${message}`);
    return { ok: false, error: message };
  }
}
