/**
 * @pumpscreen/nightscout
 *
 * Nightscout uploads, pump event detection and sensor/insulin age sync
 */

export {
  API_PATH,
  TOKEN_PREFIXES,
  normalizeBaseUrl,
  prepareApiSecret,
  uploadEntries,
  uploadDeviceStatus,
  uploadTreatment,
  parseTreatmentTime,
  fetchLatestTreatmentTime,
  checkStatus,
} from "./client.js";
export type { NightscoutConfig, NightscoutStatus, AgeEventFilter } from "./client.js";

export {
  UPLOADER_DEVICE,
  ENTERED_BY,
  buildEntry,
  buildDeviceStatus,
  buildBolusTreatment,
  buildSensorStartTreatment,
  buildInsulinChangeTreatment,
  buildBatteryChangeTreatment,
  buildReservoirChangeTreatment,
  buildCarbTreatment,
} from "./payloads.js";
export type {
  TreatmentEventType,
  NightscoutEntry,
  NightscoutDeviceStatus,
  NightscoutTreatment,
} from "./payloads.js";

export { BATTERY_CHANGE_THRESHOLD, RESERVOIR_CHANGE_THRESHOLD, createPumpEventDetector } from "./events.js";
export type { PumpEventDetector } from "./events.js";

export { DEFAULT_AGE_TOLERANCE_HOURS, reconcileAge, needsUpload, describeAgeDecision } from "./reconcile.js";
export type { AgeDecision } from "./reconcile.js";

export { syncSensorAge, syncInsulinAge } from "./age-sync.js";
export type { AgeSyncResult } from "./age-sync.js";

export { syncReading, syncPendingReadings, syncMeal } from "./sync.js";
export type { ReadingSyncResult, SyncResult, SyncOptions, MealSyncResult } from "./sync.js";
