export { createDocClient } from "./client.js";
export type { DocClientOptions } from "./client.js";
export {
  PARTITION_TIMEZONE,
  UNSYNCED_PARTITION,
  padTimestamp,
  readingPartition,
  generateReadingKeys,
  generateUnsyncedKeys,
} from "./keys.js";
export type { ReadingKeys, UnsyncedKeys } from "./keys.js";
export {
  DEFAULT_RETENTION_DAYS,
  buildReadingItem,
  storeReadings,
  parseReadingItem,
  queryUnsyncedReadings,
  markReadingSynced,
  queryReadingsByTimeRange,
  createReadingStore,
} from "./readings.js";
export type { DocumentSender, WriteResult, StoreOptions, ReadingItem, ReadingStore } from "./readings.js";
