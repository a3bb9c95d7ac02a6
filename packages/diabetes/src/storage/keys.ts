/**
 * DynamoDB key generation for readings
 *
 * Key Design:
 * - PK: READING#{YYYY-MM-DD} - one partition per UTC day
 * - SK: {timestamp} - capture time, zero padded so it sorts lexically
 * - GSI1 (sparse): present only until the reading reaches Nightscout
 *   - gsi1pk: UNSYNCED
 *   - gsi1sk: {timestamp}
 */

import { formatDateInTimezone } from "../time.js";

/**
 * Partitions are cut on UTC days whatever the display timezone
 */
export const PARTITION_TIMEZONE = "UTC";

export const UNSYNCED_PARTITION = "UNSYNCED";

export interface ReadingKeys {
  pk: string;
  sk: string;
}

export interface UnsyncedKeys {
  gsi1pk: string;
  gsi1sk: string;
}

export function padTimestamp(timestampMs: number): string {
  return timestampMs.toString().padStart(15, "0");
}

export function readingPartition(timestampMs: number): string {
  return `READING#${formatDateInTimezone(timestampMs, PARTITION_TIMEZONE)}`;
}

export function generateReadingKeys(timestampMs: number): ReadingKeys {
  return {
    pk: readingPartition(timestampMs),
    sk: padTimestamp(timestampMs),
  };
}

export function generateUnsyncedKeys(timestampMs: number): UnsyncedKeys {
  return {
    gsi1pk: UNSYNCED_PARTITION,
    gsi1sk: padTimestamp(timestampMs),
  };
}
