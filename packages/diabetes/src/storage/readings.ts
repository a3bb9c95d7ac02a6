/**
 * DynamoDB storage operations for glucose readings
 */

import {
  PutCommand,
  QueryCommand,
  UpdateCommand,
} from "@aws-sdk/lib-dynamodb";
import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { GlucoseReading } from "../models/index.js";
import { storedReadingSchema } from "../schemas.js";
import { addDays, DAY_MS, formatDateInTimezone } from "../time.js";
import { createGlucoseReading, withPumpDetails } from "../validation.js";
import {
  generateReadingKeys,
  generateUnsyncedKeys,
  padTimestamp,
  PARTITION_TIMEZONE,
  UNSYNCED_PARTITION,
} from "./keys.js";

/**
 * The part of a Document Client the store needs
 */
export type DocumentSender = Pick<DynamoDBDocumentClient, "send">;

/**
 * Maximum concurrent writes per batch
 */
const MAX_BATCH_SIZE = 25;

export const DEFAULT_RETENTION_DAYS = 90;

export interface WriteResult {
  written: number;
  duplicates: number;
  errors: string[];
}

export interface StoreOptions {
  /** Days before DynamoDB TTL removes a reading (default: 90) */
  retentionDays?: number;
  /** Override for the storedAt stamp */
  now?: number;
}

/**
 * DynamoDB item for a reading
 */
export interface ReadingItem {
  pk: string;
  sk: string;
  gsi1pk?: string;
  gsi1sk?: string;
  data: GlucoseReading;
  storedAt: number;
  syncedAt?: number;
  /** Expiry in epoch seconds */
  ttl: number;
}

export function buildReadingItem(reading: GlucoseReading, options: StoreOptions = {}): ReadingItem {
  const retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
  return {
    ...generateReadingKeys(reading.timestamp),
    ...generateUnsyncedKeys(reading.timestamp),
    data: reading,
    storedAt: options.now ?? Date.now(),
    ttl: Math.floor((reading.timestamp + retentionDays * DAY_MS) / 1000),
  };
}

function isConditionalCheckFailure(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "name" in error &&
    error.name === "ConditionalCheckFailedException"
  );
}

/**
 * Store readings with idempotent writes keyed by capture timestamp
 */
export async function storeReadings(
  docClient: DocumentSender,
  tableName: string,
  readings: GlucoseReading[],
  options: StoreOptions = {}
): Promise<WriteResult> {
  let written = 0;
  let duplicates = 0;
  const errors: string[] = [];

  for (let i = 0; i < readings.length; i += MAX_BATCH_SIZE) {
    const batch = readings.slice(i, i + MAX_BATCH_SIZE);

    const results = await Promise.all(
      batch.map(async (reading) => {
        try {
          await docClient.send(
            new PutCommand({
              TableName: tableName,
              Item: buildReadingItem(reading, options),
              ConditionExpression: "attribute_not_exists(pk)",
            })
          );
          return { status: "written" as const };
        } catch (error: unknown) {
          if (isConditionalCheckFailure(error)) {
            return { status: "duplicate" as const };
          }
          const errorMsg = error instanceof Error ? error.message : String(error);
          return { status: "error" as const, error: errorMsg };
        }
      })
    );

    for (const result of results) {
      if (result.status === "written") written++;
      else if (result.status === "duplicate") duplicates++;
      else errors.push(result.error);
    }
  }

  return { written, duplicates, errors };
}

/**
 * Rebuild a reading from a stored item, re-running the range check.
 * Items that fail either check are logged and skipped.
 */
export function parseReadingItem(item: Record<string, unknown>): GlucoseReading | null {
  const parsed = storedReadingSchema.safeParse(item.data);
  if (!parsed.success) {
    console.warn(`[store] Skipping malformed reading ${String(item.sk)}: ${parsed.error.message}`);
    return null;
  }

  const { value, unit, trend, source, timestamp, ...details } = parsed.data;
  const created = createGlucoseReading({ value, unit, trend, source, timestamp });
  if (!created.ok) {
    console.warn(`[store] Skipping invalid reading ${String(item.sk)}: ${created.reason}`);
    return null;
  }
  return withPumpDetails(created.reading, details);
}

function parseItems(items: Record<string, unknown>[] | undefined): GlucoseReading[] {
  const readings: GlucoseReading[] = [];
  for (const item of items ?? []) {
    const reading = parseReadingItem(item);
    if (reading) readings.push(reading);
  }
  return readings;
}

/**
 * Readings not yet uploaded, oldest first
 */
export async function queryUnsyncedReadings(
  docClient: DocumentSender,
  tableName: string,
  limit = 100
): Promise<GlucoseReading[]> {
  const result = await docClient.send(
    new QueryCommand({
      TableName: tableName,
      IndexName: "GSI1",
      KeyConditionExpression: "gsi1pk = :pk",
      ExpressionAttributeValues: {
        ":pk": UNSYNCED_PARTITION,
      },
      Limit: limit,
      ScanIndexForward: true,
    })
  );

  return parseItems(result.Items);
}

/**
 * Drop a reading from the unsynced index
 */
export async function markReadingSynced(
  docClient: DocumentSender,
  tableName: string,
  timestamp: number,
  syncedAt: number = Date.now()
): Promise<void> {
  await docClient.send(
    new UpdateCommand({
      TableName: tableName,
      Key: generateReadingKeys(timestamp),
      UpdateExpression: "SET syncedAt = :syncedAt REMOVE gsi1pk, gsi1sk",
      ExpressionAttributeValues: {
        ":syncedAt": syncedAt,
      },
    })
  );
}

/**
 * Readings captured within [startTime, endTime], oldest first
 */
export async function queryReadingsByTimeRange(
  docClient: DocumentSender,
  tableName: string,
  startTime: number,
  endTime: number
): Promise<GlucoseReading[]> {
  const readings: GlucoseReading[] = [];
  const lastDate = formatDateInTimezone(endTime, PARTITION_TIMEZONE);

  for (
    let date = formatDateInTimezone(startTime, PARTITION_TIMEZONE);
    date <= lastDate;
    date = addDays(date, 1)
  ) {
    const result = await docClient.send(
      new QueryCommand({
        TableName: tableName,
        KeyConditionExpression: "pk = :pk AND sk BETWEEN :start AND :end",
        ExpressionAttributeValues: {
          ":pk": `READING#${date}`,
          ":start": padTimestamp(startTime),
          ":end": padTimestamp(endTime),
        },
      })
    );
    readings.push(...parseItems(result.Items));
  }

  return readings;
}

/**
 * Store operations bound to one table
 */
export interface ReadingStore {
  save(reading: GlucoseReading): Promise<"written" | "duplicate">;
  listUnsynced(limit?: number): Promise<GlucoseReading[]>;
  markSynced(timestamp: number): Promise<void>;
  listBetween(startTime: number, endTime: number): Promise<GlucoseReading[]>;
}

export function createReadingStore(
  docClient: DocumentSender,
  tableName: string,
  options: StoreOptions = {}
): ReadingStore {
  return {
    save: async (reading) => {
      const result = await storeReadings(docClient, tableName, [reading], options);
      if (result.errors.length > 0) {
        throw new Error(`Store reading failed: ${result.errors.join("; ")}`);
      }
      return result.duplicates > 0 ? "duplicate" : "written";
    },
    listUnsynced: (limit) => queryUnsyncedReadings(docClient, tableName, limit),
    markSynced: (timestamp) => markReadingSynced(docClient, tableName, timestamp),
    listBetween: (startTime, endTime) =>
      queryReadingsByTimeRange(docClient, tableName, startTime, endTime),
  };
}
