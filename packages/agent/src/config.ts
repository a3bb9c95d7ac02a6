/**
 * Agent configuration from the environment (.env supported)
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { defaultTimezone, MINUTE_MS, TARGET, type RangeThresholds } from "@pumpscreen/diabetes";
import type { NightscoutConfig } from "@pumpscreen/nightscout";
import { DEFAULT_SOURCE } from "@pumpscreen/reader";

function isTimezone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const flag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z
  .object({
    NIGHTSCOUT_URL: z.string().url().optional(),
    NIGHTSCOUT_API_SECRET: z.string().default(""),
    READING_INTERVAL_MINUTES: z.coerce.number().int().min(1).max(15).default(5),
    MIN_READ_GAP_SECONDS: z.coerce.number().int().min(0).default(30),
    AGE_CHECK_INTERVAL_MINUTES: z.coerce.number().int().positive().default(240),
    AGE_TOLERANCE_HOURS: z.coerce.number().positive().default(1.5),
    GRAPH_SCAN_ENABLED: flag.default("true"),
    TARGET_APP_PACKAGE: z.string().default(DEFAULT_SOURCE),
    GLUCOSE_LOW: z.coerce.number().int().positive().default(TARGET.LOW),
    GLUCOSE_HIGH: z.coerce.number().int().positive().default(TARGET.HIGH),
    SAFETY_ALERT_THRESHOLD: z.coerce.number().int().positive().default(3),
    READINGS_TABLE: z.string().optional(),
    READING_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
    DYNAMODB_ENDPOINT: z.string().url().optional(),
    TIMEZONE: z.string().refine(isTimezone, "unknown time zone").optional(),
  })
  .refine((env) => env.GLUCOSE_LOW < env.GLUCOSE_HIGH, {
    message: "must be below GLUCOSE_HIGH",
    path: ["GLUCOSE_LOW"],
  });

export interface AgentConfig {
  /** Null when NIGHTSCOUT_URL is unset */
  nightscout: NightscoutConfig | null;
  readingIntervalMs: number;
  minReadGapMs: number;
  ageCheckIntervalMs: number;
  ageToleranceHours: number;
  graphScanEnabled: boolean;
  source: string;
  thresholds: RangeThresholds;
  safetyAlertThreshold: number;
  /** Null when READINGS_TABLE is unset */
  readingsTable: string | null;
  retentionDays: number;
  dynamoEndpoint: string | null;
  timezone: string;
}

/**
 * Validate environment variables. Empty values count as unset.
 * Throws one error listing every invalid variable.
 */
export function parseConfig(env: Record<string, string | undefined>): AgentConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const e = parsed.data;
  return {
    nightscout: e.NIGHTSCOUT_URL ? { baseUrl: e.NIGHTSCOUT_URL, apiSecret: e.NIGHTSCOUT_API_SECRET } : null,
    readingIntervalMs: e.READING_INTERVAL_MINUTES * MINUTE_MS,
    minReadGapMs: e.MIN_READ_GAP_SECONDS * 1000,
    ageCheckIntervalMs: e.AGE_CHECK_INTERVAL_MINUTES * MINUTE_MS,
    ageToleranceHours: e.AGE_TOLERANCE_HOURS,
    graphScanEnabled: e.GRAPH_SCAN_ENABLED,
    source: e.TARGET_APP_PACKAGE,
    thresholds: { low: e.GLUCOSE_LOW, high: e.GLUCOSE_HIGH },
    safetyAlertThreshold: e.SAFETY_ALERT_THRESHOLD,
    readingsTable: e.READINGS_TABLE ?? null,
    retentionDays: e.READING_RETENTION_DAYS,
    dynamoEndpoint: e.DYNAMODB_ENDPOINT ?? null,
    timezone: e.TIMEZONE ?? defaultTimezone(),
  };
}

/**
 * Load a .env file (default: ./.env) into process.env, then parse it
 */
export function loadConfig(envPath?: string): AgentConfig {
  loadDotenv(envPath ? { path: envPath } : undefined);
  return parseConfig(process.env);
}
