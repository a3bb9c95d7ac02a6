/**
 * Nightscout API v1 Client
 *
 * Uploads entries, device status and treatments, and reads back the latest
 * sensor and insulin change treatments for age reconciliation.
 */

import { createHash } from "crypto";
import { z } from "zod";
import type {
  NightscoutDeviceStatus,
  NightscoutEntry,
  NightscoutTreatment,
} from "./payloads.js";

export const API_PATH = "/api/v1";

/** Access token prefixes Nightscout accepts without hashing */
export const TOKEN_PREFIXES = ["admin", "readable", "reader", "denied", "device", "food"];

export interface NightscoutConfig {
  /** Site URL, with or without a trailing /api/v1 */
  baseUrl: string;
  /** Plain API secret, its SHA-1 hex or an access token */
  apiSecret: string;
}

/** Event type fragments matched by the treatments query */
export type AgeEventFilter = "Sensor" | "Insulin";

const treatmentTimeSchema = z
  .object({
    created_at: z.string().optional(),
    date: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough();

const treatmentListSchema = z.array(treatmentTimeSchema);

const statusSchema = z
  .object({
    status: z.string().optional(),
    name: z.string().optional(),
    version: z.string().optional(),
    serverTime: z.string().optional(),
  })
  .passthrough();

export type NightscoutStatus = z.infer<typeof statusSchema>;

/**
 * Strip trailing slashes and an /api/v1 suffix
 */
export function normalizeBaseUrl(url: string): string {
  let normalized = url.trim().replace(/\/+$/, "");
  if (normalized.toLowerCase().endsWith(API_PATH)) {
    normalized = normalized.slice(0, -API_PATH.length).replace(/\/+$/, "");
  }
  return normalized;
}

/**
 * Value for the api-secret header.
 *
 * Access tokens and 40-char hex hashes are sent as is, anything else is
 * hashed with SHA-1. Blank secrets produce an empty string.
 */
export function prepareApiSecret(secret: string): string {
  const trimmed = secret.trim();
  if (!trimmed) return "";

  const parts = trimmed.split("-");
  if (parts.length === 2 && TOKEN_PREFIXES.includes(parts[0].toLowerCase())) {
    return trimmed;
  }

  if (/^[0-9a-f]{40}$/i.test(trimmed)) {
    return trimmed;
  }

  return createHash("sha1").update(trimmed).digest("hex");
}

function buildHeaders(config: NightscoutConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json",
  };
  const secret = prepareApiSecret(config.apiSecret);
  if (secret) {
    headers["api-secret"] = secret;
  }
  return headers;
}

function endpointUrl(config: NightscoutConfig, endpoint: string): string {
  return `${normalizeBaseUrl(config.baseUrl)}${API_PATH}/${endpoint}`;
}

async function post(
  config: NightscoutConfig,
  endpoint: string,
  body: unknown,
  operation: string
): Promise<void> {
  const response = await fetch(endpointUrl(config, endpoint), {
    method: "POST",
    headers: buildHeaders(config),
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    throw new Error(
      `Nightscout ${operation} failed: ${response.status}${errorText ? ` ${errorText}` : ""}`
    );
  }
}

async function get(config: NightscoutConfig, endpoint: string, operation: string): Promise<unknown> {
  const response = await fetch(endpointUrl(config, endpoint), {
    method: "GET",
    headers: buildHeaders(config),
  });

  if (!response.ok) {
    throw new Error(`Nightscout ${operation} failed: ${response.status}`);
  }

  return response.json();
}

export async function uploadEntries(
  config: NightscoutConfig,
  entries: NightscoutEntry[]
): Promise<number> {
  if (entries.length === 0) return 0;
  await post(config, "entries", entries, "upload entries");
  return entries.length;
}

export async function uploadDeviceStatus(
  config: NightscoutConfig,
  status: NightscoutDeviceStatus
): Promise<void> {
  await post(config, "devicestatus", [status], "upload devicestatus");
}

export async function uploadTreatment(
  config: NightscoutConfig,
  treatment: NightscoutTreatment
): Promise<void> {
  await post(config, "treatments", [treatment], "upload treatment");
}

/**
 * Time of a treatment document: created_at, else date as epoch ms
 * (number or digit string) or ISO text.
 */
export function parseTreatmentTime(treatment: z.infer<typeof treatmentTimeSchema>): number | null {
  if (treatment.created_at) {
    const parsed = Date.parse(treatment.created_at);
    if (!Number.isNaN(parsed)) return parsed;
  }

  const { date } = treatment;
  if (typeof date === "number") {
    return Number.isFinite(date) ? date : null;
  }
  if (typeof date === "string") {
    if (/^\d+$/.test(date)) return parseInt(date, 10);
    const parsed = Date.parse(date);
    return Number.isNaN(parsed) ? null : parsed;
  }

  return null;
}

/**
 * Time of the latest treatment whose eventType matches the filter,
 * or null if there is none.
 */
export async function fetchLatestTreatmentTime(
  config: NightscoutConfig,
  filter: AgeEventFilter
): Promise<number | null> {
  const body = await get(
    config,
    `treatments?find[eventType][$regex]=${filter}&count=1`,
    `fetch latest ${filter} treatment`
  );

  const parsed = treatmentListSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Nightscout ${filter} treatment response invalid: ${parsed.error.message}`);
  }

  if (parsed.data.length === 0) {
    console.log(`[nightscout] No ${filter} treatments found`);
    return null;
  }

  const time = parseTreatmentTime(parsed.data[0]);
  if (time === null) {
    console.warn(`[nightscout] Latest ${filter} treatment has no usable date`);
  }
  return time;
}

/**
 * Connection check against /status
 */
export async function checkStatus(config: NightscoutConfig): Promise<NightscoutStatus> {
  const body = await get(config, "status", "status");
  const parsed = statusSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Nightscout status response invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}
