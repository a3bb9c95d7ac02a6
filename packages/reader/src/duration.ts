/**
 * Human-readable durations from the menu ("5d 6h 58min", "5 Tage 6 Stunden", ...)
 */

import { DAY_MS, HOUR_MS, MINUTE_MS } from "@pumpscreen/diabetes";
import { firstMatch, parseWhole } from "./patterns.js";
import type { PatternRule } from "./patterns.js";

function toMs(days: number, hours: number, minutes: number): number {
  return days * DAY_MS + hours * HOUR_MS + minutes * MINUTE_MS;
}

/** Missing optional groups count as zero */
function part(raw: string | undefined): number {
  return parseWhole(raw) ?? 0;
}

/**
 * Tried in order; a later form is only used when every earlier one fails
 */
export const DURATION_RULES: readonly PatternRule<number>[] = [
  {
    name: "compact",
    pattern: /(\d+)d\s*(?:(\d+)h)?\s*(?:(\d+)min)?/i,
    extract: (m) => toMs(part(m[1]), part(m[2]), part(m[3])),
  },
  {
    name: "days",
    pattern: /(\d+)\s*(?:Tage?|days?|jours?)(?:\s+(\d+)\s*(?:Stunden?|hours?|heures?))?/i,
    extract: (m) => toMs(part(m[1]), part(m[2]), 0),
  },
  {
    name: "hours",
    pattern: /(\d+)\s*(?:hours?|heures?|Stunden?|h)\s*(?:(\d+)\s*(?:minutes?|Minuten?|min))?/i,
    extract: (m) => toMs(0, part(m[1]), part(m[2])),
  },
  {
    name: "minutes",
    pattern: /(\d+)\s*(?:minutes?|Minuten?|min)/i,
    extract: (m) => toMs(0, 0, part(m[1])),
  },
];

/**
 * Duration in milliseconds, or null for blank, "---" or unrecognized text
 */
export function parseDuration(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === "" || trimmed === "---") return null;
  return firstMatch(DURATION_RULES, trimmed)?.value ?? null;
}
