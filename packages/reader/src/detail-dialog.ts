/**
 * Detail dialog extraction.
 *
 * Each field has its own label + number + unit pattern; fields are found
 * independently and a missing field is not an error. The bolus amount and
 * its age always come from the same string.
 */

import type { PumpDetails, UiNode } from "@pumpscreen/diabetes";
import { defaultKeywords } from "./keywords.js";
import type { KeywordTable } from "./keywords.js";
import { alternation, firstMatch, parseDecimal, parseWhole } from "./patterns.js";
import type { PatternRule } from "./patterns.js";
import { collectText } from "./text.js";

const NUMBER = "([\\d,\\.]+)";
const INSULIN_UNIT = "(?:IE|U|UI)";

type SimpleField =
  | "activeInsulin"
  | "basalRate"
  | "reservoir"
  | "pumpBattery"
  | "glucoseTarget"
  | "insulinToday"
  | "insulinYesterday";

interface FieldPattern {
  field: SimpleField;
  pattern: RegExp;
  integer: boolean;
}

export interface BolusObservation {
  /** Null for the "no bolus" placeholder */
  amount: number | null;
  minutesAgo: number | null;
}

export interface DialogPatterns {
  fields: FieldPattern[];
  bolus: PatternRule<BolusObservation>[];
  pumpConnection: PatternRule<number>[];
  sensorData: PatternRule<number>[];
}

function labeled(labels: readonly string[], tail: string): RegExp {
  return new RegExp(`${alternation(labels)}:\\s*${NUMBER}\\s*${tail}`, "i");
}

function bolusRule(name: string, labels: string, tail: string, minutes: (m: RegExpMatchArray) => number | null): PatternRule<BolusObservation> {
  return {
    name,
    pattern: new RegExp(`${labels}:\\s*${NUMBER}\\s*${INSULIN_UNIT}\\s*${tail}`, "i"),
    extract: (match) => {
      const amount = parseDecimal(match[1]);
      const minutesAgo = minutes(match);
      return amount === null || minutesAgo === null ? null : { amount, minutesAgo };
    },
  };
}

/**
 * "vor 5 Minuten", "vor einer Minute", "5 minutes ago", "a minute ago",
 * "il y a 5 minutes", "il y a une minute"
 */
function ageRules(labels: readonly string[]): PatternRule<number>[] {
  const prefix = `${alternation(labels)}:\\s*`;
  const one = (): number => 1;
  return [
    { name: "de", pattern: new RegExp(`${prefix}vor\\s*(\\d+)\\s*Minuten`, "i"), extract: (m) => parseWhole(m[1]) },
    { name: "de-one", pattern: new RegExp(`${prefix}vor\\s*einer\\s*Minute`, "i"), extract: one },
    { name: "en", pattern: new RegExp(`${prefix}(\\d+)\\s*minutes?\\s*ago`, "i"), extract: (m) => parseWhole(m[1]) },
    { name: "en-one", pattern: new RegExp(`${prefix}(?:a|one)\\s+minute\\s*ago`, "i"), extract: one },
    { name: "fr", pattern: new RegExp(`${prefix}il y a\\s*(\\d+)\\s*minutes?`, "i"), extract: (m) => parseWhole(m[1]) },
    { name: "fr-one", pattern: new RegExp(`${prefix}il y a\\s*une\\s*minute`, "i"), extract: one },
  ];
}

/**
 * Compile the dialog patterns from the keyword table
 */
export function buildDialogPatterns(keywords: KeywordTable): DialogPatterns {
  const labels = keywords.dialogLabels;
  const bolus = alternation(labels.bolus);

  return {
    fields: [
      { field: "activeInsulin", pattern: labeled(labels.activeInsulin, INSULIN_UNIT), integer: false },
      { field: "basalRate", pattern: labeled(labels.basalRate, `${INSULIN_UNIT}/h`), integer: false },
      { field: "reservoir", pattern: labeled(labels.reservoir, INSULIN_UNIT), integer: false },
      { field: "pumpBattery", pattern: labeled(labels.pumpBattery, "%"), integer: true },
      { field: "glucoseTarget", pattern: labeled(labels.glucoseTarget, "(?:mg/dL|mmol/L)"), integer: false },
      { field: "insulinToday", pattern: labeled(labels.insulinToday, INSULIN_UNIT), integer: false },
      { field: "insulinYesterday", pattern: labeled(labels.insulinYesterday, INSULIN_UNIT), integer: false },
    ],
    bolus: [
      bolusRule("de", bolus, "vor\\s*(\\d+)\\s*Minuten", (m) => parseWhole(m[2])),
      bolusRule("en", bolus, "(\\d+)\\s*minutes?\\s*ago", (m) => parseWhole(m[2])),
      bolusRule("fr", bolus, "il y a\\s*(\\d+)\\s*minutes?", (m) => parseWhole(m[2])),
      bolusRule("compact", bolus, "(\\d+)\\s*h\\s*(\\d+)\\s*min", (m) => {
        const hours = parseWhole(m[2]);
        const mins = parseWhole(m[3]);
        return hours === null || mins === null ? null : hours * 60 + mins;
      }),
      {
        name: "none",
        pattern: new RegExp(`${bolus}:\\s*---`, "i"),
        extract: () => ({ amount: null, minutesAgo: null }),
      },
    ],
    pumpConnection: ageRules(labels.pumpConnection),
    sensorData: ageRules(labels.sensorData),
  };
}

const compiled = new WeakMap<KeywordTable, DialogPatterns>();

function patternsFor(keywords: KeywordTable): DialogPatterns {
  let patterns = compiled.get(keywords);
  if (patterns === undefined) {
    patterns = buildDialogPatterns(keywords);
    compiled.set(keywords, patterns);
  }
  return patterns;
}

/**
 * Extract dialog fields from already collected strings
 */
export function extractDetailsFromTexts(
  texts: readonly string[],
  keywords: KeywordTable = defaultKeywords()
): PumpDetails {
  const patterns = patternsFor(keywords);
  const details: PumpDetails = {};
  let bolusSeen = false;

  for (const text of texts) {
    for (const { field, pattern, integer } of patterns.fields) {
      if (details[field] !== undefined) continue;
      const match = text.match(pattern);
      const value = match ? parseDecimal(match[1]) : null;
      if (value !== null) {
        details[field] = integer ? Math.trunc(value) : value;
      }
    }

    if (!bolusSeen) {
      const bolus = firstMatch(patterns.bolus, text);
      if (bolus !== null) {
        bolusSeen = true;
        if (bolus.value.amount !== null && bolus.value.minutesAgo !== null) {
          details.bolusAmount = bolus.value.amount;
          details.bolusMinutesAgo = bolus.value.minutesAgo;
        }
      }
    }

    if (details.pumpConnectionMinutesAgo === undefined) {
      const age = firstMatch(patterns.pumpConnection, text);
      if (age !== null) details.pumpConnectionMinutesAgo = age.value;
    }

    if (details.sensorDataMinutesAgo === undefined) {
      const age = firstMatch(patterns.sensorData, text);
      if (age !== null) details.sensorDataMinutesAgo = age.value;
    }
  }

  return details;
}

/**
 * Fields found on the detail dialog. An unrelated surface yields {}.
 */
export function extractDetailDialog(root: UiNode, keywords: KeywordTable = defaultKeywords()): PumpDetails {
  const details = extractDetailsFromTexts(collectText(root), keywords);
  const found = Object.keys(details);
  if (found.length > 0) {
    console.log(`[reader] Dialog fields: ${found.join(", ")}`);
  }
  return details;
}
