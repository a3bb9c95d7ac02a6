/**
 * Multilingual keyword table.
 *
 * Every category (element kind, trend, marker list, dialog label) is a
 * list of surface forms per language in data/keywords.json. Adding a
 * language means adding entries there.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { glucoseTrendSchema } from "@pumpscreen/diabetes";
import type { GlucoseTrend, GlucoseUnit } from "@pumpscreen/diabetes";

export const DEFAULT_KEYWORDS_PATH = new URL("../data/keywords.json", import.meta.url);

/** language code → surface forms; "any" holds language-neutral forms */
const localizedSchema = z.record(z.string(), z.array(z.string()));

const elementSchema = z.object({
  strategy: z.enum(["first", "deepest"]),
  maxDepth: z.number().int().positive(),
  label: localizedSchema,
  text: localizedSchema,
  exactText: z.array(z.string()),
  id: z.array(z.string()),
});

const keywordFileSchema = z.object({
  unitMarkers: z.object({
    "mg/dL": z.array(z.string()).min(1),
    "mmol/L": z.array(z.string()).min(1),
  }),
  appMarkers: localizedSchema,
  signalLoss: localizedSchema,
  trends: z.array(
    z.object({
      trend: glucoseTrendSchema,
      glyphs: z.array(z.string()),
      labels: localizedSchema,
    })
  ),
  elements: z.object({
    info: elementSchema,
    close: elementSchema,
    menu: elementSchema,
    back: elementSchema,
    rotate: elementSchema,
  }),
  dialogLabels: z.object({
    activeInsulin: z.array(z.string()).min(1),
    basalRate: z.array(z.string()).min(1),
    reservoir: z.array(z.string()).min(1),
    pumpBattery: z.array(z.string()).min(1),
    glucoseTarget: z.array(z.string()).min(1),
    insulinToday: z.array(z.string()).min(1),
    insulinYesterday: z.array(z.string()).min(1),
    bolus: z.array(z.string()).min(1),
    pumpConnection: z.array(z.string()).min(1),
    sensorData: z.array(z.string()).min(1),
  }),
  ageLabels: z.object({
    sensorStart: z.array(z.string()).min(1),
    insulinFill: z.array(z.string()).min(1),
    sensorEnd: z.array(z.string()).min(1),
    sinceWords: z.array(z.string()),
    sensorBrands: z.array(z.string()),
  }),
});

type KeywordFile = z.infer<typeof keywordFileSchema>;

export type ElementKind = keyof KeywordFile["elements"];
export type DialogLabelKey = keyof KeywordFile["dialogLabels"];
export type AgeLabelKey = keyof KeywordFile["ageLabels"];

/**
 * How to recognize one kind of control. All strings are lowercase.
 */
export interface ElementMatcher {
  /** "deepest" keeps the deepest match instead of the first */
  strategy: "first" | "deepest";
  maxDepth: number;
  /** Substrings of the accessible label */
  labels: string[];
  /** Substrings of the visible text */
  texts: string[];
  /** Whole visible text, for single glyphs such as "×" */
  exactTexts: string[];
  /** Substrings of the view id */
  ids: string[];
}

export interface TrendMatcher {
  trend: GlucoseTrend;
  glyphs: string[];
  /** Whole-string accessible labels, lowercase */
  labels: string[];
}

export interface KeywordTable {
  unitMarkers: Record<GlucoseUnit, string[]>;
  appMarkers: string[];
  signalLoss: string[];
  trends: TrendMatcher[];
  elements: Record<ElementKind, ElementMatcher>;
  /** Original casing; these are compiled into case-insensitive regexes */
  dialogLabels: Record<DialogLabelKey, string[]>;
  ageLabels: Record<AgeLabelKey, string[]>;
}

function lower(values: string[]): string[] {
  return values.map((value) => value.toLowerCase());
}

function flatten(localized: Record<string, string[]>): string[] {
  return [...new Set(lower(Object.values(localized).flat()))];
}

function toMatcher(element: KeywordFile["elements"][ElementKind]): ElementMatcher {
  return {
    strategy: element.strategy,
    maxDepth: element.maxDepth,
    labels: flatten(element.label),
    texts: flatten(element.text),
    exactTexts: lower(element.exactText),
    ids: lower(element.id),
  };
}

/**
 * Validate and normalize a parsed keyword file
 */
export function buildKeywordTable(raw: unknown): KeywordTable {
  const file = keywordFileSchema.parse(raw);
  const { elements, ageLabels } = file;

  return {
    unitMarkers: {
      "mg/dL": lower(file.unitMarkers["mg/dL"]),
      "mmol/L": lower(file.unitMarkers["mmol/L"]),
    },
    appMarkers: flatten(file.appMarkers),
    signalLoss: flatten(file.signalLoss),
    trends: file.trends.map((entry) => ({
      trend: entry.trend,
      glyphs: entry.glyphs,
      labels: flatten(entry.labels),
    })),
    elements: {
      info: toMatcher(elements.info),
      close: toMatcher(elements.close),
      menu: toMatcher(elements.menu),
      back: toMatcher(elements.back),
      rotate: toMatcher(elements.rotate),
    },
    dialogLabels: file.dialogLabels,
    ageLabels: {
      sensorStart: lower(ageLabels.sensorStart),
      insulinFill: lower(ageLabels.insulinFill),
      sensorEnd: lower(ageLabels.sensorEnd),
      sinceWords: lower(ageLabels.sinceWords),
      sensorBrands: lower(ageLabels.sensorBrands),
    },
  };
}

export function loadKeywordTable(path: string | URL = DEFAULT_KEYWORDS_PATH): KeywordTable {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return buildKeywordTable(raw);
}

let defaultTable: KeywordTable | null = null;

/**
 * The bundled table, loaded on first use
 */
export function defaultKeywords(): KeywordTable {
  if (defaultTable === null) {
    defaultTable = loadKeywordTable();
  }
  return defaultTable;
}
