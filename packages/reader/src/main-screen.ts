/**
 * Main screen extraction.
 *
 * Gates run in a fixed order and each one is a hard stop:
 *   A unit marker, B info button, C app marker  (is this the right screen?)
 *   D signal loss, E value range                (is the value trustworthy?)
 * A rejected screen yields no reading at all, never a guessed one.
 */

import { createGlucoseReading } from "@pumpscreen/diabetes";
import type { GlucoseReading, GlucoseUnit, UiNode } from "@pumpscreen/diabetes";
import { findElement } from "./elements.js";
import { defaultKeywords } from "./keywords.js";
import type { KeywordTable } from "./keywords.js";
import { collectText } from "./text.js";
import { determineTrend } from "./trend.js";

export const DEFAULT_SOURCE = "com.camdiab.fx.camaps";

/**
 * "identity-mismatch": not the main screen, expected while the user navigates.
 * "safety": the main screen, but its value cannot be trusted.
 */
export type RejectionKind = "identity-mismatch" | "safety";

export type RejectionGate =
  | "unit-marker"
  | "info-button"
  | "app-marker"
  | "signal-loss"
  | "no-candidate"
  | "range";

export interface Rejection {
  kind: RejectionKind;
  gate: RejectionGate;
  detail: string;
}

export type MainScreenResult =
  | { ok: true; reading: GlucoseReading; candidates: number[] }
  | { ok: false; rejection: Rejection };

export interface MainScreenOptions {
  /** Package name stamped on the reading */
  source?: string;
  /** Capture time (default: Date.now()) */
  now?: number;
  keywords?: KeywordTable;
}

const BARE_NUMBER = /^\s*(\d{2,3})\s*$/;

function reject(kind: RejectionKind, gate: RejectionGate, detail: string): MainScreenResult {
  if (kind === "safety") {
    console.warn(`[reader] safety rejection at ${gate}: ${detail}`);
  } else {
    console.log(`[reader] identity-mismatch at ${gate}: ${detail}`);
  }
  return { ok: false, rejection: { kind, gate, detail } };
}

/**
 * Unit of the first string carrying a unit marker
 */
export function findUnit(texts: readonly string[], keywords: KeywordTable): GlucoseUnit | null {
  const units: GlucoseUnit[] = ["mg/dL", "mmol/L"];
  for (const text of texts) {
    const lower = text.toLowerCase();
    for (const unit of units) {
      if (keywords.unitMarkers[unit].some((marker) => lower.includes(marker))) {
        return unit;
      }
    }
  }
  return null;
}

function findAny(texts: readonly string[], needles: readonly string[]): { text: string; needle: string } | null {
  for (const text of texts) {
    const lower = text.toLowerCase();
    const needle = needles.find((candidate) => lower.includes(candidate));
    if (needle !== undefined) return { text, needle };
  }
  return null;
}

/**
 * Standalone 2-3 digit numerals in document order
 */
export function findCandidates(texts: readonly string[]): number[] {
  const candidates: number[] = [];
  for (const text of texts) {
    const match = text.match(BARE_NUMBER);
    if (match) candidates.push(parseInt(match[1], 10));
  }
  return candidates;
}

export function extractMainScreen(root: UiNode, options: MainScreenOptions = {}): MainScreenResult {
  const keywords = options.keywords ?? defaultKeywords();
  const texts = collectText(root);

  const unit = findUnit(texts, keywords);
  if (unit === null) {
    return reject("identity-mismatch", "unit-marker", "no mg/dL or mmol/L text");
  }

  if (findElement(root, "info", keywords) === null) {
    return reject("identity-mismatch", "info-button", "no info button");
  }

  if (findAny(texts, keywords.appMarkers) === null) {
    return reject("identity-mismatch", "app-marker", "no app mode or brand text");
  }

  const signalLoss = findAny(texts, keywords.signalLoss);
  if (signalLoss !== null) {
    return reject("safety", "signal-loss", `'${signalLoss.text}' matches '${signalLoss.needle}'`);
  }

  const candidates = findCandidates(texts);
  if (candidates.length === 0) {
    return reject("safety", "no-candidate", "no standalone glucose value");
  }
  if (candidates.length > 1) {
    console.warn(`[reader] Multiple glucose candidates ${candidates.join(", ")}, using the first`);
  }

  const created = createGlucoseReading({
    value: candidates[0],
    unit,
    trend: determineTrend(texts, keywords),
    source: options.source ?? DEFAULT_SOURCE,
    timestamp: options.now ?? Date.now(),
  });
  if (!created.ok) {
    return reject("safety", "range", created.reason);
  }

  return { ok: true, reading: created.reading, candidates };
}
