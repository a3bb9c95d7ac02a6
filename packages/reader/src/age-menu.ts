/**
 * Sensor and reservoir ages from the navigation menu.
 *
 * Labels and values are sibling nodes, so each label's value is the next
 * collected string (see valueAfter).
 */

import type { AgeInfo, InsulinInfo, SensorInfo, UiNode } from "@pumpscreen/diabetes";
import { parseDuration } from "./duration.js";
import { defaultKeywords } from "./keywords.js";
import type { KeywordTable } from "./keywords.js";
import { collectText, valueAfter } from "./text.js";

export interface AgeMenuOptions {
  now?: number;
  keywords?: KeywordTable;
}

interface ParsedAge {
  durationMs: number;
  text: string;
}

function isLabel(text: string, labels: readonly string[]): boolean {
  return labels.includes(text.trim().toLowerCase());
}

function ageAfter(texts: readonly string[], index: number): ParsedAge | null {
  const value = valueAfter(texts, index);
  if (value === null) return null;
  const durationMs = parseDuration(value);
  return durationMs === null ? null : { durationMs, text: value };
}

/**
 * Serial shown after a known sensor brand, unless the next string is a
 * "since" label rather than a name
 */
function serialAfter(texts: readonly string[], index: number, keywords: KeywordTable): string | null {
  const value = valueAfter(texts, index);
  if (value === null || value.trim() === "") return null;
  const lower = value.toLowerCase();
  if (keywords.ageLabels.sinceWords.some((word) => lower.includes(word))) return null;
  return value.trim();
}

export function extractAgesFromTexts(texts: readonly string[], options: AgeMenuOptions = {}): AgeInfo {
  const keywords = options.keywords ?? defaultKeywords();
  const now = options.now ?? Date.now();
  const labels = keywords.ageLabels;

  let sensorStart: ParsedAge | null = null;
  let sensorEnd: ParsedAge | null = null;
  let insulinFill: ParsedAge | null = null;
  let serial: string | null = null;

  for (let index = 0; index < texts.length; index++) {
    const text = texts[index];
    if (sensorStart === null && isLabel(text, labels.sensorStart)) {
      sensorStart = ageAfter(texts, index);
    } else if (insulinFill === null && isLabel(text, labels.insulinFill)) {
      insulinFill = ageAfter(texts, index);
    } else if (sensorEnd === null && isLabel(text, labels.sensorEnd)) {
      sensorEnd = ageAfter(texts, index);
    } else if (serial === null) {
      const lower = text.toLowerCase();
      if (labels.sensorBrands.some((brand) => lower.includes(brand))) {
        serial = serialAfter(texts, index, keywords);
      }
    }
  }

  return {
    sensor: buildSensorInfo(sensorStart, sensorEnd, serial, now),
    insulin: buildInsulinInfo(insulinFill, now),
  };
}

function buildSensorInfo(
  start: ParsedAge | null,
  end: ParsedAge | null,
  serial: string | null,
  now: number
): SensorInfo | null {
  if (start === null) return null;
  return {
    serial,
    startTime: now - start.durationMs,
    endTime: end === null ? null : now + end.durationMs,
    durationText: start.text,
  };
}

function buildInsulinInfo(fill: ParsedAge | null, now: number): InsulinInfo | null {
  if (fill === null) return null;
  return {
    fillTime: now - fill.durationMs,
    durationText: fill.text,
  };
}

/**
 * Sensor and insulin info from the menu; either may be null
 */
export function extractAgeMenu(root: UiNode, options: AgeMenuOptions = {}): AgeInfo {
  const ages = extractAgesFromTexts(collectText(root), options);
  console.log(
    `[reader] Menu ages: sensor=${ages.sensor ? ages.sensor.durationText : "none"}, ` +
      `insulin=${ages.insulin ? ages.insulin.durationText : "none"}`
  );
  return ages;
}
