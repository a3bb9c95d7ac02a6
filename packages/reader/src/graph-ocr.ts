/**
 * Meal markers read off the landscape graph by OCR.
 *
 * Time-axis labels ("21:00") sit in one horizontal band near the bottom;
 * carb markers ("30 g") sit above it. A marker's time is linearly
 * interpolated from the two axis labels around its horizontal center.
 */

import { atTimeOfDay, defaultTimezone, MINUTE_MS } from "@pumpscreen/diabetes";
import type { BoundingBox, GraphTreatment, OcrBlock, TimeLabel } from "@pumpscreen/diabetes";

export const TIME_PATTERN = /(\d{2}):(\d{2})/;

/** "30 g" but not "30 mg", and not the "G" of "Glukose" */
export const CARBS_PATTERN = /(?<!m)(\d{1,3})\s*g\b/i;

/** Axis threshold when no time label is visible */
export const DEFAULT_AXIS_THRESHOLD = 500;

const BAND_HEIGHT = 100;
const AXIS_TOLERANCE = 100;
const MINUTES_PER_DAY = 24 * 60;
const MAX_FUTURE_MS = 10 * MINUTE_MS;

export const CARBS_RANGE = { MIN: 1, MAX: 200 } as const;

export interface CarbMarker {
  grams: number;
  x: number;
}

export interface GraphOcrOptions {
  now?: number;
  /** Zone whose calendar date the axis times belong to */
  timezone?: string;
}

interface PositionedBlock {
  text: string;
  box: BoundingBox;
}

function positioned(blocks: readonly OcrBlock[]): PositionedBlock[] {
  const result: PositionedBlock[] = [];
  for (const block of blocks) {
    if (block.boundingBox !== null) result.push({ text: block.text, box: block.boundingBox });
  }
  return result;
}

function centerX(box: BoundingBox): number {
  return Math.trunc((box.left + box.right) / 2);
}

function parseTime(text: string): { hour: number; minute: number } | null {
  const match = text.match(TIME_PATTERN);
  if (!match) return null;
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/**
 * Top edge of the axis band: mean top of the most populated 100px band of
 * time-shaped blocks, less a tolerance
 */
export function findAxisThreshold(blocks: readonly OcrBlock[]): number {
  const bands = new Map<number, number[]>();
  for (const { text, box } of positioned(blocks)) {
    if (parseTime(text) === null) continue;
    const band = Math.floor(box.top / BAND_HEIGHT) * BAND_HEIGHT;
    const tops = bands.get(band) ?? [];
    tops.push(box.top);
    bands.set(band, tops);
  }

  let largest: number[] = [];
  for (const tops of bands.values()) {
    if (tops.length > largest.length) largest = tops;
  }
  if (largest.length === 0) return DEFAULT_AXIS_THRESHOLD;

  const average = Math.trunc(largest.reduce((sum, top) => sum + top, 0) / largest.length);
  return average - AXIS_TOLERANCE;
}

/**
 * Axis labels at or below the threshold, left to right
 */
export function findTimeLabels(blocks: readonly OcrBlock[], threshold: number): TimeLabel[] {
  const labels: TimeLabel[] = [];
  for (const { text, box } of positioned(blocks)) {
    if (box.top < threshold) continue;
    const time = parseTime(text);
    if (time !== null) labels.push({ ...time, x: centerX(box) });
  }
  return labels.sort((a, b) => a.x - b.x);
}

/**
 * Carb markers strictly above the threshold
 */
export function findCarbMarkers(blocks: readonly OcrBlock[], threshold: number): CarbMarker[] {
  const markers: CarbMarker[] = [];
  for (const { text, box } of positioned(blocks)) {
    if (box.top >= threshold) continue;
    const match = text.match(CARBS_PATTERN);
    if (!match) continue;
    const grams = parseInt(match[1], 10);
    if (grams >= CARBS_RANGE.MIN && grams <= CARBS_RANGE.MAX) {
      markers.push({ grams, x: centerX(box) });
    }
  }
  return markers;
}

/**
 * Minute of day at pixel `x`, in [0, 1440). Outside the labelled span the
 * nearest pair of labels is extrapolated. Null with fewer than two labels.
 */
export function interpolateMinuteOfDay(x: number, labels: readonly TimeLabel[]): number | null {
  if (labels.length < 2) return null;

  let leftIndex: number;
  if (x < labels[0].x) {
    leftIndex = 0;
  } else if (x > labels[labels.length - 1].x) {
    leftIndex = labels.length - 2;
  } else {
    leftIndex = labels.findIndex((label, i) => i < labels.length - 1 && label.x <= x && labels[i + 1].x >= x);
    if (leftIndex < 0) return null;
  }
  const left = labels[leftIndex];
  const right = labels[leftIndex + 1];

  const xRange = right.x - left.x;
  if (xRange <= 0) return null;

  const leftMinutes = left.hour * 60 + left.minute;
  let rightMinutes = right.hour * 60 + right.minute;
  // Axis crosses midnight
  if (rightMinutes < leftMinutes) rightMinutes += MINUTES_PER_DAY;

  const fraction = (x - left.x) / xRange;
  const minutes = leftMinutes + (rightMinutes - leftMinutes) * fraction;
  const normalized = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return Math.floor(normalized);
}

/**
 * Place a minute of day on today's date, or yesterday's when today's would
 * be more than ten minutes ahead of `now`
 */
export function resolveTimestamp(minuteOfDay: number, now: number, timezone: string): number {
  const today = atTimeOfDay(now, minuteOfDay, timezone);
  if (today > now + MAX_FUTURE_MS) {
    return atTimeOfDay(now, minuteOfDay, timezone, -1);
  }
  return today;
}

/**
 * Carb treatments with estimated times. Markers are dropped, not guessed,
 * when the axis cannot be read.
 */
export function interpolateGraphTreatments(
  blocks: readonly OcrBlock[],
  options: GraphOcrOptions = {}
): GraphTreatment[] {
  const now = options.now ?? Date.now();
  const timezone = options.timezone ?? defaultTimezone();

  const threshold = findAxisThreshold(blocks);
  const labels = findTimeLabels(blocks, threshold);
  const markers = findCarbMarkers(blocks, threshold);

  if (labels.length < 2) {
    if (markers.length > 0) {
      console.warn(`[reader] ${markers.length} carb marker(s) dropped: ${labels.length} time label(s) on axis`);
    }
    return [];
  }

  const treatments: GraphTreatment[] = [];
  for (const marker of markers) {
    const minuteOfDay = interpolateMinuteOfDay(marker.x, labels);
    if (minuteOfDay === null) continue;
    treatments.push({
      insulinUnits: null,
      carbsGrams: marker.grams,
      timestamp: resolveTimestamp(minuteOfDay, now, timezone),
    });
  }
  return treatments;
}
