/**
 * @pumpscreen/reader
 *
 * Turns UI tree snapshots and graph OCR output from the pump app into
 * validated readings, dialog fields, ages and meal events.
 */

export { MAX_TREE_DEPTH, collectText, valueAfter } from "./text.js";
export { firstMatch, parseDecimal, parseWhole, escapeRegExp, alternation } from "./patterns.js";
export type { PatternRule, PatternMatch } from "./patterns.js";
export {
  DEFAULT_KEYWORDS_PATH,
  buildKeywordTable,
  loadKeywordTable,
  defaultKeywords,
} from "./keywords.js";
export type {
  ElementKind,
  ElementMatcher,
  TrendMatcher,
  KeywordTable,
  DialogLabelKey,
  AgeLabelKey,
} from "./keywords.js";
export { matchesElement, findElement } from "./elements.js";
export { determineTrend } from "./trend.js";
export {
  DEFAULT_SOURCE,
  findUnit,
  findCandidates,
  extractMainScreen,
} from "./main-screen.js";
export type {
  RejectionKind,
  RejectionGate,
  Rejection,
  MainScreenResult,
  MainScreenOptions,
} from "./main-screen.js";
export { buildDialogPatterns, extractDetailsFromTexts, extractDetailDialog } from "./detail-dialog.js";
export type { BolusObservation, DialogPatterns } from "./detail-dialog.js";
export { DURATION_RULES, parseDuration } from "./duration.js";
export { extractAgesFromTexts, extractAgeMenu } from "./age-menu.js";
export type { AgeMenuOptions } from "./age-menu.js";
export {
  TIME_PATTERN,
  CARBS_PATTERN,
  CARBS_RANGE,
  DEFAULT_AXIS_THRESHOLD,
  findAxisThreshold,
  findTimeLabels,
  findCarbMarkers,
  interpolateMinuteOfDay,
  resolveTimestamp,
  interpolateGraphTreatments,
} from "./graph-ocr.js";
export type { CarbMarker, GraphOcrOptions } from "./graph-ocr.js";
export {
  BOLUS_WINDOW_MS,
  MEAL_WINDOW_MS,
  EventDeduplicator,
  BolusDeduplicator,
  MealDeduplicator,
} from "./dedup.js";
