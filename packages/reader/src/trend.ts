/**
 * Trend arrow recognition
 */

import type { GlucoseTrend } from "@pumpscreen/diabetes";
import { defaultKeywords } from "./keywords.js";
import type { KeywordTable } from "./keywords.js";

/**
 * Trend of the first string that shows an arrow glyph or is an arrow's
 * accessible label. Double arrows are listed before single ones.
 * The main screen often omits the flat arrow, so no arrow means flat.
 */
export function determineTrend(
  texts: readonly string[],
  keywords: KeywordTable = defaultKeywords()
): GlucoseTrend {
  for (const text of texts) {
    const whole = text.trim().toLowerCase();
    for (const entry of keywords.trends) {
      if (entry.glyphs.some((glyph) => text.includes(glyph)) || entry.labels.includes(whole)) {
        return entry.trend;
      }
    }
  }
  return "flat";
}
