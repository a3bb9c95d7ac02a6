/**
 * Ordered pattern lists: try each rule in priority order, first success wins
 */

export interface PatternRule<T> {
  /** Shown in logs */
  name: string;
  pattern: RegExp;
  /** Return null to fall through to the next rule */
  extract: (match: RegExpMatchArray) => T | null;
}

export interface PatternMatch<T> {
  rule: string;
  value: T;
}

export function firstMatch<T>(rules: readonly PatternRule<T>[], text: string): PatternMatch<T> | null {
  for (const rule of rules) {
    const match = text.match(rule.pattern);
    if (match === null) continue;
    const value = rule.extract(match);
    if (value !== null) {
      return { rule: rule.name, value };
    }
  }
  return null;
}

/**
 * Parse "2,5" or "2.5". Returns null for anything that is not one number.
 */
export function parseDecimal(raw: string | undefined): number | null {
  if (raw === undefined || raw === "") return null;
  const value = Number(raw.replace(/,/g, "."));
  return Number.isFinite(value) ? value : null;
}

export function parseWhole(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  return parseInt(raw, 10);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * "(?:A|B|C)" over literal labels
 */
export function alternation(labels: readonly string[]): string {
  return `(?:${labels.map(escapeRegExp).join("|")})`;
}
