/**
 * Calendar helpers that respect a configured timezone
 */

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * The host's own timezone
 */
export function defaultTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Format a timestamp as YYYY-MM-DD in the given timezone
 */
export function formatDateInTimezone(timestampMs: number, timezone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(new Date(timestampMs));
}

/**
 * Shift a YYYY-MM-DD string by whole days
 */
export function addDays(dateStr: string, days: number): string {
  const [year, month, day] = dateStr.split("-").map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return shifted.toISOString().slice(0, 10);
}

/**
 * Zone offset (local wall clock minus UTC) at an instant
 */
export function zoneOffsetMs(timestampMs: number, timezone: string): number {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    Number(formatter.formatToParts(new Date(timestampMs)).find((p) => p.type === type)?.value ?? 0);

  const wallAsUtc = Date.UTC(part("year"), part("month") - 1, part("day"), part("hour"), part("minute"), part("second"));
  return wallAsUtc - Math.floor(timestampMs / 1000) * 1000;
}

/**
 * Timestamp of a time of day on the calendar date of `referenceMs`.
 * Resolved against the offset in force at that wall-clock time, so the
 * result holds on days the zone changes offset.
 */
export function atTimeOfDay(
  referenceMs: number,
  minuteOfDay: number,
  timezone: string,
  dayOffset = 0
): number {
  const [year, month, day] = addDays(formatDateInTimezone(referenceMs, timezone), dayOffset)
    .split("-")
    .map(Number);
  const wallAsUtc = Date.UTC(year, month - 1, day) + minuteOfDay * MINUTE_MS;

  const first = wallAsUtc - zoneOffsetMs(wallAsUtc, timezone);
  return wallAsUtc - zoneOffsetMs(first, timezone);
}
