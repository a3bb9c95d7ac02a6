/**
 * Command-line option parsers
 */

import { InvalidArgumentError } from "commander";

/** ISO 8601 time as epoch ms */
export function parseTime(value: string): number {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Invalid time: ${value}`);
  }
  return parsed;
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Not a positive whole number: ${value}`);
  }
  return parsed;
}

export function parseHours(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Not a positive number of hours: ${value}`);
  }
  return parsed;
}
