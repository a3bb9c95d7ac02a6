/**
 * Decide whether a locally observed sensor start or insulin fill time
 * needs to be pushed to the remote service
 */

import { HOUR_MS } from "@pumpscreen/diabetes";

export const DEFAULT_AGE_TOLERANCE_HOURS = 1.5;

export type AgeDecision =
  | { action: "uploaded-no-previous" }
  | { action: "updated"; diffHours: number }
  | { action: "in-sync"; diffHours: number };

export function reconcileAge(
  localTime: number,
  remoteTime: number | null,
  toleranceHours: number = DEFAULT_AGE_TOLERANCE_HOURS
): AgeDecision {
  if (remoteTime === null) {
    return { action: "uploaded-no-previous" };
  }

  const diffMs = Math.abs(localTime - remoteTime);
  const diffHours = diffMs / HOUR_MS;

  if (diffMs > toleranceHours * HOUR_MS) {
    return { action: "updated", diffHours };
  }
  return { action: "in-sync", diffHours };
}

/** Whether the decision calls for a write */
export function needsUpload(decision: AgeDecision): boolean {
  return decision.action !== "in-sync";
}

/**
 * Outcome string, e.g. "updated (diff was 3.0h)"
 *
 * @param label - Remote name of the age being reconciled (SAGE, IAGE)
 */
export function describeAgeDecision(decision: AgeDecision, label: string): string {
  switch (decision.action) {
    case "uploaded-no-previous":
      return `uploaded (no previous ${label})`;
    case "updated":
      return `updated (diff was ${decision.diffHours.toFixed(1)}h)`;
    case "in-sync":
      return "in_sync";
  }
}
