/**
 * Events read off the landscape glucose graph
 */

export interface GraphTreatment {
  insulinUnits: number | null;
  carbsGrams: number | null;
  /** Estimated event time (Unix ms) */
  timestamp: number;
}

export function hasInsulin(treatment: GraphTreatment): boolean {
  return treatment.insulinUnits !== null && treatment.insulinUnits > 0;
}

export function hasCarbs(treatment: GraphTreatment): boolean {
  return treatment.carbsGrams !== null && treatment.carbsGrams > 0;
}

export function hasBoth(treatment: GraphTreatment): boolean {
  return hasInsulin(treatment) && hasCarbs(treatment);
}

/**
 * An "HH:MM" label on the graph's time axis
 */
export interface TimeLabel {
  hour: number;
  minute: number;
  /** Horizontal center in screenshot pixels */
  x: number;
}
