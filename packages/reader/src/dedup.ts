/**
 * Suppress events the pump app keeps showing across polling cycles.
 *
 * The app re-displays its last bolus (and the graph its meals) until a new
 * one happens, with no event id. Identity is therefore "same amount, same
 * implied time within a window". State is owned by one instance and is only
 * touched by the polling cycle, which never overlaps itself.
 */

import { MINUTE_MS, withoutBolus } from "@pumpscreen/diabetes";
import type { GlucoseReading, GraphTreatment } from "@pumpscreen/diabetes";

export const BOLUS_WINDOW_MS = 2 * MINUTE_MS;
export const MEAL_WINDOW_MS = 30 * MINUTE_MS;

interface AcceptedEvent {
  amount: number;
  timestamp: number;
}

/**
 * Remembers the last accepted (amount, time) pair
 */
export class EventDeduplicator {
  private readonly windowMs: number;
  private last: AcceptedEvent | null = null;

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  /**
   * True if this is the event accepted last time. A new event replaces the
   * remembered one.
   */
  isDuplicate(amount: number, timestamp: number): boolean {
    if (
      this.last !== null &&
      this.last.amount === amount &&
      Math.abs(this.last.timestamp - timestamp) < this.windowMs
    ) {
      return true;
    }
    this.last = { amount, timestamp };
    return false;
  }

  lastAccepted(): AcceptedEvent | null {
    return this.last;
  }

  reset(): void {
    this.last = null;
  }
}

export class BolusDeduplicator {
  private readonly events = new EventDeduplicator(BOLUS_WINDOW_MS);

  /**
   * @param minutesAgo - bolus age as shown in the dialog
   * @param now - when the dialog was read
   */
  isDuplicate(amount: number, minutesAgo: number, now: number): boolean {
    return this.events.isDuplicate(amount, now - minutesAgo * MINUTE_MS);
  }

  /**
   * The reading as it should be stored: bolus fields stripped when the
   * bolus was already recorded
   */
  filter(reading: GlucoseReading, now: number = reading.timestamp): GlucoseReading {
    const { bolusAmount, bolusMinutesAgo } = reading;
    if (bolusAmount === undefined || bolusMinutesAgo === undefined) return reading;

    if (this.isDuplicate(bolusAmount, bolusMinutesAgo, now)) {
      console.log(`[dedup] Bolus ${bolusAmount} U (${bolusMinutesAgo} min ago) already recorded`);
      return withoutBolus(reading);
    }
    return reading;
  }

  reset(): void {
    this.events.reset();
  }
}

export class MealDeduplicator {
  private readonly events = new EventDeduplicator(MEAL_WINDOW_MS);

  /**
   * The treatment if it is new, null if the same meal was already sent
   */
  filter(treatment: GraphTreatment): GraphTreatment | null {
    if (treatment.carbsGrams === null) return null;
    if (this.events.isDuplicate(treatment.carbsGrams, treatment.timestamp)) {
      console.log(`[dedup] Meal ${treatment.carbsGrams} g already recorded`);
      return null;
    }
    return treatment;
  }

  reset(): void {
    this.events.reset();
  }
}
