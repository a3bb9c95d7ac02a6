/**
 * Schedules reading cycles one after another
 */

import { createCycleBackoff, type BackoffOptions } from "./backoff.js";
import type { CycleReport } from "./cycle.js";

export interface PollerOptions {
  intervalMs: number;
  /** Retry schedule after a cycle throws */
  backoff?: BackoffOptions;
  onReport?: (report: CycleReport) => void;
}

export interface Poller {
  start: () => void;
  /** Cancel the pending cycle; a running one finishes but schedules nothing */
  stop: () => void;
  isRunning: () => boolean;
}

/**
 * Run `runCycle` every `intervalMs`. The next cycle is only scheduled once
 * the previous one has settled, so cycles never overlap, including across
 * a stop and restart while a cycle is in flight.
 */
export function createPoller(runCycle: () => Promise<CycleReport>, options: PollerOptions): Poller {
  const backoff = createCycleBackoff(options.backoff);
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;
  let inFlight = false;
  // Bumped by stop(); a tick from an earlier generation hands straight over to the current one
  let generation = 0;

  const schedule = (delay: number) => {
    timer = setTimeout(() => {
      timer = null;
      tick(generation).catch((error: unknown) => {
        console.error("[poller] Unexpected error:", error);
      });
    }, delay);
  };

  const tick = async (ownGeneration: number) => {
    let delay = options.intervalMs;
    inFlight = true;

    try {
      const report = await runCycle();
      backoff.reset();
      options.onReport?.(report);
    } catch (error) {
      const message = error instanceof Error ? error.message : error;
      const retry = backoff.failed();
      if (retry === null && ownGeneration === generation) {
        console.error("[poller] Too many failed cycles, stopping:", message);
        running = false;
        return;
      }
      if (retry !== null) {
        delay = retry;
        console.error(`[poller] Cycle failed (attempt ${backoff.failures()}), retrying in ${delay}ms:`, message);
      }
    } finally {
      inFlight = false;
    }

    if (!running) return;
    // Restarted while this cycle ran: the new generation starts now
    schedule(ownGeneration === generation ? delay : 0);
  };

  return {
    start: () => {
      if (running) return;
      running = true;
      backoff.reset();
      console.log(`[poller] Polling every ${options.intervalMs / 1000}s`);
      if (!inFlight) schedule(0);
    },
    stop: () => {
      running = false;
      generation++;
      if (timer !== null) {
        clearTimeout(timer);
        timer = null;
      }
    },
    isRunning: () => running,
  };
}
