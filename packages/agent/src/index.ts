/**
 * @pumpscreen/agent
 *
 * Runs reading cycles against a UI host on a schedule
 *
 * @example
 * ```typescript
 * import { createPoller, createReadingCycle, loadConfig } from "@pumpscreen/agent";
 *
 * const config = loadConfig();
 * const cycle = createReadingCycle({ host, ocr, nightscout: config.nightscout ?? undefined }, config);
 * createPoller(cycle.run, { intervalMs: config.readingIntervalMs }).start();
 * ```
 */

export type { ScreenCapture, UiHost, OcrEngine } from "./host.js";
export { SURFACE_ATTEMPTS, SURFACE_RETRY_MS, sleep, acquireSurface, closeSurface } from "./surface.js";
export type { Sleep, AcquireOptions } from "./surface.js";
export { CYCLE_BACKOFF, retryDelay, createCycleBackoff } from "./backoff.js";
export type { BackoffOptions, CycleBackoff } from "./backoff.js";
export { SETTLE_MS, createReadingCycle } from "./cycle.js";
export type {
  CycleSettings,
  CycleDependencies,
  CycleReport,
  StoreOutcome,
  AgeOutcome,
  MealOutcome,
  ReadingCycle,
} from "./cycle.js";
export { createPoller } from "./poller.js";
export type { Poller, PollerOptions } from "./poller.js";
export { parseConfig, loadConfig } from "./config.js";
export type { AgentConfig } from "./config.js";
export { parseUiSnapshot, parseOcrSnapshot, loadUiSnapshot, loadOcrSnapshot } from "./snapshot.js";
