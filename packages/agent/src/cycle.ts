/**
 * One polling cycle against the pump app.
 *
 * Main screen, then the info dialog, then (rate limited) the navigation
 * menu ages, then the landscape graph. Each step after the main screen is
 * optional: when it fails the cycle keeps what it already has. Anything
 * the cycle opens is closed again before the step returns.
 */

import {
  withPumpDetails,
  type AgeInfo,
  type GlucoseReading,
  type GraphTreatment,
  type PumpDetailField,
  type ReadingStore,
  type UiNode,
} from "@pumpscreen/diabetes";
import {
  createPumpEventDetector,
  syncInsulinAge,
  syncMeal,
  syncReading,
  syncSensorAge,
  type AgeSyncResult,
  type MealSyncResult,
  type NightscoutConfig,
  type ReadingSyncResult,
} from "@pumpscreen/nightscout";
import {
  BolusDeduplicator,
  MealDeduplicator,
  defaultKeywords,
  extractAgeMenu,
  extractDetailDialog,
  extractMainScreen,
  findElement,
  interpolateGraphTreatments,
  type KeywordTable,
  type Rejection,
} from "@pumpscreen/reader";
import type { OcrEngine, UiHost } from "./host.js";
import { acquireSurface, closeSurface, sleep, type Sleep } from "./surface.js";

/** Waits after each UI transition before its content is read */
export const SETTLE_MS = {
  dialog: 1500,
  menu: 1000,
  graph: 4000,
  leaveGraph: 500,
} as const;

export interface CycleSettings {
  /** Source identifier stamped on readings */
  source: string;
  /** Zone the graph's axis times belong to */
  timezone: string;
  minReadGapMs: number;
  ageCheckIntervalMs: number;
  ageToleranceHours: number;
  graphScanEnabled: boolean;
  /** Consecutive safety rejections before an error is logged */
  safetyAlertThreshold: number;
}

export interface CycleDependencies {
  host: UiHost;
  ocr?: OcrEngine;
  store?: Pick<ReadingStore, "save" | "markSynced">;
  nightscout?: NightscoutConfig;
  keywords?: KeywordTable;
  sleep?: Sleep;
  clock?: () => number;
}

export type StoreOutcome = "written" | "duplicate" | "failed";

export interface AgeOutcome {
  info: AgeInfo;
  sensor: AgeSyncResult | null;
  insulin: AgeSyncResult | null;
}

export interface MealOutcome {
  /** Carb markers placed on the time axis */
  markers: number;
  /** Latest marker, null when there was none or it was already sent */
  accepted: GraphTreatment | null;
  upload: MealSyncResult | null;
}

export interface CycleReport {
  status: "read" | "rejected" | "no-surface" | "too-soon";
  capturedAt: number;
  reading: GlucoseReading | null;
  rejection: Rejection | null;
  dialogFields: PumpDetailField[];
  stored: StoreOutcome | null;
  sync: ReadingSyncResult | null;
  ages: AgeOutcome | null;
  meal: MealOutcome | null;
}

export interface ReadingCycle {
  run: () => Promise<CycleReport>;
  consecutiveSafetyRejections: () => number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyReport(status: CycleReport["status"], capturedAt: number): CycleReport {
  return {
    status,
    capturedAt,
    reading: null,
    rejection: null,
    dialogFields: [],
    stored: null,
    sync: null,
    ages: null,
    meal: null,
  };
}

/**
 * Run an optional step, logging and returning null when it throws
 */
async function optionalStep<T>(name: string, step: () => Promise<T>): Promise<T | null> {
  try {
    return await step();
  } catch (error) {
    console.error(`[cycle] ${name} failed: ${errorMessage(error)}`);
    return null;
  }
}

export function createReadingCycle(deps: CycleDependencies, settings: CycleSettings): ReadingCycle {
  const { host } = deps;
  const keywords = deps.keywords ?? defaultKeywords();
  const wait = deps.sleep ?? sleep;
  const clock = deps.clock ?? Date.now;

  const bolusDedup = new BolusDeduplicator();
  const mealDedup = new MealDeduplicator();
  const detector = createPumpEventDetector();

  let lastReadAt: number | null = null;
  let lastAgeCheckAt: number | null = null;
  let safetyRejections = 0;

  const hasControl =
    (kind: "menu" | "rotate") =>
    (root: UiNode): boolean =>
      findElement(root, kind, keywords) !== null;

  async function readDialog(root: UiNode, reading: GlucoseReading): Promise<GlucoseReading> {
    const info = findElement(root, "info", keywords);
    if (info === null || !(await host.click(info))) {
      console.log("[cycle] Info button unavailable, main screen only");
      return reading;
    }

    let dialog: UiNode | null = null;
    try {
      await wait(SETTLE_MS.dialog);
      dialog = await acquireSurface(host, { sleep: wait });
      if (dialog === null) return reading;
      return withPumpDetails(reading, extractDetailDialog(dialog, keywords));
    } finally {
      await closeSurface(host, dialog, ["close"], keywords);
    }
  }

  async function readAges(now: number): Promise<AgeInfo | null> {
    const root = await acquireSurface(host, { sleep: wait, accept: hasControl("menu") });
    const menuButton = root === null ? null : findElement(root, "menu", keywords);
    if (menuButton === null || !(await host.click(menuButton))) {
      console.log("[cycle] Menu button unavailable, skipping age check");
      return null;
    }

    let menu: UiNode | null = null;
    try {
      await wait(SETTLE_MS.menu);
      menu = await acquireSurface(host, { sleep: wait });
      return menu === null ? null : extractAgeMenu(menu, { now, keywords });
    } finally {
      await closeSurface(host, menu, ["close", "back"], keywords);
    }
  }

  async function syncAges(config: NightscoutConfig, info: AgeInfo): Promise<AgeOutcome> {
    return {
      info,
      sensor: info.sensor ? await syncSensorAge(config, info.sensor, settings.ageToleranceHours) : null,
      insulin: info.insulin ? await syncInsulinAge(config, info.insulin, settings.ageToleranceHours) : null,
    };
  }

  async function readGraph(ocr: OcrEngine, now: number): Promise<GraphTreatment[] | null> {
    const root = await acquireSurface(host, { sleep: wait, accept: hasControl("rotate") });
    const rotate = root === null ? null : findElement(root, "rotate", keywords);
    if (rotate === null || !(await host.click(rotate))) {
      console.log("[cycle] Rotate button unavailable, skipping graph");
      return null;
    }

    try {
      await wait(SETTLE_MS.graph);
      const capture = await host.captureScreen();
      if (capture === null) {
        console.warn("[cycle] Screen capture unavailable");
        return null;
      }
      const blocks = await ocr.recognize(capture);
      return interpolateGraphTreatments(blocks, { now, timezone: settings.timezone });
    } finally {
      await wait(SETTLE_MS.leaveGraph);
      const landscape = await host.getRootNode().catch((error: unknown) => {
        console.warn(`[cycle] Graph view unreadable on leaving: ${errorMessage(error)}`);
        return null;
      });
      await closeSurface(host, landscape, ["rotate"], keywords);
    }
  }

  async function handleMeal(config: NightscoutConfig, treatments: GraphTreatment[]): Promise<MealOutcome> {
    let latest: GraphTreatment | null = null;
    for (const treatment of treatments) {
      if (treatment.carbsGrams !== null && (latest === null || treatment.timestamp > latest.timestamp)) {
        latest = treatment;
      }
    }

    const accepted = latest === null ? null : mealDedup.filter(latest);
    return {
      markers: treatments.length,
      accepted,
      upload: accepted === null ? null : await syncMeal(config, accepted),
    };
  }

  function recordRejection(rejection: Rejection): void {
    if (rejection.kind !== "safety") return;
    safetyRejections++;
    if (safetyRejections === settings.safetyAlertThreshold) {
      console.error(
        `[cycle] ${safetyRejections} consecutive safety rejections (last at ${rejection.gate}: ${rejection.detail}); check sensor and pump`
      );
    }
  }

  async function run(): Promise<CycleReport> {
    const now = clock();

    if (lastReadAt !== null && now - lastReadAt < settings.minReadGapMs) {
      return emptyReport("too-soon", now);
    }

    const root = await acquireSurface(host, { sleep: wait });
    if (root === null) {
      return emptyReport("no-surface", now);
    }

    const main = extractMainScreen(root, { source: settings.source, now, keywords });
    if (!main.ok) {
      recordRejection(main.rejection);
      return { ...emptyReport("rejected", now), rejection: main.rejection };
    }

    lastReadAt = now;
    safetyRejections = 0;

    const report = emptyReport("read", now);
    const withDialog = (await optionalStep("dialog", () => readDialog(root, main.reading))) ?? main.reading;
    report.dialogFields = Object.keys(withDialog).filter(
      (key): key is PumpDetailField => !(key in main.reading)
    );

    const reading = bolusDedup.filter(withDialog, now);
    report.reading = reading;
    console.log(
      `[cycle] Reading ${reading.value} ${reading.unit} ${reading.trend}` +
        (report.dialogFields.length > 0 ? ` with ${report.dialogFields.join(", ")}` : "")
    );

    const { store, nightscout, ocr } = deps;

    if (store) {
      try {
        report.stored = await store.save(reading);
      } catch (error) {
        console.error(`[cycle] ${errorMessage(error)}`);
        report.stored = "failed";
      }
    }

    if (nightscout) {
      report.sync = await syncReading(nightscout, reading, { detector });
      if (store && report.stored === "written" && report.sync.ok) {
        await optionalStep("mark synced", () => store.markSynced(reading.timestamp));
      }

      if (lastAgeCheckAt === null || now - lastAgeCheckAt >= settings.ageCheckIntervalMs) {
        lastAgeCheckAt = now;
        const info = await optionalStep("age menu", () => readAges(now));
        if (info !== null) {
          report.ages = await syncAges(nightscout, info);
        }
      }

      if (settings.graphScanEnabled && ocr) {
        const treatments = await optionalStep("graph", () => readGraph(ocr, now));
        if (treatments !== null) {
          report.meal = await handleMeal(nightscout, treatments);
        }
      }
    }

    return report;
  }

  return {
    run,
    consecutiveSafetyRejections: () => safetyRejections,
  };
}
