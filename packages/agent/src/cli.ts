#!/usr/bin/env node
/**
 * pumpscreen CLI
 */

import { program } from "commander";
import {
  calculateGlucoseStats,
  createDocClient,
  createReadingStore,
  HOUR_MS,
  type ReadingStore,
} from "@pumpscreen/diabetes";
import { checkStatus, createPumpEventDetector, syncPendingReadings } from "@pumpscreen/nightscout";
import {
  extractAgeMenu,
  extractDetailDialog,
  extractMainScreen,
  interpolateGraphTreatments,
} from "@pumpscreen/reader";
import { loadConfig, type AgentConfig } from "./config.js";
import { parseCount, parseHours, parseTime } from "./options.js";
import { loadOcrSnapshot, loadUiSnapshot } from "./snapshot.js";

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function config(): AgentConfig {
  return loadConfig(program.opts<{ env?: string }>().env);
}

function openStore(cfg: AgentConfig): ReadingStore {
  if (!cfg.readingsTable) {
    throw new Error("READINGS_TABLE is not set");
  }
  const docClient = createDocClient({ endpoint: cfg.dynamoEndpoint ?? undefined });
  return createReadingStore(docClient, cfg.readingsTable, { retentionDays: cfg.retentionDays });
}

program
  .name("pumpscreen")
  .description("Read pump app snapshots and sync readings to Nightscout")
  .version("0.1.0")
  .option("--env <path>", "Path to a .env file");

program
  .command("screen <file>")
  .description("Extract a reading from a main screen UI snapshot")
  .option("--at <time>", "Capture time (ISO 8601)", parseTime)
  .option("--source <package>", "Source identifier")
  .action((file: string, options: { at?: number; source?: string }) => {
    print(extractMainScreen(loadUiSnapshot(file), { now: options.at ?? Date.now(), source: options.source }));
  });

program
  .command("dialog <file>")
  .description("Extract pump details from an info dialog UI snapshot")
  .action((file: string) => {
    print(extractDetailDialog(loadUiSnapshot(file)));
  });

program
  .command("menu <file>")
  .description("Extract sensor and insulin ages from a menu UI snapshot")
  .option("--at <time>", "Capture time (ISO 8601)", parseTime)
  .action((file: string, options: { at?: number }) => {
    print(extractAgeMenu(loadUiSnapshot(file), { now: options.at ?? Date.now() }));
  });

program
  .command("graph <file>")
  .description("Place carb markers from graph OCR output on the time axis")
  .option("--at <time>", "Capture time (ISO 8601)", parseTime)
  .option("--timezone <zone>", "Zone of the axis times")
  .action((file: string, options: { at?: number; timezone?: string }) => {
    print(
      interpolateGraphTreatments(loadOcrSnapshot(file), {
        now: options.at ?? Date.now(),
        timezone: options.timezone,
      })
    );
  });

program
  .command("sync")
  .description("Upload stored readings not yet sent to Nightscout")
  .option("--limit <count>", "Maximum readings to upload", parseCount, 100)
  .action(async (options: { limit: number }) => {
    const cfg = config();
    if (!cfg.nightscout) {
      throw new Error("NIGHTSCOUT_URL is not set");
    }

    const result = await syncPendingReadings(cfg.nightscout, openStore(cfg), {
      limit: options.limit,
      detector: createPumpEventDetector(),
    });
    print(result);
    if (result.failed > 0) {
      process.exitCode = 1;
    }
  });

program
  .command("status")
  .description("Check the Nightscout connection")
  .action(async () => {
    const cfg = config();
    if (!cfg.nightscout) {
      throw new Error("NIGHTSCOUT_URL is not set");
    }
    print(await checkStatus(cfg.nightscout));
  });

program
  .command("stats")
  .description("Time in range over recent stored readings")
  .option("--hours <hours>", "Window length", parseHours, 24)
  .action(async (options: { hours: number }) => {
    const cfg = config();
    const end = Date.now();
    const readings = await openStore(cfg).listBetween(end - options.hours * HOUR_MS, end);
    print(calculateGlucoseStats(readings, cfg.thresholds));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
