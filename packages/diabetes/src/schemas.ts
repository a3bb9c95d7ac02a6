/**
 * zod schemas for JSON that crosses a process boundary:
 * UI tree dumps, OCR output and stored readings
 */

import { z } from "zod";
import type { UiNode } from "./models/index.js";

interface UiNodeInput {
  text?: string | null;
  contentDescription?: string | null;
  className?: string | null;
  viewId?: string | null;
  clickable?: boolean;
  children?: UiNodeInput[];
}

export const uiNodeSchema: z.ZodType<UiNode, z.ZodTypeDef, UiNodeInput> = z.lazy(() =>
  z.object({
    text: z.string().nullable().default(null),
    contentDescription: z.string().nullable().default(null),
    className: z.string().nullable().default(null),
    viewId: z.string().nullable().default(null),
    clickable: z.boolean().default(false),
    children: z.array(uiNodeSchema).default([]),
  })
);

export const boundingBoxSchema = z.object({
  left: z.number(),
  top: z.number(),
  right: z.number(),
  bottom: z.number(),
});

export const ocrBlockSchema = z.object({
  text: z.string(),
  boundingBox: boundingBoxSchema.nullable().default(null),
});

export const ocrBlocksSchema = z.array(ocrBlockSchema);

export const glucoseUnitSchema = z.enum(["mg/dL", "mmol/L"]);

export const glucoseTrendSchema = z.enum([
  "doubleUp",
  "singleUp",
  "slightUp",
  "flat",
  "slightDown",
  "singleDown",
  "doubleDown",
  "unknown",
]);

export const pumpDetailsSchema = z.object({
  activeInsulin: z.number().optional(),
  basalRate: z.number().optional(),
  reservoir: z.number().optional(),
  pumpBattery: z.number().optional(),
  bolusAmount: z.number().optional(),
  bolusMinutesAgo: z.number().optional(),
  pumpConnectionMinutesAgo: z.number().optional(),
  sensorDataMinutesAgo: z.number().optional(),
  glucoseTarget: z.number().optional(),
  insulinToday: z.number().optional(),
  insulinYesterday: z.number().optional(),
});

export const storedReadingSchema = pumpDetailsSchema.extend({
  value: z.number(),
  unit: glucoseUnitSchema,
  trend: glucoseTrendSchema,
  source: z.string(),
  timestamp: z.number(),
});

export type StoredReading = z.infer<typeof storedReadingSchema>;
