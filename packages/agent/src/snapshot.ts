/**
 * UI tree and OCR snapshots saved as JSON
 */

import { readFileSync } from "fs";
import { ocrBlocksSchema, uiNodeSchema, type OcrBlock, type UiNode } from "@pumpscreen/diabetes";
import type { ZodType, ZodTypeDef } from "zod";

function parseWith<T, I>(schema: ZodType<T, ZodTypeDef, I>, data: unknown, label: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid ${label}: ${problems.join("; ")}`);
  }
  return parsed.data;
}

export function parseUiSnapshot(data: unknown): UiNode {
  return parseWith(uiNodeSchema, data, "UI snapshot");
}

/**
 * OCR output, either a bare block array or `{ "blocks": [...] }`
 */
export function parseOcrSnapshot(data: unknown): OcrBlock[] {
  const blocks =
    data !== null && typeof data === "object" && !Array.isArray(data) && "blocks" in data
      ? data.blocks
      : data;
  return parseWith(ocrBlocksSchema, blocks, "OCR snapshot");
}

function readJson(path: string): unknown {
  const content = readFileSync(path, "utf-8");
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function loadUiSnapshot(path: string): UiNode {
  return parseUiSnapshot(readJson(path));
}

export function loadOcrSnapshot(path: string): OcrBlock[] {
  return parseOcrSnapshot(readJson(path));
}
