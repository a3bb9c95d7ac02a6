/**
 * Waiting for and closing host surfaces
 */

import type { UiNode } from "@pumpscreen/diabetes";
import { findElement, type ElementKind, type KeywordTable } from "@pumpscreen/reader";
import type { UiHost } from "./host.js";

export const SURFACE_ATTEMPTS = 3;
export const SURFACE_RETRY_MS = 2000;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface AcquireOptions {
  attempts?: number;
  retryDelayMs?: number;
  /** The surface must satisfy this to count */
  accept?: (root: UiNode) => boolean;
  sleep?: Sleep;
}

/**
 * Current root node, retried a bounded number of times.
 * Null when nothing usable appeared.
 */
export async function acquireSurface(host: UiHost, options: AcquireOptions = {}): Promise<UiNode | null> {
  const attempts = options.attempts ?? SURFACE_ATTEMPTS;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const root = await host.getRootNode();
    if (root !== null && (options.accept === undefined || options.accept(root))) {
      return root;
    }
    if (attempt < attempts) {
      await wait(options.retryDelayMs ?? SURFACE_RETRY_MS);
    }
  }

  console.warn(`[surface] No usable surface after ${attempts} attempts`);
  return null;
}

/**
 * Close an opened surface with the first control found, else navigate back
 */
export async function closeSurface(
  host: UiHost,
  root: UiNode | null,
  controls: readonly ElementKind[],
  keywords: KeywordTable
): Promise<void> {
  if (root !== null) {
    for (const kind of controls) {
      const control = findElement(root, kind, keywords);
      if (control !== null && (await host.click(control))) {
        return;
      }
    }
  }
  await host.back();
}
