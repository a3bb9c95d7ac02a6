/**
 * Locate the controls the agent clicks: info, close, menu, back, rotate
 */

import type { UiNode } from "@pumpscreen/diabetes";
import { defaultKeywords } from "./keywords.js";
import type { ElementKind, ElementMatcher, KeywordTable } from "./keywords.js";

function containsAny(value: string, needles: readonly string[]): boolean {
  return value !== "" && needles.some((needle) => value.includes(needle));
}

/**
 * Whether a clickable node carries any keyword for the matcher
 */
export function matchesElement(node: UiNode, matcher: ElementMatcher): boolean {
  if (!node.clickable) return false;

  const label = node.contentDescription?.toLowerCase() ?? "";
  const text = node.text?.toLowerCase() ?? "";
  const id = node.viewId?.toLowerCase() ?? "";

  return (
    containsAny(label, matcher.labels) ||
    containsAny(text, matcher.texts) ||
    matcher.exactTexts.includes(text.trim()) ||
    containsAny(id, matcher.ids)
  );
}

interface ElementMatch {
  node: UiNode;
  depth: number;
}

function search(node: UiNode, depth: number, matcher: ElementMatcher): ElementMatch | null {
  if (depth > matcher.maxDepth) return null;

  let best: ElementMatch | null = matchesElement(node, matcher) ? { node, depth } : null;
  if (best !== null && matcher.strategy === "first") return best;

  for (const child of node.children) {
    const found = search(child, depth + 1, matcher);
    if (found === null) continue;
    if (matcher.strategy === "first") return found;
    if (best === null || found.depth > best.depth) best = found;
  }
  return best;
}

/**
 * First matching node in pre-order, or the deepest one for "deepest" matchers
 * (ties go to the earlier node). Null means the control is not on screen.
 */
export function findElement(
  root: UiNode,
  kind: ElementKind,
  keywords: KeywordTable = defaultKeywords()
): UiNode | null {
  return search(root, 0, keywords.elements[kind])?.node ?? null;
}
