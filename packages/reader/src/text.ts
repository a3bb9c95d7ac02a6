/**
 * Flatten a UI tree into its visible strings
 */

import type { UiNode } from "@pumpscreen/diabetes";

/**
 * Deepest level visited. Host trees are shallow; deeper nodes are malformed.
 */
export const MAX_TREE_DEPTH = 20;

/**
 * Every non-blank text and accessible label, in pre-order.
 * A node contributes its text before its label, and both before its children.
 */
export function collectText(root: UiNode, maxDepth: number = MAX_TREE_DEPTH): string[] {
  const texts: string[] = [];

  const visit = (node: UiNode, depth: number): void => {
    if (depth > maxDepth) return;

    if (node.text !== null && node.text.trim() !== "") {
      texts.push(node.text);
    }
    if (node.contentDescription !== null && node.contentDescription.trim() !== "") {
      texts.push(node.contentDescription);
    }
    for (const child of node.children) {
      visit(child, depth + 1);
    }
  };

  visit(root, 0);
  return texts;
}

/**
 * The string rendered right after the label at `labelIndex`.
 *
 * Menu rows expose label and value as sibling nodes, so the value is
 * assumed to be the next collected string.
 */
export function valueAfter(texts: readonly string[], labelIndex: number): string | null {
  const next = texts[labelIndex + 1];
  return next === undefined ? null : next;
}
