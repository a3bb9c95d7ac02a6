/**
 * Snapshot types supplied by the UI-automation host and the OCR engine
 */

/**
 * One node of the accessibility tree. Snapshots are immutable and fresh each cycle.
 */
export interface UiNode {
  text: string | null;
  contentDescription: string | null;
  className: string | null;
  viewId: string | null;
  clickable: boolean;
  children: UiNode[];
}

export interface BoundingBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * A recognized text block with its box in source-image pixels
 */
export interface OcrBlock {
  text: string;
  boundingBox: BoundingBox | null;
}
