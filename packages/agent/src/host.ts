/**
 * What the agent needs from the device it runs against
 */

import type { OcrBlock, UiNode } from "@pumpscreen/diabetes";

/** Full-screen bitmap as returned by the host */
export interface ScreenCapture {
  width: number;
  height: number;
  /** Encoded image bytes */
  data: Uint8Array;
}

export interface UiHost {
  /** Root of the foreground window, or null if none is available */
  getRootNode(): Promise<UiNode | null>;
  /** Dispatch a click; false if the host refused it */
  click(node: UiNode): Promise<boolean>;
  /** Generic back navigation */
  back(): Promise<void>;
  captureScreen(): Promise<ScreenCapture | null>;
}

export interface OcrEngine {
  /** Text blocks in capture pixel coordinates, in no particular order */
  recognize(capture: ScreenCapture): Promise<OcrBlock[]>;
}
