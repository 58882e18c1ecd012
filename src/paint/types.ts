// Mask painting types

import type { Rect } from '../core/types/geometry';

export enum MarkMode {
  /** Write the marked value (primary button) */
  Set = 0,
  /** Write the unmarked value (secondary button) */
  Clear = 1,
}

/** Outcome of one mark; `rect` is the stamped square before clipping. */
export interface MarkResult {
  rect: Rect;
  pixelsWritten: number;
}
