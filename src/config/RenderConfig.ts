/**
 * Centralized rendering constants for the composited frame.
 */

export type RGB = readonly [number, number, number];

export const OVERLAY_COLORS: { readonly REFERENCE: RGB; readonly CURSOR: RGB } = {
  /** Outline of reference rectangles */
  REFERENCE: [0, 0, 255],
  /** Outline of the cursor-size indicator */
  CURSOR: [0, 0, 0],
};

/** Outline thickness of reference rectangles, in source pixels */
export const REFERENCE_OUTLINE_WIDTH = 2;

/** Outline thickness of the cursor indicator, in display pixels */
export const CURSOR_OUTLINE_WIDTH = 1;
