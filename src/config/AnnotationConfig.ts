/**
 * Centralized annotation constants.
 *
 * Limits for the mark radius and blend factor, the zoom steps bound to wheel
 * and keyboard input, and the panning stride.
 */

// ---------------------------------------------------------------------------
// Operator-adjustable settings
// ---------------------------------------------------------------------------

export const ANNOTATION_LIMITS = {
  /** Smallest mark radius in source pixels */
  MIN_MARK_RADIUS: 1,
  /** Largest mark radius in source pixels */
  MAX_MARK_RADIUS: 50,
  /** Mark radius at startup */
  DEFAULT_MARK_RADIUS: 5,
  /** Radius change per wheel notch */
  MARK_RADIUS_WHEEL_STEP: 1,
  /** Radius change per +/- key press */
  MARK_RADIUS_KEY_STEP: 5,
  MIN_BLEND_FACTOR: 0,
  MAX_BLEND_FACTOR: 100,
  /** Mask opacity (percent) at startup */
  DEFAULT_BLEND_FACTOR: 35,
  /** Blend change per wheel notch */
  BLEND_FACTOR_STEP: 5,
} as const;

// ---------------------------------------------------------------------------
// Viewport
// ---------------------------------------------------------------------------

/**
 * Multiplicative zoom steps. Factors below 1 zoom in, their inverses zoom out.
 */
export const ZOOM_STEPS = {
  /** Wheel with the fine modifier held */
  WHEEL: 0.95,
  /** zoom-in / zoom-out commands */
  KEYBOARD: 0.8,
} as const;

/** Fraction of the viewport width/height moved by one pan command */
export const PAN_FRACTION = 0.2;

/** Minimum viewport side length in source pixels */
export const MIN_VIEWPORT_SIZE = 1;
