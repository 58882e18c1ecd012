/**
 * Shared math utility functions.
 */

/**
 * Clamp a numeric value to the inclusive range [min, max].
 *
 * Replaces the common pattern `Math.max(min, Math.min(max, value))`.
 *
 * @param value - The value to clamp
 * @param min   - Lower bound (inclusive)
 * @param max   - Upper bound (inclusive)
 * @returns The clamped value
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Clamp and round to the nearest integer in [min, max]. */
export function clampInt(value: number, min: number, max: number): number {
  return clamp(Math.round(value), min, max);
}
