/**
 * Centralized image dimension limits used by the image codec.
 *
 * These constants prevent memory exhaustion when decoding images
 * with unreasonably large dimensions.
 */
export const IMAGE_LIMITS = {
  /** Maximum value for image width or height (65536 pixels) */
  MAX_DIMENSION: 65536,
  /** Maximum total pixel count (256 megapixels) */
  MAX_PIXELS: 268435456,
} as const;

/**
 * Check decoded dimensions against IMAGE_LIMITS.
 * Returns a reason string when the dimensions are rejected, null otherwise.
 */
export function checkImageDimensions(width: number, height: number): string | null {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return `invalid dimensions ${width}x${height}`;
  }
  if (width > IMAGE_LIMITS.MAX_DIMENSION || height > IMAGE_LIMITS.MAX_DIMENSION) {
    return `dimension exceeds ${IMAGE_LIMITS.MAX_DIMENSION}`;
  }
  if (width * height > IMAGE_LIMITS.MAX_PIXELS) {
    return `pixel count exceeds ${IMAGE_LIMITS.MAX_PIXELS}`;
  }
  return null;
}
