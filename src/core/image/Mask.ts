import { sizesEqual, type Rect, type Size } from '../types/geometry';
import { ValidationError } from '../errors';

/** Pixel value of a marked (ground-truth) mask pixel. */
export const MASK_MARKED = 255;
/** Pixel value of an unmarked mask pixel. */
export const MASK_UNMARKED = 0;

/** Grayscale values at or above this read back as marked. */
export const MASK_THRESHOLD = 128;

/**
 * Two-level single-channel raster painted by the operator.
 * Every pixel holds either MASK_MARKED or MASK_UNMARKED.
 */
export class Mask implements Size {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;

  constructor(width: number, height: number, data?: Uint8Array) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new ValidationError(`Mask: invalid dimensions ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    if (data) {
      if (data.length !== width * height) {
        throw new ValidationError(`Mask: expected ${width * height} bytes, got ${data.length}`);
      }
      this.data = data;
    } else {
      this.data = new Uint8Array(width * height);
    }
  }

  /** Binarize arbitrary grayscale values into a mask. */
  static fromGray(width: number, height: number, gray: ArrayLike<number>): Mask {
    const mask = new Mask(width, height);
    for (let i = 0; i < mask.data.length; i++) {
      mask.data[i] = (gray[i] ?? 0) >= MASK_THRESHOLD ? MASK_MARKED : MASK_UNMARKED;
    }
    return mask;
  }

  isMarked(x: number, y: number): boolean {
    return this.data[y * this.width + x] === MASK_MARKED;
  }

  /**
   * Fill the half-open rectangle [x, x+width) × [y, y+height) with a value,
   * clipped to the mask bounds. Returns the number of pixels written.
   */
  fillRect(rect: Rect, value: number): number {
    const x0 = Math.max(0, rect.x);
    const y0 = Math.max(0, rect.y);
    const x1 = Math.min(this.width, rect.x + rect.width);
    const y1 = Math.min(this.height, rect.y + rect.height);
    if (x1 <= x0 || y1 <= y0) return 0;

    for (let y = y0; y < y1; y++) {
      const row = y * this.width;
      this.data.fill(value, row + x0, row + x1);
    }
    return (x1 - x0) * (y1 - y0);
  }

  countMarked(): number {
    let n = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === MASK_MARKED) n++;
    }
    return n;
  }

  clone(): Mask {
    return new Mask(this.width, this.height, this.data.slice());
  }

  equals(other: Mask): boolean {
    if (!sizesEqual(other, this)) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }
}
