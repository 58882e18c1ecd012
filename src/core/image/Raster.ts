import type { Size } from '../types/geometry';
import { checkImageDimensions } from '../../config/ImageLimits';
import { ValidationError } from '../errors';

export interface RasterOptions {
  width: number;
  height: number;
  /** 1 (gray) or 3 (RGB) interleaved 8-bit channels */
  channels: 1 | 3;
  data?: Uint8Array;
}

/**
 * Interleaved 8-bit raster. Source images are decoded into 3-channel rasters
 * and stay read-only for the lifetime of an annotation pass.
 */
export class Raster implements Size {
  readonly width: number;
  readonly height: number;
  readonly channels: 1 | 3;
  readonly data: Uint8Array;

  constructor(options: RasterOptions) {
    const problem = checkImageDimensions(options.width, options.height);
    if (problem) {
      throw new ValidationError(`Raster: ${problem}`);
    }
    this.width = options.width;
    this.height = options.height;
    this.channels = options.channels;

    const expected = this.width * this.height * this.channels;
    if (options.data) {
      if (options.data.length !== expected) {
        throw new ValidationError(
          `Raster: expected ${expected} bytes for ${this.width}x${this.height}x${this.channels}, got ${options.data.length}`
        );
      }
      this.data = options.data;
    } else {
      this.data = new Uint8Array(expected);
    }
  }

  /** Build an RGB raster from RGBA bytes, dropping alpha. */
  static fromRGBA(width: number, height: number, rgba: Uint8Array): Raster {
    const raster = new Raster({ width, height, channels: 3 });
    const out = raster.data;
    const pixels = width * height;
    for (let i = 0; i < pixels; i++) {
      out[i * 3] = rgba[i * 4] ?? 0;
      out[i * 3 + 1] = rgba[i * 4 + 1] ?? 0;
      out[i * 3 + 2] = rgba[i * 4 + 2] ?? 0;
    }
    return raster;
  }

  getPixel(x: number, y: number): number[] {
    const idx = (y * this.width + x) * this.channels;
    const pixel = new Array<number>(this.channels);
    for (let c = 0; c < this.channels; c++) {
      pixel[c] = this.data[idx + c] ?? 0;
    }
    return pixel;
  }

  setPixel(x: number, y: number, values: readonly number[]): void {
    const idx = (y * this.width + x) * this.channels;
    for (let c = 0; c < this.channels && c < values.length; c++) {
      this.data[idx + c] = values[c] ?? 0;
    }
  }

  /** Expand to RGBA bytes (alpha 255), the layout the PNG encoder takes. */
  toRGBA(): Uint8Array {
    const pixels = this.width * this.height;
    const out = new Uint8Array(pixels * 4);
    for (let i = 0; i < pixels; i++) {
      for (let c = 0; c < 3; c++) {
        out[i * 4 + c] = this.data[i * this.channels + (this.channels === 1 ? 0 : c)] ?? 0;
      }
      out[i * 4 + 3] = 255;
    }
    return out;
  }
}
