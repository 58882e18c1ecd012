/**
 * Image codec - PNG and JPEG decoding into rasters, PNG encoding of masks
 * and display frames.
 *
 * Format detection is by magic number, not by file extension. Decoded
 * images are always 8-bit RGB; masks are written as 8-bit grayscale PNGs
 * and binarized when read back.
 */

import { PNG } from 'pngjs';
import * as jpeg from 'jpeg-js';
import { Raster } from '../core/image/Raster';
import { Mask } from '../core/image/Mask';
import { DecoderError, errorMessage } from '../core/errors';
import { checkImageDimensions } from '../config/ImageLimits';

export type ImageFormat = 'png' | 'jpeg';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SOI = [0xff, 0xd8, 0xff];

const PNG_COLOR_TYPE_GRAY = 0;
const PNG_COLOR_TYPE_RGB = 2;

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  if (bytes.length < signature.length) return false;
  return signature.every((value, i) => bytes[i] === value);
}

export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (startsWith(bytes, PNG_SIGNATURE)) return 'png';
  if (startsWith(bytes, JPEG_SOI)) return 'jpeg';
  return null;
}

interface DecodedRGBA {
  width: number;
  height: number;
  data: Uint8Array;
}

function decodePNG(bytes: Buffer): DecodedRGBA {
  try {
    const png = PNG.sync.read(bytes);
    return { width: png.width, height: png.height, data: png.data };
  } catch (err) {
    throw new DecoderError('PNG', errorMessage(err));
  }
}

function decodeJPEG(bytes: Buffer): DecodedRGBA {
  try {
    const decoded = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true });
    return { width: decoded.width, height: decoded.height, data: decoded.data };
  } catch (err) {
    throw new DecoderError('JPEG', errorMessage(err));
  }
}

function checkDecoded(format: string, decoded: DecodedRGBA): void {
  const problem = checkImageDimensions(decoded.width, decoded.height);
  if (problem) {
    throw new DecoderError(format, problem);
  }
}

/**
 * Decode a PNG or JPEG file into an RGB raster.
 * @throws DecoderError for unknown formats and corrupt data
 */
export function decodeImage(bytes: Buffer, sourcePath?: string): Raster {
  const format = detectImageFormat(bytes);
  if (format === null) {
    throw new DecoderError('image', `unrecognized file signature${sourcePath ? ` in ${sourcePath}` : ''}`);
  }

  const decoded = format === 'png' ? decodePNG(bytes) : decodeJPEG(bytes);
  checkDecoded(format.toUpperCase(), decoded);
  return Raster.fromRGBA(decoded.width, decoded.height, decoded.data);
}

/**
 * Decode a stored mask. Any image PNG works: the red channel of the decoded
 * RGBA data is thresholded into marked / unmarked.
 */
export function decodeMaskPNG(bytes: Buffer): Mask {
  if (detectImageFormat(bytes) !== 'png') {
    throw new DecoderError('mask', 'not a PNG file');
  }
  const decoded = decodePNG(bytes);
  checkDecoded('mask', decoded);

  const pixels = decoded.width * decoded.height;
  const gray = new Uint8Array(pixels);
  for (let i = 0; i < pixels; i++) {
    gray[i] = decoded.data[i * 4] ?? 0;
  }
  return Mask.fromGray(decoded.width, decoded.height, gray);
}

/** Encode a mask as an 8-bit single-channel grayscale PNG. */
export function encodeMaskPNG(mask: Mask): Buffer {
  const png = new PNG({ width: mask.width, height: mask.height });
  const pixels = mask.width * mask.height;
  for (let i = 0; i < pixels; i++) {
    const v = mask.data[i] ?? 0;
    png.data[i * 4] = v;
    png.data[i * 4 + 1] = v;
    png.data[i * 4 + 2] = v;
    png.data[i * 4 + 3] = 255;
  }
  return PNG.sync.write(png, { colorType: PNG_COLOR_TYPE_GRAY });
}

/** Encode a display frame (or any raster) as an 8-bit RGB PNG. */
export function encodeFramePNG(raster: Raster): Buffer {
  const png = new PNG({ width: raster.width, height: raster.height });
  png.data.set(raster.toRGBA());
  return PNG.sync.write(png, { colorType: PNG_COLOR_TYPE_RGB });
}
