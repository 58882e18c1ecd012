/**
 * MaskCompositor
 *
 * Builds the frame shown to the operator: the image with the mask added on
 * top at the current blend factor, reference rectangles outlined, the
 * viewport region magnified to the display size and a square marking the
 * effective mark size under the cursor.
 *
 * Every function here is pure; rendering the same inputs twice yields
 * byte-identical frames.
 */

import type { Rect, Size } from '../../core/types/geometry';
import { Raster } from '../../core/image/Raster';
import type { Mask } from '../../core/image/Mask';
import type { CursorState } from '../../core/session/SessionState';
import {
  OVERLAY_COLORS,
  REFERENCE_OUTLINE_WIDTH,
  CURSOR_OUTLINE_WIDTH,
  type RGB,
} from '../../config/RenderConfig';
import { clamp } from '../../utils/math';

export interface CompositeInput {
  image: Raster;
  mask: Mask;
  /** Viewport rectangle in source coordinates */
  viewport: Rect;
  /** Mask opacity in percent, 0..100 */
  blendFactor: number;
  references: readonly Rect[];
  showReferences: boolean;
  cursor: CursorState;
  displaySize: Size;
  caption: string | null;
}

export interface Frame {
  /** RGB raster of the display size */
  raster: Raster;
  caption: string | null;
}

/**
 * image + mask * (blendFactor / 100), per channel, saturated to 0..255.
 * The mask value is added to all three channels.
 */
export function blendMask(image: Raster, mask: Mask, blendFactor: number): Raster {
  const weight = clamp(blendFactor, 0, 100) / 100;
  const out = new Raster({ width: image.width, height: image.height, channels: 3 });
  const src = image.data;
  const dst = out.data;
  const m = mask.data;
  const pixels = image.width * image.height;
  const step = image.channels;

  for (let i = 0; i < pixels; i++) {
    const add = (m[i] ?? 0) * weight;
    for (let c = 0; c < 3; c++) {
      const v = (src[i * step + (step === 1 ? 0 : c)] ?? 0) + add;
      dst[i * 3 + c] = v >= 255 ? 255 : Math.round(v);
    }
  }
  return out;
}

function fillBox(target: Raster, x0: number, y0: number, x1: number, y1: number, color: RGB): void {
  const left = Math.max(0, x0);
  const top = Math.max(0, y0);
  const right = Math.min(target.width, x1);
  const bottom = Math.min(target.height, y1);
  for (let y = top; y < bottom; y++) {
    for (let x = left; x < right; x++) {
      target.setPixel(x, y, color);
    }
  }
}

/**
 * Outline the half-open box [x0, x1) × [y0, y1) with bands `thickness`
 * pixels wide, drawn inside the box and clipped to the raster.
 */
export function strokeBox(
  target: Raster,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  thickness: number,
  color: RGB
): void {
  if (x1 <= x0 || y1 <= y0) return;
  fillBox(target, x0, y0, x1, y0 + thickness, color);
  fillBox(target, x0, y1 - thickness, x1, y1, color);
  fillBox(target, x0, y0, x0 + thickness, y1, color);
  fillBox(target, x1 - thickness, y0, x1, y1, color);
}

/** Draw each reference rectangle's outline onto the (source-sized) raster. */
export function drawReferences(target: Raster, references: readonly Rect[]): void {
  for (const r of references) {
    strokeBox(target, r.x, r.y, r.x + r.width, r.y + r.height, REFERENCE_OUTLINE_WIDTH, OVERLAY_COLORS.REFERENCE);
  }
}

/**
 * Nearest-neighbour resample of `region` to `displaySize`. Display pixel d
 * samples source region.x + floor(d * region.width / display.width), which
 * matches Viewport.toSource.
 */
export function magnify(source: Raster, region: Rect, displaySize: Size): Raster {
  const out = new Raster({ width: displaySize.width, height: displaySize.height, channels: 3 });
  const colIndex = new Int32Array(displaySize.width);
  for (let dx = 0; dx < displaySize.width; dx++) {
    colIndex[dx] = region.x + Math.floor((dx * region.width) / displaySize.width);
  }

  const src = source.data;
  const dst = out.data;
  for (let dy = 0; dy < displaySize.height; dy++) {
    const sy = region.y + Math.floor((dy * region.height) / displaySize.height);
    const srcRow = sy * source.width;
    const dstRow = dy * displaySize.width;
    for (let dx = 0; dx < displaySize.width; dx++) {
      const s = (srcRow + (colIndex[dx] ?? 0)) * 3;
      const d = (dstRow + dx) * 3;
      dst[d] = src[s] ?? 0;
      dst[d + 1] = src[s + 1] ?? 0;
      dst[d + 2] = src[s + 2] ?? 0;
    }
  }
  return out;
}

/**
 * Square around the cursor showing the area one mark covers at the current
 * magnification (half side = radius * display.width / viewport.width).
 */
export function drawCursorIndicator(target: Raster, cursor: CursorState, viewport: Rect): void {
  const zoomFactor = target.width / viewport.width;
  const half = cursor.radius * zoomFactor;
  const { x, y } = cursor.position;
  strokeBox(
    target,
    Math.round(x - half),
    Math.round(y - half),
    Math.round(x + half),
    Math.round(y + half),
    CURSOR_OUTLINE_WIDTH,
    OVERLAY_COLORS.CURSOR
  );
}

export function renderFrame(input: CompositeInput): Frame {
  const blended = blendMask(input.image, input.mask, input.blendFactor);
  if (input.showReferences) {
    drawReferences(blended, input.references);
  }
  const raster = magnify(blended, input.viewport, input.displaySize);
  drawCursorIndicator(raster, input.cursor, input.viewport);
  return { raster, caption: input.caption };
}
