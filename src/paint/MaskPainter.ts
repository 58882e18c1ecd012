import type { Point, Size } from '../core/types/geometry';
import { Mask, MASK_MARKED, MASK_UNMARKED } from '../core/image/Mask';
import type { Viewport } from '../ui/components/Viewport';
import { ValidationError } from '../core/errors';
import { MarkMode, type MarkResult } from './types';

/**
 * Stamps square marks into a mask.
 *
 * A mark of radius r centred on (cx, cy) covers the half-open square
 * [cx - r, cx + r) × [cy - r, cy + r), i.e. 2r × 2r pixels, clipped to the
 * mask. Marks overwrite; stamping the same square twice is a no-op the
 * second time.
 */
export class MaskPainter {
  constructor(private readonly mask: Mask) {}

  mark(sourcePoint: Point, radius: number, mode: MarkMode): MarkResult {
    if (!Number.isInteger(radius) || radius < 1) {
      throw new ValidationError(`MaskPainter: radius must be a positive integer, got ${radius}`);
    }
    const cx = Math.round(sourcePoint.x);
    const cy = Math.round(sourcePoint.y);
    const rect = { x: cx - radius, y: cy - radius, width: 2 * radius, height: 2 * radius };
    const value = mode === MarkMode.Set ? MASK_MARKED : MASK_UNMARKED;
    return { rect, pixelsWritten: this.mask.fillRect(rect, value) };
  }

  /** Mark at a display-space cursor position, mapped through the viewport. */
  markAtDisplay(
    displayPoint: Point,
    displaySize: Size,
    viewport: Viewport,
    radius: number,
    mode: MarkMode
  ): MarkResult {
    return this.mark(viewport.toSource(displayPoint, displaySize), radius, mode);
  }
}
