/**
 * Viewport - the rectangle of the source image that is magnified onto the
 * display surface.
 *
 * The viewport owns the rectangle but not the cursor: callers pass the
 * current display-space cursor position and display size to every operation
 * that depends on them. The rectangle always stays inside the image, with
 * integer coordinates and sides of at least MIN_VIEWPORT_SIZE pixels.
 */

import type { Point, Rect, Size } from '../../core/types/geometry';
import { MIN_VIEWPORT_SIZE, PAN_FRACTION } from '../../config/AnnotationConfig';
import { ValidationError } from '../../core/errors';
import { clamp } from '../../utils/math';
import { Logger } from '../../utils/Logger';

const log = new Logger('Viewport');

export type PanDirection = 'left' | 'up' | 'right' | 'down';

export class Viewport {
  private imageWidth = 1;
  private imageHeight = 1;
  private _rect: Rect = { x: 0, y: 0, width: 1, height: 1 };

  constructor(imageSize?: Size) {
    if (imageSize) {
      this.initialize(imageSize.width, imageSize.height);
    }
  }

  /** Copy of the current rectangle in source coordinates. */
  get rect(): Rect {
    return { ...this._rect };
  }

  get imageSize(): Size {
    return { width: this.imageWidth, height: this.imageHeight };
  }

  /** Reset for a new image and show it in full. */
  initialize(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new ValidationError(`Viewport: invalid image size ${width}x${height}`);
    }
    this.imageWidth = width;
    this.imageHeight = height;
    this.resetFull();
  }

  resetFull(): void {
    this._rect = { x: 0, y: 0, width: this.imageWidth, height: this.imageHeight };
  }

  /**
   * Map a display-space point to source coordinates. This is the exact
   * inverse of the magnification the compositor applies.
   */
  toSource(displayPoint: Point, displaySize: Size): Point {
    const r = this._rect;
    return {
      x: r.x + displayPoint.x * (r.width / displaySize.width),
      y: r.y + displayPoint.y * (r.height / displaySize.height),
    };
  }

  containsDisplayPoint(point: Point, displaySize: Size): boolean {
    return point.x >= 0 && point.y >= 0 && point.x <= displaySize.width && point.y <= displaySize.height;
  }

  /**
   * Scale the rectangle by `factor` around the source point under the cursor.
   * Factors in (0, 1) zoom in, factors above 1 zoom out.
   *
   * The point under the cursor stays put unless the rectangle would leave
   * the image; it is then pinned against the image border, which makes the
   * view jump near edges when zooming out.
   */
  zoom(factor: number, cursor: Point, displaySize: Size): void {
    if (!Number.isFinite(factor) || factor <= 0) {
      throw new ValidationError(`Viewport: zoom factor must be a positive number, got ${factor}`);
    }

    const anchor = this.toSource(cursor, displaySize);
    const widthRatio = cursor.x / displaySize.width;
    const heightRatio = cursor.y / displaySize.height;

    const width = clamp(Math.round(this._rect.width * factor), MIN_VIEWPORT_SIZE, this.imageWidth);
    const height = clamp(Math.round(this._rect.height * factor), MIN_VIEWPORT_SIZE, this.imageHeight);

    this._rect = {
      x: clamp(Math.round(anchor.x - widthRatio * width), 0, this.imageWidth - width),
      y: clamp(Math.round(anchor.y - heightRatio * height), 0, this.imageHeight - height),
      width,
      height,
    };
    log.debug('zoom', factor, this._rect);
  }

  /** Move the rectangle by PAN_FRACTION of its own size, stopping at the image border. */
  pan(direction: PanDirection): void {
    const r = this._rect;
    const stepX = Math.max(1, Math.floor(r.width * PAN_FRACTION));
    const stepY = Math.max(1, Math.floor(r.height * PAN_FRACTION));

    switch (direction) {
      case 'left':
        r.x = clamp(r.x - stepX, 0, this.imageWidth - r.width);
        break;
      case 'right':
        r.x = clamp(r.x + stepX, 0, this.imageWidth - r.width);
        break;
      case 'up':
        r.y = clamp(r.y - stepY, 0, this.imageHeight - r.height);
        break;
      case 'down':
        r.y = clamp(r.y + stepY, 0, this.imageHeight - r.height);
        break;
    }
  }
}
