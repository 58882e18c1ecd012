/**
 * ImageEditor - the interactive state for one open image.
 *
 * Owns the mask being painted and the viewport over the image. dispatch()
 * applies one input event completely and returns where the session goes
 * next; render() composes the frame for the current state.
 */

import type { Rect, Size } from '../types/geometry';
import type { Raster } from '../image/Raster';
import type { Mask } from '../image/Mask';
import { Viewport } from '../../ui/components/Viewport';
import { MaskPainter } from '../../paint/MaskPainter';
import { MarkMode } from '../../paint/types';
import { renderFrame, type Frame } from '../../ui/components/MaskCompositor';
import { ANNOTATION_LIMITS, ZOOM_STEPS } from '../../config/AnnotationConfig';
import type { Command, InputEvent, PointerEvent, WheelEvent } from '../../utils/input/InputEvents';
import type { SessionControls } from './SessionControls';
import { STAY_INTERACTIVE, type EditorTransition } from './SessionState';
import { Logger } from '../../utils/Logger';

const log = new Logger('ImageEditor');

export interface ImageEditorOptions {
  /** Image identity (file name without extension) */
  identity: string;
  fileName: string;
  image: Raster;
  mask: Mask;
  references?: readonly Rect[];
  /** Display surface size; defaults to the image size */
  displaySize?: Size;
  controls: SessionControls;
}

export class ImageEditor {
  readonly identity: string;
  readonly fileName: string;
  readonly image: Raster;
  readonly mask: Mask;
  readonly viewport: Viewport;
  readonly displaySize: Size;

  private readonly painter: MaskPainter;
  private readonly references: readonly Rect[];
  private readonly controls: SessionControls;

  constructor(options: ImageEditorOptions) {
    this.identity = options.identity;
    this.fileName = options.fileName;
    this.image = options.image;
    this.mask = options.mask;
    this.references = options.references ?? [];
    this.controls = options.controls;
    this.displaySize = options.displaySize ?? { width: options.image.width, height: options.image.height };
    this.viewport = new Viewport(options.image);
    this.painter = new MaskPainter(options.mask);
  }

  dispatch(event: InputEvent): EditorTransition {
    switch (event.type) {
      case 'pointer':
        this.handlePointer(event);
        return STAY_INTERACTIVE;
      case 'wheel':
        this.handleWheel(event);
        return STAY_INTERACTIVE;
      case 'setting':
        if (event.name === 'markRadius') {
          this.controls.setMarkRadius(event.value);
        } else {
          this.controls.setBlendFactor(event.value);
        }
        return STAY_INTERACTIVE;
      case 'command':
        return this.applyCommand(event.command);
    }
  }

  render(): Frame {
    return renderFrame({
      image: this.image,
      mask: this.mask,
      viewport: this.viewport.rect,
      blendFactor: this.controls.blendFactor,
      references: this.references,
      showReferences: this.controls.showReferences,
      cursor: this.controls.cursor,
      displaySize: this.displaySize,
      caption: this.controls.showFilename ? this.fileName : null,
    });
  }

  private handlePointer(event: PointerEvent): void {
    this.controls.setCursorPosition(event);
    if (event.action === 'up' || event.button === 'none') return;

    const mode = event.button === 'primary' ? MarkMode.Set : MarkMode.Clear;
    this.painter.markAtDisplay(event, this.displaySize, this.viewport, this.controls.markRadius, mode);
  }

  private handleWheel(event: WheelEvent): void {
    const inward = event.direction === 'in';
    switch (event.modifier) {
      case 'fine':
        this.zoomAtCursor(inward ? ZOOM_STEPS.WHEEL : 1 / ZOOM_STEPS.WHEEL);
        break;
      case 'coarse':
        this.controls.adjustBlendFactor(inward ? ANNOTATION_LIMITS.BLEND_FACTOR_STEP : -ANNOTATION_LIMITS.BLEND_FACTOR_STEP);
        break;
      case 'none':
        this.controls.adjustMarkRadius(
          inward ? ANNOTATION_LIMITS.MARK_RADIUS_WHEEL_STEP : -ANNOTATION_LIMITS.MARK_RADIUS_WHEEL_STEP
        );
        break;
    }
  }

  private applyCommand(command: Command): EditorTransition {
    switch (command) {
      case 'next':
        return { kind: 'advance', delta: 1 };
      case 'previous':
        return { kind: 'advance', delta: -1 };
      case 'quit':
        return { kind: 'quit' };
      case 'zoom-in':
        this.keyboardZoom(ZOOM_STEPS.KEYBOARD);
        break;
      case 'zoom-out':
        this.keyboardZoom(1 / ZOOM_STEPS.KEYBOARD);
        break;
      case 'zoom-out-full':
        this.viewport.resetFull();
        break;
      case 'pan-left':
        this.viewport.pan('left');
        break;
      case 'pan-up':
        this.viewport.pan('up');
        break;
      case 'pan-right':
        this.viewport.pan('right');
        break;
      case 'pan-down':
        this.viewport.pan('down');
        break;
      case 'toggle-reference-display':
        this.controls.toggleReferences();
        break;
      case 'toggle-filename-display':
        this.controls.toggleFilename();
        break;
      case 'mark-radius-up':
        this.controls.adjustMarkRadius(ANNOTATION_LIMITS.MARK_RADIUS_KEY_STEP);
        break;
      case 'mark-radius-down':
        this.controls.adjustMarkRadius(-ANNOTATION_LIMITS.MARK_RADIUS_KEY_STEP);
        break;
    }
    return STAY_INTERACTIVE;
  }

  /** Keyboard zoom is ignored while the pointer is outside the display. */
  private keyboardZoom(factor: number): void {
    if (!this.viewport.containsDisplayPoint(this.controls.cursorPosition, this.displaySize)) {
      log.debug('zoom ignored, cursor outside display');
      return;
    }
    this.zoomAtCursor(factor);
  }

  private zoomAtCursor(factor: number): void {
    this.viewport.zoom(factor, this.controls.cursorPosition, this.displaySize);
  }
}
