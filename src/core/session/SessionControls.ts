/**
 * SessionControls - operator settings that survive from one image to the
 * next within a run: mark radius, blend factor, display toggles and the last
 * known pointer position.
 *
 * Toolkit adapters (trackbars, status bars) subscribe to the change events
 * and call the setters; all values are clamped on the way in.
 */

import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import { ANNOTATION_LIMITS } from '../../config/AnnotationConfig';
import { clampInt } from '../../utils/math';
import type { Point } from '../types/geometry';
import {
  DEFAULT_CARRIED_SETTINGS,
  type CarriedSettings,
  type CursorState,
  type DisplayFlags,
} from './SessionState';

export interface SessionControlsEvents extends EventMap {
  markRadiusChanged: number;
  blendFactorChanged: number;
  displayFlagsChanged: DisplayFlags;
}

export class SessionControls extends EventEmitter<SessionControlsEvents> {
  private _markRadius: number;
  private _blendFactor: number;
  private _showReferences: boolean;
  private _showFilename: boolean;
  private _cursor: Point = { x: 0, y: 0 };

  constructor(initial: Partial<CarriedSettings> = {}) {
    super();
    const settings = { ...DEFAULT_CARRIED_SETTINGS, ...initial };
    this._markRadius = clampRadius(settings.markRadius);
    this._blendFactor = clampBlend(settings.blendFactor);
    this._showReferences = settings.showReferences;
    this._showFilename = settings.showFilename;
  }

  get markRadius(): number {
    return this._markRadius;
  }

  get blendFactor(): number {
    return this._blendFactor;
  }

  get showReferences(): boolean {
    return this._showReferences;
  }

  get showFilename(): boolean {
    return this._showFilename;
  }

  get cursorPosition(): Point {
    return { ...this._cursor };
  }

  get cursor(): CursorState {
    return { position: this.cursorPosition, radius: this._markRadius };
  }

  setCursorPosition(point: Point): void {
    this._cursor = { x: point.x, y: point.y };
  }

  setMarkRadius(value: number): void {
    const next = clampRadius(value);
    if (next === this._markRadius) return;
    this._markRadius = next;
    this.emit('markRadiusChanged', next);
  }

  adjustMarkRadius(delta: number): void {
    this.setMarkRadius(this._markRadius + delta);
  }

  setBlendFactor(value: number): void {
    const next = clampBlend(value);
    if (next === this._blendFactor) return;
    this._blendFactor = next;
    this.emit('blendFactorChanged', next);
  }

  adjustBlendFactor(delta: number): void {
    this.setBlendFactor(this._blendFactor + delta);
  }

  toggleReferences(): void {
    this._showReferences = !this._showReferences;
    this.emit('displayFlagsChanged', this.displayFlags());
  }

  toggleFilename(): void {
    this._showFilename = !this._showFilename;
    this.emit('displayFlagsChanged', this.displayFlags());
  }

  private displayFlags(): DisplayFlags {
    return { showReferences: this._showReferences, showFilename: this._showFilename };
  }
}

function clampRadius(value: number): number {
  return clampInt(value, ANNOTATION_LIMITS.MIN_MARK_RADIUS, ANNOTATION_LIMITS.MAX_MARK_RADIUS);
}

function clampBlend(value: number): number {
  return clampInt(value, ANNOTATION_LIMITS.MIN_BLEND_FACTOR, ANNOTATION_LIMITS.MAX_BLEND_FACTOR);
}
