/**
 * Session State Types
 *
 * State owned by an annotation session and threaded explicitly through the
 * editor, painter and compositor. Nothing here is process-wide.
 */

import type { Point, Rect } from '../types/geometry';
import { ANNOTATION_LIMITS } from '../../config/AnnotationConfig';

/** Last display-space pointer position and the current mark radius. */
export interface CursorState {
  position: Point;
  radius: number;
}

/** Display toggles; they affect rendering only. */
export interface DisplayFlags {
  showReferences: boolean;
  showFilename: boolean;
}

/**
 * Settings that carry over from one image to the next within a run.
 */
export interface CarriedSettings extends DisplayFlags {
  markRadius: number;
  blendFactor: number;
}

export const DEFAULT_CARRIED_SETTINGS: CarriedSettings = {
  markRadius: ANNOTATION_LIMITS.DEFAULT_MARK_RADIUS,
  blendFactor: ANNOTATION_LIMITS.DEFAULT_BLEND_FACTOR,
  showReferences: true,
  showFilename: false,
};

/** Read-only reference rectangles keyed by image identity. */
export type ReferenceIndex = ReadonlyMap<string, readonly Rect[]>;

/** Where the state machine goes after an input event. */
export type EditorTransition =
  | { kind: 'interactive' }
  | { kind: 'advance'; delta: 1 | -1 }
  | { kind: 'quit' };

export const STAY_INTERACTIVE: EditorTransition = { kind: 'interactive' };
