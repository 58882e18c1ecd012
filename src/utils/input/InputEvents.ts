/**
 * Input events consumed by the annotation core.
 *
 * The windowing layer (or a replay script) produces these; the core never
 * reads a device directly. Key presses are resolved to commands before they
 * reach the core, see KeyboardManager.
 */

import { ValidationError } from '../../core/errors';

export const COMMANDS = [
  'next',
  'previous',
  'quit',
  'zoom-in',
  'zoom-out',
  'zoom-out-full',
  'pan-left',
  'pan-up',
  'pan-right',
  'pan-down',
  'toggle-reference-display',
  'toggle-filename-display',
  'mark-radius-up',
  'mark-radius-down',
] as const;

export type Command = (typeof COMMANDS)[number];

export type PointerAction = 'down' | 'move' | 'up';
export type PointerButton = 'primary' | 'secondary' | 'none';
export type WheelDirection = 'in' | 'out';
export type WheelModifier = 'fine' | 'coarse' | 'none';
export type SettingName = 'markRadius' | 'blendFactor';

export interface PointerEvent {
  type: 'pointer';
  action: PointerAction;
  x: number;
  y: number;
  /** Button held during the event */
  button: PointerButton;
}

/** One discrete wheel notch. `in` zooms in / enlarges. */
export interface WheelEvent {
  type: 'wheel';
  direction: WheelDirection;
  modifier: WheelModifier;
}

export interface CommandEvent {
  type: 'command';
  command: Command;
}

/** Direct assignment from a toolkit control such as a trackbar. */
export interface SettingEvent {
  type: 'setting';
  name: SettingName;
  value: number;
}

export type InputEvent = PointerEvent | WheelEvent | CommandEvent | SettingEvent;

/** A key press that has not been resolved to a command yet. */
export interface KeyEvent {
  type: 'key';
  key: string;
}

export type RawInputEvent = InputEvent | KeyEvent;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(`${field} must be one of ${allowed.join(', ')}; got ${JSON.stringify(value)}`);
  }
  return match;
}

function finiteNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number; got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Validate a decoded JSON value as an input event.
 * Optional fields default: pointer button `none`, wheel modifier `none`.
 */
export function parseInputEvent(value: unknown): RawInputEvent {
  if (!isRecord(value)) {
    throw new ValidationError('event must be an object');
  }

  switch (value.type) {
    case 'pointer':
      return {
        type: 'pointer',
        action: oneOf(value.action, ['down', 'move', 'up'] as const, 'pointer.action'),
        x: finiteNumber(value.x, 'pointer.x'),
        y: finiteNumber(value.y, 'pointer.y'),
        button: oneOf(value.button ?? 'none', ['primary', 'secondary', 'none'] as const, 'pointer.button'),
      };
    case 'wheel':
      return {
        type: 'wheel',
        direction: oneOf(value.direction, ['in', 'out'] as const, 'wheel.direction'),
        modifier: oneOf(value.modifier ?? 'none', ['fine', 'coarse', 'none'] as const, 'wheel.modifier'),
      };
    case 'command':
      return { type: 'command', command: oneOf(value.command, COMMANDS, 'command.command') };
    case 'setting':
      return {
        type: 'setting',
        name: oneOf(value.name, ['markRadius', 'blendFactor'] as const, 'setting.name'),
        value: finiteNumber(value.value, 'setting.value'),
      };
    case 'key':
      if (typeof value.key !== 'string' || value.key.length === 0) {
        throw new ValidationError('key.key must be a non-empty string');
      }
      return { type: 'key', key: value.key };
    default:
      throw new ValidationError(`unknown event type ${JSON.stringify(value.type)}`);
  }
}
