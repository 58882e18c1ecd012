/**
 * Input event validation tests
 */

import { describe, it, expect } from 'vitest';
import { parseInputEvent } from './InputEvents';
import { ValidationError } from '../../core/errors';

describe('parseInputEvent', () => {
  it('INP-001: parses a pointer event and defaults the button', () => {
    expect(parseInputEvent({ type: 'pointer', action: 'move', x: 3, y: 4.5 })).toEqual({
      type: 'pointer',
      action: 'move',
      x: 3,
      y: 4.5,
      button: 'none',
    });
  });

  it('INP-002: parses a wheel event and defaults the modifier', () => {
    expect(parseInputEvent({ type: 'wheel', direction: 'out' })).toEqual({
      type: 'wheel',
      direction: 'out',
      modifier: 'none',
    });
  });

  it('INP-003: parses command, setting and key events', () => {
    expect(parseInputEvent({ type: 'command', command: 'pan-left' })).toEqual({
      type: 'command',
      command: 'pan-left',
    });
    expect(parseInputEvent({ type: 'setting', name: 'blendFactor', value: 60 })).toEqual({
      type: 'setting',
      name: 'blendFactor',
      value: 60,
    });
    expect(parseInputEvent({ type: 'key', key: 'G' })).toEqual({ type: 'key', key: 'G' });
  });

  it.each([
    ['a non-object', 'pointer'],
    ['an array', []],
    ['null', null],
    ['an unknown type', { type: 'gesture' }],
    ['a bad pointer action', { type: 'pointer', action: 'click', x: 0, y: 0 }],
    ['a non-numeric coordinate', { type: 'pointer', action: 'down', x: '1', y: 0 }],
    ['an infinite coordinate', { type: 'pointer', action: 'down', x: Infinity, y: 0 }],
    ['a bad wheel direction', { type: 'wheel', direction: 'up' }],
    ['an unknown command', { type: 'command', command: 'undo' }],
    ['an unknown setting', { type: 'setting', name: 'zoom', value: 1 }],
    ['an empty key', { type: 'key', key: '' }],
  ])('INP-010: rejects %s', (_label, value) => {
    expect(() => parseInputEvent(value)).toThrow(ValidationError);
  });

  it('INP-011: error names the offending field', () => {
    expect(() => parseInputEvent({ type: 'wheel', direction: 'in', modifier: 'shift' })).toThrow(
      'wheel.modifier must be one of fine, coarse, none; got "shift"'
    );
  });
});
