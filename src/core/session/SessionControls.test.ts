/**
 * SessionControls Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SessionControls } from './SessionControls';

describe('SessionControls', () => {
  it('CTL-001: starts from the default carried settings', () => {
    const controls = new SessionControls();

    expect(controls.markRadius).toBe(5);
    expect(controls.blendFactor).toBe(35);
    expect(controls.showReferences).toBe(true);
    expect(controls.showFilename).toBe(false);
    expect(controls.cursorPosition).toEqual({ x: 0, y: 0 });
  });

  it('CTL-002: initial values are clamped', () => {
    const controls = new SessionControls({ markRadius: 0, blendFactor: 140 });

    expect(controls.markRadius).toBe(1);
    expect(controls.blendFactor).toBe(100);
  });

  it('CTL-003: radius changes emit once per actual change', () => {
    const controls = new SessionControls();
    const listener = vi.fn();
    controls.on('markRadiusChanged', listener);

    controls.setMarkRadius(12);
    controls.setMarkRadius(12);
    controls.adjustMarkRadius(100);

    expect(listener.mock.calls).toEqual([[12], [50]]);
  });

  it('CTL-004: blend changes clamp to 0..100', () => {
    const controls = new SessionControls();
    const listener = vi.fn();
    controls.on('blendFactorChanged', listener);

    controls.adjustBlendFactor(-50);

    expect(controls.blendFactor).toBe(0);
    expect(listener).toHaveBeenCalledWith(0);
  });

  it('CTL-005: fractional values round to integers', () => {
    const controls = new SessionControls();

    controls.setMarkRadius(7.6);
    controls.setBlendFactor(20.4);

    expect(controls.markRadius).toBe(8);
    expect(controls.blendFactor).toBe(20);
  });

  it('CTL-006: toggles report both display flags', () => {
    const controls = new SessionControls();
    const listener = vi.fn();
    controls.on('displayFlagsChanged', listener);

    controls.toggleReferences();
    controls.toggleFilename();

    expect(listener.mock.calls).toEqual([
      [{ showReferences: false, showFilename: false }],
      [{ showReferences: false, showFilename: true }],
    ]);
  });

  it('CTL-007: cursor state pairs the position with the radius', () => {
    const controls = new SessionControls({ markRadius: 9 });

    controls.setCursorPosition({ x: 14, y: 3 });

    expect(controls.cursor).toEqual({ position: { x: 14, y: 3 }, radius: 9 });
  });

  it('CTL-008: cursor position getter returns a copy', () => {
    const controls = new SessionControls();
    const position = controls.cursorPosition;
    position.x = 99;

    expect(controls.cursorPosition).toEqual({ x: 0, y: 0 });
  });
});
