import { describe, it, expect } from 'vitest';
import { Raster } from './Raster';
import { ValidationError } from '../errors';

describe('Raster', () => {
  it('RAS-001: allocates zeroed interleaved storage', () => {
    const raster = new Raster({ width: 4, height: 2, channels: 3 });

    expect(raster.data).toHaveLength(24);
    expect(raster.getPixel(3, 1)).toEqual([0, 0, 0]);
  });

  it('RAS-002: rejects data of the wrong length', () => {
    expect(() => new Raster({ width: 2, height: 2, channels: 1, data: new Uint8Array(3) })).toThrow(
      'Raster: expected 4 bytes for 2x2x1, got 3'
    );
  });

  it('RAS-003: rejects empty dimensions', () => {
    expect(() => new Raster({ width: 0, height: 5, channels: 3 })).toThrow(ValidationError);
  });

  it('RAS-004: fromRGBA drops alpha', () => {
    const raster = Raster.fromRGBA(2, 1, Uint8Array.from([1, 2, 3, 0, 4, 5, 6, 128]));

    expect(Array.from(raster.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('RAS-005: toRGBA replicates a gray channel and sets opaque alpha', () => {
    const raster = new Raster({ width: 2, height: 1, channels: 1, data: Uint8Array.from([10, 200]) });

    expect(Array.from(raster.toRGBA())).toEqual([10, 10, 10, 255, 200, 200, 200, 255]);
  });

  it('RAS-006: setPixel writes only the channels given', () => {
    const raster = new Raster({ width: 1, height: 1, channels: 3 });
    raster.setPixel(0, 0, [7, 8]);

    expect(raster.getPixel(0, 0)).toEqual([7, 8, 0]);
  });
});
