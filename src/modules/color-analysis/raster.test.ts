import { describe, it, expect } from 'vitest';
import type { Raster } from '../../types/screening';
import { thrownCode } from '../../testing/fixtures';
import { assertReadableRaster, cropRaster, rasterFromRgba, rotateRaster, scaleRaster } from './raster';

const RED = [255, 0, 0];
const BLUE = [0, 0, 255];

const rasterOf = (width: number, height: number, pixels: number[][], rotationDegrees = 0): Raster => ({
  width,
  height,
  data: Uint8ClampedArray.from(pixels.flat()),
  rotationDegrees
});

describe('assertReadableRaster', () => {
  it('rejects mismatched buffers, empty frames and odd rotations', () => {
    expect(thrownCode(() => assertReadableRaster({ width: 2, height: 2, data: new Uint8Array(5) }))).toBe('DECODE_ERROR');
    expect(thrownCode(() => assertReadableRaster({ width: 0, height: 2, data: new Uint8Array(0) }))).toBe('DECODE_ERROR');
    expect(thrownCode(() => assertReadableRaster(rasterOf(1, 1, [RED], 45)))).toBe('DECODE_ERROR');
  });

  it('accepts a well-formed frame', () => {
    expect(thrownCode(() => assertReadableRaster(rasterOf(2, 1, [RED, BLUE], 270)))).toBeNull();
  });
});

describe('rotateRaster', () => {
  const strip = rasterOf(2, 1, [RED, BLUE]);

  it('returns the input untouched without a rotation hint', () => {
    expect(rotateRaster(strip)).toBe(strip);
  });

  it('rotates clockwise by 90 degrees', () => {
    const rotated = rotateRaster({ ...strip, rotationDegrees: 90 });
    expect(rotated.width).toBe(1);
    expect(rotated.height).toBe(2);
    expect(Array.from(rotated.data)).toEqual([...RED, ...BLUE]);
  });

  it('rotates by 180 and 270 degrees', () => {
    expect(Array.from(rotateRaster({ ...strip, rotationDegrees: 180 }).data)).toEqual([...BLUE, ...RED]);

    const quarter = rotateRaster({ ...strip, rotationDegrees: 270 });
    expect([quarter.width, quarter.height]).toEqual([1, 2]);
    expect(Array.from(quarter.data)).toEqual([...BLUE, ...RED]);
  });
});

describe('cropRaster', () => {
  it('copies the requested rectangle', () => {
    const raster = rasterOf(2, 2, [RED, BLUE, BLUE, RED]);
    const crop = cropRaster(raster, { x: 1, y: 0, width: 1, height: 2 });
    expect(Array.from(crop.data)).toEqual([...BLUE, ...RED]);
  });
});

describe('scaleRaster', () => {
  it('interpolates bilinearly between pixel centers', () => {
    const gradient = rasterOf(2, 1, [
      [0, 0, 0],
      [255, 255, 255]
    ]);
    const scaled = scaleRaster(gradient, 4, 1);
    const reds = [0, 1, 2, 3].map(x => scaled.data[x * 3]);
    expect(reds).toEqual([0, 64, 191, 255]);
  });
});

describe('rasterFromRgba', () => {
  it('drops the alpha channel', () => {
    const raster = rasterFromRgba({ width: 2, height: 1, data: [1, 2, 3, 255, 4, 5, 6, 0] }, 90);
    expect(Array.from(raster.data)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(raster.rotationDegrees).toBe(90);
  });

  it('rejects a buffer that does not match the frame size', () => {
    expect(thrownCode(() => rasterFromRgba({ width: 2, height: 2, data: [0, 0, 0, 0] }))).toBe('DECODE_ERROR');
  });
});
