import type { Raster } from '../../types/screening';
import { ScreeningError } from '../errors/ScreeningError';

const CHANNELS = 3;

export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Rejects rasters the decoder handed over in an unusable state.
 */
export function assertReadableRaster(raster: Raster): void {
  const { width, height, data } = raster;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ScreeningError('DECODE_ERROR', `Invalid raster dimensions ${width}x${height}`);
  }
  if (data.length !== width * height * CHANNELS) {
    throw new ScreeningError(
      'DECODE_ERROR',
      `Raster buffer holds ${data.length} bytes, expected ${width * height * CHANNELS}`
    );
  }
  const rotation = raster.rotationDegrees ?? 0;
  if (!Number.isFinite(rotation) || rotation % 90 !== 0) {
    throw new ScreeningError('DECODE_ERROR', `Unsupported rotation ${rotation}`);
  }
}

/**
 * Converts canvas ImageData (RGBA) into an RGB raster.
 */
export function rasterFromRgba(
  rgba: { width: number; height: number; data: ArrayLike<number> },
  rotationDegrees = 0
): Raster {
  const pixelCount = rgba.width * rgba.height;
  if (rgba.data.length !== pixelCount * 4) {
    throw new ScreeningError('DECODE_ERROR', 'RGBA buffer does not match frame dimensions');
  }
  const data = new Uint8ClampedArray(pixelCount * CHANNELS);
  for (let i = 0; i < pixelCount; i++) {
    data[i * 3] = rgba.data[i * 4];
    data[i * 3 + 1] = rgba.data[i * 4 + 1];
    data[i * 3 + 2] = rgba.data[i * 4 + 2];
  }
  return { width: rgba.width, height: rgba.height, data, rotationDegrees };
}

/**
 * Applies the clockwise rotation hint. Returns the same raster when there is nothing to do.
 */
export function rotateRaster(raster: Raster): Raster {
  const rotation = (((raster.rotationDegrees ?? 0) % 360) + 360) % 360;
  if (rotation === 0) {
    return raster;
  }

  const { width: w, height: h, data } = raster;
  const swap = rotation === 90 || rotation === 270;
  const outWidth = swap ? h : w;
  const outHeight = swap ? w : h;
  const out = new Uint8ClampedArray(w * h * CHANNELS);

  for (let y = 0; y < outHeight; y++) {
    for (let x = 0; x < outWidth; x++) {
      let srcX: number;
      let srcY: number;
      if (rotation === 90) {
        srcX = y;
        srcY = h - 1 - x;
      } else if (rotation === 180) {
        srcX = w - 1 - x;
        srcY = h - 1 - y;
      } else {
        srcX = w - 1 - y;
        srcY = x;
      }
      const src = (srcY * w + srcX) * CHANNELS;
      const dst = (y * outWidth + x) * CHANNELS;
      out[dst] = data[src];
      out[dst + 1] = data[src + 1];
      out[dst + 2] = data[src + 2];
    }
  }

  return { width: outWidth, height: outHeight, data: out, rotationDegrees: 0 };
}

export function cropRaster(raster: Raster, rect: PixelRect): Raster {
  const out = new Uint8ClampedArray(rect.width * rect.height * CHANNELS);
  for (let row = 0; row < rect.height; row++) {
    const srcStart = ((rect.y + row) * raster.width + rect.x) * CHANNELS;
    out.set(raster.data.subarray(srcStart, srcStart + rect.width * CHANNELS), row * rect.width * CHANNELS);
  }
  return { width: rect.width, height: rect.height, data: out, rotationDegrees: 0 };
}

/**
 * Bilinear resize with pixel-center alignment.
 */
export function scaleRaster(raster: Raster, outWidth: number, outHeight: number): Raster {
  const { width: w, height: h, data } = raster;
  const out = new Uint8ClampedArray(outWidth * outHeight * CHANNELS);
  const scaleX = w / outWidth;
  const scaleY = h / outHeight;

  for (let y = 0; y < outHeight; y++) {
    const srcY = Math.min(h - 1, Math.max(0, (y + 0.5) * scaleY - 0.5));
    const y0 = Math.floor(srcY);
    const y1 = Math.min(y0 + 1, h - 1);
    const fy = srcY - y0;

    for (let x = 0; x < outWidth; x++) {
      const srcX = Math.min(w - 1, Math.max(0, (x + 0.5) * scaleX - 0.5));
      const x0 = Math.floor(srcX);
      const x1 = Math.min(x0 + 1, w - 1);
      const fx = srcX - x0;

      const i00 = (y0 * w + x0) * CHANNELS;
      const i01 = (y0 * w + x1) * CHANNELS;
      const i10 = (y1 * w + x0) * CHANNELS;
      const i11 = (y1 * w + x1) * CHANNELS;
      const dst = (y * outWidth + x) * CHANNELS;

      for (let c = 0; c < CHANNELS; c++) {
        const top = data[i00 + c] * (1 - fx) + data[i01 + c] * fx;
        const bottom = data[i10 + c] * (1 - fx) + data[i11 + c] * fx;
        out[dst + c] = top * (1 - fy) + bottom * fy;
      }
    }
  }

  return { width: outWidth, height: outHeight, data: out, rotationDegrees: 0 };
}
