import type { RegionOfInterest } from '../../types/screening';
import { SCREENING_CONFIG, type RoiPresetName } from '../config/ScreeningConfig';
import { ScreeningError } from '../errors/ScreeningError';
import type { PixelRect } from './raster';

const clamp01 = (value: number) => (Number.isFinite(value) ? Math.max(0, Math.min(1, value)) : 0);

const clampInt = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

export function roiPreset(name: RoiPresetName): RegionOfInterest {
  return { ...SCREENING_CONFIG.ROI_PRESETS[name] };
}

export const DEFAULT_ROI: Readonly<RegionOfInterest> = Object.freeze(roiPreset('LOWER_EYELID'));

/**
 * Clamps every bound into [0, 1] and rejects regions that collapse to zero area.
 */
export function normalizeRoi(roi: RegionOfInterest): RegionOfInterest {
  const normalized = {
    left: clamp01(roi.left),
    top: clamp01(roi.top),
    right: clamp01(roi.right),
    bottom: clamp01(roi.bottom)
  };
  if (normalized.left >= normalized.right || normalized.top >= normalized.bottom) {
    throw new ScreeningError(
      'INVALID_ROI',
      `Degenerate region (${normalized.left}, ${normalized.top}, ${normalized.right}, ${normalized.bottom})`
    );
  }
  return normalized;
}

/**
 * Maps a normalized ROI onto pixel bounds. The result is at least 1x1 and inside the frame.
 */
export function roiToPixelRect(roi: RegionOfInterest, width: number, height: number): PixelRect {
  const left = clampInt(Math.floor(width * roi.left), 0, width - 1);
  const top = clampInt(Math.floor(height * roi.top), 0, height - 1);
  const right = clampInt(Math.floor(width * roi.right), left + 1, width);
  const bottom = clampInt(Math.floor(height * roi.bottom), top + 1, height);

  return { x: left, y: top, width: right - left, height: bottom - top };
}
