import type { ColorFeatures, Raster, RegionOfInterest } from '../../types/screening';
import { SCREENING_CONFIG } from '../config/ScreeningConfig';
import { pallorIndex } from './PallorScorer';
import { assertReadableRaster, cropRaster, rotateRaster, scaleRaster } from './raster';
import { DEFAULT_ROI, normalizeRoi, roiToPixelRect } from './roi';

export interface ColorFeatureExtractorConfig {
  inputSize: number;
}

const defaultConfig: ColorFeatureExtractorConfig = {
  inputSize: SCREENING_CONFIG.INFERENCE.INPUT_SIZE
};

export interface ExtractionResult {
  scaled: Raster;
  features: ColorFeatures;
}

/**
 * Crops the region of interest, scales it to the model input size and
 * summarizes its color distribution.
 *
 * Only the scaled crop leaves this class; the rotated full-resolution copy is
 * dropped as soon as the crop exists.
 */
export class ColorFeatureExtractor {
  private readonly config: ColorFeatureExtractorConfig;

  constructor(config: Partial<ColorFeatureExtractorConfig> = {}) {
    this.config = { ...defaultConfig, ...config };
    if (!Number.isInteger(this.config.inputSize) || this.config.inputSize <= 0) {
      throw new RangeError(`ColorFeatureExtractor: invalid input size ${this.config.inputSize}`);
    }
  }

  public get inputSize(): number {
    return this.config.inputSize;
  }

  public extract(raster: Raster, roi: RegionOfInterest = DEFAULT_ROI): ExtractionResult {
    assertReadableRaster(raster);
    const region = normalizeRoi(roi);

    const scaled = this.cropAndScale(raster, region);
    return { scaled, features: computeColorFeatures(scaled) };
  }

  private cropAndScale(raster: Raster, region: RegionOfInterest): Raster {
    const rotated = rotateRaster(raster);
    const crop = cropRaster(rotated, roiToPixelRect(region, rotated.width, rotated.height));
    return scaleRaster(crop, this.config.inputSize, this.config.inputSize);
  }
}

/**
 * Mean RGB plus mean HSV saturation and value over every pixel of the raster.
 */
export function computeColorFeatures(raster: Raster): ColorFeatures {
  const { data } = raster;
  const pixelCount = raster.width * raster.height;

  let totalR = 0;
  let totalG = 0;
  let totalB = 0;
  let totalSaturation = 0;
  let totalBrightness = 0;

  for (let i = 0; i < pixelCount; i++) {
    const r = data[i * 3];
    const g = data[i * 3 + 1];
    const b = data[i * 3 + 2];
    totalR += r;
    totalG += g;
    totalB += b;

    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    totalSaturation += max === 0 ? 0 : (max - min) / max;
    totalBrightness += max / 255;
  }

  const meanRed = totalR / pixelCount;
  const meanGreen = totalG / pixelCount;
  const meanBlue = totalB / pixelCount;
  const saturation = totalSaturation / pixelCount;
  const brightness = totalBrightness / pixelCount;

  return Object.freeze({
    meanRed,
    meanGreen,
    meanBlue,
    saturation,
    brightness,
    pallorIndex: pallorIndex(meanRed, meanGreen, meanBlue, saturation)
  });
}
