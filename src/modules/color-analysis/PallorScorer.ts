import { SCREENING_CONFIG } from '../config/ScreeningConfig';

const { EPSILON, HEALTHY_RED_RATIO, HEALTHY_SATURATION, RED_WEIGHT, SATURATION_WEIGHT } = SCREENING_CONFIG.PALLOR;

const finiteOrZero = (value: number) => (Number.isFinite(value) ? value : 0);

export function redRatio(meanRed: number, meanGreen: number, meanBlue: number): number {
  const r = Math.max(0, finiteOrZero(meanRed));
  const total = r + Math.max(0, finiteOrZero(meanGreen)) + Math.max(0, finiteOrZero(meanBlue)) + EPSILON;
  return r / total;
}

/**
 * Pallor index: 0 = healthy red, saturated tissue, 1 = severe pallor.
 *
 * Healthy conjunctiva keeps the red channel near half of the total intensity with
 * moderate saturation; anemic tissue loses both. Reference points and weights are fixed.
 */
export function pallorIndex(meanRed: number, meanGreen: number, meanBlue: number, meanSaturation: number): number {
  const redDeficit = Math.max(0, HEALTHY_RED_RATIO - redRatio(meanRed, meanGreen, meanBlue)) / HEALTHY_RED_RATIO;
  const saturationDeficit = Math.max(0, HEALTHY_SATURATION - finiteOrZero(meanSaturation)) / HEALTHY_SATURATION;

  const index = redDeficit * RED_WEIGHT + saturationDeficit * SATURATION_WEIGHT;
  return Math.min(1, Math.max(0, index));
}
