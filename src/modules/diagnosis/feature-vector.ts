import type { ColorFeatures, Vitals } from '../../types/screening';
import { SCREENING_CONFIG } from '../config/ScreeningConfig';
import { redRatio } from '../color-analysis/PallorScorer';

/**
 * Anonymized features eligible for sync. Vitals only appear as coarse flags:
 * no hemoglobin value, no raw fatigue score.
 */
export interface AnonymizedFeatures {
  pallor_index: number;
  saturation: number;
  brightness: number;
  red_ratio: number;
  has_fatigue: boolean;
  has_shortness_of_breath: boolean;
  has_dizziness: boolean;
  has_pale_skin: boolean;
}

export function buildAnonymizedFeatures(features: ColorFeatures, vitals: Vitals = {}): AnonymizedFeatures {
  return {
    pallor_index: features.pallorIndex,
    saturation: features.saturation,
    brightness: features.brightness,
    red_ratio: redRatio(features.meanRed, features.meanGreen, features.meanBlue),
    has_fatigue: vitals.fatigueLevel !== undefined && vitals.fatigueLevel >= SCREENING_CONFIG.VITALS.FATIGUE_MODERATE,
    has_shortness_of_breath: vitals.shortnessOfBreath === true,
    has_dizziness: vitals.dizziness === true,
    has_pale_skin: vitals.paleSkin === true
  };
}

export function encodeFeatureVector(features: ColorFeatures, vitals?: Vitals): string {
  return JSON.stringify(buildAnonymizedFeatures(features, vitals));
}

const NUMERIC_KEYS = ['pallor_index', 'saturation', 'brightness', 'red_ratio'] as const;
const FLAG_KEYS = ['has_fatigue', 'has_shortness_of_breath', 'has_dizziness', 'has_pale_skin'] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses a stored encoding, keeping only the known anonymized keys.
 * Returns null for anything that is not a JSON object.
 */
export function decodeFeatureVector(encoded: string): Partial<AnonymizedFeatures> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(encoded);
  } catch (error) {
    console.warn('decodeFeatureVector: invalid feature vector encoding', error);
    return null;
  }
  if (!isRecord(parsed)) return null;

  const source = parsed;
  const result: Partial<AnonymizedFeatures> = {};
  NUMERIC_KEYS.forEach(key => {
    const value = source[key];
    if (typeof value === 'number') result[key] = value;
  });
  FLAG_KEYS.forEach(key => {
    const value = source[key];
    if (typeof value === 'boolean') result[key] = value;
  });
  return result;
}
