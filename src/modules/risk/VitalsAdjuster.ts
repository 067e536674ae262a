import type { Vitals } from '../../types/screening';
import { SCREENING_CONFIG } from '../config/ScreeningConfig';

const V = SCREENING_CONFIG.VITALS;

function hemoglobinBoost(hemoglobin: number | undefined): number {
  if (hemoglobin === undefined || !Number.isFinite(hemoglobin)) return 0;
  if (hemoglobin < V.HEMOGLOBIN_SEVERE) return V.HEMOGLOBIN_SEVERE_BOOST;
  if (hemoglobin < V.HEMOGLOBIN_MODERATE) return V.HEMOGLOBIN_MODERATE_BOOST;
  if (hemoglobin < V.HEMOGLOBIN_MILD) return V.HEMOGLOBIN_MILD_BOOST;
  return 0;
}

function fatigueBoost(fatigueLevel: number | undefined): number {
  if (fatigueLevel === undefined || !Number.isFinite(fatigueLevel)) return 0;
  if (fatigueLevel >= V.FATIGUE_HIGH) return V.FATIGUE_HIGH_BOOST;
  if (fatigueLevel >= V.FATIGUE_MODERATE) return V.FATIGUE_MODERATE_BOOST;
  return 0;
}

/**
 * Sum of the additive vitals corrections, before clamping.
 * The thresholds and increments are provisional and not calibrated against outcomes.
 */
export function vitalsIncrement(vitals: Vitals): number {
  return (
    hemoglobinBoost(vitals.knownHemoglobin) +
    fatigueBoost(vitals.fatigueLevel) +
    (vitals.shortnessOfBreath ? V.SHORTNESS_OF_BREATH_BOOST : 0) +
    (vitals.dizziness ? V.DIZZINESS_BOOST : 0) +
    (vitals.paleSkin ? V.PALE_SKIN_BOOST : 0)
  );
}

/**
 * Applies patient vitals to a base score. Without vitals the score is returned untouched.
 */
export function adjustScore(baseScore: number, vitals?: Vitals | null): number {
  if (!vitals) return baseScore;

  const adjusted = baseScore + vitalsIncrement(vitals);
  return Number.isNaN(adjusted) ? 0 : Math.min(1, Math.max(0, adjusted));
}
