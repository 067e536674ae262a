import type { RiskLevel } from '../../types/screening';
import { SCREENING_CONFIG } from '../config/ScreeningConfig';

export const RECOMMENDATIONS: Readonly<Record<RiskLevel, string>> = {
  RED: 'Immediate medical consultation recommended. Signs suggest possible moderate to severe anemia.',
  AMBER: 'Consider scheduling a blood test. Some indicators of mild anemia detected.',
  GREEN: 'No immediate concern detected. Continue regular health monitoring.'
};

export interface RiskClassification {
  riskLevel: RiskLevel;
  recommendation: string;
}

// Lower bounds are inclusive: 0.70 is RED, 0.40 is AMBER
export function classifyRisk(score: number): RiskClassification {
  const { RED_THRESHOLD, AMBER_THRESHOLD } = SCREENING_CONFIG.CLASSIFICATION;
  const riskLevel: RiskLevel =
    score >= RED_THRESHOLD ? 'RED' : score >= AMBER_THRESHOLD ? 'AMBER' : 'GREEN';

  return { riskLevel, recommendation: RECOMMENDATIONS[riskLevel] };
}
