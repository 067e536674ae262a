import type { RiskLevel, ScanRecord, ScanType } from '../../types/screening';
import { decodeFeatureVector, type AnonymizedFeatures } from '../diagnosis/feature-vector';

export interface SyncScanEntry {
  scan_type: ScanType;
  risk_score: number;
  risk_level: RiskLevel;
  confidence: number;
  inference_time_ms: number;
  features: Partial<AnonymizedFeatures> | null;
}

export interface SyncBatchStats {
  avg_risk_score: number;
  high_risk_count: number;
  moderate_risk_count: number;
  low_risk_count: number;
}

export interface SyncBatchPayload {
  device_id: string;
  timestamp: number;
  count: number;
  scans: SyncScanEntry[];
  stats: SyncBatchStats;
}

/**
 * Anonymized batch for upload. Entries are built field by field so nothing
 * identifying (patient, image path, vitals values) can leak through.
 */
export function buildSyncPayload(scans: readonly ScanRecord[], deviceId: string, timestamp: number): SyncBatchPayload {
  const entries = scans.map(
    (scan): SyncScanEntry => ({
      scan_type: scan.scanType,
      risk_score: scan.riskScore,
      risk_level: scan.riskLevel,
      confidence: scan.confidence,
      inference_time_ms: scan.inferenceTimeMs,
      features: decodeFeatureVector(scan.featureVector)
    })
  );

  const countLevel = (level: RiskLevel) => scans.filter(scan => scan.riskLevel === level).length;
  const totalRisk = scans.reduce((sum, scan) => sum + scan.riskScore, 0);

  return {
    device_id: deviceId,
    timestamp,
    count: scans.length,
    scans: entries,
    stats: {
      avg_risk_score: scans.length > 0 ? totalRisk / scans.length : 0,
      high_risk_count: countLevel('RED'),
      moderate_risk_count: countLevel('AMBER'),
      low_risk_count: countLevel('GREEN')
    }
  };
}
