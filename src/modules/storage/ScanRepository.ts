import type { RiskLevel, ScanRecord, SyncStatus } from '../../types/screening';

/**
 * Local store of scan records. Status updates must be atomic per record so the
 * diagnosis flow and the sync cycle can write concurrently.
 */
export interface ScanRepository {
  insert(scan: ScanRecord): Promise<void>;
  update(scan: ScanRecord): Promise<void>;
  getById(scanId: string): Promise<ScanRecord | null>;
  getByPatient(patientId: string): Promise<ScanRecord[]>;
  /** Newest first, at most `limit` records. */
  getRecent(limit: number): Promise<ScanRecord[]>;
  listByStatus(...statuses: SyncStatus[]): Promise<ScanRecord[]>;
  countByStatus(...statuses: SyncStatus[]): Promise<number>;
  markSynced(scanIds: readonly string[]): Promise<void>;
  markFailed(scanIds: readonly string[]): Promise<void>;
  countByRiskLevel(level: RiskLevel): Promise<number>;
  averageRiskScore(): Promise<number | null>;
}
