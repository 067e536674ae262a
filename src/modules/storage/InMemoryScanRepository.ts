import type { RiskLevel, ScanRecord, SyncStatus } from '../../types/screening';
import { debugStorage } from '../../utils/debug';
import type { ScanRepository } from './ScanRepository';

const copyRecord = (scan: ScanRecord): ScanRecord => ({ ...scan, vitals: { ...scan.vitals } });

/**
 * Process-local repository. Every operation works on copies, and a status
 * update replaces each affected record in one synchronous step, so no caller
 * ever observes a half-written record.
 */
export class InMemoryScanRepository implements ScanRepository {
  private readonly scans = new Map<string, ScanRecord>();

  public async insert(scan: ScanRecord): Promise<void> {
    this.scans.set(scan.scanId, copyRecord(scan));
    debugStorage('scan inserted', { scanId: scan.scanId, syncStatus: scan.syncStatus });
  }

  public async update(scan: ScanRecord): Promise<void> {
    if (!this.scans.has(scan.scanId)) {
      throw new Error(`InMemoryScanRepository: unknown scan ${scan.scanId}`);
    }
    this.scans.set(scan.scanId, copyRecord(scan));
  }

  public async getById(scanId: string): Promise<ScanRecord | null> {
    const scan = this.scans.get(scanId);
    return scan ? copyRecord(scan) : null;
  }

  public async getByPatient(patientId: string): Promise<ScanRecord[]> {
    return this.sortedByTimestamp(scan => scan.patientId === patientId);
  }

  public async getRecent(limit: number): Promise<ScanRecord[]> {
    if (limit <= 0) return [];
    return this.sortedByTimestamp(() => true)
      .reverse()
      .slice(0, limit);
  }

  public async listByStatus(...statuses: SyncStatus[]): Promise<ScanRecord[]> {
    return this.sortedByTimestamp(scan => statuses.includes(scan.syncStatus));
  }

  public async countByStatus(...statuses: SyncStatus[]): Promise<number> {
    let count = 0;
    this.scans.forEach(scan => {
      if (statuses.includes(scan.syncStatus)) count++;
    });
    return count;
  }

  public async markSynced(scanIds: readonly string[]): Promise<void> {
    this.setStatus(scanIds, 'SYNCED');
  }

  public async markFailed(scanIds: readonly string[]): Promise<void> {
    this.setStatus(scanIds, 'FAILED');
  }

  public async countByRiskLevel(level: RiskLevel): Promise<number> {
    let count = 0;
    this.scans.forEach(scan => {
      if (scan.riskLevel === level) count++;
    });
    return count;
  }

  public async averageRiskScore(): Promise<number | null> {
    if (this.scans.size === 0) return null;
    let total = 0;
    this.scans.forEach(scan => {
      total += scan.riskScore;
    });
    return total / this.scans.size;
  }

  private setStatus(scanIds: readonly string[], syncStatus: SyncStatus): void {
    scanIds.forEach(scanId => {
      const scan = this.scans.get(scanId);
      if (scan) {
        this.scans.set(scanId, { ...scan, syncStatus });
      }
    });
    debugStorage(`marked ${scanIds.length} scan(s) ${syncStatus}`);
  }

  // Oldest first
  private sortedByTimestamp(predicate: (scan: ScanRecord) => boolean): ScanRecord[] {
    return Array.from(this.scans.values())
      .filter(predicate)
      .sort((a, b) => a.timestamp - b.timestamp)
      .map(copyRecord);
  }
}
