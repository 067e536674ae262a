import type { ProcessingError, ScanRecord } from '../../types/screening';
import { ScreeningError, toProcessingError } from '../errors/ScreeningError';
import type { ScanRepository } from '../storage/ScanRepository';
import { debugSync } from '../../utils/debug';
import { buildSyncPayload } from './sync-payload';
import type { SyncTransport } from './SyncTransport';

export type SyncOutcome =
  | { status: 'idle' }
  | { status: 'synced'; count: number }
  | { status: 'failed'; count: number; retry: true; error: ProcessingError }
  | { status: 'cancelled'; count: number };

export interface SyncQueueManagerDeps {
  repository: ScanRepository;
  transport: SyncTransport;
  // Loaded once at startup, see loadAnonymousDeviceId
  deviceId: string;
  clock?: () => number;
}

const abortedOutcome = (count: number): SyncOutcome => ({ status: 'cancelled', count });

/**
 * Uploads every unsynced scan as one anonymized batch.
 *
 * The whole batch succeeds or fails together. Failed scans keep no retry
 * counter; they are simply selected again by the next cycle. Cycles never
 * overlap: a call made while one is running waits for it to finish.
 */
export class SyncQueueManager {
  private readonly repository: ScanRepository;
  private readonly transport: SyncTransport;
  private readonly deviceId: string;
  private readonly clock: () => number;
  private queue: Promise<unknown> = Promise.resolve();
  private running = 0;

  constructor(deps: SyncQueueManagerDeps) {
    this.repository = deps.repository;
    this.transport = deps.transport;
    this.deviceId = deps.deviceId;
    this.clock = deps.clock ?? Date.now;
  }

  public get isSyncing(): boolean {
    return this.running > 0;
  }

  /** Records not yet accepted by the collector (PENDING or FAILED). */
  public pendingCount(): Promise<number> {
    return this.repository.countByStatus('PENDING', 'FAILED');
  }

  public runSyncCycle(signal?: AbortSignal): Promise<SyncOutcome> {
    const cycle = this.queue.then(async () => {
      this.running++;
      try {
        if (signal?.aborted) return abortedOutcome(0);
        const records = await this.repository.listByStatus('PENDING', 'FAILED');
        return await this.syncBatch(records, signal);
      } finally {
        this.running--;
      }
    });
    // Keep the chain alive whatever this cycle's outcome
    this.queue = cycle.catch(() => undefined);
    return cycle;
  }

  /**
   * One transport attempt for the given records, then one status write for all of them.
   * Only reachable through runSyncCycle, so batches never overlap.
   */
  private async syncBatch(records: readonly ScanRecord[], signal?: AbortSignal): Promise<SyncOutcome> {
    const toSync = records.filter(record => record.syncStatus !== 'SYNCED');
    if (toSync.length === 0) {
      debugSync('nothing to sync');
      return { status: 'idle' };
    }
    if (signal?.aborted) return abortedOutcome(toSync.length);

    const scanIds = toSync.map(record => record.scanId);
    const payload = JSON.stringify(buildSyncPayload(toSync, this.deviceId, this.clock()));
    debugSync('sending batch', { count: toSync.length, bytes: payload.length });

    let accepted = false;
    let failure: unknown = null;
    try {
      accepted = await this.transport.send(payload, signal);
    } catch (error) {
      failure = error;
    }

    // An accepted batch is recorded even if the abort raced the response
    if (accepted) {
      await this.writeStatus(() => this.repository.markSynced(scanIds));
      console.log(`SyncQueueManager: synced ${scanIds.length} scan(s)`);
      return { status: 'synced', count: scanIds.length };
    }

    // Constraints went away mid-run: leave every record as it was
    if (signal?.aborted) {
      console.warn('SyncQueueManager: sync cycle aborted, records left unchanged', { count: toSync.length });
      return abortedOutcome(toSync.length);
    }

    await this.writeStatus(() => this.repository.markFailed(scanIds));
    const error = toProcessingError(
      failure ?? new Error('Collector rejected the batch'),
      'TRANSPORT_FAILURE'
    );
    console.error('SyncQueueManager: sync failed, will retry next cycle', error);
    return { status: 'failed', count: scanIds.length, retry: true, error };
  }

  private async writeStatus(write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      console.error('SyncQueueManager: failed to record sync status', error);
      throw new ScreeningError('PERSISTENCE_ERROR', 'Sync status could not be saved', error);
    }
  }
}
