import { SCREENING_CONFIG } from '../config/ScreeningConfig';
import type { SyncOutcome, SyncQueueManager } from './SyncQueueManager';

export interface PeriodicSyncSchedulerOptions {
  manager: SyncQueueManager;
  intervalMs?: number;
  // Unmetered network, charging, battery not low; checked by the host platform
  constraintsMet?: () => boolean;
  onOutcome?: (outcome: SyncOutcome) => void;
}

/**
 * Invokes a sync cycle on a fixed interval while the host's constraints hold.
 * A tick that finds a cycle still running is skipped.
 */
export class PeriodicSyncScheduler {
  private readonly manager: SyncQueueManager;
  private readonly intervalMs: number;
  private readonly constraintsMet: () => boolean;
  private readonly onOutcome?: (outcome: SyncOutcome) => void;
  private timer: ReturnType<typeof setInterval> | null = null;
  private controller: AbortController | null = null;
  private current: Promise<void> | null = null;

  constructor(options: PeriodicSyncSchedulerOptions) {
    this.manager = options.manager;
    this.intervalMs = options.intervalMs ?? SCREENING_CONFIG.SYNC.INTERVAL_MS;
    this.constraintsMet = options.constraintsMet ?? (() => true);
    this.onOutcome = options.onOutcome;
  }

  public get isRunning(): boolean {
    return this.timer !== null;
  }

  public start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    console.log(`PeriodicSyncScheduler: started, every ${this.intervalMs}ms`);
  }

  /** Stops scheduling and aborts a cycle still in flight. */
  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    console.log('PeriodicSyncScheduler: stopped');
  }

  /** Abort the in-flight cycle, e.g. when the network class changes. */
  public cancelCurrent(): void {
    this.controller?.abort();
  }

  /** Runs one cycle now, unless constraints are unmet or a cycle is already running. */
  public tick(): Promise<void> | null {
    if (this.current || !this.constraintsMet()) {
      return null;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.current = this.manager
      .runSyncCycle(controller.signal)
      .then(outcome => this.onOutcome?.(outcome))
      .catch(error => {
        console.error('PeriodicSyncScheduler: sync cycle threw', error);
      })
      .finally(() => {
        this.current = null;
        if (this.controller === controller) this.controller = null;
      });
    return this.current;
  }
}
