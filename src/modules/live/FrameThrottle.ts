import { SCREENING_CONFIG } from '../config/ScreeningConfig';

export interface FrameThrottleConfig {
  frameSkip: number;
  minIntervalMs: number;
}

const defaultConfig: FrameThrottleConfig = {
  frameSkip: SCREENING_CONFIG.FRAME_THROTTLE.FRAME_SKIP,
  minIntervalMs: SCREENING_CONFIG.FRAME_THROTTLE.MIN_INTERVAL_MS
};

/**
 * Caps how often live frames reach the analyzer, independent of camera frame rate:
 * only every Nth frame is considered, and only if enough time has passed since
 * the last accepted one.
 */
export class FrameThrottle {
  private readonly config: FrameThrottleConfig;
  private frameCounter = 0;
  private lastAcceptedAt: number | null = null;

  constructor(config: Partial<FrameThrottleConfig> = {}) {
    this.config = { ...defaultConfig, ...config };
    this.config.frameSkip = Math.max(1, Math.floor(this.config.frameSkip));
  }

  public shouldAnalyze(now: number): boolean {
    this.frameCounter++;
    if (this.frameCounter % this.config.frameSkip !== 0) {
      return false;
    }
    if (this.lastAcceptedAt !== null && now - this.lastAcceptedAt < this.config.minIntervalMs) {
      return false;
    }
    this.lastAcceptedAt = now;
    return true;
  }

  public reset(): void {
    this.frameCounter = 0;
    this.lastAcceptedAt = null;
  }
}
