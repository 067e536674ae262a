import type { DiagnosisResult, ProcessingError, Raster, RegionOfInterest } from '../../types/screening';
import { ColorFeatureExtractor } from '../color-analysis/ColorFeatureExtractor';
import { DEFAULT_ROI, normalizeRoi } from '../color-analysis/roi';
import { toProcessingError } from '../errors/ScreeningError';
import type { RiskInferenceEngine } from '../inference/RiskInferenceEngine';
import { classifyRisk } from '../risk/RiskClassifier';
import { debugFrame } from '../../utils/debug';
import { FrameThrottle } from './FrameThrottle';

export interface LiveFrameAnalyzerOptions {
  engine: RiskInferenceEngine;
  extractor?: ColorFeatureExtractor;
  throttle?: FrameThrottle;
  roi?: RegionOfInterest;
  onResult?: (result: DiagnosisResult) => void;
  onError?: (error: ProcessingError) => void;
  now?: () => number;
}

/**
 * Live preview analysis on a single worker slot.
 *
 * Frames that arrive while an analysis is running are dropped, never queued.
 * Once disposed, a result still in flight is discarded instead of delivered.
 */
export class LiveFrameAnalyzer {
  private readonly engine: RiskInferenceEngine;
  private readonly extractor: ColorFeatureExtractor;
  private readonly throttle: FrameThrottle;
  private readonly now: () => number;
  private roi: RegionOfInterest;
  private inFlight: Promise<void> | null = null;
  private disposed = false;
  private droppedFrames = 0;

  public onResult?: (result: DiagnosisResult) => void;
  public onError?: (error: ProcessingError) => void;

  constructor(options: LiveFrameAnalyzerOptions) {
    this.engine = options.engine;
    this.extractor = options.extractor ?? new ColorFeatureExtractor();
    this.throttle = options.throttle ?? new FrameThrottle();
    this.roi = normalizeRoi(options.roi ?? DEFAULT_ROI);
    this.onResult = options.onResult;
    this.onError = options.onError;
    this.now = options.now ?? (() => performance.now());
  }

  public get isBusy(): boolean {
    return this.inFlight !== null;
  }

  public get droppedFrameCount(): number {
    return this.droppedFrames;
  }

  /** Retargets the ROI for subsequent frames; throws INVALID_ROI on a degenerate region. */
  public setRegionOfInterest(roi: RegionOfInterest): void {
    this.roi = normalizeRoi(roi);
  }

  public getRegionOfInterest(): RegionOfInterest {
    return { ...this.roi };
  }

  /**
   * Offers a frame for analysis. Returns false when it was throttled or dropped.
   */
  public submit(frame: Raster): boolean {
    if (this.disposed) return false;
    // A frame dropped while busy must not reach the throttle
    if (this.inFlight) {
      this.droppedFrames++;
      debugFrame('analyzer busy, frame dropped', { droppedFrames: this.droppedFrames });
      return false;
    }
    if (!this.throttle.shouldAnalyze(this.now())) return false;

    this.inFlight = this.analyzeFrame(frame, this.roi).finally(() => {
      this.inFlight = null;
    });
    return true;
  }

  /** Resolves once no analysis is in flight. */
  public async idle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  public dispose(): void {
    this.disposed = true;
    this.onResult = undefined;
    this.onError = undefined;
  }

  private async analyzeFrame(frame: Raster, roi: RegionOfInterest): Promise<void> {
    let result: DiagnosisResult;
    try {
      const { scaled, features } = this.extractor.extract(frame, roi);
      const estimate = await this.engine.analyze(scaled, features);
      const { riskLevel, recommendation } = classifyRisk(estimate.riskScore);
      result = Object.freeze({
        riskScore: estimate.riskScore,
        riskLevel,
        confidence: estimate.confidence,
        inferenceTimeMs: estimate.inferenceTimeMs,
        colorFeatures: features,
        recommendation,
        source: estimate.source
      });
    } catch (error) {
      console.error('LiveFrameAnalyzer: frame analysis failed', error);
      if (!this.disposed) {
        this.onError?.(toProcessingError(error));
      }
      return;
    }

    if (this.disposed) return;
    try {
      this.onResult?.(result);
    } catch (error) {
      // Consumer failure, not an analysis error: keep it out of onError
      console.error('LiveFrameAnalyzer: onResult handler threw', error);
    }
  }
}
