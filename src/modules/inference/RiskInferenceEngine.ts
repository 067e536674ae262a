import type { ColorFeatures, InferenceSource, Raster } from '../../types/screening';
import { SCREENING_CONFIG } from '../config/ScreeningConfig';
import { redRatio } from '../color-analysis/PallorScorer';
import { debugInference } from '../../utils/debug';
import type { ModelBackend, ModelBackendLoader } from './ModelBackend';

export interface RiskEstimate {
  riskScore: number;
  confidence: number;
  inferenceTimeMs: number;
  source: InferenceSource;
}

export interface RiskInferenceEngineOptions {
  loadBackend?: ModelBackendLoader;
  now?: () => number;
}

const { IMAGE_MEAN, IMAGE_STD, HEURISTIC_CONFIDENCE } = SCREENING_CONFIG.INFERENCE;
const HEURISTIC = SCREENING_CONFIG.HEURISTIC;

export const clampUnit = (value: number): number =>
  Number.isNaN(value) ? 0 : Math.min(1, Math.max(0, value));

/**
 * Normalizes every channel to [-1, 1] in row-major HWC order.
 */
export function normalizeForModel(raster: Raster): Float32Array {
  const out = new Float32Array(raster.width * raster.height * 3);
  for (let i = 0; i < out.length; i++) {
    out[i] = (raster.data[i] - IMAGE_MEAN) / IMAGE_STD;
  }
  return out;
}

/**
 * Deterministic fallback: pallor index plus fixed penalties for washed-out tissue.
 */
export function heuristicRisk(features: ColorFeatures): { riskScore: number; confidence: number } {
  let riskScore = features.pallorIndex;

  if (features.saturation < HEURISTIC.LOW_SATURATION) {
    riskScore += HEURISTIC.LOW_SATURATION_PENALTY;
  }

  if (redRatio(features.meanRed, features.meanGreen, features.meanBlue) < HEURISTIC.LOW_RED_RATIO) {
    riskScore += HEURISTIC.LOW_RED_RATIO_PENALTY;
  }

  if (features.brightness > HEURISTIC.PALE_BRIGHTNESS && features.saturation < HEURISTIC.PALE_SATURATION) {
    riskScore += HEURISTIC.PALE_PENALTY;
  }

  return { riskScore: clampUnit(riskScore), confidence: HEURISTIC_CONFIDENCE };
}

/**
 * Produces a risk score from a scaled ROI, through the model backend when one
 * is loaded and the heuristic otherwise.
 *
 * A backend that fails to load, or throws on a given call, never surfaces as an
 * error: that call simply takes the heuristic path.
 */
export class RiskInferenceEngine {
  private backend: ModelBackend | null = null;
  private readonly backendReady: Promise<void>;
  private readonly now: () => number;
  private disposed = false;

  constructor(options: RiskInferenceEngineOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.backendReady = options.loadBackend ? this.loadBackend(options.loadBackend) : Promise.resolve();
  }

  private async loadBackend(load: ModelBackendLoader): Promise<void> {
    try {
      const backend = await load();
      if (this.disposed) {
        backend.dispose();
        return;
      }
      this.backend = backend;
      console.log('RiskInferenceEngine: model backend loaded');
    } catch (error) {
      console.warn('RiskInferenceEngine: model backend unavailable, using heuristic analysis', error);
      this.backend = null;
    }
  }

  /** Resolves once backend loading has settled, whatever its outcome. */
  public ready(): Promise<void> {
    return this.backendReady;
  }

  public isBackendAvailable(): boolean {
    return this.backend !== null;
  }

  public async analyze(scaled: Raster, features: ColorFeatures): Promise<RiskEstimate> {
    await this.backendReady;
    const startTime = this.now();

    let estimate: { riskScore: number; confidence: number } | null = null;
    let source: InferenceSource = 'heuristic';

    if (this.backend) {
      try {
        estimate = await this.runModel(this.backend, scaled);
        source = 'model';
      } catch (error) {
        console.warn('RiskInferenceEngine: backend call failed, falling back to heuristic', error);
      }
    }

    if (!estimate) {
      estimate = heuristicRisk(features);
    }

    const inferenceTimeMs = Math.max(0, this.now() - startTime);
    debugInference('analysis complete', { source, riskScore: estimate.riskScore, inferenceTimeMs });

    return { ...estimate, inferenceTimeMs, source };
  }

  private async runModel(backend: ModelBackend, scaled: Raster): Promise<{ riskScore: number; confidence: number }> {
    if (scaled.width !== scaled.height) {
      throw new Error(`model input must be square, got ${scaled.width}x${scaled.height}`);
    }
    const [riskScore, confidence] = await backend.predict(normalizeForModel(scaled), scaled.width);
    return { riskScore: clampUnit(riskScore), confidence: clampUnit(confidence) };
  }

  public dispose(): void {
    this.disposed = true;
    if (this.backend) {
      this.backend.dispose();
      this.backend = null;
      console.log('RiskInferenceEngine: model backend released');
    }
  }
}
