export type {
  ColorFeatures,
  DiagnosisResult,
  Gender,
  InferenceSource,
  Patient,
  ProcessingError,
  Raster,
  RegionOfInterest,
  RiskLevel,
  ScanRecord,
  ScanType,
  SyncStatus,
  Vitals
} from './types/screening';

export { SCREENING_CONFIG } from './modules/config/ScreeningConfig';
export type { RoiPresetName, ScreeningConfig } from './modules/config/ScreeningConfig';
export { ScreeningError, isScreeningError, toProcessingError } from './modules/errors/ScreeningError';
export type { ScreeningErrorCode } from './modules/errors/ScreeningError';

export { ColorFeatureExtractor, computeColorFeatures } from './modules/color-analysis/ColorFeatureExtractor';
export type { ColorFeatureExtractorConfig, ExtractionResult } from './modules/color-analysis/ColorFeatureExtractor';
export { pallorIndex, redRatio } from './modules/color-analysis/PallorScorer';
export { rasterFromRgba } from './modules/color-analysis/raster';
export { DEFAULT_ROI, normalizeRoi, roiPreset } from './modules/color-analysis/roi';

export { RiskInferenceEngine, heuristicRisk, normalizeForModel } from './modules/inference/RiskInferenceEngine';
export type { RiskEstimate, RiskInferenceEngineOptions } from './modules/inference/RiskInferenceEngine';
export type { ModelBackend, ModelBackendLoader } from './modules/inference/ModelBackend';
export { TensorFlowModelBackend } from './modules/inference/tensorflow-backend';

export { adjustScore, vitalsIncrement } from './modules/risk/VitalsAdjuster';
export { classifyRisk, RECOMMENDATIONS } from './modules/risk/RiskClassifier';

export { DiagnosisService } from './modules/diagnosis/DiagnosisService';
export type { DiagnosisOutcome, DiagnosisRequest } from './modules/diagnosis/DiagnosisService';
export { buildAnonymizedFeatures, decodeFeatureVector, encodeFeatureVector } from './modules/diagnosis/feature-vector';

export { FrameThrottle } from './modules/live/FrameThrottle';
export { LiveFrameAnalyzer } from './modules/live/LiveFrameAnalyzer';

export type { ScanRepository } from './modules/storage/ScanRepository';
export { InMemoryScanRepository } from './modules/storage/InMemoryScanRepository';
export type { PatientRepository } from './modules/storage/PatientRepository';
export { InMemoryPatientRepository } from './modules/storage/InMemoryPatientRepository';
export { MemoryKeyValueStore, WebStorageKeyValueStore } from './modules/storage/key-value-store';
export type { KeyValueStore, WebStorageLike } from './modules/storage/key-value-store';

export { SyncQueueManager } from './modules/sync/SyncQueueManager';
export type { SyncOutcome } from './modules/sync/SyncQueueManager';
export type { SyncTransport } from './modules/sync/SyncTransport';
export { HttpSyncTransport } from './modules/sync/HttpSyncTransport';
export { PeriodicSyncScheduler } from './modules/sync/PeriodicSyncScheduler';
export { buildSyncPayload } from './modules/sync/sync-payload';
export { loadAnonymousDeviceId } from './modules/sync/device-id';

export { useAnemiaScreening } from './hooks/useAnemiaScreening';
export { useSyncQueue } from './hooks/useSyncQueue';
