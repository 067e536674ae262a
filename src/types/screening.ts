/**
 * Decoded RGB frame handed over by the capture layer.
 * `data` is row-major, 3 bytes per pixel.
 */
export interface Raster {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
  rotationDegrees?: number;
}

/** Fractional crop bounds relative to the (rotated) raster. */
export interface RegionOfInterest {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface ColorFeatures {
  readonly meanRed: number;
  readonly meanGreen: number;
  readonly meanBlue: number;
  readonly saturation: number;
  readonly brightness: number;
  readonly pallorIndex: number;
}

/**
 * Patient-reported vitals. A missing field means "not assessed", never "negative".
 */
export interface Vitals {
  fatigueLevel?: number;       // 1-10
  knownHemoglobin?: number;    // g/dL
  shortnessOfBreath?: boolean;
  paleSkin?: boolean;
  dizziness?: boolean;
}

export type Gender = 'MALE' | 'FEMALE' | 'OTHER';

/**
 * Screened person. The name is optional so screening can stay anonymous;
 * nothing in this record ever leaves the device.
 */
export interface Patient {
  id: string;
  name?: string;
  age: number;
  gender: Gender;
  createdAt: number;
}

export type RiskLevel = 'RED' | 'AMBER' | 'GREEN';

export type ScanType = 'EYE_CONJUNCTIVA' | 'NAIL_BED';

export type SyncStatus = 'PENDING' | 'SYNCED' | 'FAILED';

export type InferenceSource = 'model' | 'heuristic';

export interface DiagnosisResult {
  readonly riskScore: number;
  readonly riskLevel: RiskLevel;
  readonly confidence: number;
  readonly inferenceTimeMs: number;
  readonly colorFeatures: ColorFeatures;
  readonly recommendation: string;
  readonly source: InferenceSource;
}

export interface ScanRecord {
  scanId: string;
  patientId: string;
  scanType: ScanType;
  // Stays on the device, never part of a sync payload
  localImagePath: string;
  vitals: Vitals;
  riskScore: number;
  riskLevel: RiskLevel;
  confidence: number;
  inferenceTimeMs: number;
  featureVector: string;
  syncStatus: SyncStatus;
  timestamp: number;
}

/** Error shape delivered to callback-style consumers (live analysis, hooks). */
export interface ProcessingError {
  code: string;
  message: string;
  timestamp: number;
}
