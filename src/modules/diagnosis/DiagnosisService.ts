import type {
  DiagnosisResult,
  Patient,
  Raster,
  RegionOfInterest,
  ScanRecord,
  ScanType,
  Vitals
} from '../../types/screening';
import type { ColorFeatureExtractor } from '../color-analysis/ColorFeatureExtractor';
import { DEFAULT_ROI } from '../color-analysis/roi';
import { ScreeningError } from '../errors/ScreeningError';
import type { RiskInferenceEngine } from '../inference/RiskInferenceEngine';
import { classifyRisk } from '../risk/RiskClassifier';
import { adjustScore } from '../risk/VitalsAdjuster';
import type { PatientRepository } from '../storage/PatientRepository';
import type { ScanRepository } from '../storage/ScanRepository';
import { encodeFeatureVector } from './feature-vector';

export interface DiagnosisRequest {
  raster: Raster;
  roi?: RegionOfInterest;
  patient: Patient;
  scanType: ScanType;
  localImagePath: string;
  vitals?: Vitals;
}

export interface DiagnosisServiceDeps {
  extractor: ColorFeatureExtractor;
  engine: RiskInferenceEngine;
  repository: ScanRepository;
  patients: PatientRepository;
  generateId?: () => string;
  clock?: () => number;
}

export interface DiagnosisOutcome {
  result: DiagnosisResult;
  scan: ScanRecord;
}

/**
 * Registers the patient, runs one capture through the full pipeline and
 * persists the anonymized record.
 * The diagnosis only counts as complete once the record is stored.
 */
export class DiagnosisService {
  private readonly extractor: ColorFeatureExtractor;
  private readonly engine: RiskInferenceEngine;
  private readonly repository: ScanRepository;
  private readonly patients: PatientRepository;
  private readonly generateId: () => string;
  private readonly clock: () => number;

  constructor(deps: DiagnosisServiceDeps) {
    this.extractor = deps.extractor;
    this.engine = deps.engine;
    this.repository = deps.repository;
    this.patients = deps.patients;
    this.generateId = deps.generateId ?? (() => crypto.randomUUID());
    this.clock = deps.clock ?? Date.now;
  }

  public async runDiagnosis(request: DiagnosisRequest): Promise<DiagnosisOutcome> {
    await this.persist('patient', () => this.patients.insert(request.patient));

    const { scaled, features } = this.extractor.extract(request.raster, request.roi ?? DEFAULT_ROI);
    const estimate = await this.engine.analyze(scaled, features);

    const riskScore = adjustScore(estimate.riskScore, request.vitals);
    const { riskLevel, recommendation } = classifyRisk(riskScore);

    const result: DiagnosisResult = Object.freeze({
      riskScore,
      riskLevel,
      confidence: estimate.confidence,
      inferenceTimeMs: estimate.inferenceTimeMs,
      colorFeatures: features,
      recommendation,
      source: estimate.source
    });

    const vitals = request.vitals ?? {};
    const scan: ScanRecord = {
      scanId: this.generateId(),
      patientId: request.patient.id,
      scanType: request.scanType,
      localImagePath: request.localImagePath,
      vitals: { ...vitals },
      riskScore,
      riskLevel,
      confidence: estimate.confidence,
      inferenceTimeMs: estimate.inferenceTimeMs,
      featureVector: encodeFeatureVector(features, vitals),
      syncStatus: 'PENDING',
      timestamp: this.clock()
    };

    await this.persist('scan', () => this.repository.insert(scan));

    console.log('DiagnosisService: diagnosis complete', {
      scanId: scan.scanId,
      riskLevel,
      source: estimate.source
    });
    return { result, scan };
  }

  private async persist(what: 'patient' | 'scan', write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      console.error(`DiagnosisService: failed to persist ${what}`, error);
      throw new ScreeningError('PERSISTENCE_ERROR', 'Diagnosis could not be saved', error);
    }
  }
}
