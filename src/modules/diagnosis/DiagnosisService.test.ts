import { describe, it, expect, vi } from 'vitest';
import type { Patient } from '../../types/screening';
import { rejectedCode, uniformRaster } from '../../testing/fixtures';
import { ColorFeatureExtractor } from '../color-analysis/ColorFeatureExtractor';
import { RiskInferenceEngine } from '../inference/RiskInferenceEngine';
import { InMemoryPatientRepository } from '../storage/InMemoryPatientRepository';
import { InMemoryScanRepository } from '../storage/InMemoryScanRepository';
import { buildSyncPayload } from '../sync/sync-payload';
import { decodeFeatureVector } from './feature-vector';
import { DiagnosisService } from './DiagnosisService';

const TISSUE = [200, 40, 40] as const;

const patient: Patient = {
  id: 'patient-42',
  name: 'Test Patient',
  age: 34,
  gender: 'FEMALE',
  createdAt: 1_699_999_000_000
};

function createService(repository = new InMemoryScanRepository(), patients = new InMemoryPatientRepository()) {
  let nextId = 0;
  const service = new DiagnosisService({
    extractor: new ColorFeatureExtractor({ inputSize: 4 }),
    engine: new RiskInferenceEngine({ now: () => 0 }),
    repository,
    patients,
    generateId: () => `scan-${++nextId}`,
    clock: () => 1_700_000_000_000
  });
  return { service, repository, patients };
}

const request = {
  raster: uniformRaster(10, 10, TISSUE),
  patient,
  scanType: 'EYE_CONJUNCTIVA' as const,
  localImagePath: '/data/scans/scan-1.jpg'
};

describe('DiagnosisService', () => {
  it('classifies healthy tissue without vitals as GREEN', async () => {
    const { service } = createService();
    const { result, scan } = await service.runDiagnosis(request);

    expect(result.riskScore).toBe(0);
    expect(result.riskLevel).toBe('GREEN');
    expect(result.confidence).toBe(0.65);
    expect(result.source).toBe('heuristic');
    expect(scan.vitals).toEqual({});
  });

  it('raises the score with reported vitals', async () => {
    const { service } = createService();
    const { result } = await service.runDiagnosis({
      ...request,
      vitals: { knownHemoglobin: 6.0, fatigueLevel: 8, paleSkin: true }
    });

    expect(result.riskScore).toBeCloseTo(0.45, 10);
    expect(result.riskLevel).toBe('AMBER');
    expect(result.recommendation).toBe(
      'Consider scheduling a blood test. Some indicators of mild anemia detected.'
    );
  });

  it('registers the patient and persists a PENDING record', async () => {
    const { service, repository, patients } = createService();
    const { scan } = await service.runDiagnosis({
      ...request,
      scanType: 'NAIL_BED',
      vitals: { knownHemoglobin: 6.0, fatigueLevel: 8 }
    });

    expect(await patients.getById('patient-42')).toEqual(patient);

    const stored = await repository.getById('scan-1');
    expect(stored).toEqual(scan);
    expect(stored?.patientId).toBe('patient-42');
    expect(stored?.syncStatus).toBe('PENDING');
    expect(stored?.timestamp).toBe(1_700_000_000_000);
    expect(stored?.scanType).toBe('NAIL_BED');

    const features = decodeFeatureVector(scan.featureVector);
    expect(features?.has_fatigue).toBe(true);
    expect(features?.red_ratio).toBeCloseTo(200 / 280.001, 10);
  });

  it('keeps patient details out of the sync batch', async () => {
    const { service, repository } = createService();
    await service.runDiagnosis({ ...request, vitals: { knownHemoglobin: 6.0 } });

    const pending = await repository.listByStatus('PENDING');
    const serialized = JSON.stringify(buildSyncPayload(pending, 'device-test', 0));
    expect(serialized).not.toContain('Test Patient');
    expect(serialized).not.toContain('patient-42');
    expect(serialized).not.toContain('FEMALE');
    expect(serialized).not.toContain('/data/scans');
  });

  it('reports a scan storage failure as PERSISTENCE_ERROR', async () => {
    const repository = new InMemoryScanRepository();
    vi.spyOn(repository, 'insert').mockRejectedValue(new Error('disk full'));
    const { service } = createService(repository);

    expect(await rejectedCode(service.runDiagnosis(request))).toBe('PERSISTENCE_ERROR');
  });

  it('stops before analysis when the patient cannot be saved', async () => {
    const patients = new InMemoryPatientRepository();
    vi.spyOn(patients, 'insert').mockRejectedValue(new Error('disk full'));
    const { service, repository } = createService(undefined, patients);

    expect(await rejectedCode(service.runDiagnosis(request))).toBe('PERSISTENCE_ERROR');
    expect(await repository.countByStatus('PENDING')).toBe(0);
  });

  it('rejects an invalid region before any inference', async () => {
    const { service, repository } = createService();
    const code = await rejectedCode(
      service.runDiagnosis({ ...request, roi: { left: 0.5, top: 0.5, right: 0.5, bottom: 0.9 } })
    );
    expect(code).toBe('INVALID_ROI');
    expect(await repository.countByStatus('PENDING')).toBe(0);
  });
});
