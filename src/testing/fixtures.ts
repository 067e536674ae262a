import type { Raster, ScanRecord } from '../types/screening';
import { isScreeningError } from '../modules/errors/ScreeningError';

export function uniformRaster(width: number, height: number, rgb: readonly [number, number, number]): Raster {
  const data = new Uint8ClampedArray(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    data.set(rgb, i * 3);
  }
  return { width, height, data };
}

/** Error code of whatever `fn` throws, 'UNKNOWN' for foreign errors, null if it does not throw. */
export function thrownCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    return isScreeningError(error) ? error.code : 'UNKNOWN';
  }
  return null;
}

export async function rejectedCode(promise: Promise<unknown>): Promise<string | null> {
  try {
    await promise;
  } catch (error) {
    return isScreeningError(error) ? error.code : 'UNKNOWN';
  }
  return null;
}

export function makeScan(scanId: string, overrides: Partial<ScanRecord> = {}): ScanRecord {
  return {
    scanId,
    patientId: 'patient-42',
    scanType: 'EYE_CONJUNCTIVA',
    localImagePath: `/data/scans/${scanId}.jpg`,
    vitals: { knownHemoglobin: 6.3, fatigueLevel: 8, dizziness: true },
    riskScore: 0.5,
    riskLevel: 'AMBER',
    confidence: 0.65,
    inferenceTimeMs: 12,
    featureVector: JSON.stringify({
      pallor_index: 0.4,
      saturation: 0.2,
      brightness: 0.6,
      red_ratio: 0.3,
      has_fatigue: true,
      has_shortness_of_breath: false,
      has_dizziness: true,
      has_pale_skin: false
    }),
    syncStatus: 'PENDING',
    timestamp: 1_700_000_000_000,
    ...overrides
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
