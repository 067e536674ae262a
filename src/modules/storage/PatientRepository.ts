import type { Patient } from '../../types/screening';

export interface PatientRepository {
  /** Inserts or replaces the patient with the same id. */
  insert(patient: Patient): Promise<void>;
  update(patient: Patient): Promise<void>;
  delete(patientId: string): Promise<void>;
  getById(patientId: string): Promise<Patient | null>;
  // Newest first
  getAll(): Promise<Patient[]>;
  count(): Promise<number>;
}
