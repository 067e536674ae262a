import type { Patient } from '../../types/screening';
import { debugStorage } from '../../utils/debug';
import type { PatientRepository } from './PatientRepository';

export class InMemoryPatientRepository implements PatientRepository {
  private readonly patients = new Map<string, Patient>();

  public async insert(patient: Patient): Promise<void> {
    this.patients.set(patient.id, { ...patient });
    debugStorage('patient saved', { patientId: patient.id });
  }

  public async update(patient: Patient): Promise<void> {
    if (!this.patients.has(patient.id)) {
      throw new Error(`InMemoryPatientRepository: unknown patient ${patient.id}`);
    }
    this.patients.set(patient.id, { ...patient });
  }

  public async delete(patientId: string): Promise<void> {
    this.patients.delete(patientId);
  }

  public async getById(patientId: string): Promise<Patient | null> {
    const patient = this.patients.get(patientId);
    return patient ? { ...patient } : null;
  }

  public async getAll(): Promise<Patient[]> {
    return Array.from(this.patients.values())
      .sort((a, b) => b.createdAt - a.createdAt)
      .map(patient => ({ ...patient }));
  }

  public async count(): Promise<number> {
    return this.patients.size;
  }
}
