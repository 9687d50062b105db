/**
 * Inserts factory rows and records each created id for teardown
 */

import type { QueryExecutor, SqlParameter } from '../database/query-executor.js';
import { CleanupScopeBuilder } from './cleanup-scope.js';
import type {
  AllergyFixture,
  AppointmentFixture,
  AuditEventFixture,
  MedicalRecordFixture,
  MedicationFixture,
  PatientFixture,
  ProviderFixture,
  UserFixture,
  VitalSignFixture,
} from './fixture-factory.js';

type Row = Readonly<Record<string, SqlParameter>>;

export class FixtureWriter {
  constructor(
    private readonly executor: QueryExecutor,
    private readonly scope: CleanupScopeBuilder = new CleanupScopeBuilder()
  ) {}

  /** Everything written so far, ready for TestDataCleaner */
  get cleanupScope(): CleanupScopeBuilder {
    return this.scope;
  }

  async insertPatient(row: PatientFixture): Promise<PatientFixture> {
    await this.insert('patients', row);
    this.scope.addPatientId(row.patient_id);
    return row;
  }

  /**
   * Providers are shared reference data and are not added to the cleanup scope
   */
  async insertProvider(row: ProviderFixture): Promise<ProviderFixture> {
    await this.insert('providers', row);
    return row;
  }

  async insertMedicalRecord(row: MedicalRecordFixture): Promise<MedicalRecordFixture> {
    await this.insert('medical_records', row);
    this.scope.addPatientId(row.patient_id);
    return row;
  }

  async insertVitalSign(row: VitalSignFixture): Promise<VitalSignFixture> {
    await this.insert('vital_signs', row);
    return row;
  }

  async insertMedication(row: MedicationFixture): Promise<MedicationFixture> {
    await this.insert('medications', row);
    this.scope.addPatientId(row.patient_id);
    return row;
  }

  async insertAllergy(row: AllergyFixture): Promise<AllergyFixture> {
    await this.insert('patient_allergies', row);
    this.scope.addPatientId(row.patient_id);
    return row;
  }

  async insertAppointment(row: AppointmentFixture): Promise<AppointmentFixture> {
    await this.insert('appointments', row);
    this.scope.addPatientId(row.patient_id);
    return row;
  }

  async insertUser(row: UserFixture): Promise<UserFixture> {
    await this.insert('users', row);
    this.scope.addUserId(row.user_id);
    return row;
  }

  async insertAuditEvent(row: AuditEventFixture): Promise<AuditEventFixture> {
    await this.insert('audit_trail', row);
    return row;
  }

  private async insert(table: string, row: Row): Promise<void> {
    const columns = Object.keys(row);
    await this.executor.execute(
      `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`,
      columns.map((column) => row[column]),
      false
    );
  }
}
