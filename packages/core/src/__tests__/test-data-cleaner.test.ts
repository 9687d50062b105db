/**
 * TestDataCleaner Tests
 * Leaf-first teardown, residual verification and failure reporting
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FixtureFactory } from '../fixtures/fixture-factory.js';
import { FixtureWriter } from '../fixtures/fixture-writer.js';
import { TestDataCleaner, toLikePrefix } from '../fixtures/test-data-cleaner.js';
import { isVerificationError, type VerificationError } from '../errors.js';
import {
  connectScripted,
  openDatabase,
  ScriptedDriver,
  type TestDatabase,
  type TestEngine,
} from './support/engines.js';

const PATIENT_ID = 'TEST_00000001';

async function captureError(promise: Promise<unknown>): Promise<VerificationError> {
  try {
    await promise;
  } catch (error) {
    if (isVerificationError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a VerificationError');
}

describe.each<TestEngine>(['sqlite', 'postgres'])('TestDataCleaner on %s', (engine) => {
  let database: TestDatabase;
  let writer: FixtureWriter;
  let factory: FixtureFactory;
  let cleaner: TestDataCleaner;

  async function count(table: string): Promise<number> {
    return database.executor.count(`SELECT COUNT(*) FROM ${table}`);
  }

  /** Patient with one row in every dependent table, plus a synthetic user */
  async function insertFixtureTree(patientId: string): Promise<void> {
    const provider = await writer.insertProvider(factory.provider());
    await writer.insertPatient(factory.patient({ patient_id: patientId }));
    const record = await writer.insertMedicalRecord(
      factory.medicalRecord(patientId, { provider_id: provider.provider_id })
    );
    await writer.insertVitalSign(factory.vitalSign(record.record_id));
    await writer.insertMedication(factory.medication(patientId));
    await writer.insertAllergy(factory.allergy(patientId));
    await writer.insertAppointment(factory.appointment(patientId, provider.provider_id));
    const user = await writer.insertUser(factory.user());
    await writer.insertAuditEvent(
      factory.auditEvent({ patient_id: patientId, user_id: user.user_id, action: 'CREATE' })
    );
  }

  beforeEach(async () => {
    database = await openDatabase(engine);
    writer = new FixtureWriter(database.executor);
    factory = new FixtureFactory({ seed: 99 });
    cleaner = new TestDataCleaner(database.executor);
  });

  afterEach(async () => {
    await database.close();
  });

  it('should delete the whole fixture tree leaf first', async () => {
    await insertFixtureTree(PATIENT_ID);

    const summary = await cleaner.cleanup(writer.cleanupScope.build());

    expect(summary).toEqual({
      deleted: {
        audit_trail: 1,
        vital_signs: 1,
        medications: 1,
        patient_allergies: 1,
        appointments: 1,
        medical_records: 1,
        patients: 1,
        users: 1,
      },
      transactional: true,
      verifiedTables: [
        'audit_trail',
        'vital_signs',
        'medications',
        'patient_allergies',
        'appointments',
        'medical_records',
        'patients',
        'users',
      ],
    });
    expect(await count('patients')).toBe(0);
    expect(await count('vital_signs')).toBe(0);
    expect(await count('users')).toBe(0);
  });

  it('should be a no-op the second time', async () => {
    await insertFixtureTree(PATIENT_ID);
    const scope = writer.cleanupScope.build();

    await cleaner.cleanup(scope);
    const second = await cleaner.cleanup(scope);

    expect(second.deleted).toEqual({
      audit_trail: 0,
      vital_signs: 0,
      medications: 0,
      patient_allergies: 0,
      appointments: 0,
      medical_records: 0,
      patients: 0,
      users: 0,
    });
    expect(second.verifiedTables).toHaveLength(8);
  });

  it('should keep shared providers and rows outside the scope', async () => {
    await insertFixtureTree(PATIENT_ID);
    await writer.insertPatient(factory.patient({ patient_id: 'REAL_00000001' }));
    await writer.insertMedicalRecord(factory.medicalRecord('REAL_00000001'));

    await cleaner.cleanup({ patientIdPrefixes: ['TEST_'] });

    expect(await count('providers')).toBe(1);
    expect(
      await database.executor.count('SELECT COUNT(*) FROM patients WHERE patient_id = ?', [
        'REAL_00000001',
      ])
    ).toBe(1);
    expect(await count('medical_records')).toBe(1);
  });

  it('should match prefixes literally', async () => {
    await writer.insertPatient(factory.patient({ patient_id: 'A_B00001' }));
    await writer.insertPatient(factory.patient({ patient_id: 'AXB00002' }));

    const summary = await cleaner.cleanup({ patientIdPrefixes: ['A_'], tables: ['patients'] });

    expect(summary.deleted).toEqual({ patients: 1 });
    expect(
      await database.executor.count('SELECT COUNT(*) FROM patients WHERE patient_id = ?', ['AXB00002'])
    ).toBe(1);
  });

  it('should delete synthetic users by prefix', async () => {
    await writer.insertUser(factory.user());
    await writer.insertUser(factory.user());

    const summary = await cleaner.cleanup({ userIdPrefixes: ['TESTUSER_'] });

    expect(summary.deleted).toEqual({ users: 2 });
    expect(await count('users')).toBe(0);
  });

  it('should name the table and roll back when a deletion violates a foreign key', async () => {
    await insertFixtureTree(PATIENT_ID);

    const error = await captureError(
      cleaner.cleanup({
        patientIds: [PATIENT_ID],
        // vital_signs left out, so its row still references the medical record
        tables: ['audit_trail', 'medications', 'patient_allergies', 'appointments', 'medical_records', 'patients'],
      })
    );

    expect(error.failure).toEqual({
      _tag: 'TestDataError',
      table: 'medical_records',
      residualCount: null,
    });
    expect(error.message.startsWith('Could not delete fixtures from medical_records: ')).toBe(true);
    expect(await count('patients')).toBe(1);
    expect(await count('audit_trail')).toBe(1);
  });
});

describe('TestDataCleaner', () => {
  it('should do nothing for an empty scope', async () => {
    const driver = new ScriptedDriver(() => ({ rows: [], rowCount: 0 }));
    const { executor } = await connectScripted(driver);

    const summary = await new TestDataCleaner(executor).cleanup({});

    expect(summary).toEqual({ deleted: {}, transactional: false, verifiedTables: [] });
    expect(driver.calls).toEqual([]);
  });

  it('should issue parameterized deletes inside one transaction', async () => {
    const driver = new ScriptedDriver((sql) =>
      sql.startsWith('SELECT') ? { rows: [{ count: 0 }], rowCount: 1 } : { rows: [], rowCount: 1 }
    );
    const { executor } = await connectScripted(driver);

    await new TestDataCleaner(executor).cleanup({
      patientIds: [PATIENT_ID],
      patientIdPrefixes: ['PAT_'],
      tables: ['patients'],
    });

    expect(driver.calls).toEqual([
      { sql: 'BEGIN', params: [] },
      {
        sql: "DELETE FROM patients WHERE (patient_id IN (?) OR patient_id LIKE ? ESCAPE '!')",
        params: [PATIENT_ID, 'PAT!_%'],
      },
      { sql: 'COMMIT', params: [] },
      {
        sql: "SELECT COUNT(*) AS count FROM patients WHERE (patient_id IN (?) OR patient_id LIKE ? ESCAPE '!')",
        params: [PATIENT_ID, 'PAT!_%'],
      },
    ]);
  });

  it('should fail with the residual count when rows survive deletion', async () => {
    const driver = new ScriptedDriver((sql) => {
      if (sql.startsWith('SELECT COUNT(*) AS count FROM patients ')) {
        return { rows: [{ count: 2 }], rowCount: 1 };
      }
      return sql.startsWith('SELECT') ? { rows: [{ count: 0 }], rowCount: 1 } : { rows: [], rowCount: 0 };
    });
    const { executor } = await connectScripted(driver);

    const error = await captureError(new TestDataCleaner(executor).cleanup({ patientIds: [PATIENT_ID] }));

    expect(error.failure).toEqual({ _tag: 'TestDataError', table: 'patients', residualCount: 2 });
    expect(error.message).toBe('Cleanup left 2 row(s) in patients');
  });

  it('should run statement by statement on a backend without transactions', async () => {
    const driver = new ScriptedDriver(
      (sql) => (sql.startsWith('SELECT') ? { rows: [{ count: 0 }], rowCount: 1 } : { rows: [], rowCount: 3 }),
      'sqlite',
      false
    );
    const { executor } = await connectScripted(driver);

    const summary = await new TestDataCleaner(executor).cleanup({ userIds: ['TESTUSER_1', 'TESTUSER_2'] });

    expect(summary).toEqual({ deleted: { users: 3 }, transactional: false, verifiedTables: ['users'] });
    expect(driver.calls.map((call) => call.sql)).toEqual([
      'DELETE FROM users WHERE (user_id IN (?, ?))',
      'SELECT COUNT(*) AS count FROM users WHERE (user_id IN (?, ?))',
    ]);
  });

  it('should reject an unsafe table order before deleting anything', async () => {
    const driver = new ScriptedDriver(() => ({ rows: [], rowCount: 0 }));
    const { executor } = await connectScripted(driver);

    const error = await captureError(
      new TestDataCleaner(executor).cleanup({
        patientIds: [PATIENT_ID],
        tables: ['patients', 'medical_records'],
      })
    );

    expect(error.kind).toBe('ValidationError');
    expect(error.message).toBe(
      'Invalid cleanup order: medical_records references patients and must be deleted before it'
    );
    expect(driver.calls).toEqual([]);
  });

  describe('toLikePrefix', () => {
    it('should escape LIKE wildcards and the escape character', () => {
      expect(toLikePrefix('TEST_')).toBe('TEST!_%');
      expect(toLikePrefix('50%!')).toBe('50!%!!%');
      expect(toLikePrefix('PLAIN')).toBe('PLAIN%');
    });
  });
});
