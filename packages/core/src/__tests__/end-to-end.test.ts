/**
 * Validate, extend, clean up and re-validate one patient
 */

import { describe, it, expect, afterEach } from 'vitest';
import { TestDataCleaner } from '../fixtures/test-data-cleaner.js';
import { IntegrityValidator } from '../verification/integrity-validator.js';
import { openDatabase, type TestDatabase, type TestEngine } from './support/engines.js';

describe.each<TestEngine>(['sqlite', 'postgres'])('patient lifecycle on %s', (engine) => {
  let database: TestDatabase;

  afterEach(async () => {
    await database.close();
  });

  it('should reflect each step in the integrity report', async () => {
    database = await openDatabase(engine);
    const { executor } = database;
    const validator = new IntegrityValidator(executor);
    const cleaner = new TestDataCleaner(executor);

    await executor.execute(
      'INSERT INTO patients (patient_id, first_name, last_name, date_of_birth, gender) VALUES (?, ?, ?, ?, ?)',
      ['P1', 'Test', 'Patient', '1980-01-01', 'F'],
      false
    );

    const initial = await validator.validate('P1');
    expect(initial.patientExists).toBe(true);
    expect(initial.dataIntegrityPassed).toBe(true);
    expect(initial.medicalRecordsCount).toBe(0);
    expect(initial.prescriptionsCount).toBe(0);

    await executor.execute(
      'INSERT INTO medical_records (record_id, patient_id, visit_date) VALUES (?, ?, ?)',
      ['MR1', 'P1', '2024-01-15'],
      false
    );
    expect((await validator.validate('P1')).medicalRecordsCount).toBe(1);

    const summary = await cleaner.cleanup({ patientIdPrefixes: ['P1'] });
    expect(summary.deleted.medical_records).toBe(1);
    expect(summary.deleted.patients).toBe(1);

    const after = await validator.validate('P1');
    expect(after.patientExists).toBe(false);
    expect(after.dataIntegrityPassed).toBe(false);
  });
});
