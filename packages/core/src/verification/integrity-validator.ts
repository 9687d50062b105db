/**
 * Structural consistency checks for one patient aggregate
 *
 * Read-only: issues SELECTs only, so repeated calls without intervening
 * mutations return identical reports.
 */

import {
  REQUIRED_PATIENT_FIELDS,
  type FieldDetails,
  type IntegrityReport,
  type OrphanFinding,
} from '@vitalcheck/types';
import { validationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { QueryExecutor } from '../database/query-executor.js';

/**
 * A dependent foreign key scoped to the patient being validated.
 * NULL references are not orphans.
 */
interface OrphanCheck {
  table: string;
  column: string;
  parentTable: string;
  parentColumn: string;
}

export const ORPHAN_CHECKS: readonly OrphanCheck[] = [
  { table: 'medical_records', column: 'provider_id', parentTable: 'providers', parentColumn: 'provider_id' },
  { table: 'medications', column: 'prescribed_by', parentTable: 'providers', parentColumn: 'provider_id' },
  { table: 'appointments', column: 'provider_id', parentTable: 'providers', parentColumn: 'provider_id' },
];

const NO_FIELDS: FieldDetails = {
  first_name: false,
  last_name: false,
  date_of_birth: false,
  gender: false,
};

function isPopulated(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  return typeof value !== 'string' || value.trim().length > 0;
}

export interface IntegrityValidatorOptions {
  logger?: Logger;
}

export class IntegrityValidator {
  private readonly logger: Logger;

  constructor(
    private readonly executor: QueryExecutor,
    options: IntegrityValidatorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger({ name: 'integrity-validator' });
  }

  /**
   * Validate a patient and its dependents
   *
   * @throws ValidationError for an empty id, before any query runs
   * @throws QueryError when a check cannot be executed
   */
  async validate(patientId: string): Promise<IntegrityReport> {
    if (patientId.trim().length === 0) {
      throw validationError('patientId must not be empty');
    }

    const { rows } = await this.executor.execute(
      `SELECT ${REQUIRED_PATIENT_FIELDS.join(', ')} FROM patients WHERE patient_id = ?`,
      [patientId]
    );
    const patient = rows[0];

    if (!patient) {
      this.logger.info({ patientId }, 'Patient not found; integrity check failed');
      return {
        patientExists: false,
        hasRequiredFields: false,
        medicalRecordsCount: 0,
        prescriptionsCount: 0,
        dataIntegrityPassed: false,
        fieldDetails: { ...NO_FIELDS },
        orphanedRecords: [],
      };
    }

    const fieldDetails: FieldDetails = {
      first_name: isPopulated(patient.first_name),
      last_name: isPopulated(patient.last_name),
      date_of_birth: isPopulated(patient.date_of_birth),
      gender: isPopulated(patient.gender),
    };
    const hasRequiredFields = REQUIRED_PATIENT_FIELDS.every((field) => fieldDetails[field]);

    const medicalRecordsCount = await this.executor.count(
      'SELECT COUNT(*) AS count FROM medical_records WHERE patient_id = ?',
      [patientId]
    );
    const prescriptionsCount = await this.executor.count(
      'SELECT COUNT(*) AS count FROM medications WHERE patient_id = ?',
      [patientId]
    );
    const orphanedRecords = await this.findOrphans(patientId);

    const report: IntegrityReport = {
      patientExists: true,
      hasRequiredFields,
      medicalRecordsCount,
      prescriptionsCount,
      dataIntegrityPassed: hasRequiredFields && orphanedRecords.length === 0,
      fieldDetails,
      orphanedRecords,
    };

    this.logger.info(
      {
        patientId,
        passed: report.dataIntegrityPassed,
        medicalRecordsCount,
        prescriptionsCount,
        orphans: orphanedRecords.length,
      },
      'Patient integrity validated'
    );
    return report;
  }

  private async findOrphans(patientId: string): Promise<OrphanFinding[]> {
    const findings: OrphanFinding[] = [];
    for (const check of ORPHAN_CHECKS) {
      const count = await this.executor.count(
        `SELECT COUNT(*) AS count FROM ${check.table} d
          WHERE d.patient_id = ?
            AND d.${check.column} IS NOT NULL
            AND NOT EXISTS (
              SELECT 1 FROM ${check.parentTable} p WHERE p.${check.parentColumn} = d.${check.column}
            )`,
        [patientId]
      );
      if (count > 0) {
        findings.push({
          table: check.table,
          column: check.column,
          references: `${check.parentTable}.${check.parentColumn}`,
          count,
        });
      }
    }
    return findings;
  }
}
