/**
 * Cleanup scope assembly and deletion-order rules
 */

import {
  CleanupScopeSchema,
  PATIENT_CLEANUP_ORDER,
  type CleanupScope,
  type CleanupScopeInput,
  type FixtureTable,
} from '@vitalcheck/types';
import { validationError } from '../errors.js';

/**
 * Foreign keys between fixture tables: each table maps to the tables it references.
 */
export const FIXTURE_FOREIGN_KEYS: Readonly<Record<FixtureTable, readonly FixtureTable[]>> = {
  audit_trail: ['patients'],
  vital_signs: ['medical_records'],
  medications: ['patients'],
  patient_allergies: ['patients'],
  appointments: ['patients'],
  medical_records: ['patients'],
  patients: [],
};

/**
 * Reject an order that would delete a parent before a child that references it
 *
 * @throws ValidationError
 */
export function assertDeletionOrder(tables: readonly FixtureTable[]): void {
  const issues: string[] = [];
  const position = new Map<FixtureTable, number>();

  tables.forEach((table, index) => {
    if (position.has(table)) {
      issues.push(`${table} appears more than once`);
    }
    position.set(table, index);
  });

  for (const [index, table] of tables.entries()) {
    for (const parent of FIXTURE_FOREIGN_KEYS[table]) {
      const parentIndex = position.get(parent);
      if (parentIndex !== undefined && parentIndex < index) {
        issues.push(`${table} references ${parent} and must be deleted before it`);
      }
    }
  }

  if (issues.length > 0) {
    throw validationError(`Invalid cleanup order: ${issues.join('; ')}`, issues);
  }
}

/**
 * Parse and validate a scope before any deletion runs
 *
 * @throws ValidationError
 */
export function parseCleanupScope(input: CleanupScopeInput): CleanupScope {
  const parsed = CleanupScopeSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw validationError(`Invalid cleanup scope: ${issues.join('; ')}`, issues);
  }
  assertDeletionOrder(parsed.data.tables);
  return parsed.data;
}

/**
 * Collects fixture identifiers as a test run creates them; consumed once at teardown.
 *
 * @example
 * ```typescript
 * const scope = new CleanupScopeBuilder().addPatientId('TEST_00000001').addUserIdPrefix('TESTUSER_');
 * await cleaner.cleanup(scope.build());
 * ```
 */
export class CleanupScopeBuilder {
  private readonly patientIds = new Set<string>();
  private readonly patientIdPrefixes = new Set<string>();
  private readonly userIds = new Set<string>();
  private readonly userIdPrefixes = new Set<string>();
  private tables: FixtureTable[] = [...PATIENT_CLEANUP_ORDER];

  addPatientId(id: string): this {
    this.patientIds.add(id);
    return this;
  }

  addPatientIdPrefix(prefix: string): this {
    this.patientIdPrefixes.add(prefix);
    return this;
  }

  addUserId(id: string): this {
    this.userIds.add(id);
    return this;
  }

  addUserIdPrefix(prefix: string): this {
    this.userIdPrefixes.add(prefix);
    return this;
  }

  withTables(tables: readonly FixtureTable[]): this {
    this.tables = [...tables];
    return this;
  }

  get isEmpty(): boolean {
    return (
      this.patientIds.size === 0 &&
      this.patientIdPrefixes.size === 0 &&
      this.userIds.size === 0 &&
      this.userIdPrefixes.size === 0
    );
  }

  build(): CleanupScope {
    return parseCleanupScope({
      patientIds: [...this.patientIds],
      patientIdPrefixes: [...this.patientIdPrefixes],
      userIds: [...this.userIds],
      userIdPrefixes: [...this.userIdPrefixes],
      tables: this.tables,
    });
  }
}
