/**
 * Teardown of synthetic fixtures across the patient dependency graph
 *
 * Deletes leaf tables first and the patients table last, then synthetic users.
 * All deletions share one transaction where the backend supports it. A second
 * run over the same scope deletes nothing and succeeds.
 */

import type { CleanupScope, CleanupScopeInput, FixtureTable } from '@vitalcheck/types';
import { describeCause, isVerificationError, testDataError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { QueryExecutor, SqlParameter } from '../database/query-executor.js';
import { parseCleanupScope } from './cleanup-scope.js';

export type CleanupTable = FixtureTable | 'users';

export interface CleanupSummary {
  /** Rows deleted per table, in deletion order */
  deleted: Partial<Record<CleanupTable, number>>;
  /** Whether all deletions committed as one unit */
  transactional: boolean;
  /** Tables whose residual count was checked and found to be zero */
  verifiedTables: CleanupTable[];
}

/** SQL condition plus its bound values */
interface Predicate {
  sql: string;
  params: SqlParameter[];
}

const LIKE_ESCAPE = '!';

/**
 * Turn an id prefix into a LIKE pattern that matches it literally
 */
export function toLikePrefix(prefix: string): string {
  return `${prefix.replace(/[!%_]/g, (char) => `${LIKE_ESCAPE}${char}`)}%`;
}

function idPredicate(
  column: string,
  ids: readonly string[],
  prefixes: readonly string[]
): Predicate | null {
  const clauses: string[] = [];
  const params: SqlParameter[] = [];

  if (ids.length > 0) {
    clauses.push(`${column} IN (${ids.map(() => '?').join(', ')})`);
    params.push(...ids);
  }
  for (const prefix of prefixes) {
    clauses.push(`${column} LIKE ? ESCAPE '${LIKE_ESCAPE}'`);
    params.push(toLikePrefix(prefix));
  }

  return clauses.length > 0 ? { sql: `(${clauses.join(' OR ')})`, params } : null;
}

/**
 * Rows of `table` belonging to the scoped patients, or null when the scope names none
 */
function tablePredicate(table: FixtureTable, scope: CleanupScope): Predicate | null {
  if (table === 'vital_signs') {
    // Vital signs reach the patient only through their medical record
    const records = idPredicate('patient_id', scope.patientIds, scope.patientIdPrefixes);
    return records
      ? {
          sql: `record_id IN (SELECT record_id FROM medical_records WHERE ${records.sql})`,
          params: records.params,
        }
      : null;
  }
  return idPredicate('patient_id', scope.patientIds, scope.patientIdPrefixes);
}

export interface TestDataCleanerOptions {
  logger?: Logger;
}

export class TestDataCleaner {
  private readonly logger: Logger;

  constructor(
    private readonly executor: QueryExecutor,
    options: TestDataCleanerOptions = {}
  ) {
    this.logger = options.logger ?? createLogger({ name: 'test-data-cleaner' });
  }

  /**
   * Delete every fixture row in scope, then verify none remain
   *
   * @throws ValidationError for a malformed scope or unsafe table order, before any deletion
   * @throws TestDataError naming the table when a deletion fails or rows remain afterwards
   */
  async cleanup(input: CleanupScopeInput): Promise<CleanupSummary> {
    const scope = parseCleanupScope(input);
    const users = idPredicate('user_id', scope.userIds, scope.userIdPrefixes);

    const steps: Array<{ table: CleanupTable; predicate: Predicate }> = [];
    for (const table of scope.tables) {
      const predicate = tablePredicate(table, scope);
      if (predicate) {
        steps.push({ table, predicate });
      }
    }
    if (users) {
      steps.push({ table: 'users', predicate: users });
    }

    if (steps.length === 0) {
      this.logger.info('Cleanup scope is empty; nothing to delete');
      return { deleted: {}, transactional: false, verifiedTables: [] };
    }

    const transactional = this.executor.supportsTransactions;
    const deleted = await this.executor.transaction(async () => {
      const counts: Partial<Record<CleanupTable, number>> = {};
      for (const step of steps) {
        counts[step.table] = await this.deleteFrom(step.table, step.predicate);
      }
      return counts;
    });

    const verifiedTables: CleanupTable[] = [];
    for (const step of steps) {
      const residual = await this.executor.count(
        `SELECT COUNT(*) AS count FROM ${step.table} WHERE ${step.predicate.sql}`,
        step.predicate.params
      );
      if (residual > 0) {
        this.logger.warn({ table: step.table, residual }, 'Cleanup left residual rows');
        throw testDataError(`Cleanup left ${residual} row(s) in ${step.table}`, {
          table: step.table,
          residualCount: residual,
        });
      }
      verifiedTables.push(step.table);
    }

    this.logger.info({ deleted, transactional }, 'Test data cleanup completed');
    return { deleted, transactional, verifiedTables };
  }

  private async deleteFrom(table: CleanupTable, predicate: Predicate): Promise<number> {
    try {
      return await this.executor.execute(
        `DELETE FROM ${table} WHERE ${predicate.sql}`,
        predicate.params,
        false
      );
    } catch (error) {
      if (isVerificationError(error, 'QueryError')) {
        throw testDataError(
          `Could not delete fixtures from ${table}: ${describeCause(error)}`,
          { table, residualCount: null },
          error
        );
      }
      throw error;
    }
  }
}
