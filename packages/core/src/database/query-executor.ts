/**
 * Parameterized query execution over the active connection
 *
 * Callers write one dialect: `?` placeholders and plain JS values. Placeholder
 * style and value representation are adapted to the connected engine here.
 * Values are always bound, never spliced into SQL text.
 */

import type { DatabaseKind } from '@vitalcheck/types';
import { describeCause, isVerificationError, queryError, validationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { maskSensitive } from '../security/masking.js';
import type { ConnectionManager } from './connection-manager.js';
import { normalizeColumnValue, type DatabaseDriver, type SqlScalar } from './driver.js';
import { rewritePlaceholders } from './placeholders.js';

export type SqlParameter =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Buffer
  | null
  | undefined
  | Readonly<Record<string, unknown>>
  | readonly unknown[];

export type QueryRow = Record<string, SqlScalar>;

export interface QueryResult {
  rows: QueryRow[];
  rowCount: number;
}

export interface QueryExecutorOptions {
  logger?: Logger;
}

/**
 * Coerce a COUNT(*) column, which engines report as number, bigint or numeric string.
 * Returns null for anything that is not a non-negative integer.
 */
export function toCount(value: unknown): number | null {
  let count: number;
  if (typeof value === 'number') {
    count = value;
  } else if (typeof value === 'bigint') {
    count = Number(value);
  } else if (typeof value === 'string' && /^\d+$/.test(value)) {
    count = Number(value);
  } else {
    return null;
  }
  return Number.isSafeInteger(count) && count >= 0 ? count : null;
}

export class QueryExecutor {
  private readonly logger: Logger;
  private inTransaction = false;

  constructor(
    private readonly connections: ConnectionManager,
    options: QueryExecutorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger({ name: 'query-executor' });
  }

  /**
   * @throws ValidationError when not connected
   */
  get backend(): DatabaseKind {
    return this.connections.getDriver().kind;
  }

  get supportsTransactions(): boolean {
    return this.connections.getDriver().supportsTransactions;
  }

  /**
   * Run one statement. Each call commits on its own unless it runs inside `transaction()`.
   *
   * @returns the rows when `fetch` is true, otherwise the affected-row count
   * @throws ValidationError when not connected or the parameter count does not match
   * @throws QueryError on any engine failure, including statement timeouts
   */
  execute(sql: string, params?: readonly SqlParameter[], fetch?: true): Promise<QueryResult>;
  execute(sql: string, params: readonly SqlParameter[], fetch: false): Promise<number>;
  async execute(
    sql: string,
    params: readonly SqlParameter[] = [],
    fetch = true
  ): Promise<QueryResult | number> {
    const driver = this.connections.getDriver();
    const result = await this.run(driver, sql, params);
    if (!fetch) {
      return result.rowCount;
    }
    return {
      rows: result.rows.map((row) => {
        const normalized: QueryRow = {};
        for (const [column, value] of Object.entries(row)) {
          normalized[column] = normalizeColumnValue(value);
        }
        return normalized;
      }),
      rowCount: result.rowCount,
    };
  }

  /**
   * Run a single-column count query and return its value
   *
   * @throws QueryError when the first column is not a count
   */
  async count(sql: string, params: readonly SqlParameter[] = []): Promise<number> {
    const { rows } = await this.execute(sql, params);
    const first = rows[0];
    if (!first) {
      return 0;
    }
    const count = toCount(Object.values(first)[0]);
    if (count === null) {
      throw queryError('Count query did not return a numeric value', maskSensitive(sql));
    }
    return count;
  }

  /**
   * Run `work` as one unit: all of its statements commit, or none do.
   * On engines without multi-statement transactions the statements run one by one.
   */
  async transaction<T>(work: () => Promise<T>): Promise<T> {
    const driver = this.connections.getDriver();
    if (this.inTransaction) {
      throw validationError('A transaction is already open on this connection');
    }

    if (!driver.supportsTransactions) {
      this.logger.warn(
        { backend: driver.kind },
        'Backend has no multi-statement transactions; running statements individually'
      );
      return work();
    }

    await this.run(driver, 'BEGIN', []);
    this.inTransaction = true;
    try {
      const result = await work();
      await this.run(driver, 'COMMIT', []);
      return result;
    } catch (error) {
      try {
        await driver.run('ROLLBACK', []);
      } catch (rollbackError) {
        // The original failure is what the caller needs; the rollback failure is only logged
        this.logger.error({ err: rollbackError, backend: driver.kind }, 'Rollback failed');
      }
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  private async run(
    driver: DatabaseDriver,
    sql: string,
    params: readonly SqlParameter[]
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number }> {
    const statement = rewritePlaceholders(sql, (position) => driver.placeholder(position));
    const masked = maskSensitive(sql);

    if (statement.placeholderCount !== params.length) {
      throw validationError(
        `Statement has ${statement.placeholderCount} placeholder(s) but ${params.length} parameter(s) were supplied`
      );
    }

    this.logger.debug({ sql: masked, paramCount: params.length, backend: driver.kind }, 'Executing');

    try {
      return await driver.run(
        statement.sql,
        params.map((value) => driver.normalizeParameter(value))
      );
    } catch (error) {
      if (isVerificationError(error)) {
        throw error;
      }
      throw queryError(`Query failed on ${driver.kind}: ${describeCause(error)}`, masked, error);
    }
  }
}
