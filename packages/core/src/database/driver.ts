/**
 * Backend driver contract
 *
 * One implementation per relational engine, selected when the ConnectionManager
 * connects. Everything above this seam (QueryExecutor and the verifiers) is
 * engine-agnostic.
 */

import type {
  DatabaseConfig,
  DatabaseKind,
  MySqlConfig,
  PostgresConfig,
  SqliteConfig,
} from '@vitalcheck/types';

/** Raw rows and affected-row count as reported by the engine */
export interface DriverResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface DatabaseDriver {
  readonly kind: DatabaseKind;
  /** Whether BEGIN/COMMIT/ROLLBACK span several statements on this engine */
  readonly supportsTransactions: boolean;
  /** Native placeholder for the 1-based parameter position */
  placeholder(position: number): string;
  /** Convert a bound value into something the engine's client accepts */
  normalizeParameter(value: unknown): unknown;
  run(sql: string, params: readonly unknown[]): Promise<DriverResult>;
  close(): Promise<void>;
}

export type DriverFactory<C extends DatabaseConfig> = (config: C) => Promise<DatabaseDriver>;

export interface DriverFactories {
  postgres: DriverFactory<PostgresConfig>;
  mysql: DriverFactory<MySqlConfig>;
  sqlite: DriverFactory<SqliteConfig>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Normalization shared by every engine: `undefined` binds as NULL,
 * plain objects and arrays bind as JSON text.
 */
export function normalizeCommonParameter(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  if (isPlainObject(value) || Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return value;
}

/** Scalar as exposed to callers in a QueryResult row */
export type SqlScalar = string | number | boolean | Date | null;

/**
 * Reduce an engine-specific column value to a scalar. Integers that do not fit
 * a double stay as decimal strings.
 */
export function normalizeColumnValue(value: unknown): SqlScalar {
  if (value === null || value === undefined) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (Buffer.isBuffer(value) || value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  return JSON.stringify(value);
}
