/**
 * MySQL driver over mysql2/promise
 */

import type { ConnectionOptions } from 'mysql2/promise';
import type { MySqlConfig } from '@vitalcheck/types';
import { normalizeCommonParameter, type DatabaseDriver, type DriverResult } from './driver.js';

/**
 * Subset of a mysql2 promise connection the driver relies on
 */
export interface MySqlConnectionLike {
  query(options: { sql: string; timeout?: number }): Promise<[unknown, unknown]>;
  execute(options: { sql: string; timeout?: number }, values: unknown[]): Promise<[unknown, unknown]>;
  end(): Promise<void>;
}

export interface MySqlDriverOptions {
  connectionFactory?: (options: ConnectionOptions) => Promise<MySqlConnectionLike>;
}

async function createMySqlConnection(options: ConnectionOptions): Promise<MySqlConnectionLike> {
  const mysql = await import('mysql2/promise');
  return mysql.default.createConnection(options);
}

export function toMySqlConnectionOptions(config: MySqlConfig): ConnectionOptions {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.secret,
    ssl: config.ssl ? { rejectUnauthorized: true } : undefined,
    connectTimeout: config.timeoutMs,
    // Dates cross the wire as UTC
    timezone: 'Z',
    supportBigNumbers: true,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MySqlDriver implements DatabaseDriver {
  readonly kind = 'mysql' as const;
  readonly supportsTransactions = true;

  constructor(
    private readonly connection: MySqlConnectionLike,
    private readonly timeoutMs: number
  ) {}

  placeholder(): string {
    return '?';
  }

  normalizeParameter(value: unknown): unknown {
    if (typeof value === 'boolean') {
      return value ? 1 : 0;
    }
    return normalizeCommonParameter(value);
  }

  async run(sql: string, params: readonly unknown[]): Promise<DriverResult> {
    const options = { sql, timeout: this.timeoutMs };
    // Transaction control is not preparable, so parameterless statements use the text protocol
    const [result] =
      params.length === 0
        ? await this.connection.query(options)
        : await this.connection.execute(options, [...params]);

    // SELECT yields a row array, DML a result header
    if (Array.isArray(result)) {
      const rows = result.filter(isRecord);
      return { rows, rowCount: rows.length };
    }
    if (isRecord(result) && typeof result.affectedRows === 'number') {
      return { rows: [], rowCount: result.affectedRows };
    }
    return { rows: [], rowCount: 0 };
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}

export async function createMySqlDriver(
  config: MySqlConfig,
  options: MySqlDriverOptions = {}
): Promise<DatabaseDriver> {
  const factory = options.connectionFactory ?? createMySqlConnection;
  const connection = await factory(toMySqlConnectionOptions(config));
  return new MySqlDriver(connection, config.timeoutMs);
}
