/**
 * PostgreSQL driver over node-postgres
 */

import type { ClientConfig } from 'pg';
import type { PostgresConfig } from '@vitalcheck/types';
import { describeCause } from '../errors.js';
import { createLogger } from '../logger.js';
import { normalizeCommonParameter, type DatabaseDriver, type DriverResult } from './driver.js';

const logger = createLogger({ name: 'postgres-driver' });

/**
 * Subset of pg.Client the driver relies on; lets tests plug in an in-process engine
 */
export interface PgClientLike {
  connect(): Promise<void>;
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export interface PostgresDriverOptions {
  clientFactory?: (config: ClientConfig) => PgClientLike | Promise<PgClientLike>;
}

async function createPgClient(config: ClientConfig): Promise<PgClientLike> {
  // Loaded lazily so embedded-only runs do not need pg
  const pg = await import('pg');
  return new pg.default.Client(config);
}

export function toPgClientConfig(config: PostgresConfig): ClientConfig {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.secret,
    ssl: config.ssl ? { rejectUnauthorized: true } : false,
    connectionTimeoutMillis: config.timeoutMs,
    // Server-side limit plus a client-side guard in case the server never answers
    statement_timeout: config.timeoutMs,
    query_timeout: config.timeoutMs,
  };
}

export class PostgresDriver implements DatabaseDriver {
  readonly kind = 'postgres' as const;
  readonly supportsTransactions = true;

  constructor(private readonly client: PgClientLike) {}

  placeholder(position: number): string {
    return `$${position}`;
  }

  normalizeParameter(value: unknown): unknown {
    return normalizeCommonParameter(value);
  }

  async run(sql: string, params: readonly unknown[]): Promise<DriverResult> {
    const result = await this.client.query(sql, [...params]);
    return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export async function createPostgresDriver(
  config: PostgresConfig,
  options: PostgresDriverOptions = {}
): Promise<DatabaseDriver> {
  const factory = options.clientFactory ?? createPgClient;
  const client = await factory(toPgClientConfig(config));
  try {
    await client.connect();
  } catch (error) {
    // A client that failed to connect can still hold a socket
    try {
      await client.end();
    } catch (endError) {
      logger.warn({ cause: describeCause(endError) }, 'Failed to release client after connect error');
    }
    throw error;
  }
  return new PostgresDriver(client);
}
