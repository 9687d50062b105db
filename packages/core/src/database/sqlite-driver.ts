/**
 * Embedded SQLite driver over better-sqlite3
 *
 * better-sqlite3 is synchronous; `run` still returns a Promise so the driver is
 * interchangeable with the networked ones.
 */

import Database from 'better-sqlite3';
import type { SqliteConfig } from '@vitalcheck/types';
import { normalizeCommonParameter, type DatabaseDriver, type DriverResult } from './driver.js';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS.sss` in UTC; sorts lexicographically and matches
 * SQLite's own datetime format.
 */
export function toSqliteTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}.` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

export class SqliteDriver implements DatabaseDriver {
  readonly kind = 'sqlite' as const;
  readonly supportsTransactions = true;

  constructor(private readonly db: Database.Database) {}

  placeholder(): string {
    return '?';
  }

  normalizeParameter(value: unknown): unknown {
    if (typeof value === 'boolean') {
      return value ? 1 : 0;
    }
    if (value instanceof Date) {
      return toSqliteTimestamp(value);
    }
    return normalizeCommonParameter(value);
  }

  run(sql: string, params: readonly unknown[]): Promise<DriverResult> {
    try {
      const statement = this.db.prepare<unknown[], Record<string, unknown>>(sql);
      if (statement.reader) {
        const rows = statement.all(...params);
        return Promise.resolve({ rows, rowCount: rows.length });
      }
      const info = statement.run(...params);
      return Promise.resolve({ rows: [], rowCount: info.changes });
    } catch (error) {
      return Promise.reject(error);
    }
  }

  close(): Promise<void> {
    this.db.close();
    return Promise.resolve();
  }
}

export function createSqliteDriver(config: SqliteConfig): Promise<DatabaseDriver> {
  try {
    // `timeout` is how long a statement waits on a locked database
    const db = new Database(config.filePath, { timeout: config.timeoutMs, fileMustExist: false });
    db.pragma('foreign_keys = ON');
    return Promise.resolve(new SqliteDriver(db));
  } catch (error) {
    return Promise.reject(error);
  }
}
