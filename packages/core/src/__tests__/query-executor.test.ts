/**
 * QueryExecutor Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConnectionManager } from '../database/connection-manager.js';
import { createMySqlDriver, type MySqlConnectionLike } from '../database/mysql-driver.js';
import { QueryExecutor, toCount } from '../database/query-executor.js';
import { isVerificationError, type VerificationError } from '../errors.js';
import {
  connectScripted,
  openDatabase,
  ScriptedDriver,
  type TestDatabase,
  type TestEngine,
} from './support/engines.js';

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

const INSERT_PROVIDER =
  'INSERT INTO providers (provider_id, first_name, last_name, specialty) VALUES (?, ?, ?, ?)';

describe.each<TestEngine>(['sqlite', 'postgres'])('QueryExecutor on %s', (engine) => {
  let database: TestDatabase;

  afterEach(async () => {
    await database.close();
  });

  it('should bind parameters and return rows', async () => {
    database = await openDatabase(engine);
    const { executor } = database;

    const inserted = await executor.execute(
      INSERT_PROVIDER,
      ['TEST_PRV_000001', 'Ada', 'Byron', 'Cardiology'],
      false
    );
    expect(inserted).toBe(1);

    const result = await executor.execute(
      'SELECT provider_id, specialty FROM providers WHERE provider_id = ?',
      ['TEST_PRV_000001']
    );
    expect(result.rows).toEqual([{ provider_id: 'TEST_PRV_000001', specialty: 'Cardiology' }]);
    expect(result.rowCount).toBe(1);
  });

  it('should treat injection-shaped values as data', async () => {
    database = await openDatabase(engine);
    const { executor } = database;
    const hostile = "x'; DROP TABLE providers; --";

    await executor.execute(INSERT_PROVIDER, ['TEST_PRV_000002', hostile, 'Doe', null], false);

    expect(await executor.count('SELECT COUNT(*) FROM providers WHERE first_name = ?', [hostile])).toBe(1);
  });

  it('should report the affected-row count for updates and deletes', async () => {
    database = await openDatabase(engine);
    const { executor } = database;
    await executor.execute(INSERT_PROVIDER, ['TEST_PRV_000003', 'A', 'B', null], false);
    await executor.execute(INSERT_PROVIDER, ['TEST_PRV_000004', 'C', 'D', null], false);

    expect(
      await executor.execute("UPDATE providers SET status = 'INACTIVE' WHERE provider_id LIKE ?", ['TEST_PRV_%'], false)
    ).toBe(2);
    expect(await executor.execute('DELETE FROM providers WHERE provider_id = ?', ['nope'], false)).toBe(0);
  });

  it('should commit every statement of a transaction together', async () => {
    database = await openDatabase(engine);
    const { executor } = database;

    await executor.transaction(async () => {
      await executor.execute(INSERT_PROVIDER, ['TEST_PRV_000005', 'A', 'B', null], false);
      await executor.execute(INSERT_PROVIDER, ['TEST_PRV_000006', 'C', 'D', null], false);
    });

    expect(await executor.count('SELECT COUNT(*) FROM providers')).toBe(2);
  });

  it('should roll back a transaction when the work fails', async () => {
    database = await openDatabase(engine);
    const { executor } = database;

    await expect(
      executor.transaction(async () => {
        await executor.execute(INSERT_PROVIDER, ['TEST_PRV_000007', 'A', 'B', null], false);
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await executor.count('SELECT COUNT(*) FROM providers')).toBe(0);
  });

  it('should wrap engine failures in QueryError with a masked statement', async () => {
    database = await openDatabase(engine);

    const error = await captureError(
      database.executor.execute("SELECT * FROM no_such_table WHERE password = 'hunter2'")
    );

    expect(error.kind).toBe('QueryError');
    expect(error.failure).toEqual({
      _tag: 'QueryError',
      statement: "SELECT * FROM no_such_table WHERE password = '***'",
    });
    expect(error.message.startsWith(`Query failed on ${engine}: `)).toBe(true);
    expect(error.cause).toBeInstanceOf(Error);
  });
});

describe('QueryExecutor', () => {
  describe('preconditions', () => {
    it('should reject execution while disconnected', async () => {
      const executor = new QueryExecutor(new ConnectionManager());

      const error = await captureError(executor.execute('SELECT 1'));
      expect(error.kind).toBe('ValidationError');
      expect(error.message).toBe('Not connected to a database; call connect() first');
    });

    it('should reject a parameter count that does not match the placeholders', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [], rowCount: 0 }));
      const database = await connectScripted(driver);

      const error = await captureError(database.executor.execute('SELECT ? AS a, ? AS b', [1]));
      expect(error.kind).toBe('ValidationError');
      expect(error.message).toBe('Statement has 2 placeholder(s) but 1 parameter(s) were supplied');
      expect(driver.calls).toEqual([]);
    });
  });

  describe('value normalization', () => {
    it('should bind booleans, dates and undefined on sqlite', async () => {
      const database = await openDatabase('sqlite');
      const { executor } = database;

      const { rows } = await executor.execute('SELECT ? AS yes, ? AS no, ? AS at, ? AS missing, ? AS doc', [
        true,
        false,
        new Date(Date.UTC(2024, 0, 15, 9, 30, 0, 250)),
        undefined,
        { a: 1 },
      ]);

      expect(rows).toEqual([
        { yes: 1, no: 0, at: '2024-01-15 09:30:00.250', missing: null, doc: '{"a":1}' },
      ]);
      await database.close();
    });

    it('should reduce engine-specific column values to scalars', async () => {
      const driver = new ScriptedDriver(() => ({
        rows: [{ small: 12n, huge: 2n ** 60n, blob: Buffer.from('hi'), doc: { a: 1 }, gone: undefined }],
        rowCount: 1,
      }));
      const database = await connectScripted(driver);

      const { rows } = await database.executor.execute('SELECT 1');
      expect(rows).toEqual([
        { small: 12, huge: '1152921504606846976', blob: 'aGk=', doc: '{"a":1}', gone: null },
      ]);
    });

    it('should rewrite placeholders to the postgres style', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [], rowCount: 0 }), 'postgres');
      const database = await connectScripted(driver);

      await database.executor.execute("SELECT * FROM t WHERE a = ? AND b = '?' AND c = ?", ['x', 'y']);
      expect(driver.calls).toEqual([
        { sql: "SELECT * FROM t WHERE a = $1 AND b = '?' AND c = $2", params: ['x', 'y'] },
      ]);
    });
  });

  describe('count', () => {
    it('should read the first column of the first row', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [{ total: '42' }], rowCount: 1 }));
      const database = await connectScripted(driver);
      expect(await database.executor.count('SELECT COUNT(*) AS total FROM t')).toBe(42);
    });

    it('should return zero when the query yields no rows', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [], rowCount: 0 }));
      const database = await connectScripted(driver);
      expect(await database.executor.count('SELECT total FROM t')).toBe(0);
    });

    it('should coerce the representations engines use for counts', () => {
      expect(toCount(3)).toBe(3);
      expect(toCount(7n)).toBe(7);
      expect(toCount('15')).toBe(15);
      expect(toCount(null)).toBeNull();
      expect(toCount('n/a')).toBeNull();
      expect(toCount(-1)).toBeNull();
      expect(toCount(2.5)).toBeNull();
      expect(toCount(2n ** 64n)).toBeNull();
    });

    it('should raise QueryError when the count column is not numeric', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [{ total: 'n/a' }], rowCount: 1 }));
      const database = await connectScripted(driver);

      const error = await captureError(
        database.executor.count("SELECT COUNT(*) AS total FROM users WHERE password = 'hunter2'")
      );
      expect(error.failure).toEqual({
        _tag: 'QueryError',
        statement: "SELECT COUNT(*) AS total FROM users WHERE password = '***'",
      });
      expect(error.message).toBe('Count query did not return a numeric value');
    });

    it('should raise QueryError when the count column is NULL', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [{ total: null }], rowCount: 1 }));
      const database = await connectScripted(driver);

      const error = await captureError(database.executor.count('SELECT MAX(id) AS total FROM t'));
      expect(error.kind).toBe('QueryError');
    });
  });

  describe('transactions', () => {
    it('should reject a nested transaction', async () => {
      const database = await connectScripted(new ScriptedDriver(() => ({ rows: [], rowCount: 0 })));
      const { executor } = database;

      const error = await captureError(
        executor.transaction(() => executor.transaction(() => Promise.resolve(1)))
      );
      expect(error.kind).toBe('ValidationError');
      expect(error.message).toBe('A transaction is already open on this connection');
    });

    it('should bracket the work with BEGIN and COMMIT', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [], rowCount: 1 }));
      const { executor } = await connectScripted(driver);

      const result = await executor.transaction(() =>
        executor.execute('DELETE FROM t WHERE id = ?', ['a'], false)
      );

      expect(result).toBe(1);
      expect(driver.calls.map((call) => call.sql)).toEqual(['BEGIN', 'DELETE FROM t WHERE id = ?', 'COMMIT']);
    });

    it('should run the work directly when the backend has no transactions', async () => {
      const driver = new ScriptedDriver(() => ({ rows: [], rowCount: 1 }), 'sqlite', false);
      const { executor } = await connectScripted(driver);

      await executor.transaction(() => executor.execute('DELETE FROM t', [], false));
      expect(driver.calls.map((call) => call.sql)).toEqual(['DELETE FROM t']);
    });

    it('should surface the original failure when the rollback also fails', async () => {
      const driver = new ScriptedDriver((sql) => {
        if (sql === 'ROLLBACK') {
          throw new Error('connection lost');
        }
        return { rows: [], rowCount: 0 };
      });
      const { executor } = await connectScripted(driver);

      await expect(
        executor.transaction(() => Promise.reject(new Error('work failed')))
      ).rejects.toThrow('work failed');
      expect(driver.calls.map((call) => call.sql)).toEqual(['BEGIN', 'ROLLBACK']);
    });
  });

  describe('mysql', () => {
    function fakeConnection(): MySqlConnectionLike & {
      query: ReturnType<typeof vi.fn>;
      execute: ReturnType<typeof vi.fn>;
    } {
      return {
        query: vi.fn().mockResolvedValue([{ affectedRows: 0 }, undefined]),
        execute: vi.fn().mockResolvedValue([{ affectedRows: 3 }, undefined]),
        end: vi.fn().mockResolvedValue(undefined),
      };
    }

    async function connectMySql(connection: MySqlConnectionLike): Promise<QueryExecutor> {
      const connections = new ConnectionManager({
        drivers: {
          mysql: (config) =>
            createMySqlDriver(config, { connectionFactory: () => Promise.resolve(connection) }),
        },
      });
      await connections.connect({
        kind: 'mysql',
        host: 'mysql.test',
        port: 3306,
        user: 'tester',
        secret: 'test-secret',
        timeoutMs: 1000,
      });
      return new QueryExecutor(connections);
    }

    it('should prepare parameterized statements with booleans bound as integers', async () => {
      const connection = fakeConnection();
      const executor = await connectMySql(connection);

      const affected = await executor.execute(
        'UPDATE users SET status = ? WHERE is_locked = ?',
        ['ACTIVE', true],
        false
      );

      expect(affected).toBe(3);
      expect(connection.execute).toHaveBeenCalledWith(
        { sql: 'UPDATE users SET status = ? WHERE is_locked = ?', timeout: 1000 },
        ['ACTIVE', 1]
      );
    });

    it('should send transaction control over the text protocol', async () => {
      const connection = fakeConnection();
      const executor = await connectMySql(connection);

      await executor.transaction(() => executor.execute('DELETE FROM t WHERE id = ?', ['a'], false));

      expect(connection.query.mock.calls).toEqual([
        [{ sql: 'BEGIN', timeout: 1000 }],
        [{ sql: 'COMMIT', timeout: 1000 }],
      ]);
      expect(connection.execute).toHaveBeenCalledTimes(1);
    });

    it('should return selected rows', async () => {
      const connection = fakeConnection();
      connection.execute.mockResolvedValueOnce([[{ patient_id: 'TEST_00000001' }], []]);
      const executor = await connectMySql(connection);

      const result = await executor.execute('SELECT patient_id FROM patients WHERE patient_id = ?', [
        'TEST_00000001',
      ]);
      expect(result).toEqual({ rows: [{ patient_id: 'TEST_00000001' }], rowCount: 1 });
    });
  });
});
