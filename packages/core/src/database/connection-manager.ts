/**
 * Connection lifecycle for one test execution context
 *
 * Disconnected --connect(config)--> Connecting --> Connected --disconnect()--> Disconnected
 *
 * A manager owns at most one driver. It is never shared across concurrently
 * running contexts; each parallel worker creates its own.
 */

import {
  DatabaseConfigSchema,
  describeTarget,
  type DatabaseConfig,
  type DatabaseConfigInput,
  type DatabaseKind,
} from '@vitalcheck/types';
import { databaseConnectionError, describeCause, validationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { DatabaseDriver, DriverFactories } from './driver.js';
import { createMySqlDriver } from './mysql-driver.js';
import { createPostgresDriver } from './postgres-driver.js';
import { createSqliteDriver } from './sqlite-driver.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface ConnectionManagerOptions {
  /** Replace the driver used for one or more backend kinds */
  drivers?: Partial<DriverFactories>;
  logger?: Logger;
}

const DEFAULT_DRIVERS: DriverFactories = {
  postgres: (config) => createPostgresDriver(config),
  mysql: (config) => createMySqlDriver(config),
  sqlite: (config) => createSqliteDriver(config),
};

interface Connection {
  kind: DatabaseKind;
  target: string;
  driver: DatabaseDriver;
}

export class ConnectionManager {
  private connection: Connection | null = null;
  private pending: Omit<Connection, 'driver'> | null = null;
  private readonly drivers: DriverFactories;
  private readonly logger: Logger;

  constructor(options: ConnectionManagerOptions = {}) {
    this.drivers = { ...DEFAULT_DRIVERS, ...options.drivers };
    this.logger = options.logger ?? createLogger({ name: 'connection-manager' });
  }

  get state(): ConnectionState {
    if (this.connection) {
      return 'connected';
    }
    return this.pending ? 'connecting' : 'disconnected';
  }

  get isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Validate the configuration, then open a connection to the backend it names
   *
   * @throws ValidationError when connected, still connecting, or the config is incomplete
   * @throws DatabaseConnectionError when the backend cannot be reached
   */
  async connect(input: DatabaseConfigInput): Promise<void> {
    if (this.connection) {
      throw validationError(
        `Already connected to ${this.connection.kind} at ${this.connection.target}; disconnect first`
      );
    }
    if (this.pending) {
      throw validationError(
        `A connection to ${this.pending.kind} at ${this.pending.target} is already being opened; wait for it to finish`
      );
    }

    const parsed = DatabaseConfigSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
      );
      throw validationError(`Invalid database configuration: ${issues.join('; ')}`, issues);
    }

    const config = parsed.data;
    const target = describeTarget(config);

    // Claimed before the first await so an overlapping connect() is refused
    this.pending = { kind: config.kind, target };
    let driver: DatabaseDriver;
    try {
      driver = await this.openDriver(config);
    } catch (error) {
      this.logger.error({ backend: config.kind, target }, 'Database connection failed');
      throw databaseConnectionError(
        `Could not connect to ${config.kind} at ${target}: ${describeCause(error)}`,
        { backend: config.kind, target },
        error
      );
    } finally {
      this.pending = null;
    }

    this.connection = { kind: config.kind, target, driver };
    this.logger.info({ backend: config.kind, target }, 'Database connected');
  }

  /**
   * Close the connection. A no-op when already disconnected.
   */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      return;
    }

    // State is released even if the driver fails to close cleanly
    this.connection = null;
    try {
      await connection.driver.close();
    } catch (error) {
      throw databaseConnectionError(
        `Error while closing ${connection.kind} connection at ${connection.target}: ${describeCause(error)}`,
        { backend: connection.kind, target: connection.target },
        error
      );
    }
    this.logger.info({ backend: connection.kind, target: connection.target }, 'Database disconnected');
  }

  /**
   * Active driver
   *
   * @throws ValidationError when not connected
   */
  getDriver(): DatabaseDriver {
    if (!this.connection) {
      throw validationError('Not connected to a database; call connect() first');
    }
    return this.connection.driver;
  }

  /** Backend kind of the open connection, or null */
  get backend(): DatabaseKind | null {
    return this.connection?.kind ?? null;
  }

  private openDriver(config: DatabaseConfig): Promise<DatabaseDriver> {
    switch (config.kind) {
      case 'postgres':
        return this.drivers.postgres(config);
      case 'mysql':
        return this.drivers.mysql(config);
      case 'sqlite':
        return this.drivers.sqlite(config);
    }
  }
}
