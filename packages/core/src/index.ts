/**
 * VitalCheck Core
 *
 * Data-integrity and compliance verification for healthcare test runs:
 * connection lifecycle, dialect-neutral queries, PHI encryption and masking,
 * patient integrity checks, audit evidence checks and fixture cleanup.
 *
 * @module @vitalcheck/core
 */

export {
  VerificationError,
  databaseConnectionError,
  validationError,
  securityError,
  testDataError,
  queryError,
  isVerificationError,
  matchFailure,
  describeCause,
  type VerificationFailure,
  type FailureKind,
  type FailureOf,
  type SecurityReason,
  type SafeErrorDetails,
} from './errors.js';

export { createLogger, withCorrelationId, type Logger, type CreateLoggerOptions } from './logger.js';

export { loadHarnessConfig, HarnessEnvSchema, type HarnessConfig, type HarnessEnv } from './env.js';

export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionState,
} from './database/connection-manager.js';
export {
  QueryExecutor,
  toCount,
  type QueryExecutorOptions,
  type QueryResult,
  type QueryRow,
  type SqlParameter,
} from './database/query-executor.js';
export type {
  DatabaseDriver,
  DriverFactory,
  DriverFactories,
  DriverResult,
  SqlScalar,
} from './database/driver.js';
export { rewritePlaceholders, type RewrittenStatement } from './database/placeholders.js';
export {
  PostgresDriver,
  createPostgresDriver,
  type PgClientLike,
  type PostgresDriverOptions,
} from './database/postgres-driver.js';
export {
  MySqlDriver,
  createMySqlDriver,
  type MySqlConnectionLike,
  type MySqlDriverOptions,
} from './database/mysql-driver.js';
export { SqliteDriver, createSqliteDriver, toSqliteTimestamp } from './database/sqlite-driver.js';

export {
  SecurityHelper,
  isWeakKey,
  MIN_PASSWORD_LENGTH,
  type SecurityHelperConfig,
} from './security/security-helper.js';
export { maskSensitive, maskFields, MASK, DEFAULT_PII_FIELDS } from './security/masking.js';

export {
  IntegrityValidator,
  ORPHAN_CHECKS,
  type IntegrityValidatorOptions,
} from './verification/integrity-validator.js';
export {
  AuditTrailVerifier,
  type AuditTrailVerifierOptions,
} from './verification/audit-trail-verifier.js';

export {
  CleanupScopeBuilder,
  FIXTURE_FOREIGN_KEYS,
  assertDeletionOrder,
  parseCleanupScope,
} from './fixtures/cleanup-scope.js';
export {
  TestDataCleaner,
  toLikePrefix,
  type CleanupSummary,
  type CleanupTable,
  type TestDataCleanerOptions,
} from './fixtures/test-data-cleaner.js';
export {
  FixtureFactory,
  FIXTURE_PATIENT_PREFIX,
  FIXTURE_USER_PREFIX,
  type FixtureFactoryOptions,
  type PatientFixture,
  type ProviderFixture,
  type MedicalRecordFixture,
  type VitalSignFixture,
  type MedicationFixture,
  type AllergyFixture,
  type AppointmentFixture,
  type UserFixture,
  type AuditEventFixture,
} from './fixtures/fixture-factory.js';
export { FixtureWriter } from './fixtures/fixture-writer.js';
