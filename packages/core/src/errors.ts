/**
 * Failure taxonomy shared by every verification component
 *
 * A closed set of tagged variants carried by one error class. Call sites match on
 * `failure._tag` (see `matchFailure`) instead of catching by class hierarchy.
 * Messages never contain credentials or raw PHI.
 *
 * @module @vitalcheck/core/errors
 */

import { matchTag, type DatabaseKind, type TagHandlers } from '@vitalcheck/types';

export type SecurityReason =
  | 'key_missing'
  | 'key_malformed'
  | 'key_mismatch'
  | 'blob_malformed'
  | 'authentication_failed'
  | 'audit_unavailable';

export type VerificationFailure =
  | {
      readonly _tag: 'DatabaseConnectionError';
      readonly backend: DatabaseKind;
      readonly target: string;
    }
  | { readonly _tag: 'ValidationError'; readonly issues: readonly string[] }
  | { readonly _tag: 'SecurityError'; readonly reason: SecurityReason }
  | {
      readonly _tag: 'TestDataError';
      readonly table: string;
      /** Rows left behind, or null when the deletion itself failed */
      readonly residualCount: number | null;
    }
  | { readonly _tag: 'QueryError'; readonly statement: string };

export type FailureKind = VerificationFailure['_tag'];

export type FailureOf<K extends FailureKind> = Extract<VerificationFailure, { _tag: K }>;

export interface SafeErrorDetails {
  code: string;
  message: string;
}

const ERROR_CODES: Record<FailureKind, string> = {
  DatabaseConnectionError: 'DATABASE_CONNECTION_ERROR',
  ValidationError: 'VALIDATION_ERROR',
  SecurityError: 'SECURITY_ERROR',
  TestDataError: 'TEST_DATA_ERROR',
  QueryError: 'QUERY_ERROR',
};

export class VerificationError<F extends VerificationFailure = VerificationFailure> extends Error {
  public readonly failure: F;
  public readonly code: string;

  constructor(failure: F, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = failure._tag;
    this.failure = failure;
    this.code = ERROR_CODES[failure._tag];
    Error.captureStackTrace(this, this.constructor);
  }

  get kind(): F['_tag'] {
    return this.failure._tag;
  }

  /**
   * Get safe error details for reports (no credentials, no PHI)
   */
  toSafeError(): SafeErrorDetails {
    return { code: this.code, message: this.message };
  }
}

export function databaseConnectionError(
  message: string,
  context: { backend: DatabaseKind; target: string },
  cause?: unknown
): VerificationError<FailureOf<'DatabaseConnectionError'>> {
  return new VerificationError<FailureOf<'DatabaseConnectionError'>>(
    { _tag: 'DatabaseConnectionError', ...context },
    message,
    cause
  );
}

export function validationError(
  message: string,
  issues: readonly string[] = [message]
): VerificationError<FailureOf<'ValidationError'>> {
  return new VerificationError<FailureOf<'ValidationError'>>(
    { _tag: 'ValidationError', issues },
    message
  );
}

export function securityError(
  message: string,
  reason: SecurityReason,
  cause?: unknown
): VerificationError<FailureOf<'SecurityError'>> {
  return new VerificationError<FailureOf<'SecurityError'>>(
    { _tag: 'SecurityError', reason },
    message,
    cause
  );
}

export function testDataError(
  message: string,
  context: { table: string; residualCount: number | null },
  cause?: unknown
): VerificationError<FailureOf<'TestDataError'>> {
  return new VerificationError<FailureOf<'TestDataError'>>(
    { _tag: 'TestDataError', ...context },
    message,
    cause
  );
}

export function queryError(
  message: string,
  statement: string,
  cause?: unknown
): VerificationError<FailureOf<'QueryError'>> {
  return new VerificationError<FailureOf<'QueryError'>>(
    { _tag: 'QueryError', statement },
    message,
    cause
  );
}

/**
 * Narrow an unknown thrown value to a VerificationError, optionally of one kind
 */
export function isVerificationError(error: unknown): error is VerificationError;
export function isVerificationError<K extends FailureKind>(
  error: unknown,
  kind: K
): error is VerificationError<FailureOf<K>>;
export function isVerificationError(error: unknown, kind?: FailureKind): boolean {
  return error instanceof VerificationError && (kind === undefined || error.kind === kind);
}

/**
 * Exhaustively dispatch on the failure variant of a VerificationError
 */
export function matchFailure<R>(
  error: VerificationError,
  handlers: TagHandlers<VerificationFailure, R>
): R {
  return matchTag(error.failure, handlers);
}

/**
 * Human-readable message of any thrown value, for wrapping driver errors
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
