/**
 * Compliance evidence checks against the audit trail
 *
 * Only rows inside the recency window count. Older rows with the same ids are
 * treated as absent, never as stale matches.
 */

import {
  AuditActionSchema,
  AuditSnapshotSchema,
  AuditVerificationRequestSchema,
  DEFAULT_AUDIT_RECENCY_WINDOW_MS,
  type AuditAction,
  type AuditEvent,
  type AuditSnapshot,
} from '@vitalcheck/types';
import { describeCause, isVerificationError, securityError, validationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { QueryExecutor, QueryRow } from '../database/query-executor.js';
import type { SqlScalar } from '../database/driver.js';

export interface AuditTrailVerifierOptions {
  /** Window used when a call does not pass one */
  defaultRecencyWindowMs?: number;
  /** Source of "now"; injectable for tests */
  clock?: () => Date;
  logger?: Logger;
}

/** Parse a timestamp column; zone-less text is UTC */
function toDate(value: SqlScalar): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string') {
    const iso = value.includes('T') ? value : value.replace(' ', 'T');
    const hasZone = /(Z|[+-]\d{2}(:?\d{2})?)$/.test(iso);
    const date = new Date(hasZone ? iso : `${iso}Z`);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function toSnapshot(value: SqlScalar): AuditSnapshot | null {
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    // Not JSON; keep the text so the caller still sees what was recorded
    return { raw: value };
  }
  const snapshot = AuditSnapshotSchema.safeParse(parsed);
  return snapshot.success ? snapshot.data : { raw: parsed };
}

export class AuditTrailVerifier {
  private readonly defaultWindowMs: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly executor: QueryExecutor,
    options: AuditTrailVerifierOptions = {}
  ) {
    this.defaultWindowMs = options.defaultRecencyWindowMs ?? DEFAULT_AUDIT_RECENCY_WINDOW_MS;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ name: 'audit-trail-verifier' });

    if (!Number.isInteger(this.defaultWindowMs) || this.defaultWindowMs <= 0) {
      throw validationError('defaultRecencyWindowMs must be a positive integer');
    }
  }

  get defaultRecencyWindowMs(): number {
    return this.defaultWindowMs;
  }

  /**
   * True iff an audit row for (subject, action, actor) exists in [now - window, now].
   * A null subject matches rows without one, such as LOGIN and LOGOUT.
   *
   * @throws ValidationError for malformed arguments, before any query runs
   * @throws SecurityError when the audit trail cannot be read
   */
  async verify(
    subjectId: string | null,
    action: AuditAction,
    actorId: string,
    recencyWindowMs: number = this.defaultWindowMs
  ): Promise<boolean> {
    const parsed = AuditVerificationRequestSchema.safeParse({
      subjectId,
      action,
      actorId,
      recencyWindowMs,
    });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw validationError(`Invalid audit verification request: ${issues.join('; ')}`, issues);
    }

    const { since, until } = this.window(recencyWindowMs);
    const subjectClause = subjectId === null ? 'patient_id IS NULL' : 'patient_id = ?';
    const params =
      subjectId === null
        ? [action, actorId, since, until]
        : [subjectId, action, actorId, since, until];

    const count = await this.readAudit(() =>
      this.executor.count(
        `SELECT COUNT(*) AS count FROM audit_trail
          WHERE ${subjectClause} AND action = ? AND user_id = ?
            AND created_date >= ? AND created_date <= ?`,
        params
      )
    );

    const found = count > 0;
    if (found) {
      this.logger.info({ subjectId, action, actorId, recencyWindowMs }, 'Audit evidence found');
    } else {
      this.logger.warn({ subjectId, action, actorId, recencyWindowMs }, 'Audit evidence missing');
    }
    return found;
  }

  /**
   * Audit events for a subject inside the window, oldest first
   *
   * @throws SecurityError when the audit trail cannot be read
   */
  async listRecentEvents(
    subjectId: string | null,
    recencyWindowMs: number = this.defaultWindowMs
  ): Promise<AuditEvent[]> {
    if (subjectId?.trim().length === 0) {
      throw validationError('subjectId must not be empty');
    }
    if (!Number.isInteger(recencyWindowMs) || recencyWindowMs <= 0) {
      throw validationError('recencyWindowMs must be a positive integer');
    }

    const { since, until } = this.window(recencyWindowMs);
    const subjectClause = subjectId === null ? 'patient_id IS NULL' : 'patient_id = ?';
    const params = subjectId === null ? [since, until] : [subjectId, since, until];

    const { rows } = await this.readAudit(() =>
      this.executor.execute(
        `SELECT patient_id, user_id, action, created_date, old_values, new_values
           FROM audit_trail
          WHERE ${subjectClause} AND created_date >= ? AND created_date <= ?
          ORDER BY created_date, audit_id`,
        params
      )
    );

    return rows.flatMap((row) => {
      const event = this.toEvent(row);
      return event ? [event] : [];
    });
  }

  private window(recencyWindowMs: number): { since: Date; until: Date } {
    const until = this.clock();
    return { since: new Date(until.getTime() - recencyWindowMs), until };
  }

  /**
   * Missing or unreadable audit storage is a compliance failure, not an absence of evidence
   */
  private async readAudit<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      if (isVerificationError(error, 'ValidationError')) {
        throw error;
      }
      this.logger.error({ err: error }, 'Audit trail unavailable');
      throw securityError(
        `Audit trail unavailable: ${describeCause(error)}`,
        'audit_unavailable',
        error
      );
    }
  }

  private toEvent(row: QueryRow): AuditEvent | null {
    const action = AuditActionSchema.safeParse(row.action);
    const timestamp = toDate(row.created_date ?? null);
    if (!action.success || !timestamp || typeof row.user_id !== 'string') {
      // Actions outside the tracked set (e.g. EXPORT) are not part of this view
      return null;
    }
    return {
      subjectId: typeof row.patient_id === 'string' ? row.patient_id : null,
      actorId: row.user_id,
      action: action.data,
      timestamp,
      before: toSnapshot(row.old_values ?? null),
      after: toSnapshot(row.new_values ?? null),
    };
  }
}
