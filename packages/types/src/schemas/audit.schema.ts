/**
 * Audit trail schemas
 *
 * Read-only view over the `audit_trail` table written by the application under test.
 */

import { z } from 'zod';

export const AuditActionSchema = z.enum(['LOGIN', 'LOGOUT', 'READ', 'CREATE', 'UPDATE', 'DELETE']);
export type AuditAction = z.infer<typeof AuditActionSchema>;

/** Default recency window for audit verification: five minutes */
export const DEFAULT_AUDIT_RECENCY_WINDOW_MS = 5 * 60 * 1000;

export const AuditSnapshotSchema = z.record(z.unknown());
export type AuditSnapshot = z.infer<typeof AuditSnapshotSchema>;

export const AuditEventSchema = z.object({
  /** Patient the action concerned; null for session events such as LOGIN */
  subjectId: z.string().nullable(),
  actorId: z.string().min(1),
  action: AuditActionSchema,
  timestamp: z.date(),
  before: AuditSnapshotSchema.nullable(),
  after: AuditSnapshotSchema.nullable(),
});
export type AuditEvent = z.infer<typeof AuditEventSchema>;

export const AuditVerificationRequestSchema = z.object({
  subjectId: z.string().min(1).nullable(),
  action: AuditActionSchema,
  actorId: z.string().min(1, 'actorId is required'),
  recencyWindowMs: z.number().int().positive(),
});
export type AuditVerificationRequest = z.infer<typeof AuditVerificationRequestSchema>;
