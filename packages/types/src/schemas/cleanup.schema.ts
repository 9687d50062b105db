/**
 * Fixture tables and cleanup scope
 */

import { z } from 'zod';

/**
 * Patient-aggregate tables in leaf-to-root deletion order.
 * Every table precedes each table it references; `patients` comes last.
 */
export const PATIENT_CLEANUP_ORDER = [
  'audit_trail',
  'vital_signs',
  'medications',
  'patient_allergies',
  'appointments',
  'medical_records',
  'patients',
] as const;

export const FixtureTableSchema = z.enum(PATIENT_CLEANUP_ORDER);
export type FixtureTable = z.infer<typeof FixtureTableSchema>;

export const DEFAULT_PATIENT_PREFIXES = ['TEST_', 'PAT_'] as const;
export const DEFAULT_USER_PREFIXES = ['TESTUSER_'] as const;

const PrefixSchema = z.string().min(1, 'identifier prefixes must not be empty');

export const CleanupScopeSchema = z.object({
  /** Exact patient ids created by the run */
  patientIds: z.array(z.string().min(1)).default([]),
  /** Reserved prefixes marking synthetic patients */
  patientIdPrefixes: z.array(PrefixSchema).default([]),
  /** Exact user ids created by the run */
  userIds: z.array(z.string().min(1)).default([]),
  /** Reserved prefixes marking synthetic user accounts */
  userIdPrefixes: z.array(PrefixSchema).default([]),
  /** Tables to purge, leaf first */
  tables: z.array(FixtureTableSchema).default([...PATIENT_CLEANUP_ORDER]),
});

export type CleanupScope = z.infer<typeof CleanupScopeSchema>;
export type CleanupScopeInput = z.input<typeof CleanupScopeSchema>;
