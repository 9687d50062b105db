/**
 * Patient aggregate integrity report
 */

import { z } from 'zod';

/** Business fields every patient row must carry */
export const REQUIRED_PATIENT_FIELDS = ['first_name', 'last_name', 'date_of_birth', 'gender'] as const;
export type RequiredPatientField = (typeof REQUIRED_PATIENT_FIELDS)[number];

export const OrphanFindingSchema = z.object({
  table: z.string(),
  column: z.string(),
  references: z.string(),
  count: z.number().int().positive(),
});
export type OrphanFinding = z.infer<typeof OrphanFindingSchema>;

export const FieldDetailsSchema = z.object({
  first_name: z.boolean(),
  last_name: z.boolean(),
  date_of_birth: z.boolean(),
  gender: z.boolean(),
});
export type FieldDetails = z.infer<typeof FieldDetailsSchema>;

export const IntegrityReportSchema = z.object({
  patientExists: z.boolean(),
  hasRequiredFields: z.boolean(),
  medicalRecordsCount: z.number().int().nonnegative(),
  prescriptionsCount: z.number().int().nonnegative(),
  dataIntegrityPassed: z.boolean(),
  fieldDetails: FieldDetailsSchema,
  orphanedRecords: z.array(OrphanFindingSchema),
});
export type IntegrityReport = z.infer<typeof IntegrityReportSchema>;
