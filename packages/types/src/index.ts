/**
 * VitalCheck Types Package
 *
 * Zod schemas and inferred types shared by the verification core.
 *
 * @module @vitalcheck/types
 */

export * from './lib/index.js';
export * from './schemas/database.schema.js';
export * from './schemas/audit.schema.js';
export * from './schemas/integrity.schema.js';
export * from './schemas/cleanup.schema.js';
