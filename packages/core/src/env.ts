import { z } from 'zod';
import {
  DEFAULT_AUDIT_RECENCY_WINDOW_MS,
  DEFAULT_PATIENT_PREFIXES,
  DEFAULT_STATEMENT_TIMEOUT_MS,
  DEFAULT_USER_PREFIXES,
  DatabaseConfigSchema,
  DatabaseKindSchema,
  type DatabaseConfig,
  type DatabaseConfigInput,
} from '@vitalcheck/types';
import { validationError } from './errors.js';

/**
 * Environment loading for the test harness
 * The verification components never read the environment; the harness calls
 * `loadHarnessConfig` once and hands the pieces to each component.
 */

const NumericString = z.string().regex(/^\d+$/, 'must be a whole number').transform(Number);

const PrefixList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((prefix) => prefix.trim())
      .filter((prefix) => prefix.length > 0)
  );

const DEFAULT_PORTS = { postgres: 5432, mysql: 3306 } as const;

export const HarnessEnvSchema = z.object({
  DB_KIND: DatabaseKindSchema.default('sqlite'),
  DB_HOST: z.string().optional(),
  DB_PORT: NumericString.optional(),
  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_FILE: z.string().default(':memory:'),
  DB_SSL: z
    .enum(['true', 'false'])
    .optional()
    .default('true')
    .transform((v) => v === 'true'),
  DB_TIMEOUT_MS: NumericString.optional(),
  /** 64 hex characters; generate with SecurityHelper.generateKey() */
  PHI_ENCRYPTION_KEY: z.string().optional(),
  AUDIT_WINDOW_MS: NumericString.optional(),
  FIXTURE_PATIENT_PREFIXES: PrefixList.optional(),
  FIXTURE_USER_PREFIXES: PrefixList.optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type HarnessEnv = z.infer<typeof HarnessEnvSchema>;

export interface HarnessConfig {
  database: DatabaseConfig;
  security: { encryptionKey: string | undefined };
  audit: { recencyWindowMs: number };
  fixtures: { patientIdPrefixes: string[]; userIdPrefixes: string[] };
  logLevel: HarnessEnv['LOG_LEVEL'];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
}

function toDatabaseInput(env: HarnessEnv): DatabaseConfigInput {
  const timeoutMs = env.DB_TIMEOUT_MS ?? DEFAULT_STATEMENT_TIMEOUT_MS;
  if (env.DB_KIND === 'sqlite') {
    return { kind: 'sqlite', filePath: env.DB_FILE, timeoutMs };
  }
  return {
    kind: env.DB_KIND,
    host: env.DB_HOST ?? '',
    port: env.DB_PORT ?? DEFAULT_PORTS[env.DB_KIND],
    database: env.DB_NAME,
    user: env.DB_USER ?? '',
    secret: env.DB_PASSWORD ?? '',
    ssl: env.DB_SSL,
    timeoutMs,
  };
}

/**
 * Validate the harness environment
 *
 * @throws ValidationError listing every invalid or missing variable
 */
export function loadHarnessConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const result = HarnessEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw validationError(`Environment validation failed: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;
  const database = DatabaseConfigSchema.safeParse(toDatabaseInput(parsed));
  if (!database.success) {
    const issues = formatIssues(database.error);
    throw validationError(`Database environment is incomplete: ${issues.join('; ')}`, issues);
  }

  const recencyWindowMs = parsed.AUDIT_WINDOW_MS ?? DEFAULT_AUDIT_RECENCY_WINDOW_MS;
  if (recencyWindowMs <= 0) {
    throw validationError('AUDIT_WINDOW_MS must be greater than zero');
  }

  return {
    database: database.data,
    security: { encryptionKey: parsed.PHI_ENCRYPTION_KEY },
    audit: { recencyWindowMs },
    fixtures: {
      patientIdPrefixes: parsed.FIXTURE_PATIENT_PREFIXES ?? [...DEFAULT_PATIENT_PREFIXES],
      userIdPrefixes: parsed.FIXTURE_USER_PREFIXES ?? [...DEFAULT_USER_PREFIXES],
    },
    logLevel: parsed.LOG_LEVEL,
  };
}
