/**
 * Database connection configuration
 *
 * One shape per backend kind: networked engines need a host and credentials,
 * the embedded engine only a file path.
 */

import { z } from 'zod';

export const DEFAULT_STATEMENT_TIMEOUT_MS = 30_000;

export const DatabaseKindSchema = z.enum(['postgres', 'mysql', 'sqlite']);
export type DatabaseKind = z.infer<typeof DatabaseKindSchema>;

const TimeoutSchema = z.number().int().positive().default(DEFAULT_STATEMENT_TIMEOUT_MS);

const NetworkedFields = {
  host: z.string().min(1, 'host is required'),
  port: z.number().int().min(1).max(65535),
  database: z.string().min(1).optional(),
  user: z.string().min(1, 'user is required'),
  secret: z.string().min(1, 'secret is required'),
  timeoutMs: TimeoutSchema,
};

export const PostgresConfigSchema = z.object({
  kind: z.literal('postgres'),
  ...NetworkedFields,
  /** Require TLS (the default for PHI traffic) */
  ssl: z.boolean().default(true),
});

export const MySqlConfigSchema = z.object({
  kind: z.literal('mysql'),
  ...NetworkedFields,
  ssl: z.boolean().default(true),
});

export const SqliteConfigSchema = z.object({
  kind: z.literal('sqlite'),
  /** Database file, or `:memory:` */
  filePath: z.string().min(1, 'filePath is required'),
  timeoutMs: TimeoutSchema,
});

export const DatabaseConfigSchema = z.discriminatedUnion('kind', [
  PostgresConfigSchema,
  MySqlConfigSchema,
  SqliteConfigSchema,
]);

/** Validated configuration (defaults applied) */
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
/** Configuration as supplied by a loader, before defaults */
export type DatabaseConfigInput = z.input<typeof DatabaseConfigSchema>;

export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;
export type MySqlConfig = z.infer<typeof MySqlConfigSchema>;
export type SqliteConfig = z.infer<typeof SqliteConfigSchema>;

/**
 * Human-readable target for logs and errors. Never includes the secret.
 */
export function describeTarget(config: DatabaseConfig): string {
  if (config.kind === 'sqlite') {
    return config.filePath;
  }
  const database = config.database ? `/${config.database}` : '';
  return `${config.host}:${config.port}${database}`;
}
