import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Harness logger with PHI and credential redaction
 * Keeps raw patient data and secrets out of test-run logs and CI artifacts
 */

// Fields to censor wherever they appear one level deep in a log object
const REDACTED_FIELDS = [
  'secret',
  'password',
  'password_hash',
  'token',
  'apiKey',
  'encryptionKey',
  'authorization',
  'ssn',
  'social_security_number',
  'first_name',
  'last_name',
  'firstName',
  'lastName',
  'date_of_birth',
  'dateOfBirth',
  'email',
  'phone_number',
  'plaintext',
];

/**
 * Redaction settings for Pino
 */
function createRedactor() {
  return {
    paths: [...REDACTED_FIELDS, ...REDACTED_FIELDS.map((field) => `*.${field}`)],
    censor: '[REDACTED]',
  };
}

function getDefaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

/**
 * Create a logger instance with redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = getDefaultLevel(), correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Use null to omit base, or provide correlationId if present
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

export type { Logger };
