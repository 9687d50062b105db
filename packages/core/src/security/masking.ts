/**
 * Sensitive-substring masking for text that is about to be logged or captured
 *
 * Patterns are applied in order, each independently. Every replacement output is
 * itself a fixed point of its pattern, so masking is idempotent.
 *
 * @module @vitalcheck/core/security/masking
 */

export const MASK = '***';

interface MaskRule {
  name: string;
  pattern: RegExp;
  replace: string;
}

/**
 * Ordered substitution rules. Keys keep their original spelling and spacing;
 * only the value is replaced. Keys match as suffixes too (`db_password`, `user_ssn`).
 */
export const MASK_RULES: readonly MaskRule[] = [
  // key = 'value' (SQL literals, config dumps)
  {
    name: 'ssn',
    pattern: /(ssn)(\s*=\s*)'[^']+'/gi,
    replace: `$1$2'${MASK}'`,
  },
  {
    name: 'social_security_number',
    pattern: /(social_security_number)(\s*=\s*)'[^']+'/gi,
    replace: `$1$2'${MASK}'`,
  },
  {
    name: 'password',
    pattern: /(password)(\s*=\s*)'[^']+'/gi,
    replace: `$1$2'${MASK}'`,
  },
  {
    name: 'token',
    pattern: /(token)(\s*=\s*)'[^']+'/gi,
    replace: `$1$2'${MASK}'`,
  },
  // key=value (query strings, connection strings)
  {
    name: 'unquoted',
    pattern: /(password|token|secret|api_key)=(?!')[^\s&;'"]+/gi,
    replace: `$1=${MASK}`,
  },
  // Authorization headers
  {
    name: 'bearer',
    pattern: /\b(Bearer\s+)[A-Za-z0-9\-._~+/]+=*/g,
    replace: `$1${MASK}`,
  },
];

/**
 * Redact sensitive substrings from free text
 *
 * @example
 * maskSensitive("password = 'abc123'") // "password = '***'"
 * maskSensitive('GET /export?token=abc') // 'GET /export?token=***'
 */
export function maskSensitive(text: string): string {
  let result = text;
  for (const rule of MASK_RULES) {
    result = result.replace(rule.pattern, rule.replace);
  }
  return result;
}

/** Default PII fields masked by `maskFields` */
export const DEFAULT_PII_FIELDS = [
  'social_security_number',
  'ssn',
  'phone_number',
  'email',
  'address_line1',
  'address_line2',
] as const;

/**
 * Mask PII fields of a record, keeping only the last four characters
 * (shorter values are fully masked). Returns a copy.
 *
 * @example
 * maskFields({ ssn: '123-45-6789' }) // { ssn: '*******6789' }
 */
export function maskFields(
  record: Readonly<Record<string, unknown>>,
  fields: readonly string[] = DEFAULT_PII_FIELDS
): Record<string, unknown> {
  const masked: Record<string, unknown> = { ...record };
  for (const field of fields) {
    const value = masked[field];
    if (value === undefined || value === null) {
      continue;
    }
    const text = String(value);
    masked[field] =
      text.length > 4 ? '*'.repeat(text.length - 4) + text.slice(-4) : '*'.repeat(text.length);
  }
  return masked;
}
