/**
 * Positional placeholder rewriting
 *
 * Callers always write `?`. Question marks inside string literals, quoted
 * identifiers and comments are not placeholders and are left untouched.
 */

type ScanState = 'code' | 'single' | 'double' | 'backtick' | 'line-comment' | 'block-comment';

export interface RewrittenStatement {
  sql: string;
  placeholderCount: number;
}

export function rewritePlaceholders(
  sql: string,
  placeholder: (position: number) => string
): RewrittenStatement {
  let state: ScanState = 'code';
  let output = '';
  let count = 0;

  for (let i = 0; i < sql.length; i++) {
    const char = sql.charAt(i);
    const next = sql.charAt(i + 1);

    switch (state) {
      case 'code':
        if (char === '?') {
          count++;
          output += placeholder(count);
          continue;
        }
        if (char === "'") state = 'single';
        else if (char === '"') state = 'double';
        else if (char === '`') state = 'backtick';
        else if (char === '-' && next === '-') state = 'line-comment';
        else if (char === '/' && next === '*') state = 'block-comment';
        break;
      case 'single':
        // '' is an escaped quote and keeps us inside the literal
        if (char === "'" && next === "'") {
          output += "''";
          i++;
          continue;
        } else if (char === "'") {
          state = 'code';
        }
        break;
      case 'double':
        if (char === '"') state = 'code';
        break;
      case 'backtick':
        if (char === '`') state = 'code';
        break;
      case 'line-comment':
        if (char === '\n') state = 'code';
        break;
      case 'block-comment':
        if (char === '*' && next === '/') {
          output += '*/';
          i++;
          state = 'code';
          continue;
        }
        break;
    }
    output += char;
  }

  return { sql: output, placeholderCount: count };
}
