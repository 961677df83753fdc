/**
 * Placeholder Values
 *
 * Textual conversion for values bound through setValue() and the deferred
 * search-and-replace that resolves placeholder tokens at render time.
 */

import type { SQLDialect } from '../dialect/sql-dialect';

/**
 * A value that knows its own SQL text
 *
 * @example
 * ```typescript
 * const now: SqlLiteral = { toSqlLiteral: () => 'SYSDATE' };
 * builder.setValue('?jd', now);
 * ```
 */
export interface SqlLiteral {
  toSqlLiteral(): string;
}

export type PlaceholderValue = string | number | bigint | boolean | SqlLiteral;

export function isSqlLiteral(value: unknown): value is SqlLiteral {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toSqlLiteral' in value &&
    typeof value.toSqlLiteral === 'function'
  );
}

/**
 * Convert a placeholder value to the text spliced into the WHERE clause
 */
export function toPlaceholderText(value: PlaceholderValue, dialect: SQLDialect): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'boolean') {
    return dialect.formatBoolean(value);
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  return value.toSqlLiteral();
}

/**
 * Replace the first occurrence of each token with its value, in map order.
 *
 * This is a raw text replacement: a token that also appears inside a column
 * name or an earlier substituted value is replaced there instead.
 */
export function substitutePlaceholders(text: string, values: ReadonlyMap<string, string>): string {
  let result = text;
  for (const [token, value] of values) {
    const position = result.indexOf(token);
    if (position !== -1) {
      // slice instead of String#replace, which would expand `$&` and friends in value
      result = result.slice(0, position) + value + result.slice(position + token.length);
    }
  }
  return result;
}
