/**
 * MariaDB Dialect Implementation
 *
 * Handles MariaDB/MySQL-specific SQL syntax:
 * - Backtick (`) quoting of reserved identifiers
 * - FORCE INDEX(...) after the table name
 * - LIMIT n OFFSET m pagination
 * - Single-quoted date/time literals
 */

import { Dialect, SQLDialect } from './sql-dialect';

import type { DialectConfig } from './sql-dialect';

export class MariaDBDialect extends SQLDialect {
  readonly name = Dialect.MariaDB;

  readonly config: DialectConfig = {
    identifierQuote: '`',
    indexHintStyle: 'FORCE_INDEX',
    limitStyle: 'LIMIT_OFFSET',
    booleanLiterals: { true: 'TRUE', false: 'FALSE' },
    dateTimeLiteral: (value: string) => `'${value}'`,
  };
}
