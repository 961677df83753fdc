/**
 * Oracle Dialect Implementation
 *
 * Handles Oracle-specific SQL syntax:
 * - Double-quote (") quoting of reserved identifiers
 * - Inline optimizer hint comments for index selection
 * - FETCH FIRST n ROWS ONLY pagination
 * - TO_TIMESTAMP(...) date/time literals
 */

import { DATE_DEFAULTS } from '../constants';

import { Dialect, SQLDialect } from './sql-dialect';

import type { DialectConfig } from './sql-dialect';

export class OracleDialect extends SQLDialect {
  readonly name = Dialect.Oracle;

  readonly config: DialectConfig = {
    identifierQuote: '"',
    indexHintStyle: 'OPTIMIZER_HINT',
    limitStyle: 'FETCH_FIRST',
    // Oracle has no boolean column type before 23c
    booleanLiterals: { true: '1', false: '0' },
    dateTimeLiteral: (value: string) =>
      `TO_TIMESTAMP('${value}', '${DATE_DEFAULTS.ORACLE_TIMESTAMP_FORMAT}')`,
  };
}
