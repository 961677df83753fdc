/**
 * SQL Dialect Base Class
 *
 * Provides dialect-specific rendering for the pieces of a SELECT statement
 * that differ between databases: identifier quoting, index hints,
 * pagination and date/time literals.
 *
 * Subclasses only supply a name and a config; every formatting decision is a
 * switch over the config, so a dialect is effectively a tagged value.
 */

import { PAGINATION_DEFAULTS, RESERVED_KEYWORDS } from '../constants';

export const Dialect = {
  MariaDB: 'mariadb',
  Oracle: 'oracle',
} as const;

export type Dialect = (typeof Dialect)[keyof typeof Dialect];

export interface DialectConfig {
  /** Character used to quote reserved identifiers (` for MariaDB, " for Oracle) */
  identifierQuote: string;
  /**
   * Where an index hint goes:
   * - FORCE_INDEX: `FORCE INDEX(idx)` after the table name
   * - OPTIMIZER_HINT: `/*+ INDEX(table, idx) *\/` right after SELECT
   */
  indexHintStyle: 'FORCE_INDEX' | 'OPTIMIZER_HINT';
  /** Limit/offset syntax style */
  limitStyle: 'LIMIT_OFFSET' | 'FETCH_FIRST';
  /** Boolean literal values */
  booleanLiterals: { true: string; false: string };
  /** Wraps a date/time literal; purely textual, the value is not checked */
  dateTimeLiteral: (value: string) => string;
}

const reservedKeywords: ReadonlySet<string> = new Set<string>(RESERVED_KEYWORDS);

export abstract class SQLDialect {
  abstract readonly name: Dialect;
  abstract readonly config: DialectConfig;

  /**
   * Check whether a token is a reserved keyword (exact, case-sensitive)
   */
  isReservedKeyword(identifier: string): boolean {
    return reservedKeywords.has(identifier);
  }

  /**
   * Unconditionally quote an identifier
   */
  quoteIdentifier(identifier: string): string {
    const quote = this.config.identifierQuote;
    return `${quote}${identifier}${quote}`;
  }

  /**
   * Quote an identifier only when it is a reserved keyword
   */
  escapeIdentifier(identifier: string): string {
    return this.isReservedKeyword(identifier) ? this.quoteIdentifier(identifier) : identifier;
  }

  formatDateTime(value: string): string {
    return this.config.dateTimeLiteral(value);
  }

  formatBoolean(value: boolean): string {
    return value ? this.config.booleanLiterals.true : this.config.booleanLiterals.false;
  }

  /**
   * Hint emitted between `SELECT ` and the column list, or '' when the
   * dialect places its hint elsewhere
   */
  optimizerHint(table: string, indexName: string): string {
    switch (this.config.indexHintStyle) {
      case 'OPTIMIZER_HINT': {
        return ` /*+ INDEX(${table}, ${indexName}) */ `;
      }
      case 'FORCE_INDEX': {
        return '';
      }
    }
  }

  /**
   * Hint emitted right after the table name, or '' when the dialect places
   * its hint elsewhere
   */
  tableHint(indexName: string): string {
    switch (this.config.indexHintStyle) {
      case 'FORCE_INDEX': {
        return ` FORCE INDEX(${indexName}) `;
      }
      case 'OPTIMIZER_HINT': {
        return '';
      }
    }
  }

  /**
   * Render the pagination tail. A negative limit disables pagination
   * entirely, including any offset.
   */
  pagination(limit: number, offset: number = PAGINATION_DEFAULTS.NO_OFFSET): string {
    if (limit < 0) {
      return '';
    }

    switch (this.config.limitStyle) {
      case 'LIMIT_OFFSET': {
        return offset > 0 ? ` LIMIT ${limit} OFFSET ${offset}` : ` LIMIT ${limit}`;
      }
      case 'FETCH_FIRST': {
        // No offset form is emitted for this style
        return ` FETCH FIRST ${limit} ROWS ONLY`;
      }
    }
  }
}
