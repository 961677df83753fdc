/**
 * Query Builder
 *
 * Fluent builder for SELECT statements. Every call renders its fragment
 * immediately; only placeholder substitution waits until render().
 *
 * @example
 * ```typescript
 * const sql = new QueryBuilder(Dialect.MariaDB)
 *   .select(['id', 'name', 'DATE'])
 *   .distinct()
 *   .from('users')
 *   .useIndex('idx_users_name')
 *   .whereWithPlaceholder([['join_date', '?joindate']])
 *   .setValue('?joindate', 'SYSDATE')
 *   .innerJoin('orders', 'users.id = orders.user_id')
 *   .orderBy('name')
 *   .limit(10)
 *   .offset(5)
 *   .render();
 * ```
 */

import { PAGINATION_DEFAULTS } from '../constants';
import { DialectFactory } from '../dialect/dialect-factory';
import { SQLDialect } from '../dialect/sql-dialect';
import { QueryBuildError } from '../errors';
import { validateFiniteNumber, validatePaginationValue } from '../utils';

import { substitutePlaceholders, toPlaceholderText } from './placeholder-values';

import type { Dialect } from '../dialect/sql-dialect';
import type { Logger } from '../types';
import type { PlaceholderValue } from './placeholder-values';

/** Ordered `[column, value]` pairs */
export type ConditionList = ReadonlyArray<readonly [column: string, value: string]>;

/** Pairs as a list, or as an object whose key order is the condition order */
export type WhereConditions = ConditionList | Readonly<Record<string, string>>;

export interface QueryBuilderOptions {
  /** Receives warnings from the mutators; render() never logs */
  logger?: Logger;
  /**
   * Throw from render() on a missing table, unresolved placeholders or
   * non-integer pagination instead of emitting the text as-is
   */
  strict?: boolean;
}

function isConditionList(conditions: WhereConditions): conditions is ConditionList {
  return Array.isArray(conditions);
}

function toConditionPairs(conditions: WhereConditions): ConditionList {
  return isConditionList(conditions) ? conditions : Object.entries(conditions);
}

export class QueryBuilder {
  readonly dialect: SQLDialect;

  private readonly logger?: Logger;
  private readonly strict: boolean;

  // ============ Selection State ============
  private readonly _columns: string[] = [];
  private _table = '';
  private _distinct = false;

  // ============ Clause State ============
  private readonly _where: string[] = [];
  private readonly _joins: string[] = [];
  private _orderBy = '';
  private _indexHint = '';

  // ============ Pagination State ============
  private _limit: number = PAGINATION_DEFAULTS.NO_LIMIT;
  private _offset: number = PAGINATION_DEFAULTS.NO_OFFSET;

  // ============ Placeholder State ============
  private readonly _values = new Map<string, string>();
  private readonly _placeholders: string[] = [];

  constructor(dialect: Dialect | string | SQLDialect, options: QueryBuilderOptions = {}) {
    this.dialect = dialect instanceof SQLDialect ? dialect : DialectFactory.getDialect(dialect);
    this.logger = options.logger;
    this.strict = options.strict ?? false;
  }

  // ============ Selection Methods ============

  /**
   * Add columns to the selection (cumulative)
   */
  select(columns: readonly string[]): this {
    for (const column of columns) {
      this._columns.push(this.dialect.escapeIdentifier(column));
    }
    return this;
  }

  /**
   * Set FROM table, verbatim
   */
  from(table: string): this {
    if (!table) {
      this.logger?.warn('Empty table name; the query will render without a table');
    }
    this._table = table;
    return this;
  }

  distinct(): this {
    this._distinct = true;
    return this;
  }

  // ============ WHERE Methods ============

  /**
   * Add `column = value` conditions, ANDed together at render time.
   * With `isDateTime`, each value is wrapped as a dialect date/time literal;
   * otherwise it is used verbatim.
   */
  where(conditions: WhereConditions, isDateTime = false): this {
    for (const [column, value] of toConditionPairs(conditions)) {
      const formatted = isDateTime ? this.dialect.formatDateTime(value) : value;
      this._where.push(`${this.dialect.escapeIdentifier(column)} = ${formatted}`);
    }
    return this;
  }

  /**
   * Add `column = token` conditions whose tokens are resolved by setValue()
   */
  whereWithPlaceholder(conditions: WhereConditions): this {
    for (const [column, token] of toConditionPairs(conditions)) {
      this._where.push(`${this.dialect.escapeIdentifier(column)} = ${token}`);
      if (!this._placeholders.includes(token)) {
        this._placeholders.push(token);
      }
    }
    return this;
  }

  /**
   * Bind a value to a placeholder token; the last value bound wins
   */
  setValue(token: string, value: PlaceholderValue): this {
    if (this.strict && typeof value === 'number') {
      validateFiniteNumber(value, 'value');
    }
    if (!this._placeholders.includes(token)) {
      // May still be registered later; substitution happens at render time
      this.logger?.debug(`Value bound to unregistered placeholder ${token}`);
    }
    this._values.set(token, toPlaceholderText(value, this.dialect));
    return this;
  }

  // ============ JOIN Methods ============

  innerJoin(table: string, onCondition: string): this {
    this._joins.push(`INNER JOIN ${table} ON ${onCondition}`);
    return this;
  }

  // ============ Ordering & Hints ============

  /**
   * Set the single ORDER BY column; a later call replaces it
   */
  orderBy(column: string, ascending = true): this {
    this._orderBy = `${this.dialect.escapeIdentifier(column)} ${ascending ? 'ASC' : 'DESC'}`;
    return this;
  }

  useIndex(indexName: string): this {
    this._indexHint = indexName;
    return this;
  }

  // ============ Pagination ============

  /**
   * Negative values render no pagination at all
   */
  limit(value: number): this {
    this.warnIfFractional(value, 'limit');
    this._limit = value;
    return this;
  }

  offset(value: number): this {
    this.warnIfFractional(value, 'offset');
    this._offset = value;
    return this;
  }

  // ============ Introspection ============

  /**
   * Placeholder tokens registered through whereWithPlaceholder(), in order
   */
  placeholders(): string[] {
    return [...this._placeholders];
  }

  unresolvedPlaceholders(): string[] {
    return this._placeholders.filter((token) => !this._values.has(token));
  }

  // ============ Rendering ============

  /**
   * Render the statement. A pure function of builder state: nothing is
   * logged or mutated, so repeated calls return the same text. In strict
   * mode incomplete state throws instead.
   */
  render(): string {
    const sql = this.compose();
    if (this.strict) {
      this.assertComplete(sql);
    }
    return sql;
  }

  /**
   * Alias for render()
   */
  build(): string {
    return this.render();
  }

  /**
   * The current text without strict checks, so a builder can be
   * interpolated into messages whatever its state
   */
  toString(): string {
    return this.compose();
  }

  private compose(): string {
    const parts: string[] = ['SELECT '];

    if (this._indexHint) {
      parts.push(this.dialect.optimizerHint(this._table, this._indexHint));
    }

    if (this._columns.length === 0) {
      parts.push('*');
    } else {
      if (this._distinct) {
        parts.push(' DISTINCT  ');
      }
      parts.push(this._columns.join(', '));
    }

    parts.push(` FROM ${this._table}`);

    if (this._indexHint) {
      parts.push(this.dialect.tableHint(this._indexHint));
    }

    for (const join of this._joins) {
      parts.push(` ${join}`);
    }

    if (this._where.length > 0) {
      parts.push(` WHERE ${substitutePlaceholders(this._where.join(' AND '), this._values)}`);
    }

    if (this._orderBy) {
      parts.push(` ORDER BY ${this._orderBy}`);
    }

    parts.push(this.dialect.pagination(this._limit, this._offset));

    return parts.join('');
  }

  private assertComplete(sql: string): void {
    if (!this._table) {
      throw new QueryBuildError('Cannot render a query without a table', 'MISSING_TABLE', sql);
    }
    const unresolved = this.unresolvedPlaceholders();
    if (unresolved.length > 0) {
      throw new QueryBuildError(
        `Unresolved placeholders: ${unresolved.join(', ')}`,
        'UNRESOLVED_PLACEHOLDER',
        sql,
      );
    }
    validatePaginationValue(this._limit, 'limit');
    validatePaginationValue(this._offset, 'offset');
  }

  private warnIfFractional(value: number, field: 'limit' | 'offset'): void {
    if (!this.strict && !Number.isInteger(value)) {
      this.logger?.warn(`${field} is not an integer and will render as ${value}`);
    }
  }
}
