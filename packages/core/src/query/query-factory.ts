/**
 * Query Builder Factory
 *
 * @example
 * ```typescript
 * const sql = createQueryBuilder('oracle', { strict: true })
 *   .select(['id', 'USER'])
 *   .from('accounts')
 *   .limit(20)
 *   .render();
 * // SELECT id, "USER" FROM accounts FETCH FIRST 20 ROWS ONLY
 * ```
 */

import { QueryBuilder } from './query-builder';

import type { Dialect, SQLDialect } from '../dialect/sql-dialect';
import type { QueryBuilderOptions } from './query-builder';

export function createQueryBuilder(
  dialect: Dialect | string | SQLDialect,
  options: QueryBuilderOptions = {},
): QueryBuilder {
  return new QueryBuilder(dialect, options);
}
