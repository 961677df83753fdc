/**
 * Query Builder Module
 *
 * @module query
 */

export {
  QueryBuilder,
  type ConditionList,
  type WhereConditions,
  type QueryBuilderOptions,
} from './query-builder';
export {
  isSqlLiteral,
  toPlaceholderText,
  substitutePlaceholders,
  type SqlLiteral,
  type PlaceholderValue,
} from './placeholder-values';
export { createQueryBuilder } from './query-factory';
