/**
 * SQL Dialect Abstraction Layer
 *
 * @module dialect
 */

export { SQLDialect, Dialect, type DialectConfig } from './sql-dialect';
export { MariaDBDialect } from './mariadb-dialect';
export { OracleDialect } from './oracle-dialect';
export { DialectFactory } from './dialect-factory';
