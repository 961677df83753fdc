/**
 * Dialect Factory
 *
 * Creates the SQL dialect for a dialect name or one of its aliases.
 */

import { UnsupportedDialectError } from '../errors';

import { MariaDBDialect } from './mariadb-dialect';
import { OracleDialect } from './oracle-dialect';
import { Dialect } from './sql-dialect';

import type { SQLDialect } from './sql-dialect';

const dialectCache = new Map<Dialect, SQLDialect>();

export class DialectFactory {
  /**
   * Get dialect for database type (cached)
   */
  static getDialect(type: string): SQLDialect {
    const normalizedType = this.normalizeType(type);

    const cached = dialectCache.get(normalizedType);
    if (cached) {
      return cached;
    }

    const dialect = this.createDialect(normalizedType);
    dialectCache.set(normalizedType, dialect);
    return dialect;
  }

  /**
   * Create new dialect instance (not cached)
   */
  static createDialect(type: string): SQLDialect {
    switch (this.normalizeType(type)) {
      case Dialect.MariaDB: {
        return new MariaDBDialect();
      }
      case Dialect.Oracle: {
        return new OracleDialect();
      }
    }
  }

  /**
   * Normalize database type aliases
   */
  private static normalizeType(type: string): Dialect {
    switch (type.toLowerCase()) {
      case 'mariadb':
      case 'mysql': {
        return Dialect.MariaDB;
      }
      case 'oracle': {
        return Dialect.Oracle;
      }
      default: {
        throw new UnsupportedDialectError(type);
      }
    }
  }

  /**
   * Check if database type is supported, ignoring case like getDialect()
   */
  static isSupported(type: string): boolean {
    return ['mariadb', 'mysql', 'oracle'].includes(type.toLowerCase());
  }

  /**
   * Clear dialect cache (useful for testing)
   */
  static clearCache(): void {
    dialectCache.clear();
  }
}
