import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { UnsupportedDialectError } from '../../errors';
import { DialectFactory } from '../dialect-factory';
import { MariaDBDialect } from '../mariadb-dialect';
import { OracleDialect } from '../oracle-dialect';
import { Dialect } from '../sql-dialect';

describe('MariaDBDialect', () => {
  let dialect: MariaDBDialect;

  beforeEach(() => {
    dialect = new MariaDBDialect();
  });

  describe('config', () => {
    it('should have correct name', () => {
      expect(dialect.name).toBe('mariadb');
      expect(dialect.name).toBe(Dialect.MariaDB);
    });

    it('should use backtick for identifier quote', () => {
      expect(dialect.config.identifierQuote).toBe('`');
    });

    it('should use LIMIT_OFFSET style', () => {
      expect(dialect.config.limitStyle).toBe('LIMIT_OFFSET');
    });

    it('should use FORCE_INDEX hints', () => {
      expect(dialect.config.indexHintStyle).toBe('FORCE_INDEX');
    });
  });

  describe('escapeIdentifier', () => {
    it('should wrap reserved keywords with backticks', () => {
      expect(dialect.escapeIdentifier('DATE')).toBe('`DATE`');
      expect(dialect.escapeIdentifier('USER')).toBe('`USER`');
      expect(dialect.escapeIdentifier('ORDER')).toBe('`ORDER`');
      expect(dialect.escapeIdentifier('GROUP')).toBe('`GROUP`');
      expect(dialect.escapeIdentifier('INDEX')).toBe('`INDEX`');
    });

    it('should leave other identifiers unchanged', () => {
      expect(dialect.escapeIdentifier('name')).toBe('name');
      expect(dialect.escapeIdentifier('users.id')).toBe('users.id');
    });

    it('should match case-sensitively', () => {
      expect(dialect.escapeIdentifier('date')).toBe('date');
      expect(dialect.escapeIdentifier('Order')).toBe('Order');
    });

    it('should not match substrings', () => {
      expect(dialect.escapeIdentifier('DATE_CREATED')).toBe('DATE_CREATED');
      expect(dialect.escapeIdentifier('USERS')).toBe('USERS');
    });
  });

  describe('quoteIdentifier', () => {
    it('should always quote', () => {
      expect(dialect.quoteIdentifier('users')).toBe('`users`');
    });
  });

  describe('formatDateTime', () => {
    it('should wrap the literal in single quotes', () => {
      expect(dialect.formatDateTime('2024-01-01 10:00:00')).toBe("'2024-01-01 10:00:00'");
    });

    it('should not validate the literal', () => {
      expect(dialect.formatDateTime('yesterday')).toBe("'yesterday'");
    });
  });

  describe('formatBoolean', () => {
    it('should use TRUE and FALSE', () => {
      expect(dialect.formatBoolean(true)).toBe('TRUE');
      expect(dialect.formatBoolean(false)).toBe('FALSE');
    });
  });

  describe('index hints', () => {
    it('should not emit an optimizer hint', () => {
      expect(dialect.optimizerHint('users', 'idx_name')).toBe('');
    });

    it('should emit FORCE INDEX after the table', () => {
      expect(dialect.tableHint('idx_name')).toBe(' FORCE INDEX(idx_name) ');
    });
  });

  describe('pagination', () => {
    it('should emit LIMIT only', () => {
      expect(dialect.pagination(10)).toBe(' LIMIT 10');
    });

    it('should emit LIMIT with OFFSET', () => {
      expect(dialect.pagination(10, 5)).toBe(' LIMIT 10 OFFSET 5');
    });

    it('should allow a zero limit', () => {
      expect(dialect.pagination(0)).toBe(' LIMIT 0');
    });

    it('should skip a zero offset', () => {
      expect(dialect.pagination(10, 0)).toBe(' LIMIT 10');
    });

    it('should skip a negative offset', () => {
      expect(dialect.pagination(10, -3)).toBe(' LIMIT 10');
    });

    it('should emit nothing for a negative limit, even with an offset', () => {
      expect(dialect.pagination(-1, 5)).toBe('');
    });
  });
});

describe('OracleDialect', () => {
  let dialect: OracleDialect;

  beforeEach(() => {
    dialect = new OracleDialect();
  });

  describe('config', () => {
    it('should have correct name', () => {
      expect(dialect.name).toBe('oracle');
    });

    it('should use double quote for identifier quote', () => {
      expect(dialect.config.identifierQuote).toBe('"');
    });

    it('should use FETCH_FIRST style', () => {
      expect(dialect.config.limitStyle).toBe('FETCH_FIRST');
    });

    it('should use OPTIMIZER_HINT hints', () => {
      expect(dialect.config.indexHintStyle).toBe('OPTIMIZER_HINT');
    });
  });

  describe('escapeIdentifier', () => {
    it('should wrap reserved keywords with double quotes', () => {
      expect(dialect.escapeIdentifier('DATE')).toBe('"DATE"');
      expect(dialect.escapeIdentifier('GROUP')).toBe('"GROUP"');
    });

    it('should leave other identifiers unchanged', () => {
      expect(dialect.escapeIdentifier('event_time')).toBe('event_time');
    });
  });

  describe('formatDateTime', () => {
    it('should wrap the literal in TO_TIMESTAMP', () => {
      expect(dialect.formatDateTime('2024-01-01 10:00:00')).toBe(
        "TO_TIMESTAMP('2024-01-01 10:00:00', 'YYYY-MM-DD HH24:MI:SS')",
      );
    });
  });

  describe('formatBoolean', () => {
    it('should use 1 and 0', () => {
      expect(dialect.formatBoolean(true)).toBe('1');
      expect(dialect.formatBoolean(false)).toBe('0');
    });
  });

  describe('index hints', () => {
    it('should emit an inline optimizer hint', () => {
      expect(dialect.optimizerHint('users', 'idx_name')).toBe(' /*+ INDEX(users, idx_name) */ ');
    });

    it('should not emit a table hint', () => {
      expect(dialect.tableHint('idx_name')).toBe('');
    });
  });

  describe('pagination', () => {
    it('should emit FETCH FIRST', () => {
      expect(dialect.pagination(10)).toBe(' FETCH FIRST 10 ROWS ONLY');
    });

    it('should never emit an offset', () => {
      expect(dialect.pagination(10, 5)).toBe(' FETCH FIRST 10 ROWS ONLY');
    });

    it('should emit nothing for a negative limit', () => {
      expect(dialect.pagination(-1)).toBe('');
    });
  });
});

describe('DialectFactory', () => {
  afterEach(() => {
    DialectFactory.clearCache();
  });

  describe('getDialect', () => {
    it('should return MariaDB dialect for mariadb', () => {
      expect(DialectFactory.getDialect('mariadb')).toBeInstanceOf(MariaDBDialect);
    });

    it('should return MariaDB dialect for mysql alias', () => {
      expect(DialectFactory.getDialect('mysql')).toBeInstanceOf(MariaDBDialect);
    });

    it('should return Oracle dialect for oracle', () => {
      expect(DialectFactory.getDialect('oracle')).toBeInstanceOf(OracleDialect);
    });

    it('should ignore case', () => {
      expect(DialectFactory.getDialect('MariaDB')).toBeInstanceOf(MariaDBDialect);
      expect(DialectFactory.getDialect('ORACLE')).toBeInstanceOf(OracleDialect);
    });

    it('should cache dialect instances', () => {
      const first = DialectFactory.getDialect('mariadb');
      const second = DialectFactory.getDialect('mysql');
      expect(first).toBe(second);
    });

    it('should throw for unsupported type', () => {
      expect(() => DialectFactory.getDialect('sqlite')).toThrow(UnsupportedDialectError);
      expect(() => DialectFactory.getDialect('sqlite')).toThrow('Unsupported dialect: sqlite');
    });
  });

  describe('createDialect', () => {
    it('should create new instance each time', () => {
      const first = DialectFactory.createDialect('oracle');
      const second = DialectFactory.createDialect('oracle');
      expect(first).not.toBe(second);
    });
  });

  describe('clearCache', () => {
    it('should drop cached instances', () => {
      const first = DialectFactory.getDialect('oracle');
      DialectFactory.clearCache();
      expect(DialectFactory.getDialect('oracle')).not.toBe(first);
    });
  });

  describe('isSupported', () => {
    it('should return true for supported types', () => {
      expect(DialectFactory.isSupported('mariadb')).toBe(true);
      expect(DialectFactory.isSupported('mysql')).toBe(true);
      expect(DialectFactory.isSupported('oracle')).toBe(true);
    });

    it('should ignore case like getDialect', () => {
      expect(DialectFactory.isSupported('MariaDB')).toBe(true);
      expect(DialectFactory.isSupported('ORACLE')).toBe(true);
      expect(() => DialectFactory.getDialect('MariaDB')).not.toThrow();
    });

    it('should return false for unsupported types', () => {
      expect(DialectFactory.isSupported('postgresql')).toBe(false);
      expect(DialectFactory.isSupported('')).toBe(false);
    });
  });
});
