/**
 * Constants
 *
 * Centralized configuration constants for SQL generation.
 */

// ============ Identifier Defaults ============

/**
 * Identifiers that collide with SQL grammar and must be quoted when used as
 * column names. Matched exactly and case-sensitively.
 */
export const RESERVED_KEYWORDS = ['DATE', 'USER', 'ORDER', 'GROUP', 'INDEX'] as const;

// ============ Date Defaults ============

export const DATE_DEFAULTS = {
  /** Format mask passed to Oracle's TO_TIMESTAMP */
  ORACLE_TIMESTAMP_FORMAT: 'YYYY-MM-DD HH24:MI:SS',
} as const;

// ============ Pagination Defaults ============

export const PAGINATION_DEFAULTS = {
  /** Limit sentinel; any negative limit renders no pagination */
  NO_LIMIT: -1,
  /** Offset sentinel; only offsets greater than zero are rendered */
  NO_OFFSET: -1,
} as const;

// ============ Logging Defaults ============

export const LOGGING_DEFAULTS = {
  PREFIX: '[sqlweave]',
} as const;
