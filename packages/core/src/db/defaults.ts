/**
 * Safe session defaults for query execution.
 * These are conservative limits enforced by the adapters.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on returned rows regardless of query LIMIT */
  maxRows: 1000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** SQLite busy timeout in milliseconds */
  busyTimeoutMs: 5_000,
} as const;
