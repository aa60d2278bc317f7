/**
 * AST parse of a candidate, used as a second opinion next to the text rules.
 * Uses node-sql-parser with the target database's dialect.
 *
 * Generated SQL often uses syntax a dialect grammar does not cover, so a
 * failed parse is reported, never treated as a violation by itself.
 */

import pkg from 'node-sql-parser';
import type { Dialect } from '../db/types.js';

const { Parser } = pkg;

const parser = new Parser();

const DIALECT_OPTIONS: Record<Dialect, { database: string }> = {
  sqlite: { database: 'sqlite' },
  postgres: { database: 'PostgresQL' },
};

export type SqlKind =
  | 'select'
  | 'insert'
  | 'replace'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

export interface ParseResult {
  /** Number of statements found */
  statementCount: number;
  /** Kind of the first statement */
  kind: SqlKind;
  /** Kinds of every statement, in order */
  kinds: SqlKind[];
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

function kindOf(statement: unknown): SqlKind {
  if (typeof statement !== 'object' || statement === null || !('type' in statement)) return 'unknown';
  const rawKind = String(statement.type).toLowerCase();
  return KNOWN_KINDS.find((kind) => kind === rawKind) ?? 'unknown';
}

/**
 * Parse a SQL string into an AST using the given dialect.
 * Returns a structured result or a parse error.
 */
export function parseSql(sql: string, dialect: Dialect = 'sqlite'): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult: unknown = parser.astify(normalizedSql, DIALECT_OPTIONS[dialect]);
    const statements: unknown[] = Array.isArray(astResult) ? astResult : [astResult];

    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }

    const kinds = statements.map(kindOf);
    return {
      ok: true,
      statementCount: statements.length,
      kind: kinds[0] ?? 'unknown',
      kinds,
      normalizedSql,
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}
