/**
 * Schema retrieval heuristic: selects relevant tables/columns
 * for the reasoning prompt based on the user's question.
 */

import type { SchemaSnapshot, TableInfo, ColumnInfo } from '../db/types.js';

export interface SchemaContextOpts {
  maxTables?: number;
  maxColumnsPerTable?: number;
  /** Tables that are always included, ahead of the scored ones */
  includeTables?: string[];
}

interface ScoredTable {
  table: TableInfo;
  score: number;
  scoredColumns: Array<{ col: ColumnInfo; score: number }>;
}

/**
 * Tokenize a string: lowercase, split on non-alphanumeric (keeping underscores).
 */
function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 1);
}

/**
 * Score how well a name matches the question tokens.
 * Supports matching against underscore-separated parts too.
 */
function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const token of tokens) {
    if (lower === token) {
      score += 10;
    } else if (lower.includes(token)) {
      score += 5;
    } else if (parts.some((p) => p === token)) {
      score += 7;
    } else if (parts.some((p) => p.includes(token) || token.includes(p))) {
      score += 3;
    }
  }
  return score;
}

/**
 * Build a text schema context for the reasoning prompt.
 * Uses a token overlap heuristic to pick the most relevant tables;
 * each table lists its outgoing foreign keys.
 */
export function buildSchemaContext(
  question: string,
  schema: SchemaSnapshot,
  opts: SchemaContextOpts = {},
): string {
  const maxTables = opts.maxTables ?? 6;
  const maxCols = opts.maxColumnsPerTable ?? 20;
  const tokens = tokenize(question);

  // Score each table
  const scored: ScoredTable[] = schema.tables.map((table) => {
    let tableScore = scoreMatch(table.name, tokens);
    // Also score on schema name separately
    if (table.schema && table.schema !== 'main') {
      tableScore += scoreMatch(table.schema, tokens);
    }

    // Score each column
    const scoredColumns = table.columns.map((col) => ({
      col,
      score: scoreMatch(col.name, tokens),
    }));

    // Boost table score by its best column matches
    const colBoost = scoredColumns
      .map((sc) => sc.score)
      .sort((a, b) => b - a)
      .slice(0, 3)
      .reduce((sum, s) => sum + s, 0);

    return {
      table,
      score: tableScore + colBoost,
      scoredColumns,
    };
  });

  // Pinned tables first, then by score descending, take top K
  const pinned = new Set((opts.includeTables ?? []).map((t) => t.toLowerCase()));
  scored.sort((a, b) => {
    const pa = pinned.has(a.table.name.toLowerCase()) ? 1 : 0;
    const pb = pinned.has(b.table.name.toLowerCase()) ? 1 : 0;
    if (pa !== pb) return pb - pa;
    return b.score - a.score;
  });
  const selected = scored.slice(0, Math.max(maxTables, pinned.size));
  const selectedNames = new Set(selected.map((s) => s.table.name));

  // Build text output
  const lines: string[] = ['-- Database Schema (relevant subset)', ''];

  for (const entry of selected) {
    const t = entry.table;
    const fullName = t.schema && t.schema !== 'main' ? `${t.schema}.${t.name}` : t.name;
    lines.push(`TABLE ${fullName}`);

    // Sort columns: PK first, then by score, then alphabetical
    const cols = [...entry.scoredColumns]
      .sort((a, b) => {
        if (a.col.isPrimaryKey !== b.col.isPrimaryKey) return a.col.isPrimaryKey ? -1 : 1;
        if (b.score !== a.score) return b.score - a.score;
        return a.col.name.localeCompare(b.col.name);
      })
      .slice(0, maxCols);

    for (const { col } of cols) {
      const pk = col.isPrimaryKey ? ' PK' : '';
      const nullable = col.nullable ? ' NULL' : ' NOT NULL';
      lines.push(`  ${col.name} ${col.dataType}${nullable}${pk}`);
    }

    for (const fk of schema.foreignKeys) {
      if (fk.fromTable === t.name) {
        const note = selectedNames.has(fk.toTable) ? '' : ' (not shown)';
        lines.push(`  FK ${fk.fromColumn} -> ${fk.toTable}.${fk.toColumn}${note}`);
      }
    }

    if (t.rowCountEstimate !== undefined) {
      lines.push(`  -- ~${t.rowCountEstimate.toLocaleString()} rows`);
    }

    lines.push('');
  }

  return lines.join('\n');
}

/** One line per table: name and column names. Used before any table is chosen. */
export function buildSchemaOverview(schema: SchemaSnapshot): string {
  return schema.tables
    .map((t) => `${t.schema && t.schema !== 'main' ? `${t.schema}.` : ''}${t.name}(${t.columns.map((c) => c.name).join(', ')})`)
    .join('\n');
}
