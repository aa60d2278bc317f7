/**
 * Deterministic text rules of the safety gate.
 *
 * Rules read the candidate with string literals and comments blanked out,
 * so a keyword inside a value (`WHERE note = 'drop me'`) never trips them.
 */

import type { RuleViolation } from './types.js';

/** Blank out comments, string literals and quoted identifiers, keeping positions roughly intact. */
export function maskSql(sql: string): string {
  return sql
    .replace(/--[^\n]*/g, ' ')
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/'(?:[^']|'')*'/g, "''")
    .replace(/"(?:[^"]|"")*"/g, '""');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Rule 1: exactly one SELECT/WITH statement and no forbidden keyword. */
export function checkStatement(masked: string, forbiddenKeywords: string[]): RuleViolation[] {
  const body = masked.trim().replace(/;+\s*$/, '').trim();
  if (!body) {
    return [{ rule: 'forbidden_statement', reason: 'Empty SQL statement.' }];
  }

  const violations: RuleViolation[] = [];
  if (body.includes(';')) {
    violations.push({
      rule: 'forbidden_statement',
      reason: 'Multiple statements detected. Only a single statement is allowed.',
      suggestedFix: 'Return one SELECT statement.',
    });
  }

  if (!/^(SELECT|WITH)\b/i.test(body)) {
    violations.push({
      rule: 'forbidden_statement',
      reason: 'Statement must start with SELECT or WITH.',
      suggestedFix: 'Rewrite as a read-only SELECT query.',
    });
  } else if (/^WITH\b/i.test(body) && !/\bSELECT\b/i.test(body)) {
    violations.push({ rule: 'forbidden_statement', reason: 'CTE must contain a SELECT.' });
  }

  const found = forbiddenKeywords.filter((kw) => new RegExp(`\\b${escapeRegExp(kw)}\\b`, 'i').test(body));
  if (found.length > 0) {
    violations.push({
      rule: 'forbidden_statement',
      reason: `Statement contains forbidden keyword${found.length > 1 ? 's' : ''}: ${found.join(', ')}.`,
      suggestedFix: 'Only read-only SELECT queries are allowed.',
    });
  }
  return violations;
}

/** Rule 2: no bare `*` in a select list. `COUNT(*)` and `t.*` are fine. */
export function checkWildcard(masked: string): RuleViolation[] {
  if (/(?:\bSELECT\s+(?:(?:DISTINCT|ALL)\s+)?|,\s*)\*/i.test(masked)) {
    return [
      {
        rule: 'unqualified_wildcard',
        reason: 'SELECT * is not allowed.',
        suggestedFix: 'List the needed columns explicitly.',
      },
    ];
  }
  return [];
}

/** Offsets of `LIMIT` keywords outside any parentheses. */
function topLevelLimitOffsets(masked: string): number[] {
  const offsets: number[] = [];
  let depth = 0;
  for (let i = 0; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === '(') depth++;
    else if (ch === ')') depth = Math.max(0, depth - 1);
    else if (depth === 0 && /^LIMIT\b/i.test(masked.slice(i, i + 6)) && (i === 0 || /\W/.test(masked[i - 1] ?? ' '))) {
      offsets.push(i);
    }
  }
  return offsets;
}

export type LimitValue =
  | { kind: 'missing' }
  | { kind: 'count'; value: number }
  | { kind: 'unbounded'; raw: string };

/** Row count of the outermost LIMIT. `LIMIT offset, count` reads the count. */
export function readOuterLimit(masked: string): LimitValue {
  const offsets = topLevelLimitOffsets(masked);
  const last = offsets[offsets.length - 1];
  if (last === undefined) return { kind: 'missing' };

  const tail = masked.slice(last + 'LIMIT'.length);
  const match = /^\s*([^\s,;)]+)(?:\s*,\s*([^\s,;)]+))?/.exec(tail);
  const raw = (match?.[2] ?? match?.[1] ?? '').trim();
  if (!/^\d+$/.test(raw)) return { kind: 'unbounded', raw: raw || '(none)' };
  return { kind: 'count', value: Number.parseInt(raw, 10) };
}

/** Rule 3: an outer LIMIT no larger than the cap. */
export function checkLimit(masked: string, rowLimitCap: number): RuleViolation[] {
  const limit = readOuterLimit(masked);
  switch (limit.kind) {
    case 'missing':
      return [
        {
          rule: 'missing_limit',
          reason: 'Query has no LIMIT clause.',
          suggestedFix: `Add LIMIT n with n ≤ ${rowLimitCap}.`,
        },
      ];
    case 'unbounded':
      return [
        {
          rule: 'unbounded_limit',
          reason: `LIMIT ${limit.raw} is not a bounded literal row count.`,
          suggestedFix: `Use LIMIT n with a literal n ≤ ${rowLimitCap}.`,
        },
      ];
    case 'count':
      if (limit.value > rowLimitCap) {
        return [
          {
            rule: 'unbounded_limit',
            reason: `LIMIT ${limit.value} exceeds the cap of ${rowLimitCap}.`,
            suggestedFix: `Lower the LIMIT to ${rowLimitCap} or less.`,
          },
        ];
      }
      return [];
  }
}
