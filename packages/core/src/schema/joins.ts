/**
 * Pattern-based join extraction.
 *
 * Finds column-to-column equalities between two different table references
 * (`JOIN ... ON a.x = b.y` and implicit `WHERE a.x = b.y`) and resolves
 * aliases declared in FROM and JOIN clauses.
 *
 * Limitations: aliases of subqueries and CTEs are not resolved to tables,
 * and multi-column joins are reported one equality at a time.
 */

export interface JoinCondition {
  leftTable: string;
  leftColumn: string;
  rightTable: string;
  rightColumn: string;
  /** `leftTable.leftColumn = rightTable.rightColumn` with aliases resolved */
  text: string;
  /** The equality as written */
  original: string;
}

const RESERVED = new Set([
  'ON', 'USING', 'WHERE', 'GROUP', 'ORDER', 'LIMIT', 'HAVING', 'JOIN', 'INNER', 'LEFT', 'RIGHT',
  'FULL', 'OUTER', 'CROSS', 'NATURAL', 'UNION', 'EXCEPT', 'INTERSECT', 'AS', 'SELECT', 'FROM',
  'OFFSET', 'WINDOW', 'AND', 'OR', 'SET', 'VALUES', 'WITH', 'LATERAL',
]);

const FROM_LIST =
  /\bFROM\s+([\s\S]*?)(?=\bWHERE\b|\bGROUP\b|\bORDER\b|\bLIMIT\b|\bHAVING\b|\bUNION\b|\b(?:INNER|LEFT|RIGHT|FULL|CROSS|NATURAL|JOIN)\b|[();]|$)/gi;
const JOIN_TARGET = /\bJOIN\s+([A-Za-z_][\w.]*)(?:\s+(?:AS\s+)?([A-Za-z_]\w*))?/gi;
const EQUALITY = /\b([A-Za-z_]\w*)\.([A-Za-z_]\w*)\s*=\s*([A-Za-z_]\w*)\.([A-Za-z_]\w*)\b/g;

/**
 * Remove comments, blank out string literals and unquote identifiers,
 * so the patterns below only see SQL structure.
 */
export function normalizeSqlText(sql: string): string {
  return sql
    .replace(/--[^\n]*/g, ' ')
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/'(?:[^']|'')*'/g, "''")
    .replace(/"([^"]+)"/g, '$1')
    .replace(/`([^`]+)`/g, '$1')
    .replace(/\[([^\]]+)\]/g, '$1');
}

function bareName(name: string): string {
  return name.includes('.') ? name.slice(name.lastIndexOf('.') + 1) : name;
}

/** Alias (lowercase) to table name, including each table's own name. */
export function collectAliases(normalizedSql: string): Map<string, string> {
  const aliases = new Map<string, string>();
  const register = (table: string, alias?: string): void => {
    const name = bareName(table);
    aliases.set(name.toLowerCase(), name);
    if (alias && !RESERVED.has(alias.toUpperCase())) {
      aliases.set(alias.toLowerCase(), name);
    }
  };

  for (const match of normalizedSql.matchAll(FROM_LIST)) {
    for (const item of (match[1] ?? '').split(',')) {
      const ref = /^\s*([A-Za-z_][\w.]*)(?:\s+(?:AS\s+)?([A-Za-z_]\w*))?\s*$/i.exec(item);
      if (ref?.[1]) register(ref[1], ref[2]);
    }
  }
  for (const match of normalizedSql.matchAll(JOIN_TARGET)) {
    if (match[1]) register(match[1], match[2]);
  }
  return aliases;
}

export function extractJoinConditions(sql: string): JoinCondition[] {
  const normalized = normalizeSqlText(sql);
  const aliases = collectAliases(normalized);
  const resolve = (qualifier: string): string => aliases.get(qualifier.toLowerCase()) ?? qualifier;

  const seen = new Set<string>();
  const conditions: JoinCondition[] = [];
  for (const match of normalized.matchAll(EQUALITY)) {
    const [original, q1 = '', c1 = '', q2 = '', c2 = ''] = match;
    // Same qualifier on both sides is a row filter, not a join.
    if (q1.toLowerCase() === q2.toLowerCase()) continue;

    const leftTable = resolve(q1);
    const rightTable = resolve(q2);
    const text = `${leftTable}.${c1} = ${rightTable}.${c2}`;
    const key = text.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    conditions.push({ leftTable, leftColumn: c1, rightTable, rightColumn: c2, text, original });
  }
  return conditions;
}
