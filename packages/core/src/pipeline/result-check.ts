/**
 * Deterministic sanity check of an execution result.
 * Findings are warnings only; they never change the outcome.
 */

import type { ExecuteResult } from '../db/types.js';

const AGGREGATE_NAME = /count|sum|total|avg|average|amount|revenue|quantity|qty/i;

function valueType(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return 'date';
  if (Buffer.isBuffer(value)) return 'blob';
  return typeof value;
}

export function checkResult(result: ExecuteResult, rowLimitCap: number): string[] {
  const warnings: string[] = [];

  if (result.rowCount === 0) {
    warnings.push('Query returned no rows.');
    return warnings;
  }

  if (result.truncated || result.rowCount >= rowLimitCap) {
    warnings.push(`Result reached the row cap of ${rowLimitCap}; more rows may exist.`);
  }

  for (const column of result.columns) {
    const types = new Set<string>();
    let negatives = 0;
    for (const row of result.rows) {
      const value = row[column];
      const type = valueType(value);
      if (type) types.add(type);
      if (typeof value === 'number' && value < 0) negatives++;
    }

    if (negatives > 0 && AGGREGATE_NAME.test(column)) {
      warnings.push(`Column ${column} has ${negatives} negative value${negatives === 1 ? '' : 's'}.`);
    }
    if (types.size > 1) {
      warnings.push(`Column ${column} mixes value types: ${[...types].sort().join(', ')}.`);
    }
  }

  return warnings;
}
