/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

const MAX_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  // Calculate column widths
  const widths = columns.map((col) => Math.min(col.length, MAX_WIDTH));
  for (const row of rows) {
    columns.forEach((col, i) => {
      widths[i] = Math.min(Math.max(widths[i] ?? 0, formatValue(row[col]).length), MAX_WIDTH);
    });
  }

  const cell = (text: string, width: number): string =>
    text.length > width ? `${text.slice(0, width - 1)}…` : text.padEnd(width);

  const lines: string[] = [];
  lines.push(columns.map((col, i) => cell(col, widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of rows) {
    lines.push(columns.map((col, i) => cell(formatValue(row[col]), widths[i] ?? 0)).join(' | '));
  }

  return lines.join('\n');
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
