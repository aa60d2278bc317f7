/**
 * SQLite adapter.
 * Uses better-sqlite3 on a read-only handle; writes fail at the driver even if one slipped past the gate.
 */

import Database from 'better-sqlite3';
import { SAFE_DEFAULTS } from '../defaults.js';
import { ExecutionError, describeError } from '../../errors.js';
import type {
  ExecuteLimits,
  ExecuteResult,
  ExecutionAdapter,
  ForeignKeyInfo,
  SchemaSnapshot,
  TableInfo,
} from '../types.js';

export interface SqliteConnectionConfig {
  filepath: string;
  busyTimeoutMs?: number;
}

interface TableInfoRow {
  name: string;
  type: string;
  notnull: 0 | 1;
  pk: number;
  dflt_value: string | null;
}

interface ForeignKeyRow {
  table: string;
  from: string;
  to: string | null;
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class SqliteAdapter implements ExecutionAdapter {
  readonly dialect = 'sqlite' as const;
  private readonly db: Database.Database;

  constructor(cfg: SqliteConnectionConfig) {
    if (!cfg.filepath?.trim()) {
      throw new Error('SQLite database path is required.');
    }
    this.db = new Database(cfg.filepath, {
      readonly: true,
      fileMustExist: true,
      timeout: cfg.busyTimeoutMs ?? SAFE_DEFAULTS.busyTimeoutMs,
    });
  }

  async execute(sql: string, limits: ExecuteLimits = {}): Promise<ExecuteResult> {
    const maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;
    try {
      const start = performance.now();
      const stmt = this.db.prepare<unknown[], Record<string, unknown>>(sql);
      if (!stmt.reader) {
        throw new Error('Statement does not return rows.');
      }

      const rows: Record<string, unknown>[] = [];
      let truncated = false;
      for (const row of stmt.iterate()) {
        if (rows.length >= maxRows) {
          truncated = true;
          break;
        }
        rows.push(row);
      }
      const execMs = Math.round(performance.now() - start);
      return {
        columns: stmt.columns().map((column) => column.name),
        rows,
        rowCount: rows.length,
        truncated,
        execMs,
      };
    } catch (err: unknown) {
      throw new ExecutionError(describeError(err), sql, err);
    }
  }

  async sample(table: string, limit: number): Promise<ExecuteResult> {
    return this.execute(`SELECT * FROM ${quoteIdent(table)} LIMIT ${Math.max(0, Math.floor(limit))}`);
  }

  async introspect(): Promise<SchemaSnapshot> {
    const tables = this.db
      .prepare<[], { name: string }>(`
        SELECT name
        FROM sqlite_master
        WHERE type = 'table'
          AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `)
      .all();

    const tableInfos: TableInfo[] = [];
    const foreignKeys: ForeignKeyInfo[] = [];
    for (const { name: tableName } of tables) {
      const columns = this.db
        .prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdent(tableName)})`)
        .all();

      const countRow = this.db
        .prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${quoteIdent(tableName)}`)
        .get();

      tableInfos.push({
        name: tableName,
        schema: 'main',
        rowCountEstimate: Number(countRow?.c ?? 0),
        columns: columns.map((column) => ({
          name: column.name,
          dataType: column.type || 'TEXT',
          nullable: column.notnull === 0,
          isPrimaryKey: column.pk > 0,
          defaultValue: column.dflt_value ?? undefined,
        })),
      });

      const fkRows = this.db
        .prepare<[], ForeignKeyRow>(`PRAGMA foreign_key_list(${quoteIdent(tableName)})`)
        .all();
      for (const fk of fkRows) {
        // A NULL target column means the parent's primary key.
        const toColumn = fk.to ?? this.primaryKeyOf(fk.table);
        if (!toColumn) continue;
        foreignKeys.push({
          fromTable: tableName,
          fromColumn: fk.from,
          toTable: fk.table,
          toColumn,
        });
      }
    }

    return {
      tables: tableInfos,
      foreignKeys,
      capturedAt: new Date(),
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private primaryKeyOf(table: string): string | undefined {
    const columns = this.db
      .prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdent(table)})`)
      .all();
    return columns.find((column) => column.pk === 1)?.name;
  }
}
