/**
 * Postgres adapter.
 * Uses the `pg` driver with strict safety defaults.
 */

import pg from 'pg';
import { SAFE_DEFAULTS } from '../defaults.js';
import { ExecutionError, describeError } from '../../errors.js';
import { silentLogger, type Logger } from '../../logging.js';
import type {
  ExecuteLimits,
  ExecuteResult,
  ExecutionAdapter,
  ForeignKeyInfo,
  SchemaSnapshot,
  TableInfo,
} from '../types.js';

const { Client } = pg;

export interface PgConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  ssl: boolean;
  statementTimeoutMs?: number;
}

interface TableRow {
  table_schema: string;
  table_name: string;
  row_estimate: string | number | null;
}

interface ColumnRow {
  table_schema: string;
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
  column_default: string | null;
  is_pk: boolean;
}

interface ForeignKeyRow {
  table_name: string;
  column_name: string;
  ref_table_name: string;
  ref_column_name: string;
}

export function quotePgIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class PostgresAdapter implements ExecutionAdapter {
  readonly dialect = 'postgres' as const;

  constructor(
    private readonly cfg: PgConnectionConfig,
    private readonly logger: Logger = silentLogger(),
  ) {}

  private newClient(connectionTimeoutMillis = 10_000): pg.Client {
    return new Client({
      host: this.cfg.host,
      port: this.cfg.port,
      database: this.cfg.database,
      user: this.cfg.user,
      password: this.cfg.password,
      ssl: this.cfg.ssl ? { rejectUnauthorized: false } : false,
      connectionTimeoutMillis,
    });
  }

  /**
   * Execute a statement with safety guardrails:
   * - statement_timeout on the session
   * - BEGIN READ ONLY transaction, rolled back afterwards
   * - hard cap on returned rows
   */
  async execute(sql: string, limits: ExecuteLimits = {}): Promise<ExecuteResult> {
    const maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;
    const statementTimeoutMs =
      limits.statementTimeoutMs ?? this.cfg.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;

    const client = this.newClient();
    try {
      await client.connect();
      await client.query(`SET statement_timeout = ${Math.floor(statementTimeoutMs)}`);
      await client.query('BEGIN READ ONLY');

      const start = performance.now();
      const result = await client.query<Record<string, unknown>>(sql);
      const execMs = Math.round(performance.now() - start);

      await client.query('ROLLBACK');

      const columns = result.fields?.map((f) => f.name) ?? [];
      const allRows = result.rows ?? [];
      const truncated = allRows.length > maxRows;
      const rows = truncated ? allRows.slice(0, maxRows) : allRows;

      return { columns, rows, rowCount: rows.length, truncated, execMs };
    } catch (err: unknown) {
      await rollbackQuietly(client, this.logger);
      throw new ExecutionError(describeError(err), sql, err);
    } finally {
      await endQuietly(client, this.logger);
    }
  }

  async sample(table: string, limit: number): Promise<ExecuteResult> {
    const qualified = table
      .split('.')
      .map((part) => quotePgIdent(part))
      .join('.');
    return this.execute(`SELECT * FROM ${qualified} LIMIT ${Math.max(0, Math.floor(limit))}`);
  }

  /**
   * Introspect tables, columns, primary keys and foreign keys.
   */
  async introspect(): Promise<SchemaSnapshot> {
    const client = this.newClient(15_000);
    try {
      await client.connect();

      const tablesRes = await client.query<TableRow>(`
        SELECT t.table_schema, t.table_name,
               c.reltuples::bigint AS row_estimate
        FROM information_schema.tables t
        LEFT JOIN pg_namespace n ON n.nspname = t.table_schema
        LEFT JOIN pg_class c ON c.relname = t.table_name AND c.relnamespace = n.oid
        WHERE t.table_schema NOT IN ('pg_catalog', 'information_schema')
          AND t.table_type = 'BASE TABLE'
        ORDER BY t.table_schema, t.table_name
      `);

      const colsRes = await client.query<ColumnRow>(`
        SELECT c.table_schema, c.table_name, c.column_name, c.data_type,
               c.is_nullable, c.column_default,
               CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
        FROM information_schema.columns c
        LEFT JOIN (
          SELECT ku.table_schema, ku.table_name, ku.column_name
          FROM information_schema.table_constraints tc
          JOIN information_schema.key_column_usage ku
            ON tc.constraint_name = ku.constraint_name
            AND tc.table_schema = ku.table_schema
          WHERE tc.constraint_type = 'PRIMARY KEY'
        ) pk ON pk.table_schema = c.table_schema
            AND pk.table_name = c.table_name
            AND pk.column_name = c.column_name
        WHERE c.table_schema NOT IN ('pg_catalog', 'information_schema')
        ORDER BY c.table_schema, c.table_name, c.ordinal_position
      `);

      const fkRes = await client.query<ForeignKeyRow>(`
        SELECT kcu.table_name, kcu.column_name,
               ccu.table_name AS ref_table_name,
               ccu.column_name AS ref_column_name
        FROM information_schema.table_constraints tc
        JOIN information_schema.key_column_usage kcu
          ON tc.constraint_name = kcu.constraint_name
          AND tc.table_schema = kcu.table_schema
        JOIN information_schema.constraint_column_usage ccu
          ON ccu.constraint_name = tc.constraint_name
          AND ccu.constraint_schema = tc.table_schema
        WHERE tc.constraint_type = 'FOREIGN KEY'
          AND tc.table_schema NOT IN ('pg_catalog', 'information_schema')
        ORDER BY kcu.table_name, kcu.column_name
      `);

      const tableMap = new Map<string, TableInfo>();
      for (const row of tablesRes.rows) {
        tableMap.set(`${row.table_schema}.${row.table_name}`, {
          name: row.table_name,
          schema: row.table_schema,
          columns: [],
          rowCountEstimate: Math.max(0, Number(row.row_estimate) || 0),
        });
      }

      for (const row of colsRes.rows) {
        const table = tableMap.get(`${row.table_schema}.${row.table_name}`);
        if (table) {
          table.columns.push({
            name: row.column_name,
            dataType: row.data_type,
            nullable: row.is_nullable === 'YES',
            isPrimaryKey: row.is_pk === true,
            defaultValue: row.column_default ?? undefined,
          });
        }
      }

      const foreignKeys: ForeignKeyInfo[] = fkRes.rows.map((row) => ({
        fromTable: row.table_name,
        fromColumn: row.column_name,
        toTable: row.ref_table_name,
        toColumn: row.ref_column_name,
      }));

      return {
        tables: Array.from(tableMap.values()),
        foreignKeys,
        capturedAt: new Date(),
      };
    } finally {
      await endQuietly(client, this.logger);
    }
  }

  async close(): Promise<void> {
    // Connections are per call.
  }
}

// The statement's own error is the one reported; cleanup failures are only logged.
async function rollbackQuietly(client: pg.Client, logger: Logger): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (err: unknown) {
    logger.debug({ err: describeError(err) }, 'postgres rollback failed');
  }
}

async function endQuietly(client: pg.Client, logger: Logger): Promise<void> {
  try {
    await client.end();
  } catch (err: unknown) {
    logger.debug({ err: describeError(err) }, 'postgres disconnect failed');
  }
}
