/**
 * Database abstraction types.
 * SQLite and Postgres adapters implement ExecutionAdapter.
 */

export type Dialect = 'sqlite' | 'postgres';

export interface SchemaSnapshot {
  tables: TableInfo[];
  foreignKeys: ForeignKeyInfo[];
  capturedAt: Date;
}

export interface TableInfo {
  name: string;
  schema?: string;
  columns: ColumnInfo[];
  rowCountEstimate?: number;
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
  defaultValue?: string;
}

/** One column pair of a declared foreign key: fromTable.fromColumn references toTable.toColumn. */
export interface ForeignKeyInfo {
  fromTable: string;
  fromColumn: string;
  toTable: string;
  toColumn: string;
}

export interface ExecuteResult {
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
  truncated: boolean;
  execMs: number;
}

export interface ExecuteLimits {
  /** Hard cap on returned rows regardless of query LIMIT */
  maxRows?: number;
  statementTimeoutMs?: number;
}

/**
 * Read-only access to the target database.
 * Adapters enforce read-only at the connection level, independent of the safety gate.
 */
export interface ExecutionAdapter {
  readonly dialect: Dialect;

  /** Run one already-approved statement */
  execute(sql: string, limits?: ExecuteLimits): Promise<ExecuteResult>;

  /** First `limit` rows of a table, for value grounding */
  sample(table: string, limit: number): Promise<ExecuteResult>;

  /** Tables, columns and foreign keys */
  introspect(): Promise<SchemaSnapshot>;

  close(): Promise<void>;
}
