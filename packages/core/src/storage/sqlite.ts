/**
 * Local state store using better-sqlite3.
 * Holds the query history written by the pipeline.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import {
  getHistoryItem,
  listHistory,
  recordQueryRun,
  type HistoryDetail,
  type HistoryListItem,
  type HistoryRecorder,
  type QueryRunRecord,
} from './repo.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: query runs
  `CREATE TABLE IF NOT EXISTS query_runs (
    id TEXT PRIMARY KEY,
    asked_at TEXT NOT NULL DEFAULT (datetime('now')),
    question TEXT NOT NULL,
    status TEXT NOT NULL,
    sql_text TEXT,
    answer TEXT NOT NULL,
    row_count INTEGER NOT NULL DEFAULT 0,
    correction_attempts INTEGER NOT NULL DEFAULT 0,
    total_ms INTEGER NOT NULL DEFAULT 0,
    warnings_json TEXT NOT NULL DEFAULT '[]',
    trace_json TEXT NOT NULL
  )`,

  // 2: listing index
  `CREATE INDEX IF NOT EXISTS idx_query_runs_asked_at ON query_runs (asked_at)`,
];

// ── Default DB path ──────────────────────────────────────────────────

export function defaultDbPath(): string {
  return join(homedir(), '.querygate', 'querygate.db');
}

// ── LocalStore ───────────────────────────────────────────────────────

export class LocalStore implements HistoryRecorder {
  private db: Database.Database;

  /** `:memory:` keeps the store in process */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0] ?? '');

    const applied = this.db.prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version').all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare<[number]>('INSERT INTO migrations (version) VALUES (?)');

    MIGRATIONS.forEach((sql, version) => {
      if (version === 0 || appliedSet.has(version)) return;
      this.db.exec(sql);
      insert.run(version);
    });
  }

  // ── History ──────────────────────────────────────────────────────

  recordRun(run: QueryRunRecord): void {
    recordQueryRun(this.db, run);
  }

  listHistory(limit?: number): HistoryListItem[] {
    return listHistory(this.db, limit);
  }

  getHistoryItem(id: string): HistoryDetail | null {
    return getHistoryItem(this.db, id);
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
