/**
 * Query history repository.
 * Stores each question with its final status, SQL, answer and audit trace.
 * NEVER stores result row data.
 */

import type Database from 'better-sqlite3';
import type { AuditEntry } from '../pipeline/trace.js';

// ── Types ────────────────────────────────────────────────────────────

export type RunStatus = 'SUCCESS' | 'BLOCKED' | 'ERROR';

export interface QueryRunRecord {
  id: string;
  question: string;
  status: RunStatus;
  sql: string | null;
  answer: string;
  rowCount: number;
  correctionAttempts: number;
  totalTimeMs: number;
  warnings: string[];
  trace: readonly AuditEntry[];
}

/** Where the pipeline sends each finished query */
export interface HistoryRecorder {
  recordRun(run: QueryRunRecord): void;
}

export interface HistoryListItem {
  id: string;
  question: string;
  askedAt: string;
  status: RunStatus;
  rowCount: number;
  totalTimeMs: number;
}

export interface HistoryDetail extends HistoryListItem {
  sql: string | null;
  answer: string;
  correctionAttempts: number;
  warnings: string[];
  trace: AuditEntry[];
}

interface RunRow {
  id: string;
  question: string;
  asked_at: string;
  status: string;
  sql_text: string | null;
  answer: string;
  row_count: number;
  correction_attempts: number;
  total_ms: number;
  warnings_json: string;
  trace_json: string;
}

// ── Repository functions ─────────────────────────────────────────────

export function recordQueryRun(db: Database.Database, run: QueryRunRecord): void {
  db.prepare(
    `INSERT INTO query_runs (id, asked_at, question, status, sql_text, answer, row_count, correction_attempts, total_ms, warnings_json, trace_json)
     VALUES (?, datetime('now'), ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    run.id,
    run.question,
    run.status,
    run.sql,
    run.answer,
    run.rowCount,
    run.correctionAttempts,
    run.totalTimeMs,
    JSON.stringify(run.warnings),
    JSON.stringify(run.trace),
  );
}

export function listHistory(db: Database.Database, limit: number = 20): HistoryListItem[] {
  return db
    .prepare<[number], RunRow>(
      `SELECT id, question, asked_at, status, sql_text, answer, row_count, correction_attempts, total_ms, warnings_json, trace_json
       FROM query_runs
       ORDER BY asked_at DESC, rowid DESC
       LIMIT ?`,
    )
    .all(limit)
    .map(toListItem);
}

export function getHistoryItem(db: Database.Database, id: string): HistoryDetail | null {
  const row = db
    .prepare<[string], RunRow>(
      `SELECT id, question, asked_at, status, sql_text, answer, row_count, correction_attempts, total_ms, warnings_json, trace_json
       FROM query_runs WHERE id = ?`,
    )
    .get(id);
  if (!row) return null;

  const warnings = safeJsonParse(row.warnings_json, []);
  const trace = safeJsonParse(row.trace_json, []);
  return {
    ...toListItem(row),
    sql: row.sql_text,
    answer: row.answer,
    correctionAttempts: row.correction_attempts,
    warnings: Array.isArray(warnings) ? warnings.filter((w): w is string => typeof w === 'string') : [],
    trace: Array.isArray(trace) ? trace.filter(isAuditEntry) : [],
  };
}

function toListItem(row: RunRow): HistoryListItem {
  return {
    id: row.id,
    question: row.question,
    askedAt: row.asked_at,
    status: toStatus(row.status),
    rowCount: row.row_count,
    totalTimeMs: row.total_ms,
  };
}

function toStatus(raw: string): RunStatus {
  return raw === 'SUCCESS' || raw === 'BLOCKED' ? raw : 'ERROR';
}

function isAuditEntry(value: unknown): value is AuditEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'seq' in value &&
    typeof value.seq === 'number' &&
    'stage' in value &&
    typeof value.stage === 'string' &&
    'event' in value &&
    typeof value.event === 'string' &&
    'summary' in value &&
    typeof value.summary === 'string'
  );
}

function safeJsonParse(json: string | null, fallback: unknown): unknown {
  if (!json) return fallback;
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed;
  } catch {
    return fallback;
  }
}
