/**
 * Per-query pipeline state.
 * Owned by one orchestrator run; never shared between queries.
 */

import { randomUUID } from 'node:crypto';
import type { ExecuteResult } from '../db/types.js';
import type { IntentLabel } from '../llm/types.js';
import type { FkViolation, RuleViolation } from '../policy/types.js';
import { AuditTrace, type PipelineStage } from './trace.js';

export type Intent = IntentLabel | 'UNRESOLVED';

export type FinalStatus = 'SUCCESS' | 'BLOCKED' | 'ERROR';

export interface QueryPlan {
  tables: string[];
  /** FK join conditions the graph proposes between the planned tables */
  joins: string[];
  filters: string[];
  aggregations: string[];
  needsDataContext: boolean;
  description: string;
}

export interface TableSample {
  table: string;
  columns: string[];
  rows: Record<string, unknown>[];
}

export type CandidateOrigin = 'generated' | 'corrected';

/** One SQL attempt. Corrections replace the candidate, they never edit it. */
export interface SqlCandidate {
  readonly sql: string;
  /** 0 for the first generation, n for the n-th correction */
  readonly attempt: number;
  readonly origin: CandidateOrigin;
}

export function makeCandidate(sql: string, attempt: number, origin: CandidateOrigin): SqlCandidate {
  return Object.freeze({ sql: sql.trim(), attempt, origin });
}

export interface PipelineStateInit {
  userQuery: string;
  maxRetries: number;
  queryId?: string;
  clock?: () => number;
}

export class PipelineState {
  readonly queryId: string;
  readonly userQuery: string;
  readonly startTime: number;
  readonly maxRetries: number;
  /** Created with the state, so every exit path has a trace to return */
  readonly trace: AuditTrace;

  stage: PipelineStage = 'START';
  intent: Intent = 'UNRESOLVED';
  resolvedQuery: string;
  /** True once the classifier supplied its own restatement of the question */
  queryResolved = false;
  assumptions: string[] = [];
  clarificationQuestions: string[] = [];
  schemaContext = '';
  plan: QueryPlan | null = null;
  samples: TableSample[] = [];
  candidate: SqlCandidate | null = null;
  violations: RuleViolation[] = [];
  fkViolations: FkViolation[] = [];
  safetyApproved = false;
  executionResult: ExecuteResult | null = null;
  executionError: string | null = null;
  retryCount = 0;
  reasoningCalls = 0;
  warnings: string[] = [];
  answer = '';
  finalStatus: FinalStatus | null = null;

  private readonly clock: () => number;

  constructor(init: PipelineStateInit) {
    this.clock = init.clock ?? (() => performance.now());
    this.queryId = init.queryId ?? randomUUID();
    this.userQuery = init.userQuery;
    this.resolvedQuery = init.userQuery;
    this.maxRetries = init.maxRetries;
    this.startTime = this.clock();
    this.trace = new AuditTrace(this.startTime, this.clock);
  }

  elapsedMs(): number {
    return Math.max(0, Math.round(this.clock() - this.startTime));
  }

  canRetry(): boolean {
    return this.retryCount < this.maxRetries;
  }

  isMetaQuery(): boolean {
    return this.intent === 'META_QUERY';
  }

  /** Ambiguous with no restatement, or with questions only the user can answer */
  needsClarification(): boolean {
    return this.intent === 'AMBIGUOUS' && (!this.queryResolved || this.clarificationQuestions.length > 0);
  }
}
