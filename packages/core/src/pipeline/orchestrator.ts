/**
 * Query pipeline state machine.
 *
 * START → CLASSIFY → (BLOCKED | SCHEMA_LOOKUP)
 * SCHEMA_LOOKUP → META_ANSWER → SUCCESS (one synthesis call), or → PLAN → [SAMPLE_DATA] → GENERATE → SAFETY_CHECK
 * SAFETY_CHECK → EXECUTE | CORRECT | BLOCKED;  CORRECT → SAFETY_CHECK
 * EXECUTE → RESULT_CHECK | CORRECT | ERROR;  RESULT_CHECK → SYNTHESIZE → SUCCESS
 *
 * One instance serves many queries. Everything mutable lives in the
 * PipelineState created per run; `abort` and `finalize` are the only exits.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { ExecuteResult, ExecutionAdapter } from '../db/types.js';
import { AdmissionDeniedError, describeError, type ReasoningParseFailure } from '../errors.js';
import type { PipelineConfig } from '../config.js';
import { silentLogger, type Logger } from '../logging.js';
import type { BatchFailure, ReasoningBatchClient } from '../llm/batch-client.js';
import {
  buildCorrectMessages,
  buildGenerateMessages,
  buildMetaAnswerMessages,
  buildSynthesizeMessages,
  buildUnderstandMessages,
} from '../llm/prompt.js';
import { buildSchemaContext, buildSchemaOverview } from '../llm/schema.js';
import { compileBatchValidators, type BatchValidators } from '../llm/schema_json.js';
import type { IntentLabel, UnderstandPayload } from '../llm/types.js';
import { SafetyValidator } from '../policy/validator.js';
import { joinConditions, type SchemaGraph } from '../schema/graph.js';
import type { HistoryRecorder } from '../storage/repo.js';
import { checkResult } from './result-check.js';
import { PipelineState, makeCandidate, type FinalStatus, type QueryPlan } from './state.js';
import type { AuditEntry, PipelineStage } from './trace.js';

export interface AuditSummary {
  actions: AuditEntry[];
  finalStatus: FinalStatus;
  totalTimeMs: number;
  correctionAttempts: number;
}

/** What every caller gets back, whatever the outcome */
export interface QueryResponse {
  queryId: string;
  success: boolean;
  answer: string;
  sqlUsed: string | null;
  rowCount: number;
  isMetaQuery: boolean;
  columns: string[];
  rows: Record<string, unknown>[];
  auditTrace: AuditSummary;
  warnings: string[];
}

export interface QueryPipelineDeps {
  graph: SchemaGraph;
  adapter: ExecutionAdapter;
  client: ReasoningBatchClient;
  config: PipelineConfig;
  validators?: BatchValidators;
  safety?: SafetyValidator;
  history?: HistoryRecorder;
  logger?: Logger;
  clock?: () => number;
}

type TerminalStatus = Exclude<FinalStatus, 'SUCCESS'>;

export function normalizeIntent(raw: string): IntentLabel {
  const label = raw.trim().toUpperCase().replace(/[\s-]+/g, '_');
  if (label === 'DATA_QUERY' || label === 'DATA') return 'DATA_QUERY';
  if (label === 'META_QUERY' || label === 'META') return 'META_QUERY';
  return 'AMBIGUOUS';
}

const DEFAULT_CLARIFICATION = 'Please rephrase the question with the specific data, time range or entity you mean.';

export class QueryPipeline {
  private readonly graph: SchemaGraph;
  private readonly adapter: ExecutionAdapter;
  private readonly client: ReasoningBatchClient;
  private readonly config: PipelineConfig;
  private readonly validators: BatchValidators;
  private readonly safety: SafetyValidator;
  private readonly history?: HistoryRecorder;
  private readonly logger: Logger;
  private readonly clock?: () => number;
  private readonly schemaOverview: string;

  constructor(deps: QueryPipelineDeps) {
    this.graph = deps.graph;
    this.adapter = deps.adapter;
    this.client = deps.client;
    this.config = deps.config;
    this.validators = deps.validators ?? compileBatchValidators();
    this.safety =
      deps.safety ??
      new SafetyValidator(
        deps.graph,
        {
          forbiddenKeywords: deps.config.forbiddenKeywords,
          rowLimitCap: deps.config.rowLimitCap,
          maxJoinHops: deps.config.maxJoinHops,
        },
        deps.adapter.dialect,
      );
    this.history = deps.history;
    this.logger = (deps.logger ?? silentLogger()).child({ component: 'pipeline' });
    this.clock = deps.clock;
    this.schemaOverview = buildSchemaOverview(deps.graph.snapshot);
  }

  async run(question: string): Promise<QueryResponse> {
    const state = new PipelineState({ userQuery: question, maxRetries: this.config.maxRetries, clock: this.clock });
    const log = this.logger.child({ queryId: state.queryId });
    this.enter(state, 'START', 'query received', { question });

    let response: QueryResponse;
    try {
      response = await this.drive(state, log);
    } catch (err: unknown) {
      log.error({ err, stage: state.stage }, 'pipeline failed unexpectedly');
      response = state.finalStatus
        ? this.respond(state)
        : this.abort(state, 'ERROR', `The query could not be completed: ${describeError(err)}`);
    }

    log.info(
      { status: response.auditTrace.finalStatus, totalTimeMs: response.auditTrace.totalTimeMs },
      'query finished',
    );
    this.recordHistory(state, response, log);
    return response;
  }

  // ── Stages ───────────────────────────────────────────────────────

  private async drive(state: PipelineState, log: Logger): Promise<QueryResponse> {
    // CLASSIFY
    this.enter(state, 'CLASSIFY', 'classifying intent');
    const understood = await this.client.call(
      {
        batch: 'understand',
        messages: buildUnderstandMessages({
          question: state.userQuery,
          dialect: this.adapter.dialect,
          schemaOverview: this.schemaOverview,
        }),
        expectedKeys: ['intent'],
        validate: this.validators.understand,
      },
      state,
    );
    if (!understood.ok) return this.reasoningFailure(state, understood);
    this.applyUnderstanding(state, understood.value);
    log.debug({ intent: state.intent, resolved: state.queryResolved }, 'intent classified');

    if (state.needsClarification()) {
      const questions = state.clarificationQuestions.length > 0 ? state.clarificationQuestions : [DEFAULT_CLARIFICATION];
      return this.abort(state, 'BLOCKED', `Your question needs clarification:\n${questions.map((q) => `- ${q}`).join('\n')}`, {
        clarificationQuestions: questions,
      });
    }

    // SCHEMA_LOOKUP
    const planned = this.resolvePlannedTables(state, understood.value.plan?.relevant_tables ?? []);
    state.schemaContext = buildSchemaContext(state.resolvedQuery, this.graph.snapshot, { includeTables: planned });
    this.enter(state, 'SCHEMA_LOOKUP', `schema context built for ${planned.length || 'top-scoring'} tables`, {
      tables: planned,
    });

    if (state.isMetaQuery()) return this.answerMeta(state);
    if (state.intent === 'AMBIGUOUS') {
      this.addWarnings(state, state.assumptions.map((a) => `Assumed: ${a}`));
    }

    // PLAN
    state.plan = this.planJoins(state, planned, understood.value.plan);
    this.enter(state, 'PLAN', `planned ${state.plan.tables.length} tables and ${state.plan.joins.length} joins`, {
      plan: state.plan,
    });

    // SAMPLE_DATA
    if (state.plan.needsDataContext && state.plan.tables.length > 0) {
      await this.sampleData(state, state.plan, log);
    }

    // GENERATE
    this.enter(state, 'GENERATE', 'generating SQL');
    const generated = await this.client.call(
      {
        batch: 'generate',
        messages: buildGenerateMessages({
          dialect: this.adapter.dialect,
          question: state.resolvedQuery,
          schemaContext: state.schemaContext,
          rowLimitCap: this.config.rowLimitCap,
          planDescription: state.plan.description || undefined,
          suggestedJoins: state.plan.joins,
          assumptions: state.assumptions,
          samples: state.samples,
        }),
        expectedKeys: ['sql'],
        validate: this.validators.generate,
      },
      state,
    );
    if (!generated.ok) return this.reasoningFailure(state, generated);
    state.candidate = makeCandidate(generated.value.sql, 0, 'generated');

    const result = await this.checkAndExecute(state, log);
    if (!('columns' in result)) return result.response;

    // RESULT_CHECK
    const findings = checkResult(result, this.config.rowLimitCap);
    this.addWarnings(state, findings);
    this.enter(
      state,
      'RESULT_CHECK',
      findings.length > 0 ? `result check: ${findings.length} warning(s)` : 'result check passed',
      { rowCount: result.rowCount, warnings: findings },
    );

    // SYNTHESIZE
    return this.synthesize(state, result);
  }

  /**
   * Safety check, execution and the correction loop.
   * Returns the execution result, or the terminal response when the loop ends without one.
   */
  private async checkAndExecute(
    state: PipelineState,
    log: Logger,
  ): Promise<ExecuteResult | { response: QueryResponse }> {
    for (;;) {
      const candidate = state.candidate;
      if (!candidate) {
        return { response: this.abort(state, 'ERROR', 'No SQL candidate was produced.') };
      }

      this.enter(state, 'SAFETY_CHECK', `checking candidate ${candidate.attempt}`, { origin: candidate.origin });
      const safety = this.safety.validate(candidate.sql, { trace: state.trace, stage: 'SAFETY_CHECK' });
      state.safetyApproved = safety.approved;
      state.violations = safety.violations;
      state.fkViolations = safety.fkViolations;
      this.addWarnings(state, safety.warnings);

      if (!safety.approved) {
        log.debug({ rules: safety.violations.map((v) => v.rule) }, 'candidate rejected');
        if (!state.canRetry()) {
          const reasons = safety.violations.map((v) => v.reason).join(' ');
          return {
            response: this.abort(state, 'BLOCKED', `The generated SQL was rejected by the safety check. ${reasons}`, {
              lastCandidate: candidate.sql,
              violations: safety.violations,
            }),
          };
        }
        const problems = safety.violations.map((v) => (v.suggestedFix ? `${v.reason} Fix: ${v.suggestedFix}` : v.reason));
        const failure = await this.correct(state, candidate.sql, problems);
        if (failure) return { response: this.reasoningFailure(state, failure) };
        continue;
      }

      // Only an approved candidate gets here.
      this.enter(state, 'EXECUTE', `executing candidate ${candidate.attempt}`);
      try {
        const result = await this.adapter.execute(candidate.sql, {
          maxRows: this.config.rowLimitCap,
          statementTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs,
        });
        state.executionResult = result;
        state.executionError = null;
        state.trace.record({
          stage: 'EXECUTE',
          event: 'execution',
          summary: `returned ${result.rowCount} row(s) in ${result.execMs}ms`,
          detail: { sql: candidate.sql, rowCount: result.rowCount, truncated: result.truncated, execMs: result.execMs },
        });
        return result;
      } catch (err: unknown) {
        const message = describeError(err);
        state.executionError = message;
        state.trace.record({
          stage: 'EXECUTE',
          event: 'execution',
          summary: `execution failed: ${message}`,
          detail: { sql: candidate.sql, error: message },
        });
        log.warn({ err: message }, 'execution failed');

        if (!state.canRetry()) {
          return {
            response: this.abort(
              state,
              'ERROR',
              `The query could not be completed after ${state.retryCount} correction attempt(s). Database error: ${message}. No data was returned.`,
              { lastCandidate: candidate.sql },
            ),
          };
        }
        const failure = await this.correct(state, candidate.sql, [`Database error: ${message}`]);
        if (failure) return { response: this.reasoningFailure(state, failure) };
      }
    }
  }

  /** One correction attempt. The new candidate replaces the old one and goes back through the safety check. */
  private async correct(state: PipelineState, sql: string, problems: string[]): Promise<BatchFailure | null> {
    state.retryCount++;
    this.enter(state, 'CORRECT', `correction attempt ${state.retryCount} of ${state.maxRetries}`, { problems });

    const fkPaths = state.fkViolations
      .map((v) => v.suggestedPath)
      .filter((p): p is string => typeof p === 'string' && p.length > 0);
    const corrected = await this.client.call(
      {
        batch: 'correct',
        messages: buildCorrectMessages({
          dialect: this.adapter.dialect,
          question: state.resolvedQuery,
          schemaContext: state.schemaContext,
          rowLimitCap: this.config.rowLimitCap,
          sql,
          problems,
          suggestedJoins: fkPaths.length > 0 ? fkPaths : (state.plan?.joins ?? []),
        }),
        expectedKeys: ['corrected_sql'],
        validate: this.validators.correct,
      },
      state,
    );
    if (!corrected.ok) return corrected;

    state.candidate = makeCandidate(corrected.value.corrected_sql, state.retryCount, 'corrected');
    return null;
  }

  private async synthesize(state: PipelineState, result: ExecuteResult): Promise<QueryResponse> {
    if (result.rowCount === 0) {
      this.enter(state, 'SYNTHESIZE', 'empty result; no reasoning call');
      state.answer = 'No rows found for this question.';
      return this.finalize(state);
    }

    this.enter(state, 'SYNTHESIZE', 'synthesizing answer');
    const synthesized = await this.client.call(
      {
        batch: 'synthesize',
        messages: buildSynthesizeMessages({
          question: state.resolvedQuery,
          sql: state.candidate?.sql ?? '',
          columns: result.columns,
          rows: result.rows,
          rowCount: result.rowCount,
          truncated: result.truncated,
          warnings: state.warnings,
        }),
        expectedKeys: ['answer'],
        validate: this.validators.synthesize,
      },
      state,
    );

    if (synthesized.ok) {
      state.answer = synthesized.value.answer;
    } else {
      // The data is already in hand; describe it instead of failing the query.
      this.addWarnings(state, [`Answer synthesis failed (${describeFailure(synthesized.error)}); showing a summary of the result.`]);
      state.answer = summarizeResult(result);
    }
    return this.finalize(state);
  }

  /**
   * Schema questions never reach SQL. The facts come from the graph; the
   * synthesize batch phrases them, and the facts themselves are the fallback answer.
   */
  private async answerMeta(state: PipelineState): Promise<QueryResponse> {
    const named = this.tablesNamedIn(state.resolvedQuery);
    const tables = named.length > 0 ? named : this.graph.tables();
    const rows = tables.map((name) => {
      const info = this.graph.table(name);
      return {
        table: name,
        columns: (info?.columns ?? []).map((c) => `${c.name} ${c.dataType}${c.isPrimaryKey ? ' PK' : ''}`).join(', '),
      };
    });
    const facts =
      named.length > 0
        ? rows.map((r) => `${r.table} has columns: ${r.columns}.`).join('\n')
        : `The database has ${tables.length} table${tables.length === 1 ? '' : 's'}: ${tables.join(', ')}.`;
    state.executionResult = { columns: ['table', 'columns'], rows, rowCount: rows.length, truncated: false, execMs: 0 };
    this.enter(state, 'META_ANSWER', `answering from schema (${rows.length} tables)`);

    const synthesized = await this.client.call(
      {
        batch: 'synthesize',
        messages: buildMetaAnswerMessages({
          question: state.resolvedQuery,
          schemaFacts: facts,
          schemaContext: state.schemaContext,
        }),
        expectedKeys: ['answer'],
        validate: this.validators.synthesize,
      },
      state,
    );

    if (synthesized.ok) {
      state.answer = synthesized.value.answer;
    } else {
      this.addWarnings(state, [`Answer synthesis failed (${describeFailure(synthesized.error)}); showing the schema facts.`]);
      state.answer = facts;
    }
    return this.finalize(state);
  }

  private async sampleData(state: PipelineState, plan: QueryPlan, log: Logger): Promise<void> {
    const tables = plan.tables.slice(0, this.config.maxSampledTables);
    for (const table of tables) {
      try {
        const sample = await this.adapter.sample(table, this.config.sampleRows);
        state.samples.push({ table, columns: sample.columns, rows: sample.rows });
      } catch (err: unknown) {
        log.warn({ table, err: describeError(err) }, 'sampling failed');
        this.addWarnings(state, [`Could not sample ${table}: ${describeError(err)}`]);
      }
    }
    this.enter(state, 'SAMPLE_DATA', `sampled ${state.samples.length} of ${tables.length} tables`, {
      tables: state.samples.map((s) => s.table),
    });
  }

  // ── Helpers ──────────────────────────────────────────────────────

  private applyUnderstanding(state: PipelineState, value: UnderstandPayload): void {
    state.intent = normalizeIntent(value.intent);
    const resolved = value.resolved_query?.trim();
    state.queryResolved = Boolean(resolved);
    if (resolved) state.resolvedQuery = resolved;
    state.assumptions = value.assumptions ?? [];
    state.clarificationQuestions = (value.clarification_questions ?? []).filter((q) => q.trim().length > 0);
  }

  private resolvePlannedTables(state: PipelineState, requested: string[]): string[] {
    const tables: string[] = [];
    for (const name of requested) {
      const canonical = this.graph.canonicalTable(name);
      if (!canonical) {
        this.addWarnings(state, [`Plan referenced unknown table ${name}; ignored.`]);
        continue;
      }
      if (!tables.includes(canonical)) tables.push(canonical);
    }
    return tables;
  }

  /** Connect every planned table to the first one along the shortest FK path. */
  private planJoins(state: PipelineState, planned: string[], plan: UnderstandPayload['plan']): QueryPlan {
    const tables = [...planned];
    const joins: string[] = [];
    const [anchor, ...others] = planned;
    if (anchor) {
      for (const other of others) {
        const path = this.graph.shortestPath(anchor, other, this.config.maxJoinHops);
        if (!path) {
          this.addWarnings(state, [`No FK path between ${anchor} and ${other} within ${this.config.maxJoinHops} hops.`]);
          continue;
        }
        for (const table of path.tables) {
          if (!tables.includes(table)) tables.push(table);
        }
        for (const condition of joinConditions(path)) {
          if (!joins.includes(condition)) joins.push(condition);
        }
      }
    }
    return {
      tables,
      joins,
      filters: plan?.filters ?? [],
      aggregations: plan?.aggregations ?? [],
      needsDataContext: plan?.needs_data_context ?? false,
      description: plan?.description ?? '',
    };
  }

  private tablesNamedIn(text: string): string[] {
    const found: string[] = [];
    for (const word of text.split(/[^A-Za-z0-9_.]+/)) {
      const table = word ? this.graph.canonicalTable(word) : undefined;
      if (table && !found.includes(table)) found.push(table);
    }
    return found;
  }

  private addWarnings(state: PipelineState, warnings: string[]): void {
    for (const warning of warnings) {
      if (!state.warnings.includes(warning)) state.warnings.push(warning);
    }
  }

  private enter(state: PipelineState, stage: PipelineStage, summary: string, detail?: Record<string, unknown>): void {
    state.stage = stage;
    state.trace.record({ stage, event: 'transition', summary, detail });
  }

  private reasoningFailure(state: PipelineState, failure: BatchFailure): QueryResponse {
    const error = failure.error;
    if (error instanceof AdmissionDeniedError) {
      return this.abort(state, 'BLOCKED', `Request not admitted: ${error.message}`, {
        reason: error.reason,
        waitSeconds: error.waitSeconds,
      });
    }
    if (error.category === 'provider_failure') {
      return this.abort(state, 'ERROR', `The reasoning service failed: ${error.message}`, { category: error.category });
    }
    return this.abort(
      state,
      'BLOCKED',
      `The reasoning service returned an unusable response (${error.category}). Please try rephrasing the question.`,
      { category: error.category, message: error.message },
    );
  }

  // ── Exits ────────────────────────────────────────────────────────

  private abort(
    state: PipelineState,
    status: TerminalStatus,
    reason: string,
    detail: Record<string, unknown> = {},
  ): QueryResponse {
    state.answer = reason;
    state.finalStatus = status;
    state.stage = status;
    state.trace.record({ stage: status, event: 'finalize', summary: reason, detail });
    return this.respond(state);
  }

  private finalize(state: PipelineState): QueryResponse {
    state.finalStatus = 'SUCCESS';
    state.stage = 'SUCCESS';
    state.trace.record({
      stage: 'SUCCESS',
      event: 'finalize',
      summary: 'query answered',
      detail: { rowCount: state.executionResult?.rowCount ?? 0, correctionAttempts: state.retryCount },
    });
    return this.respond(state);
  }

  private respond(state: PipelineState): QueryResponse {
    const finalStatus = state.finalStatus ?? 'ERROR';
    const success = finalStatus === 'SUCCESS';
    const result = success ? state.executionResult : null;
    return {
      queryId: state.queryId,
      success,
      answer: state.answer,
      sqlUsed: success && !state.isMetaQuery() ? (state.candidate?.sql ?? null) : null,
      rowCount: result?.rowCount ?? 0,
      isMetaQuery: state.isMetaQuery(),
      columns: result?.columns ?? [],
      rows: result?.rows ?? [],
      auditTrace: {
        actions: state.trace.toJSON(),
        finalStatus,
        totalTimeMs: state.elapsedMs(),
        correctionAttempts: state.retryCount,
      },
      warnings: [...state.warnings],
    };
  }

  private recordHistory(state: PipelineState, response: QueryResponse, log: Logger): void {
    if (!this.history) return;
    try {
      this.history.recordRun({
        id: state.queryId,
        question: state.userQuery,
        status: response.auditTrace.finalStatus,
        sql: state.candidate?.sql ?? null,
        answer: response.answer,
        rowCount: response.rowCount,
        correctionAttempts: response.auditTrace.correctionAttempts,
        totalTimeMs: response.auditTrace.totalTimeMs,
        warnings: response.warnings,
        trace: response.auditTrace.actions,
      });
    } catch (err: unknown) {
      log.warn({ err: describeError(err) }, 'could not record query history');
    }
  }
}

function describeFailure(error: AdmissionDeniedError | ReasoningParseFailure): string {
  return error instanceof AdmissionDeniedError ? error.reason : error.category;
}

/** Plain description of a result, used when no synthesized answer is available. */
export function summarizeResult(result: ExecuteResult): string {
  const [first] = result.rows;
  const [column] = result.columns;
  if (result.rowCount === 1 && result.columns.length === 1 && first && column) {
    return `${column}: ${String(first[column])}`;
  }
  const more = result.truncated ? ' (more rows exist)' : '';
  return `Returned ${result.rowCount} row${result.rowCount === 1 ? '' : 's'}${more} with columns ${result.columns.join(', ')}.`;
}
