/**
 * The single path from the pipeline to the reasoning backend.
 *
 * Each call: per-query budget, process-wide rate limit, backend call under
 * a timeout, object extraction, key and schema checks, one audit entry.
 * Failures come back as values; nothing here throws for a bad response.
 */

import type { ValidateFunction } from 'ajv';
import { AdmissionDeniedError, ReasoningParseFailure, describeError } from '../errors.js';
import { silentLogger, type Logger } from '../logging.js';
import type { AuditTrace, PipelineStage } from '../pipeline/trace.js';
import { extractFirstObject, type AutoFix } from './extract.js';
import type { RateLimiter } from './rate-limiter.js';
import { describeValidationErrors } from './schema_json.js';
import type { BatchId, ChatMessage, ReasoningBackend } from './types.js';

export interface BatchRequest<T> {
  batch: BatchId;
  messages: ChatMessage[];
  /** Top-level keys the payload must carry */
  expectedKeys: string[];
  validate: ValidateFunction<T>;
}

export interface BatchFailure {
  ok: false;
  error: AdmissionDeniedError | ReasoningParseFailure;
}

export type BatchResult<T> =
  | { ok: true; value: T; discardedChars: number; fixesApplied: AutoFix[]; provider: string }
  | BatchFailure;

/** The slice of pipeline state a call reads and updates */
export interface CallContext {
  readonly queryId: string;
  readonly stage: PipelineStage;
  readonly trace: AuditTrace;
  reasoningCalls: number;
}

export interface BatchClientOptions {
  backend: ReasoningBackend;
  limiter: RateLimiter;
  timeoutMs: number;
  maxCallsPerQuery: number;
  maxTokens: number;
  logger?: Logger;
}

class CallTimeoutError extends Error {
  constructor(ms: number) {
    super(`Reasoning call timed out after ${ms}ms.`);
  }
}

const PREVIEW_CHARS = 120;

export class ReasoningBatchClient {
  private readonly logger: Logger;

  constructor(private readonly opts: BatchClientOptions) {
    this.logger = (opts.logger ?? silentLogger()).child({ component: 'reasoning' });
  }

  async call<T>(request: BatchRequest<T>, ctx: CallContext): Promise<BatchResult<T>> {
    const log = this.logger.child({ queryId: ctx.queryId, batch: request.batch });

    if (ctx.reasoningCalls >= this.opts.maxCallsPerQuery) {
      const error = new AdmissionDeniedError(
        'query_budget',
        `Query reached its budget of ${this.opts.maxCallsPerQuery} reasoning calls.`,
      );
      return this.deny(error, request.batch, ctx, log);
    }

    if (!this.opts.limiter.tryAcquire()) {
      const waitSeconds = this.opts.limiter.waitTime();
      const error = new AdmissionDeniedError(
        'rate_limit',
        `Reasoning rate limit reached; retry in ${Math.ceil(waitSeconds)}s.`,
        waitSeconds,
      );
      return this.deny(error, request.batch, ctx, log);
    }
    ctx.reasoningCalls++;

    const started = performance.now();
    let text: string;
    let provider: string;
    try {
      const completion = await this.withTimeout((signal) =>
        this.opts.backend.complete(request.messages, { signal, maxTokens: this.opts.maxTokens }),
      );
      text = completion.text;
      provider = completion.provider;
    } catch (err: unknown) {
      const message =
        err instanceof CallTimeoutError ? err.message : `Reasoning backend failed: ${describeError(err)}`;
      return this.fail(new ReasoningParseFailure('provider_failure', message), request.batch, ctx, log, started);
    }

    const extracted = extractFirstObject(text);
    if (!extracted.ok) {
      return this.fail(extracted.failure, request.batch, ctx, log, started);
    }

    const missing = request.expectedKeys.filter((key) => !(key in extracted.value));
    if (missing.length > 0) {
      const failure = new ReasoningParseFailure(
        'schema_violation',
        `Response is missing expected keys: ${missing.join(', ')}.`,
        text,
      );
      return this.fail(failure, request.batch, ctx, log, started);
    }

    const payload: unknown = extracted.value;
    if (!request.validate(payload)) {
      const failure = new ReasoningParseFailure(
        'schema_violation',
        `Response failed schema validation: ${describeValidationErrors(request.validate)}.`,
        text,
      );
      return this.fail(failure, request.batch, ctx, log, started);
    }

    const discardedChars = extracted.discardedText.length;
    const elapsedMs = Math.round(performance.now() - started);
    ctx.trace.record({
      stage: ctx.stage,
      event: 'reasoning_call',
      batch: request.batch,
      summary: `batch ${request.batch} answered by ${provider}`,
      detail: {
        provider,
        elapsedMs,
        discardedChars,
        discardedPreview: extracted.discardedText.slice(0, PREVIEW_CHARS),
        fixesApplied: extracted.fixesApplied,
      },
    });
    if (extracted.fixesApplied.length > 0) {
      log.warn({ fixesApplied: extracted.fixesApplied }, 'reasoning response needed auto-fix');
    }
    log.debug({ provider, elapsedMs, discardedChars }, 'reasoning call completed');

    return { ok: true, value: payload, discardedChars, fixesApplied: extracted.fixesApplied, provider };
  }

  private deny(error: AdmissionDeniedError, batch: BatchId, ctx: CallContext, log: Logger): BatchFailure {
    ctx.trace.record({
      stage: ctx.stage,
      event: 'admission_denied',
      batch,
      summary: error.message,
      detail: { reason: error.reason, waitSeconds: error.waitSeconds, limiter: this.opts.limiter.status() },
    });
    log.warn({ reason: error.reason, waitSeconds: error.waitSeconds }, 'reasoning call denied');
    return { ok: false, error };
  }

  private fail(
    error: ReasoningParseFailure,
    batch: BatchId,
    ctx: CallContext,
    log: Logger,
    started: number,
  ): BatchFailure {
    ctx.trace.record({
      stage: ctx.stage,
      event: 'reasoning_failure',
      batch,
      summary: `batch ${batch} failed: ${error.category}`,
      detail: {
        category: error.category,
        message: error.message,
        rawPreview: error.rawPreview.slice(0, PREVIEW_CHARS),
        elapsedMs: Math.round(performance.now() - started),
      },
    });
    log.warn({ category: error.category, err: error.message }, 'reasoning call failed');
    return { ok: false, error };
  }

  private async withTimeout<R>(run: (signal: AbortSignal) => Promise<R>): Promise<R> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CallTimeoutError(this.opts.timeoutMs));
      }, this.opts.timeoutMs);
    });
    try {
      return await Promise.race([run(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
