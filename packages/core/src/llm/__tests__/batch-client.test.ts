import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AdmissionDeniedError, ReasoningParseFailure } from '../../errors.js';
import { AuditTrace } from '../../pipeline/trace.js';
import { ReasoningBatchClient, type CallContext } from '../batch-client.js';
import { RateLimiter } from '../rate-limiter.js';
import { compileBatchValidators } from '../schema_json.js';
import type { ChatMessage, Completion, CompletionOptions, ReasoningBackend } from '../types.js';

const validators = compileBatchValidators();

type Reply = string | Error | 'hang';

class ScriptedBackend implements ReasoningBackend {
  readonly name = 'scripted';
  calls = 0;

  constructor(private readonly replies: Reply[]) {}

  complete(_messages: ChatMessage[], opts: CompletionOptions): Promise<Completion> {
    const reply = this.replies[this.calls] ?? '';
    this.calls++;
    if (reply === 'hang') {
      return new Promise<Completion>((_, reject) => {
        opts.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    if (reply instanceof Error) return Promise.reject(reply);
    return Promise.resolve({ text: reply, provider: this.name });
  }
}

function context(reasoningCalls = 0): CallContext {
  return { queryId: 'q-1', stage: 'CLASSIFY', trace: new AuditTrace(0, () => 0), reasoningCalls };
}

function client(
  backend: ReasoningBackend,
  overrides: { limiter?: RateLimiter; timeoutMs?: number; maxCallsPerQuery?: number } = {},
): ReasoningBatchClient {
  return new ReasoningBatchClient({
    backend,
    limiter: overrides.limiter ?? new RateLimiter({ maxCalls: 100, windowSeconds: 60 }),
    timeoutMs: overrides.timeoutMs ?? 1_000,
    maxCallsPerQuery: overrides.maxCallsPerQuery ?? 5,
    maxTokens: 256,
  });
}

const understand = (messages: ChatMessage[] = []) => ({
  batch: 'understand' as const,
  messages,
  expectedKeys: ['intent'],
  validate: validators.understand,
});

describe('ReasoningBatchClient', () => {
  it('returns the payload and records one reasoning_call entry', async () => {
    const backend = new ScriptedBackend(['Sure! Here\'s the result: {"intent": "ambiguous"} Hope this helps!']);
    const ctx = context();
    const result = await client(backend).call(understand(), ctx);

    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.value.intent, 'ambiguous');
      assert.equal(result.discardedChars, 41);
      assert.equal(result.provider, 'scripted');
    }
    assert.equal(ctx.reasoningCalls, 1);
    const entries = ctx.trace.entries();
    assert.equal(entries.length, 1);
    assert.equal(entries[0]?.event, 'reasoning_call');
    assert.equal(entries[0]?.batch, 'understand');
    assert.equal(entries[0]?.detail?.discardedChars, 41);
    assert.equal(entries[0]?.detail?.discardedPreview, "Sure! Here's the result: Hope this helps!");
  });

  it('denies a call once the query budget is spent without reaching the backend', async () => {
    const backend = new ScriptedBackend(['{"intent": "DATA_QUERY"}']);
    const ctx = context(5);
    const result = await client(backend).call(understand(), ctx);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof AdmissionDeniedError);
      assert.equal(result.error.reason, 'query_budget');
    }
    assert.equal(backend.calls, 0);
    assert.equal(ctx.reasoningCalls, 5);
    assert.equal(ctx.trace.last()?.event, 'admission_denied');
  });

  it('denies a call when the shared limiter is full', async () => {
    const limiter = new RateLimiter({ maxCalls: 1, windowSeconds: 60 });
    limiter.recordCall();
    const backend = new ScriptedBackend(['{"intent": "DATA_QUERY"}']);
    const ctx = context();
    const result = await client(backend, { limiter }).call(understand(), ctx);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof AdmissionDeniedError);
      assert.equal(result.error.reason, 'rate_limit');
      assert.ok(result.error.waitSeconds > 0);
    }
    assert.equal(backend.calls, 0);
    assert.equal(ctx.reasoningCalls, 0);
    assert.equal(limiter.status().used, 1);
  });

  it('reports a timeout as provider_failure', async () => {
    const backend = new ScriptedBackend(['hang']);
    const ctx = context();
    const result = await client(backend, { timeoutMs: 20 }).call(understand(), ctx);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof ReasoningParseFailure);
      assert.equal(result.error.category, 'provider_failure');
      assert.equal(result.error.message, 'Reasoning call timed out after 20ms.');
    }
    assert.equal(ctx.reasoningCalls, 1);
    assert.equal(ctx.trace.last()?.event, 'reasoning_failure');
  });

  it('reports a thrown backend error as provider_failure', async () => {
    const backend = new ScriptedBackend([new Error('connection reset')]);
    const result = await client(backend).call(understand(), context());

    assert.equal(result.ok, false);
    if (!result.ok && result.error instanceof ReasoningParseFailure) {
      assert.equal(result.error.category, 'provider_failure');
      assert.equal(result.error.message, 'Reasoning backend failed: connection reset');
    }
  });

  it('flags a missing expected key as schema_violation', async () => {
    const backend = new ScriptedBackend(['{"sql": "SELECT 1"}']);
    const ctx = context();
    const result = await client(backend).call(understand(), ctx);

    assert.equal(result.ok, false);
    if (!result.ok && result.error instanceof ReasoningParseFailure) {
      assert.equal(result.error.category, 'schema_violation');
      assert.equal(result.error.message, 'Response is missing expected keys: intent.');
    }
    assert.equal(ctx.trace.last()?.summary, 'batch understand failed: schema_violation');
  });

  it('flags a payload that fails the schema', async () => {
    const backend = new ScriptedBackend(['{"intent": "DATA_QUERY", "confidence": "high"}']);
    const result = await client(backend).call(understand(), context());

    assert.equal(result.ok, false);
    if (!result.ok && result.error instanceof ReasoningParseFailure) {
      assert.equal(result.error.category, 'schema_violation');
      assert.match(result.error.message, /^Response failed schema validation: \/confidence: /);
    }
  });

  it('passes extraction failures through with their category', async () => {
    const backend = new ScriptedBackend(['']);
    const result = await client(backend).call(understand(), context());

    assert.equal(result.ok, false);
    if (!result.ok && result.error instanceof ReasoningParseFailure) {
      assert.equal(result.error.category, 'empty_response');
    }
  });

  it('counts every admitted call against the budget', async () => {
    const backend = new ScriptedBackend(['{"intent": "DATA_QUERY"}', '', '{"intent": "META_QUERY"}']);
    const gate = client(backend, { maxCallsPerQuery: 2 });
    const ctx = context();

    assert.equal((await gate.call(understand(), ctx)).ok, true);
    assert.equal((await gate.call(understand(), ctx)).ok, false);
    const third = await gate.call(understand(), ctx);

    assert.equal(third.ok, false);
    if (!third.ok) assert.ok(third.error instanceof AdmissionDeniedError);
    assert.equal(backend.calls, 2);
    assert.deepEqual(
      ctx.trace.entries().map((e) => e.event),
      ['reasoning_call', 'reasoning_failure', 'admission_denied'],
    );
  });
});
