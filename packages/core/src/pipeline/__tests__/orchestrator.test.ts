import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolvePipelineConfig, type PipelineConfig } from '../../config.js';
import { createChinookDb, type ChinookDb } from '../../__tests__/chinook.js';
import { SqliteAdapter } from '../../db/adapters/sqlite.js';
import { ReasoningBatchClient } from '../../llm/batch-client.js';
import { RateLimiter } from '../../llm/rate-limiter.js';
import type { ChatMessage, Completion, CompletionOptions, ReasoningBackend } from '../../llm/types.js';
import { SchemaGraph } from '../../schema/graph.js';
import type { HistoryRecorder, QueryRunRecord } from '../../storage/repo.js';
import { QueryPipeline, normalizeIntent, summarizeResult, type QueryResponse } from '../orchestrator.js';

class ScriptedBackend implements ReasoningBackend {
  readonly name = 'scripted';
  readonly received: ChatMessage[][] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  get calls(): number {
    return this.received.length;
  }

  complete(messages: ChatMessage[], _opts: CompletionOptions): Promise<Completion> {
    const reply = this.replies[this.received.length] ?? '';
    this.received.push(messages);
    if (reply instanceof Error) return Promise.reject(reply);
    return Promise.resolve({ text: reply, provider: this.name });
  }
}

const understandData = (tables: string[], extra: Record<string, unknown> = {}): string =>
  JSON.stringify({ intent: 'DATA_QUERY', plan: { relevant_tables: tables, needs_data_context: false, ...extra } });
const generate = (sql: string): string => JSON.stringify({ sql });
const correct = (sql: string): string => JSON.stringify({ corrected_sql: sql });
const answer = (text: string): string => JSON.stringify({ answer: text });

const BRAZIL_COUNT = "SELECT COUNT(*) AS CustomerCount FROM Customer WHERE Country = 'Brazil' LIMIT 1";

function events(response: QueryResponse): string[] {
  return response.auditTrace.actions.map((a) => `${a.stage}:${a.event}`);
}

function transitions(response: QueryResponse): string[] {
  return response.auditTrace.actions.filter((a) => a.event === 'transition').map((a) => a.stage);
}

function assertTraceInvariants(response: QueryResponse): void {
  const actions = response.auditTrace.actions;
  assert.equal(actions[0]?.stage, 'START');
  actions.forEach((action, i) => assert.equal(action.seq, i + 1));
  const finals = actions.filter((a) => a.event === 'finalize');
  assert.equal(finals.length, 1);
  assert.equal(actions[actions.length - 1]?.event, 'finalize');
  assert.equal(actions[actions.length - 1]?.stage, response.auditTrace.finalStatus);
}

describe('QueryPipeline', () => {
  let fixture: ChinookDb;
  let adapter: SqliteAdapter;
  let graph: SchemaGraph;

  before(async () => {
    fixture = createChinookDb();
    adapter = new SqliteAdapter({ filepath: fixture.path });
    graph = await SchemaGraph.build(adapter);
  });

  after(async () => {
    await adapter.close();
    fixture.cleanup();
  });

  function pipeline(
    backend: ReasoningBackend,
    opts: { config?: Partial<PipelineConfig>; limiter?: RateLimiter; history?: HistoryRecorder } = {},
  ): QueryPipeline {
    const config = resolvePipelineConfig(opts.config);
    const client = new ReasoningBatchClient({
      backend,
      limiter: opts.limiter ?? new RateLimiter({ maxCalls: 100, windowSeconds: 60 }),
      timeoutMs: 1_000,
      maxCallsPerQuery: config.maxCallsPerQuery,
      maxTokens: config.maxTokens,
    });
    return new QueryPipeline({ graph, adapter, client, config, history: opts.history });
  }

  it('answers a simple count in three reasoning calls', async () => {
    const backend = new ScriptedBackend([
      understandData(['Customer']),
      generate(BRAZIL_COUNT),
      answer('There are 2 customers from Brazil.'),
    ]);
    const response = await pipeline(backend).run('How many customers are from Brazil?');

    assert.equal(response.success, true);
    assert.equal(response.answer, 'There are 2 customers from Brazil.');
    assert.equal(response.sqlUsed, BRAZIL_COUNT);
    assert.equal(response.rowCount, 1);
    assert.deepEqual(response.columns, ['CustomerCount']);
    assert.deepEqual(response.rows, [{ CustomerCount: 2 }]);
    assert.equal(response.isMetaQuery, false);
    assert.deepEqual(response.warnings, []);
    assert.equal(response.auditTrace.finalStatus, 'SUCCESS');
    assert.equal(response.auditTrace.correctionAttempts, 0);
    assert.equal(backend.calls, 3);

    assert.deepEqual(events(response), [
      'START:transition',
      'CLASSIFY:transition',
      'CLASSIFY:reasoning_call',
      'SCHEMA_LOOKUP:transition',
      'PLAN:transition',
      'GENERATE:transition',
      'GENERATE:reasoning_call',
      'SAFETY_CHECK:transition',
      'SAFETY_CHECK:safety_check',
      'EXECUTE:transition',
      'EXECUTE:execution',
      'RESULT_CHECK:transition',
      'SYNTHESIZE:transition',
      'SYNTHESIZE:reasoning_call',
      'SUCCESS:finalize',
    ]);
    assertTraceInvariants(response);
  });

  it('corrects a candidate rejected by the safety check', async () => {
    const fixed = "SELECT FirstName FROM Customer WHERE Country = 'Brazil' ORDER BY CustomerId LIMIT 10";
    const backend = new ScriptedBackend([
      understandData(['Customer']),
      generate('SELECT * FROM Customer'),
      correct(fixed),
      answer('Luis and Eduardo.'),
    ]);
    const response = await pipeline(backend).run('Which customers are from Brazil?');

    assert.equal(response.success, true);
    assert.equal(response.sqlUsed, fixed);
    assert.deepEqual(response.rows, [{ FirstName: 'Luis' }, { FirstName: 'Eduardo' }]);
    assert.equal(response.auditTrace.correctionAttempts, 1);
    assert.equal(backend.calls, 4);
    assert.deepEqual(transitions(response), [
      'START',
      'CLASSIFY',
      'SCHEMA_LOOKUP',
      'PLAN',
      'GENERATE',
      'SAFETY_CHECK',
      'CORRECT',
      'SAFETY_CHECK',
      'EXECUTE',
      'RESULT_CHECK',
      'SYNTHESIZE',
    ]);

    const correctPrompt = backend.received[2]?.map((m) => m.content).join('\n') ?? '';
    assert.ok(correctPrompt.includes('- SELECT * is not allowed. Fix: List the needed columns explicitly.'));
    assertTraceInvariants(response);
  });

  it('feeds the FK path into the correction of a bad join', async () => {
    const fixed =
      'SELECT ar.Name AS Artist, t.Name AS Track FROM Artist ar JOIN Album al ON al.ArtistId = ar.ArtistId ' +
      "JOIN Track t ON t.AlbumId = al.AlbumId WHERE ar.Name = 'AC/DC' LIMIT 10";
    const backend = new ScriptedBackend([
      understandData(['Artist', 'Track']),
      generate('SELECT ar.Name, t.Name FROM Artist ar JOIN Track t ON ar.ArtistId = t.AlbumId LIMIT 10'),
      correct(fixed),
      answer('AC/DC recorded For Those About To Rock (We Salute You).'),
    ]);
    const response = await pipeline(backend).run('Which tracks did AC/DC record?');

    assert.equal(response.success, true);
    assert.deepEqual(response.rows, [{ Artist: 'AC/DC', Track: 'For Those About To Rock (We Salute You)' }]);

    const rejected = response.auditTrace.actions.find((a) => a.event === 'safety_check');
    assert.equal(rejected?.summary, 'safety check failed: invalid_join');

    const correctPrompt = backend.received[2]?.map((m) => m.content).join('\n') ?? '';
    assert.ok(
      correctPrompt.includes(
        [
          'Use these join paths:',
          'Multi-hop path required: Artist → Album → Track',
          'JOIN conditions needed:',
          '  Album.ArtistId = Artist.ArtistId',
          '  Track.AlbumId = Album.AlbumId',
        ].join('\n'),
      ),
    );

    const plan = response.auditTrace.actions.find((a) => a.stage === 'PLAN');
    assert.equal(plan?.summary, 'planned 3 tables and 2 joins');
  });

  it('stops at the shared rate limit across queries', async () => {
    const limiter = new RateLimiter({ maxCalls: 5, windowSeconds: 60 });
    const ambiguous = JSON.stringify({ intent: 'ambiguous', clarification_questions: ['Which year?'] });
    const backend = new ScriptedBackend(Array.from({ length: 6 }, () => ambiguous));
    const gate = pipeline(backend, { limiter });

    for (let i = 0; i < 5; i++) {
      const response = await gate.run('Show me the best ones');
      assert.equal(response.auditTrace.finalStatus, 'BLOCKED');
      assert.equal(response.answer, 'Your question needs clarification:\n- Which year?');
    }

    const denied = await gate.run('Show me the best ones');
    assert.equal(denied.success, false);
    assert.equal(denied.auditTrace.finalStatus, 'BLOCKED');
    assert.match(denied.answer, /^Request not admitted: Reasoning rate limit reached; retry in \d+s\.$/);
    assert.equal(backend.calls, 5);
    assert.deepEqual(events(denied), [
      'START:transition',
      'CLASSIFY:transition',
      'CLASSIFY:admission_denied',
      'BLOCKED:finalize',
    ]);
    assertTraceInvariants(denied);
  });

  it('asks a default clarification when none is given', async () => {
    const backend = new ScriptedBackend([JSON.stringify({ intent: 'something else' })]);
    const response = await pipeline(backend).run('Tell me things');
    assert.equal(response.auditTrace.finalStatus, 'BLOCKED');
    assert.equal(
      response.answer,
      'Your question needs clarification:\n- Please rephrase the question with the specific data, time range or entity you mean.',
    );
  });

  it('continues with the restated question when an ambiguity was resolved', async () => {
    const backend = new ScriptedBackend([
      JSON.stringify({
        intent: 'AMBIGUOUS',
        resolved_query: 'How many customers are from Brazil?',
        assumptions: ['"our people" means customers'],
        plan: { relevant_tables: ['Customer'] },
      }),
      generate(BRAZIL_COUNT),
      answer('There are 2 customers from Brazil.'),
    ]);
    const response = await pipeline(backend).run('How many of our people are Brazilian?');

    assert.equal(response.success, true);
    assert.equal(response.answer, 'There are 2 customers from Brazil.');
    assert.equal(response.sqlUsed, BRAZIL_COUNT);
    assert.deepEqual(response.warnings, ['Assumed: "our people" means customers']);
    assert.equal(backend.calls, 3);
    assert.ok(transitions(response).includes('GENERATE'));

    const generatePrompt = backend.received[1]?.map((m) => m.content).join('\n') ?? '';
    assert.ok(generatePrompt.includes('Question: How many customers are from Brazil?'));
    assertTraceInvariants(response);
  });

  it('still blocks a resolved ambiguity that comes with clarification questions', async () => {
    const backend = new ScriptedBackend([
      JSON.stringify({
        intent: 'AMBIGUOUS',
        resolved_query: 'Show invoices from the last 30 days',
        clarification_questions: ['Which period counts as recent?'],
      }),
    ]);
    const response = await pipeline(backend).run('Show me recent orders');

    assert.equal(response.auditTrace.finalStatus, 'BLOCKED');
    assert.equal(response.answer, 'Your question needs clarification:\n- Which period counts as recent?');
    assert.equal(backend.calls, 1);
    assert.deepEqual(transitions(response), ['START', 'CLASSIFY']);
    assertTraceInvariants(response);
  });

  it('gives up with ERROR when execution keeps failing', async () => {
    const bad = 'SELECT Nope FROM Customer LIMIT 5';
    const backend = new ScriptedBackend([understandData(['Customer']), generate(bad), correct(bad), correct(bad)]);
    const response = await pipeline(backend).run('Show the nope of customers');

    assert.equal(response.success, false);
    assert.equal(response.auditTrace.finalStatus, 'ERROR');
    assert.equal(response.auditTrace.correctionAttempts, 2);
    assert.equal(response.sqlUsed, null);
    assert.match(
      response.answer,
      /^The query could not be completed after 2 correction attempt\(s\)\. Database error: .*no such column: Nope.*\. No data was returned\.$/,
    );
    assert.equal(backend.calls, 4);
    assert.equal(transitions(response).filter((s) => s === 'EXECUTE').length, 3);
    assertTraceInvariants(response);
  });

  it('blocks when corrections never pass the safety check', async () => {
    const bad = 'SELECT * FROM Customer LIMIT 5';
    const backend = new ScriptedBackend([understandData(['Customer']), generate(bad), correct(bad), correct(bad)]);
    const response = await pipeline(backend).run('Everything about customers');

    assert.equal(response.auditTrace.finalStatus, 'BLOCKED');
    assert.equal(response.answer, 'The generated SQL was rejected by the safety check. SELECT * is not allowed.');
    assert.equal(response.auditTrace.correctionAttempts, 2);
    assert.equal(transitions(response).includes('EXECUTE'), false);

    const final = response.auditTrace.actions[response.auditTrace.actions.length - 1];
    assert.equal(final?.detail?.lastCandidate, bad);
  });

  it('shares one retry cap between safety and execution corrections', async () => {
    const bad = 'SELECT Nope FROM Customer LIMIT 5';
    const backend = new ScriptedBackend([
      understandData(['Customer']),
      generate('SELECT * FROM Customer LIMIT 5'),
      correct(bad),
      correct(bad),
    ]);
    const response = await pipeline(backend).run('Show the nope of customers');

    assert.equal(response.success, false);
    assert.equal(response.auditTrace.finalStatus, 'ERROR');
    assert.equal(response.auditTrace.correctionAttempts, 2);
    assert.match(response.answer, /^The query could not be completed after 2 correction attempt\(s\)\. /);
    assert.equal(backend.calls, 4);

    const correctCalls = response.auditTrace.actions.filter(
      (a) => a.event === 'reasoning_call' && a.batch === 'correct',
    );
    assert.equal(correctCalls.length, 2);
    assert.deepEqual(transitions(response).slice(5), [
      'SAFETY_CHECK',
      'CORRECT',
      'SAFETY_CHECK',
      'EXECUTE',
      'CORRECT',
      'SAFETY_CHECK',
      'EXECUTE',
    ]);
    assertTraceInvariants(response);
  });

  it('honours a retry limit of zero', async () => {
    const backend = new ScriptedBackend([understandData(['Customer']), generate('SELECT * FROM Customer LIMIT 5')]);
    const response = await pipeline(backend, { config: { maxRetries: 0 } }).run('Everything about customers');
    assert.equal(response.auditTrace.finalStatus, 'BLOCKED');
    assert.equal(response.auditTrace.correctionAttempts, 0);
    assert.equal(backend.calls, 2);
  });

  it('answers an empty result without a synthesis call', async () => {
    const sql = "SELECT FirstName FROM Customer WHERE Country = 'Peru' LIMIT 5";
    const backend = new ScriptedBackend([understandData(['Customer']), generate(sql)]);
    const response = await pipeline(backend).run('Customers from Peru?');

    assert.equal(response.success, true);
    assert.equal(response.answer, 'No rows found for this question.');
    assert.equal(response.sqlUsed, sql);
    assert.equal(response.rowCount, 0);
    assert.ok(response.warnings.includes('Query returned no rows.'));
    assert.equal(backend.calls, 2);
    const synth = response.auditTrace.actions.find((a) => a.stage === 'SYNTHESIZE');
    assert.equal(synth?.summary, 'empty result; no reasoning call');
  });

  it('answers schema questions from the graph through the synthesize batch', async () => {
    const backend = new ScriptedBackend([
      JSON.stringify({ intent: 'META_QUERY' }),
      answer('Artist has two columns: the ArtistId key and Name.'),
    ]);
    const response = await pipeline(backend).run('What columns does the Artist table have?');

    assert.equal(response.success, true);
    assert.equal(response.isMetaQuery, true);
    assert.equal(response.sqlUsed, null);
    assert.equal(response.answer, 'Artist has two columns: the ArtistId key and Name.');
    assert.deepEqual(response.rows, [{ table: 'Artist', columns: 'ArtistId INTEGER PK, Name TEXT' }]);
    assert.deepEqual(response.warnings, []);
    assert.equal(backend.calls, 2);
    assert.deepEqual(events(response), [
      'START:transition',
      'CLASSIFY:transition',
      'CLASSIFY:reasoning_call',
      'SCHEMA_LOOKUP:transition',
      'META_ANSWER:transition',
      'META_ANSWER:reasoning_call',
      'SUCCESS:finalize',
    ]);

    const metaPrompt = backend.received[1]?.map((m) => m.content).join('\n') ?? '';
    assert.ok(metaPrompt.includes('Schema facts:\nArtist has columns: ArtistId INTEGER PK, Name TEXT.'));
    assertTraceInvariants(response);
  });

  it('falls back to the schema facts when the schema answer cannot be synthesized', async () => {
    const backend = new ScriptedBackend([JSON.stringify({ intent: 'meta' })]);
    const response = await pipeline(backend).run('How many tables are there?');

    assert.equal(response.success, true);
    assert.equal(
      response.answer,
      'The database has 7 tables: Album, Artist, Customer, Employee, Genre, Invoice, Track.',
    );
    assert.deepEqual(response.warnings, ['Answer synthesis failed (empty_response); showing the schema facts.']);
    assert.equal(response.rowCount, 7);
    assert.equal(backend.calls, 2);
  });

  it('falls back to a result summary when synthesis fails', async () => {
    const backend = new ScriptedBackend([understandData(['Customer']), generate(BRAZIL_COUNT), '']);
    const response = await pipeline(backend).run('How many customers are from Brazil?');

    assert.equal(response.success, true);
    assert.equal(response.answer, 'CustomerCount: 2');
    assert.deepEqual(response.warnings, [
      'Answer synthesis failed (empty_response); showing a summary of the result.',
    ]);
  });

  it('reports a provider failure as ERROR', async () => {
    const backend = new ScriptedBackend([new Error('boom')]);
    const response = await pipeline(backend).run('How many customers are from Brazil?');
    assert.equal(response.auditTrace.finalStatus, 'ERROR');
    assert.equal(response.answer, 'The reasoning service failed: Reasoning backend failed: boom');
  });

  it('blocks on an unusable generation', async () => {
    const backend = new ScriptedBackend([understandData(['Customer']), 'I am not sure how to write that query.']);
    const response = await pipeline(backend).run('How many customers are from Brazil?');
    assert.equal(response.auditTrace.finalStatus, 'BLOCKED');
    assert.equal(
      response.answer,
      'The reasoning service returned an unusable response (invalid_format). Please try rephrasing the question.',
    );
  });

  it('drops unknown planned tables and samples when asked', async () => {
    const backend = new ScriptedBackend([
      understandData(['Customer', 'Playlist'], { needs_data_context: true }),
      generate(BRAZIL_COUNT),
      answer('Two.'),
    ]);
    const response = await pipeline(backend).run('How many customers are from Brazil?');

    assert.ok(response.warnings.includes('Plan referenced unknown table Playlist; ignored.'));
    const sampled = response.auditTrace.actions.find((a) => a.stage === 'SAMPLE_DATA');
    assert.equal(sampled?.summary, 'sampled 1 of 1 tables');
    const generatePrompt = backend.received[1]?.map((m) => m.content).join('\n') ?? '';
    assert.ok(generatePrompt.includes('Luis'));
  });

  it('records every run in the history and survives a failing recorder', async () => {
    const runs: QueryRunRecord[] = [];
    const recorder: HistoryRecorder = { recordRun: (run) => void runs.push(run) };
    const backend = new ScriptedBackend([understandData(['Customer']), generate(BRAZIL_COUNT), answer('Two.')]);
    const response = await pipeline(backend, { history: recorder }).run('How many customers are from Brazil?');

    assert.equal(runs.length, 1);
    assert.equal(runs[0]?.id, response.queryId);
    assert.equal(runs[0]?.status, 'SUCCESS');
    assert.equal(runs[0]?.sql, BRAZIL_COUNT);
    assert.equal(runs[0]?.trace.length, response.auditTrace.actions.length);

    const failing: HistoryRecorder = {
      recordRun: () => {
        throw new Error('disk full');
      },
    };
    const second = await pipeline(new ScriptedBackend([JSON.stringify({ intent: 'META_QUERY' })]), {
      history: failing,
    }).run('List the tables');
    assert.equal(second.success, true);
  });
});

describe('normalizeIntent', () => {
  it('maps labels and spellings to the three intents', () => {
    assert.equal(normalizeIntent('data query'), 'DATA_QUERY');
    assert.equal(normalizeIntent('DATA'), 'DATA_QUERY');
    assert.equal(normalizeIntent('meta-query'), 'META_QUERY');
    assert.equal(normalizeIntent('Ambiguous'), 'AMBIGUOUS');
    assert.equal(normalizeIntent('chit-chat'), 'AMBIGUOUS');
  });
});

describe('summarizeResult', () => {
  it('describes single values and row sets', () => {
    assert.equal(
      summarizeResult({ columns: ['n'], rows: [{ n: 4 }], rowCount: 1, truncated: false, execMs: 0 }),
      'n: 4',
    );
    assert.equal(
      summarizeResult({
        columns: ['a', 'b'],
        rows: [
          { a: 1, b: 2 },
          { a: 3, b: 4 },
        ],
        rowCount: 2,
        truncated: true,
        execMs: 0,
      }),
      'Returned 2 rows (more rows exist) with columns a, b.',
    );
  });
});
