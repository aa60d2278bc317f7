/**
 * Process-level wiring.
 * Builds the shared collaborators (adapter, schema graph, rate limiter, backend)
 * once and hands them to a QueryPipeline.
 */

import { loadConfigFromEnv, type QueryGateConfig } from './config.js';
import { createAdapter, parseConnectionTarget, type ConnectionConfig } from './db/execute.js';
import type { ExecutionAdapter } from './db/types.js';
import { describeError } from './errors.js';
import { createLogger, type Logger } from './logging.js';
import { createBackend } from './llm/backend.js';
import { ReasoningBatchClient } from './llm/batch-client.js';
import { RateLimiter } from './llm/rate-limiter.js';
import type { ReasoningBackend } from './llm/types.js';
import { QueryPipeline, type QueryResponse } from './pipeline/orchestrator.js';
import { SchemaGraph } from './schema/graph.js';
import type { HistoryRecorder } from './storage/repo.js';

export interface QueryGateOptions {
  /** SQLite file path or postgres:// URL */
  target: string | ConnectionConfig;
  config?: QueryGateConfig;
  logger?: Logger;
  history?: HistoryRecorder;
  /** Replaces the configured OpenAI backend */
  backend?: ReasoningBackend;
  /** Shared across gates that must respect one process-wide cap */
  limiter?: RateLimiter;
}

export interface QueryGate {
  readonly pipeline: QueryPipeline;
  readonly graph: SchemaGraph;
  readonly adapter: ExecutionAdapter;
  readonly limiter: RateLimiter;
  ask(question: string): Promise<QueryResponse>;
  close(): Promise<void>;
}

/**
 * Connect, introspect and assemble a pipeline.
 * Throws SchemaIntrospectionError when the schema cannot be read; the gate never serves without a graph.
 */
export async function createQueryGate(opts: QueryGateOptions): Promise<QueryGate> {
  const config = opts.config ?? loadConfigFromEnv();
  const logger = opts.logger ?? createLogger({ level: config.logLevel });
  const connection = typeof opts.target === 'string' ? parseConnectionTarget(opts.target) : opts.target;

  const backend = opts.backend ?? createBackend(config.reasoning, logger);

  const adapter = createAdapter(connection, logger);
  let graph: SchemaGraph;
  try {
    graph = await SchemaGraph.build(adapter);
  } catch (err: unknown) {
    await adapter.close();
    throw err;
  }
  logger.info({ dialect: adapter.dialect, tables: graph.tables().length, edges: graph.edgeCount }, 'schema graph built');

  const limiter =
    opts.limiter ??
    new RateLimiter({
      maxCalls: config.pipeline.rateLimitCount,
      windowSeconds: config.pipeline.rateLimitWindowSeconds,
    });
  const client = new ReasoningBatchClient({
    backend,
    limiter,
    timeoutMs: config.pipeline.reasoningTimeoutMs,
    maxCallsPerQuery: config.pipeline.maxCallsPerQuery,
    maxTokens: config.pipeline.maxTokens,
    logger,
  });
  const pipeline = new QueryPipeline({
    graph,
    adapter,
    client,
    config: config.pipeline,
    history: opts.history,
    logger,
  });

  return {
    pipeline,
    graph,
    adapter,
    limiter,
    ask: (question) => pipeline.run(question),
    close: async () => {
      try {
        await adapter.close();
      } catch (err: unknown) {
        logger.warn({ err: describeError(err) }, 'closing the database connection failed');
      }
    },
  };
}
