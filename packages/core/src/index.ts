/**
 * @querygate/core barrel export
 *
 * Query pipeline shared by the CLI and any other front end.
 */

// Errors
export {
  QueryGateError,
  AdmissionDeniedError,
  ReasoningParseFailure,
  SafetyViolation,
  ExecutionError,
  SchemaIntrospectionError,
  ConfigError,
  describeError,
} from './errors.js';
export type { QueryGateErrorCode, AdmissionDenialReason, ParseFailureCategory, SafetyRule } from './errors.js';

// Configuration
export {
  DEFAULT_MODEL,
  DEFAULT_FORBIDDEN_KEYWORDS,
  defaultPipelineConfig,
  resolvePipelineConfig,
  loadConfigFromEnv,
} from './config.js';
export type { PipelineConfig, BackendSettings, ReasoningConfig, QueryGateConfig } from './config.js';

// Logging
export { createLogger, silentLogger } from './logging.js';
export type { Logger, LogLevel, LoggerOptions } from './logging.js';

// Database types and adapters
export type {
  Dialect,
  SchemaSnapshot,
  TableInfo,
  ColumnInfo,
  ForeignKeyInfo,
  ExecuteResult,
  ExecuteLimits,
  ExecutionAdapter,
} from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';
export { createAdapter, parseConnectionTarget } from './db/execute.js';
export type { ConnectionConfig } from './db/execute.js';
export { SqliteAdapter } from './db/adapters/sqlite.js';
export type { SqliteConnectionConfig } from './db/adapters/sqlite.js';
export { PostgresAdapter } from './db/adapters/postgres.js';
export type { PgConnectionConfig } from './db/adapters/postgres.js';

// Schema graph
export { SchemaGraph, DEFAULT_MAX_HOPS, edgeCondition, formatJoinPath, joinConditions } from './schema/graph.js';
export type { FkEdge, JoinPath, JoinValidation } from './schema/graph.js';
export { extractJoinConditions } from './schema/joins.js';
export type { JoinCondition } from './schema/joins.js';

// Safety validator
export { SafetyValidator } from './policy/validator.js';
export type { ValidateOptions } from './policy/validator.js';
export type { RuleViolation, FkViolation, SafetyConfig, SafetyResult } from './policy/types.js';
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';

// Reasoning
export { RateLimiter } from './llm/rate-limiter.js';
export type { RateLimiterOptions, RateLimiterStatus } from './llm/rate-limiter.js';
export { extractFirstObject } from './llm/extract.js';
export type { AutoFix, ExtractedObject, ExtractOutcome } from './llm/extract.js';
export { ReasoningBatchClient } from './llm/batch-client.js';
export type { BatchRequest, BatchResult, BatchFailure, CallContext, BatchClientOptions } from './llm/batch-client.js';
export { OpenAIBackend, FallbackBackend, createBackend } from './llm/backend.js';
export type {
  BatchId,
  ChatMessage,
  Completion,
  CompletionOptions,
  ReasoningBackend,
  IntentLabel,
} from './llm/types.js';
export { buildSchemaContext, buildSchemaOverview } from './llm/schema.js';
export { compileBatchValidators } from './llm/schema_json.js';
export type { BatchValidators } from './llm/schema_json.js';

// Pipeline
export { QueryPipeline, normalizeIntent, summarizeResult } from './pipeline/orchestrator.js';
export type { QueryResponse, AuditSummary, QueryPipelineDeps } from './pipeline/orchestrator.js';
export { PipelineState } from './pipeline/state.js';
export type { FinalStatus, Intent, QueryPlan, SqlCandidate } from './pipeline/state.js';
export { AuditTrace } from './pipeline/trace.js';
export type { AuditEntry, AuditEvent, PipelineStage } from './pipeline/trace.js';
export { checkResult } from './pipeline/result-check.js';

// Local storage
export { LocalStore, defaultDbPath } from './storage/sqlite.js';
export type {
  RunStatus,
  QueryRunRecord,
  HistoryRecorder,
  HistoryListItem,
  HistoryDetail,
} from './storage/repo.js';

// Wiring
export { createQueryGate } from './ask.js';
export type { QueryGate, QueryGateOptions } from './ask.js';
