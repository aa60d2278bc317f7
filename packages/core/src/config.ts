/**
 * Pipeline configuration: defaults plus environment overrides.
 *
 * Every knob has a conservative default; `loadConfigFromEnv` only replaces
 * the values whose variables are set.
 */

import { ConfigError } from './errors.js';
import type { LogLevel } from './logging.js';

export interface PipelineConfig {
  /** Keywords that block a statement when they appear as a word outside literals and comments */
  forbiddenKeywords: string[];
  /** Largest LIMIT the safety gate accepts */
  rowLimitCap: number;
  /** Corrections allowed per query, shared by safety and execution failures */
  maxRetries: number;
  /** Sliding window of the process-wide reasoning rate limit, in seconds */
  rateLimitWindowSeconds: number;
  /** Reasoning calls admitted per window */
  rateLimitCount: number;
  /** Per-call timeout for the reasoning backend */
  reasoningTimeoutMs: number;
  /** Reasoning calls a single query may make */
  maxCallsPerQuery: number;
  /** Completion token cap passed to the backend */
  maxTokens: number;
  /** Rows fetched per table when the plan asks for data context */
  sampleRows: number;
  /** Tables sampled at most when the plan asks for data context */
  maxSampledTables: number;
  /** Longest FK path considered by the join validator */
  maxJoinHops: number;
}

export interface BackendSettings {
  apiKey?: string;
  model: string;
  baseURL?: string;
}

export interface ReasoningConfig {
  primary: BackendSettings;
  /** Used when the primary provider fails (quota, outage) */
  fallback?: BackendSettings;
}

export interface QueryGateConfig {
  pipeline: PipelineConfig;
  reasoning: ReasoningConfig;
  logLevel: LogLevel;
}

export const DEFAULT_MODEL = 'gpt-4o-mini';

export const DEFAULT_FORBIDDEN_KEYWORDS: readonly string[] = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'MERGE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'ATTACH',
  'DETACH',
  'PRAGMA',
  'VACUUM',
  'REINDEX',
  'COPY',
  'CALL',
  'EXECUTE',
  'LOCK',
];

export function defaultPipelineConfig(): PipelineConfig {
  return {
    forbiddenKeywords: [...DEFAULT_FORBIDDEN_KEYWORDS],
    rowLimitCap: 1000,
    maxRetries: 2,
    rateLimitWindowSeconds: 60,
    rateLimitCount: 5,
    reasoningTimeoutMs: 30_000,
    maxCallsPerQuery: 5,
    maxTokens: 2048,
    sampleRows: 3,
    maxSampledTables: 3,
    maxJoinHops: 3,
  };
}

export function resolvePipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return { ...defaultPipelineConfig(), ...overrides };
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readInt(env: NodeJS.ProcessEnv, name: string, min: number): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a whole number, got "${raw}".`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${value}.`);
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Build the full configuration from environment variables.
 *
 * Recognised variables: `OPENAI_API_KEY`, `QUERYGATE_MODEL`, `QUERYGATE_BASE_URL`,
 * `QUERYGATE_FALLBACK_API_KEY`, `QUERYGATE_FALLBACK_MODEL`, `QUERYGATE_FALLBACK_BASE_URL`,
 * `QUERYGATE_LOG_LEVEL`, `QUERYGATE_FORBIDDEN_KEYWORDS` (comma separated) and the
 * numeric limits `QUERYGATE_ROW_LIMIT_CAP`, `QUERYGATE_MAX_RETRIES`,
 * `QUERYGATE_RATE_LIMIT_COUNT`, `QUERYGATE_RATE_LIMIT_WINDOW_S`,
 * `QUERYGATE_REASONING_TIMEOUT_MS`, `QUERYGATE_MAX_CALLS_PER_QUERY`.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): QueryGateConfig {
  const overrides: Partial<PipelineConfig> = {};

  const numeric: Array<[keyof PipelineConfig, string, number]> = [
    ['rowLimitCap', 'QUERYGATE_ROW_LIMIT_CAP', 1],
    ['maxRetries', 'QUERYGATE_MAX_RETRIES', 0],
    ['rateLimitCount', 'QUERYGATE_RATE_LIMIT_COUNT', 1],
    ['rateLimitWindowSeconds', 'QUERYGATE_RATE_LIMIT_WINDOW_S', 1],
    ['reasoningTimeoutMs', 'QUERYGATE_REASONING_TIMEOUT_MS', 1],
    ['maxCallsPerQuery', 'QUERYGATE_MAX_CALLS_PER_QUERY', 1],
  ];
  for (const [key, name, min] of numeric) {
    const value = readInt(env, name, min);
    if (value !== undefined) {
      Object.assign(overrides, { [key]: value });
    }
  }

  const keywords = readString(env, 'QUERYGATE_FORBIDDEN_KEYWORDS');
  if (keywords) {
    overrides.forbiddenKeywords = keywords
      .split(',')
      .map((kw) => kw.trim().toUpperCase())
      .filter((kw) => kw.length > 0);
  }

  const rawLevel = readString(env, 'QUERYGATE_LOG_LEVEL') ?? 'info';
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(`QUERYGATE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${rawLevel}".`);
  }

  const fallbackModel = readString(env, 'QUERYGATE_FALLBACK_MODEL');
  const fallbackBaseURL = readString(env, 'QUERYGATE_FALLBACK_BASE_URL');
  const reasoning: ReasoningConfig = {
    primary: {
      apiKey: readString(env, 'OPENAI_API_KEY'),
      model: readString(env, 'QUERYGATE_MODEL') ?? DEFAULT_MODEL,
      baseURL: readString(env, 'QUERYGATE_BASE_URL'),
    },
  };
  if (fallbackModel || fallbackBaseURL) {
    reasoning.fallback = {
      apiKey: readString(env, 'QUERYGATE_FALLBACK_API_KEY') ?? reasoning.primary.apiKey,
      model: fallbackModel ?? reasoning.primary.model,
      baseURL: fallbackBaseURL,
    };
  }

  return {
    pipeline: resolvePipelineConfig(overrides),
    reasoning,
    logLevel: rawLevel,
  };
}
