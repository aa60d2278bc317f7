/**
 * Typed failures raised or returned by the query pipeline.
 * Every class carries a stable `code` so callers can branch without string matching.
 */

export type QueryGateErrorCode =
  | 'ADMISSION_DENIED'
  | 'REASONING_PARSE_FAILED'
  | 'SAFETY_VIOLATION'
  | 'EXECUTION_FAILED'
  | 'SCHEMA_INTROSPECTION_FAILED'
  | 'CONFIG_INVALID';

export class QueryGateError extends Error {
  readonly code: QueryGateErrorCode;
  readonly details?: unknown;

  constructor(code: QueryGateErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export type AdmissionDenialReason = 'rate_limit' | 'query_budget';

/** A reasoning call was refused before reaching the backend. */
export class AdmissionDeniedError extends QueryGateError {
  readonly reason: AdmissionDenialReason;
  /** Seconds until the oldest admitted call leaves the window (0 for budget denials). */
  readonly waitSeconds: number;

  constructor(reason: AdmissionDenialReason, message: string, waitSeconds = 0) {
    super('ADMISSION_DENIED', message, { reason, waitSeconds });
    this.reason = reason;
    this.waitSeconds = waitSeconds;
  }
}

export type ParseFailureCategory =
  | 'empty_response'
  | 'invalid_format'
  | 'provider_failure'
  | 'truncated_output'
  | 'schema_violation';

export class ReasoningParseFailure extends QueryGateError {
  readonly category: ParseFailureCategory;
  /** First characters of the raw backend text, for the audit trace. */
  readonly rawPreview: string;

  constructor(category: ParseFailureCategory, message: string, raw = '') {
    super('REASONING_PARSE_FAILED', message, { category });
    this.category = category;
    this.rawPreview = raw.slice(0, 200);
  }
}

export type SafetyRule =
  | 'forbidden_statement'
  | 'unqualified_wildcard'
  | 'missing_limit'
  | 'unbounded_limit'
  | 'invalid_join';

export class SafetyViolation extends QueryGateError {
  readonly rule: SafetyRule;
  readonly suggestedFix?: string;

  constructor(rule: SafetyRule, message: string, suggestedFix?: string) {
    super('SAFETY_VIOLATION', message, { rule });
    this.rule = rule;
    this.suggestedFix = suggestedFix;
  }
}

export class ExecutionError extends QueryGateError {
  readonly sql: string;

  constructor(message: string, sql: string, cause?: unknown) {
    super('EXECUTION_FAILED', message, { cause: describeError(cause) });
    this.sql = sql;
  }
}

/** Fatal at startup: the pipeline is never constructed without a schema graph. */
export class SchemaIntrospectionError extends QueryGateError {
  constructor(message: string, cause?: unknown) {
    super('SCHEMA_INTROSPECTION_FAILED', message, { cause: describeError(cause) });
  }
}

export class ConfigError extends QueryGateError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
