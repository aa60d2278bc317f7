import { QueryGateError, type QueryGateErrorCode } from '@querygate/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'DB_NOT_CONFIGURED'
  | 'HISTORY_NOT_FOUND'
  | 'QUERY_BLOCKED'
  | 'QUERY_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, code: CliErrorCode = 'QUERY_BLOCKED', details?: unknown): CliError {
  return new CliError('policy', code, message, details);
}

const POLICY_CODES: readonly QueryGateErrorCode[] = ['SAFETY_VIOLATION', 'ADMISSION_DENIED'];

export function errorCode(error: unknown): string {
  if (error instanceof CliError || error instanceof QueryGateError) return error.code;
  return 'INTERNAL_ERROR';
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  if (error instanceof QueryGateError) {
    if (error.code === 'CONFIG_INVALID') return EXIT_CODE_USAGE;
    if (POLICY_CODES.includes(error.code)) return EXIT_CODE_POLICY;
  }
  return EXIT_CODE_RUNTIME;
}
