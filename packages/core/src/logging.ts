/**
 * Structured logging for the pipeline.
 * One root pino logger per process; components take a child bound to their name.
 */

import { pino, destination, type Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  /** Emitted as `system` on every line */
  system?: string;
  /** File descriptor 2 keeps stdout free for command output */
  stream?: 'stdout' | 'stderr';
}

const REDACT_PATHS = ['apiKey', 'password', '*.apiKey', '*.password', 'headers.authorization'];

export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino(
    {
      level: opts.level ?? 'info',
      base: { system: opts.system ?? 'querygate' },
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    },
    destination(opts.stream === 'stderr' ? 2 : 1),
  );
}

/** Logger that drops everything; used by tests and library callers that bring no logger. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
