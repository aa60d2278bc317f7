/**
 * Structured-object extraction from free-form backend text.
 *
 * Models wrap their object in prose, fences or apologies. We locate the
 * first top-level brace-balanced block by scanning character by character
 * (tracking string and escape state), parse it, and fall back to a small
 * ordered set of textual fixes when strict parsing fails.
 */

import { ReasoningParseFailure } from '../errors.js';

export type AutoFix = 'strip_comments' | 'trailing_commas' | 'single_quotes';

export interface ExtractedObject {
  value: Record<string, unknown>;
  /** Text outside the object, trimmed and joined with one space */
  discardedText: string;
  fixesApplied: AutoFix[];
}

export type ExtractOutcome = ({ ok: true } & ExtractedObject) | { ok: false; failure: ReasoningParseFailure };

const PROVIDER_ERROR_PATTERNS: readonly RegExp[] = [
  /rate limit/i,
  /quota exceeded/i,
  /api error/i,
  /authentication failed/i,
  /invalid api key/i,
  /service unavailable/i,
  /request failed/i,
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function looksLikeProviderError(text: string): boolean {
  return PROVIDER_ERROR_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Index one past the `}` closing the block that opens at `start`, or -1 when the text ends first.
 * Braces inside double-quoted strings do not count.
 */
export function findBlockEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function stripComments(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      i++;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      i++;
    } else if (ch === '/' && next === '/') {
      const newline = text.indexOf('\n', i);
      i = newline === -1 ? text.length : newline;
    } else if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close === -1 ? text.length : close + 2;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

const FIXES: ReadonlyArray<{ name: AutoFix; apply: (text: string) => string }> = [
  { name: 'strip_comments', apply: stripComments },
  { name: 'trailing_commas', apply: (text) => text.replace(/,\s*([}\]])/g, '$1') },
  {
    name: 'single_quotes',
    // Only when the block has no double quotes at all; otherwise apostrophes inside values would break.
    apply: (text) => (text.includes('"') ? text : text.replace(/'/g, '"')),
  },
];

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err: unknown) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Parse one balanced block, applying fixes in order until it parses.
 * Fixes accumulate; only fixes that changed the text are reported.
 */
export function parseBlock(
  block: string,
): { ok: true; value: unknown; fixesApplied: AutoFix[] } | { ok: false; error: string } {
  const strict = tryParse(block);
  if (strict.ok) return { ok: true, value: strict.value, fixesApplied: [] };

  let current = block;
  const fixesApplied: AutoFix[] = [];
  for (const fix of FIXES) {
    const fixed = fix.apply(current);
    if (fixed === current) continue;
    current = fixed;
    fixesApplied.push(fix.name);
    const attempt = tryParse(current);
    if (attempt.ok) return { ok: true, value: attempt.value, fixesApplied };
  }
  return { ok: false, error: strict.error };
}

function joinDiscarded(before: string, after: string): string {
  return [before.trim(), after.trim()].filter((part) => part.length > 0).join(' ');
}

/**
 * Extract the first parseable top-level object from `raw`.
 *
 * Failure categories:
 * - `empty_response`: nothing but whitespace
 * - `provider_failure`: no object, and the text reads like a provider error
 * - `invalid_format`: no object, or no block parses, or the value is not an object
 * - `truncated_output`: an object opens but never closes
 */
export function extractFirstObject(raw: string): ExtractOutcome {
  if (raw.trim().length === 0) {
    return { ok: false, failure: new ReasoningParseFailure('empty_response', 'Backend returned an empty response.', raw) };
  }

  const first = raw.indexOf('{');
  if (first === -1) {
    if (looksLikeProviderError(raw)) {
      return {
        ok: false,
        failure: new ReasoningParseFailure('provider_failure', 'Backend returned a provider error instead of an object.', raw),
      };
    }
    return { ok: false, failure: new ReasoningParseFailure('invalid_format', 'No structured object found in response.', raw) };
  }

  let firstError: string | undefined;
  let start = first;
  while (start !== -1) {
    const end = findBlockEnd(raw, start);
    if (end === -1) {
      if (firstError !== undefined) break;
      return {
        ok: false,
        failure: new ReasoningParseFailure('truncated_output', 'Structured object is not closed; output looks truncated.', raw),
      };
    }

    const parsed = parseBlock(raw.slice(start, end));
    if (parsed.ok) {
      if (!isRecord(parsed.value)) {
        return { ok: false, failure: new ReasoningParseFailure('invalid_format', 'Parsed value is not an object.', raw) };
      }
      return {
        ok: true,
        value: parsed.value,
        discardedText: joinDiscarded(raw.slice(0, start), raw.slice(end)),
        fixesApplied: parsed.fixesApplied,
      };
    }

    firstError ??= parsed.error;
    start = raw.indexOf('{', end);
  }

  return {
    ok: false,
    failure: new ReasoningParseFailure('invalid_format', `Structured object could not be parsed: ${firstError}`, raw),
  };
}
