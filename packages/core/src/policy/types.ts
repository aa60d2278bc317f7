/**
 * Safety gate types.
 *
 * The gate evaluates every candidate, first generation and corrections
 * alike, before it may reach the database.
 */

import type { SafetyRule } from '../errors.js';

export type { SafetyRule } from '../errors.js';

export interface RuleViolation {
  rule: SafetyRule;
  reason: string;
  suggestedFix?: string;
}

/** A join condition with no matching foreign key */
export interface FkViolation {
  condition: string;
  diagnostic: string;
  /** Correct JOIN conditions from the FK graph, when a path exists */
  suggestedPath?: string;
}

export interface SafetyConfig {
  forbiddenKeywords: string[];
  rowLimitCap: number;
  maxJoinHops: number;
}

export interface SafetyResult {
  approved: boolean;
  violations: RuleViolation[];
  fkViolations: FkViolation[];
  /** Non-blocking notes, e.g. the dialect parser could not read the statement */
  warnings: string[];
}
