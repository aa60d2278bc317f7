/**
 * Safety gate: every candidate passes through here before execution.
 */

import type { Dialect } from '../db/types.js';
import type { AuditTrace, PipelineStage } from '../pipeline/trace.js';
import type { SchemaGraph } from '../schema/graph.js';
import { extractJoinConditions } from '../schema/joins.js';
import { parseSql } from './parse.js';
import { checkLimit, checkStatement, checkWildcard, maskSql } from './rules.js';
import type { FkViolation, RuleViolation, SafetyConfig, SafetyResult } from './types.js';

export interface ValidateOptions {
  /** When given, exactly one entry summarising the outcome is appended */
  trace?: AuditTrace;
  stage?: PipelineStage;
}

export class SafetyValidator {
  constructor(
    private readonly graph: SchemaGraph,
    private readonly config: SafetyConfig,
    private readonly dialect: Dialect = 'sqlite',
  ) {}

  validate(sql: string, opts: ValidateOptions = {}): SafetyResult {
    const masked = maskSql(sql);
    const violations: RuleViolation[] = [
      ...checkStatement(masked, this.config.forbiddenKeywords),
      ...checkWildcard(masked),
      ...checkLimit(masked, this.config.rowLimitCap),
    ];
    const warnings: string[] = [];

    const parsed = parseSql(sql, this.dialect);
    if (!parsed.ok) {
      warnings.push(`${parsed.error}; text rules applied.`);
    } else if (!violations.some((v) => v.rule === 'forbidden_statement')) {
      if (parsed.statementCount > 1) {
        violations.push({
          rule: 'forbidden_statement',
          reason: `Multiple statements detected (${parsed.statementCount}).`,
          suggestedFix: 'Return one SELECT statement.',
        });
      }
      const writes = parsed.kinds.filter((kind) => kind !== 'select');
      if (writes.length > 0) {
        violations.push({
          rule: 'forbidden_statement',
          reason: `Statement kind ${writes.map((k) => k.toUpperCase()).join(', ')} is not allowed.`,
          suggestedFix: 'Only read-only SELECT queries are allowed.',
        });
      }
    }

    const fkViolations: FkViolation[] = [];
    for (const join of extractJoinConditions(sql)) {
      const left = this.graph.canonicalTable(join.leftTable);
      const right = this.graph.canonicalTable(join.rightTable);
      if (!left || !right) {
        warnings.push(`Join ${join.text} involves a derived or unknown table; not checked against foreign keys.`);
        continue;
      }
      const check = this.graph.validateJoinCondition(join.text, this.config.maxJoinHops);
      if (check.valid) continue;

      const suggestedPath = this.graph.suggestJoinPath(left, right, this.config.maxJoinHops);
      fkViolations.push({ condition: join.text, diagnostic: check.diagnostic, suggestedPath });
      violations.push({ rule: 'invalid_join', reason: check.diagnostic, suggestedFix: suggestedPath });
    }

    const result: SafetyResult = {
      approved: violations.length === 0,
      violations,
      fkViolations,
      warnings,
    };

    if (opts.trace) {
      const rules = [...new Set(violations.map((v) => v.rule))];
      opts.trace.record({
        stage: opts.stage ?? 'SAFETY_CHECK',
        event: 'safety_check',
        summary: result.approved ? 'safety check passed' : `safety check failed: ${rules.join(', ')}`,
        detail: { sql, approved: result.approved, violations, fkViolations, warnings },
      });
    }
    return result;
  }
}
