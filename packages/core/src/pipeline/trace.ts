/**
 * Append-only audit trace.
 * Created when a query starts; every stage, reasoning call and check adds one entry.
 */

export type PipelineStage =
  | 'START'
  | 'CLASSIFY'
  | 'SCHEMA_LOOKUP'
  | 'META_ANSWER'
  | 'PLAN'
  | 'SAMPLE_DATA'
  | 'GENERATE'
  | 'SAFETY_CHECK'
  | 'CORRECT'
  | 'EXECUTE'
  | 'RESULT_CHECK'
  | 'SYNTHESIZE'
  | 'SUCCESS'
  | 'BLOCKED'
  | 'ERROR';

export type AuditEvent =
  | 'transition'
  | 'reasoning_call'
  | 'reasoning_failure'
  | 'admission_denied'
  | 'safety_check'
  | 'execution'
  | 'warning'
  | 'finalize';

export interface AuditEntry {
  seq: number;
  stage: PipelineStage;
  event: AuditEvent;
  summary: string;
  /** Milliseconds since the query started */
  elapsedMs: number;
  batch?: string;
  detail?: Record<string, unknown>;
}

export interface AuditInput {
  stage: PipelineStage;
  event: AuditEvent;
  summary: string;
  batch?: string;
  detail?: Record<string, unknown>;
}

export class AuditTrace {
  private readonly items: AuditEntry[] = [];

  constructor(
    private readonly startedAt: number,
    private readonly clock: () => number = () => performance.now(),
  ) {}

  record(input: AuditInput): AuditEntry {
    const entry: AuditEntry = {
      seq: this.items.length + 1,
      elapsedMs: Math.max(0, Math.round(this.clock() - this.startedAt)),
      ...input,
    };
    this.items.push(Object.freeze(entry));
    return entry;
  }

  entries(): readonly AuditEntry[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  last(): AuditEntry | undefined {
    return this.items[this.items.length - 1];
  }

  toJSON(): AuditEntry[] {
    return [...this.items];
  }
}
