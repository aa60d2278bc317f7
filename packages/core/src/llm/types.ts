/**
 * Reasoning backend contract and the payload shapes each batch returns.
 */

export type BatchId = 'understand' | 'generate' | 'correct' | 'synthesize';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  signal: AbortSignal;
  maxTokens: number;
}

export interface Completion {
  text: string;
  /** Provider that actually served the call */
  provider: string;
}

export interface ReasoningBackend {
  readonly name: string;
  complete(messages: ChatMessage[], opts: CompletionOptions): Promise<Completion>;
}

export type IntentLabel = 'DATA_QUERY' | 'META_QUERY' | 'AMBIGUOUS';

/** Intent, clarification and table plan in one call */
export interface UnderstandPayload {
  intent: string;
  confidence?: number;
  reasoning?: string;
  resolved_query?: string;
  assumptions?: string[];
  clarification_questions?: string[];
  plan?: {
    relevant_tables?: string[];
    filters?: string[];
    aggregations?: string[];
    needs_data_context?: boolean;
    description?: string;
  };
}

export interface GeneratePayload {
  sql: string;
  explanation?: string;
}

export interface CorrectPayload {
  corrected_sql: string;
  analysis?: string;
  changes_made?: string[];
}

export interface SynthesizePayload {
  answer: string;
}
