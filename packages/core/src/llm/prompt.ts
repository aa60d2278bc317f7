/**
 * Prompt construction for the reasoning batches.
 */

import type { ChatMessage } from './types.js';

const JSON_RULES = `Rules:
- Do NOT wrap in markdown code fences.
- Do NOT include any text before or after the JSON.`;

const SQL_CONSTRAINTS = (dialect: string, rowLimitCap: number): string => `CONSTRAINTS:
- Generate a SINGLE ${dialect} SQL statement only. Never multiple statements.
- You MUST generate only SELECT statements or CTE (WITH ... SELECT) statements. No INSERT, UPDATE, DELETE, DROP, or DDL.
- List columns explicitly. Never use SELECT *; COUNT(*) is fine.
- Always end the outer query with LIMIT n where n <= ${rowLimitCap}.
- Join tables only on the foreign keys listed in the schema (lines starting with FK).
- Do NOT reference tables not present in the provided schema.`;

export interface UnderstandPromptInput {
  question: string;
  dialect: string;
  schemaOverview: string;
}

export function buildUnderstandMessages(input: UnderstandPromptInput): ChatMessage[] {
  const systemPrompt = `You analyse questions asked of a ${input.dialect} database before any SQL is written.

Classify the intent:
- DATA_QUERY: answerable with a SELECT over the tables below.
- META_QUERY: about the database itself (which tables exist, what columns a table has).
- AMBIGUOUS: cannot be answered without the user clarifying (vague time ranges, undefined terms).
When a vague term has one reasonable reading, resolve it, record the assumption and use DATA_QUERY.
For AMBIGUOUS, leave resolved_query empty unless you settled on a reading; questions only the user can answer go in clarification_questions.

You must respond with ONLY a JSON object matching this schema:
{
  "intent": "DATA_QUERY" | "META_QUERY" | "AMBIGUOUS",
  "confidence": <0.0 to 1.0>,
  "reasoning": "<one sentence>",
  "resolved_query": "<the question with ambiguities resolved>",
  "assumptions": ["<assumption>", ...],
  "clarification_questions": ["<question for the user, only when AMBIGUOUS>", ...],
  "plan": {
    "relevant_tables": ["<table>", ...],
    "filters": ["<filter>", ...],
    "aggregations": ["<aggregation>", ...],
    "needs_data_context": <true when filter values must be checked against real data>,
    "description": "<one sentence plan>"
  }
}

${JSON_RULES}`;

  const userPrompt = `Tables:
${input.schemaOverview}

Question: ${input.question}`;

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}

export interface SampleBlock {
  table: string;
  columns: string[];
  rows: Record<string, unknown>[];
}

export interface GeneratePromptInput {
  dialect: string;
  question: string;
  schemaContext: string;
  rowLimitCap: number;
  planDescription?: string;
  suggestedJoins: string[];
  assumptions: string[];
  samples: SampleBlock[];
}

function renderSamples(samples: SampleBlock[]): string {
  if (samples.length === 0) return '';
  const blocks = samples.map(
    (s) => `${s.table} (${s.columns.join(', ')}):\n${s.rows.map((r) => `  ${JSON.stringify(r)}`).join('\n')}`,
  );
  return `\nSample rows:\n${blocks.join('\n')}\n`;
}

export function buildGenerateMessages(input: GeneratePromptInput): ChatMessage[] {
  const systemPrompt = `You are a SQL query generator for ${input.dialect} databases.

${SQL_CONSTRAINTS(input.dialect, input.rowLimitCap)}

You must respond with ONLY a JSON object matching this schema:
{
  "sql": "<single SQL statement>",
  "explanation": "<one sentence>"
}

${JSON_RULES}`;

  const parts = [input.schemaContext];
  if (input.suggestedJoins.length > 0) {
    parts.push(`Valid join conditions for the planned tables:\n${input.suggestedJoins.map((j) => `  ${j}`).join('\n')}`);
  }
  if (input.planDescription) parts.push(`Plan: ${input.planDescription}`);
  if (input.assumptions.length > 0) parts.push(`Assumptions: ${input.assumptions.join('; ')}`);
  parts.push(renderSamples(input.samples));
  parts.push(`Question: ${input.question}`);

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: parts.filter((p) => p.length > 0).join('\n\n') },
  ];
}

export interface CorrectPromptInput {
  dialect: string;
  question: string;
  schemaContext: string;
  rowLimitCap: number;
  sql: string;
  /** Safety violations or the database error */
  problems: string[];
  suggestedJoins: string[];
}

export function buildCorrectMessages(input: CorrectPromptInput): ChatMessage[] {
  const systemPrompt = `You repair SQL queries for ${input.dialect} databases.

${SQL_CONSTRAINTS(input.dialect, input.rowLimitCap)}

You must respond with ONLY a JSON object matching this schema:
{
  "analysis": "<what was wrong>",
  "corrected_sql": "<single corrected SQL statement>",
  "changes_made": ["<change>", ...]
}

${JSON_RULES}`;

  const parts = [
    input.schemaContext,
    `Question: ${input.question}`,
    `Previous SQL:\n${input.sql}`,
    `Problems:\n${input.problems.map((p) => `- ${p}`).join('\n')}`,
  ];
  if (input.suggestedJoins.length > 0) {
    parts.push(`Use these join paths:\n${input.suggestedJoins.join('\n')}`);
  }

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: parts.join('\n\n') },
  ];
}

export interface SynthesizePromptInput {
  question: string;
  sql: string;
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
  truncated: boolean;
  warnings: string[];
}

/** At most this many rows are shown to the synthesizer */
export const SYNTHESIS_ROW_PREVIEW = 20;

export function buildSynthesizeMessages(input: SynthesizePromptInput): ChatMessage[] {
  const systemPrompt = `You answer a user's question from the result of a SQL query.
Answer in plain language, in one to three sentences, using only the data shown.
If the rows shown are a subset, say so.

You must respond with ONLY a JSON object matching this schema:
{
  "answer": "<answer>"
}

${JSON_RULES}`;

  const preview = input.rows.slice(0, SYNTHESIS_ROW_PREVIEW);
  const parts = [
    `Question: ${input.question}`,
    `SQL:\n${input.sql}`,
    `Columns: ${input.columns.join(', ')}`,
    `Rows (${preview.length} of ${input.rowCount}${input.truncated ? ', more rows were cut off' : ''}):\n${preview
      .map((r) => JSON.stringify(r))
      .join('\n')}`,
  ];
  if (input.warnings.length > 0) parts.push(`Data warnings: ${input.warnings.join('; ')}`);

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: parts.join('\n\n') },
  ];
}

export interface MetaAnswerPromptInput {
  question: string;
  /** Plain description of the tables the question is about */
  schemaFacts: string;
  schemaContext: string;
}

export function buildMetaAnswerMessages(input: MetaAnswerPromptInput): ChatMessage[] {
  const systemPrompt = `You answer a user's question about the structure of a database.
Answer in plain language, in one to three sentences, using only the schema shown.

You must respond with ONLY a JSON object matching this schema:
{
  "answer": "<answer>"
}

${JSON_RULES}`;

  const parts = [`Question: ${input.question}`, `Schema facts:\n${input.schemaFacts}`];
  if (input.schemaContext) parts.push(`Schema:\n${input.schemaContext}`);

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: parts.join('\n\n') },
  ];
}
