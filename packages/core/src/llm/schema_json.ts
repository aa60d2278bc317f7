/**
 * AJV JSON Schemas for the reasoning batches.
 * Plain object schemas (not JSONSchemaType), compiled once per process.
 */

import { Ajv, type ValidateFunction } from 'ajv';
import type { CorrectPayload, GeneratePayload, SynthesizePayload, UnderstandPayload } from './types.js';

const stringArray = { type: 'array' as const, items: { type: 'string' as const } };

export const understandSchema = {
  type: 'object' as const,
  properties: {
    intent: { type: 'string' as const, minLength: 1 },
    confidence: { type: 'number' as const, minimum: 0, maximum: 1 },
    reasoning: { type: 'string' as const },
    resolved_query: { type: 'string' as const },
    assumptions: stringArray,
    clarification_questions: stringArray,
    plan: {
      type: 'object' as const,
      properties: {
        relevant_tables: stringArray,
        filters: stringArray,
        aggregations: stringArray,
        needs_data_context: { type: 'boolean' as const },
        description: { type: 'string' as const },
      },
    },
  },
  required: ['intent'] as const,
};

export const generateSchema = {
  type: 'object' as const,
  properties: {
    sql: { type: 'string' as const, minLength: 1 },
    explanation: { type: 'string' as const },
  },
  required: ['sql'] as const,
};

export const correctSchema = {
  type: 'object' as const,
  properties: {
    corrected_sql: { type: 'string' as const, minLength: 1 },
    analysis: { type: 'string' as const },
    changes_made: stringArray,
  },
  required: ['corrected_sql'] as const,
};

export const synthesizeSchema = {
  type: 'object' as const,
  properties: {
    answer: { type: 'string' as const, minLength: 1 },
  },
  required: ['answer'] as const,
};

export interface BatchValidators {
  understand: ValidateFunction<UnderstandPayload>;
  generate: ValidateFunction<GeneratePayload>;
  correct: ValidateFunction<CorrectPayload>;
  synthesize: ValidateFunction<SynthesizePayload>;
}

export function compileBatchValidators(): BatchValidators {
  const ajv = new Ajv({ allErrors: true });
  return {
    understand: ajv.compile<UnderstandPayload>(understandSchema),
    generate: ajv.compile<GeneratePayload>(generateSchema),
    correct: ajv.compile<CorrectPayload>(correctSchema),
    synthesize: ajv.compile<SynthesizePayload>(synthesizeSchema),
  };
}

export function describeValidationErrors(validate: Pick<ValidateFunction, 'errors'>): string {
  return (
    validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ') ??
    'Unknown validation error'
  );
}
