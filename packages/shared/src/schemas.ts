/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for backend output, composed memos and
 * benchmark requests. This is the boundary where the closed FieldValue set
 * is enforced at runtime.
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import {
  MEMO_FIELDS,
  type CandidateFields,
  type FieldName,
  type FieldValueData,
  type Narrative,
} from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

const FIELD_VALUE_DEFS = {
  amount_value: {
    type: 'object',
    additionalProperties: false,
    required: ['kind', 'amount', 'currency', 'text'],
    properties: {
      kind: { const: 'amount' },
      amount: { type: 'number', minimum: 0 },
      currency: { type: 'string', pattern: '^[A-Z]{3}$' },
      text: { type: 'string' },
      quote: { type: 'string' },
    },
  },
  percentage_value: {
    type: 'object',
    additionalProperties: false,
    required: ['kind', 'percentage', 'text'],
    properties: {
      kind: { const: 'percentage' },
      percentage: { type: 'number', minimum: 0 },
      text: { type: 'string' },
      quote: { type: 'string' },
    },
  },
  date_value: {
    type: 'object',
    additionalProperties: false,
    required: ['kind', 'date', 'text'],
    properties: {
      kind: { const: 'date' },
      date: { type: 'string', format: 'date' },
      text: { type: 'string' },
      quote: { type: 'string' },
    },
  },
  free_text_value: {
    type: 'object',
    additionalProperties: false,
    required: ['kind', 'text'],
    properties: {
      kind: { const: 'free_text' },
      text: { type: 'string', minLength: 1 },
      quote: { type: 'string' },
    },
  },
  missing_value: {
    type: 'object',
    additionalProperties: false,
    required: ['kind'],
    properties: {
      kind: { const: 'missing' },
      quote: { type: 'string' },
    },
  },
  field_value: {
    type: 'object',
    required: ['kind'],
    oneOf: [
      { $ref: '#/$defs/amount_value' },
      { $ref: '#/$defs/percentage_value' },
      { $ref: '#/$defs/date_value' },
      { $ref: '#/$defs/free_text_value' },
      { $ref: '#/$defs/missing_value' },
    ],
  },
} as const;

export const STRUCTURED_FIELDS_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: [...MEMO_FIELDS],
  properties: Object.fromEntries(MEMO_FIELDS.map((f) => [f, { $ref: '#/$defs/field_value' }])),
  $defs: FIELD_VALUE_DEFS,
};

export const NARRATIVE_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: ['executive_summary', 'highlights', 'risks'],
  properties: {
    executive_summary: { type: 'string' },
    highlights: { type: 'array', items: { type: 'string' } },
    risks: { type: 'array', items: { type: 'string' } },
  },
};

export interface BenchmarkRequestBody {
  sources: Array<{ source_uri: string; raw_text: string }>;
  eval_membership: Array<string | { source_uri?: string; content_hash?: string }>;
  backends: string[];
  references?: Record<string, { fields: Partial<Record<FieldName, FieldValueData>> }>;
  scope?: 'eval' | 'all';
}

export const BENCHMARK_REQUEST_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: ['sources', 'eval_membership', 'backends'],
  properties: {
    sources: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['source_uri', 'raw_text'],
        properties: {
          source_uri: { type: 'string', minLength: 1 },
          raw_text: { type: 'string' },
        },
      },
    },
    eval_membership: {
      type: 'array',
      items: {
        anyOf: [
          { type: 'string', minLength: 1 },
          {
            type: 'object',
            additionalProperties: false,
            minProperties: 1,
            properties: {
              source_uri: { type: 'string', minLength: 1 },
              content_hash: { type: 'string', pattern: '^sha256:[0-9a-f]{64}$' },
            },
          },
        ],
      },
    },
    backends: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
    references: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        additionalProperties: false,
        required: ['fields'],
        properties: {
          fields: {
            type: 'object',
            additionalProperties: false,
            properties: Object.fromEntries(
              MEMO_FIELDS.map((f) => [f, { $ref: '#/$defs/field_value' }])
            ),
          },
        },
      },
    },
    scope: { enum: ['eval', 'all'] },
  },
  $defs: FIELD_VALUE_DEFS,
};

const structuredFieldsValidator = ajv.compile<CandidateFields>(STRUCTURED_FIELDS_SCHEMA);
const narrativeValidator = ajv.compile<Narrative>(NARRATIVE_SCHEMA);
const benchmarkRequestValidator = ajv.compile<BenchmarkRequestBody>(BENCHMARK_REQUEST_SCHEMA);

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}

/**
 * Checks JSON Schema cannot express: numbers must be finite.
 */
function numericViolations(fields: CandidateFields): string[] {
  const violations: string[] = [];
  for (const field of MEMO_FIELDS) {
    const value = fields[field];
    if (value.kind === 'amount' && !Number.isFinite(value.amount)) {
      violations.push(`/${field}/amount: must be a finite number`);
    }
    if (value.kind === 'percentage' && !Number.isFinite(value.percentage)) {
      violations.push(`/${field}/percentage: must be a finite number`);
    }
  }
  return violations;
}

/**
 * Validate a backend's structured fields: all six keys present, no extra
 * keys, every value one of the closed kinds with its required shape.
 */
export function validateStructuredFields(data: unknown): ValidationResult<CandidateFields> {
  if (!structuredFieldsValidator(data)) {
    const errors = formatAjvErrors(structuredFieldsValidator.errors);
    logger.warn('Structured fields validation failed', { errors });
    return { valid: false, errors };
  }

  const errors = numericViolations(data);
  if (errors.length > 0) {
    logger.warn('Structured fields validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, value: data };
}

/**
 * Validate narrative blocks returned by a backend
 */
export function validateNarrative(data: unknown): ValidationResult<Narrative> {
  if (!narrativeValidator(data)) {
    const errors = formatAjvErrors(narrativeValidator.errors);
    logger.warn('Narrative validation failed', { errors });
    return { valid: false, errors };
  }
  return { valid: true, value: data };
}

/**
 * Validate a POST /benchmarks request body
 */
export function validateBenchmarkRequest(data: unknown): ValidationResult<BenchmarkRequestBody> {
  if (!benchmarkRequestValidator(data)) {
    return { valid: false, errors: formatAjvErrors(benchmarkRequestValidator.errors) };
  }
  return { valid: true, value: data };
}

export { ajv };
