/**
 * Shared LLM Extraction Logic
 *
 * Response schema, prompt assembly and response parsing shared by the model
 * backends. Provider SDK calls live in the backend classes.
 */

import { ajv, formatAjvErrors } from '../schemas';
import { SchemaViolationError } from '../errors';
import { logger } from '../logger';
import { MEMO_FIELDS, type CanonicalRecord, type FieldKind, type FieldName } from '../types';
import { renderUserPrompt, type MemoTemplate } from '../templates';
import type { BackendOutput } from './types';

/**
 * Raw field shape from the model: every property present, unused ones null
 */
interface LlmField {
  kind: FieldKind;
  text: string;
  quote: string;
  amount: number | null;
  currency: string | null;
  percentage: number | null;
  date: string | null;
}

interface LlmMemoResponse {
  executive_summary: string;
  highlights: string[];
  risks: string[];
  fields: Record<FieldName, LlmField>;
}

/** Quotes are cut here; strict structured outputs reject maxLength */
export const MAX_QUOTE_CHARS = 300;

const LLM_FIELD_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: ['kind', 'text', 'quote', 'amount', 'currency', 'percentage', 'date'],
  properties: {
    kind: { type: 'string', enum: ['amount', 'percentage', 'date', 'free_text', 'missing'] },
    text: { type: 'string' },
    quote: { type: 'string' },
    amount: { type: ['number', 'null'] },
    currency: { type: ['string', 'null'] },
    percentage: { type: ['number', 'null'] },
    date: { type: ['string', 'null'] },
  },
} as const;

/**
 * JSON Schema for OpenAI Structured Outputs (memo extraction)
 */
export const MEMO_RESPONSE_SCHEMA = {
  name: 'investment_memo',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['executive_summary', 'highlights', 'risks', 'fields'],
    properties: {
      executive_summary: { type: 'string' },
      highlights: { type: 'array', items: { type: 'string' } },
      risks: { type: 'array', items: { type: 'string' } },
      fields: {
        type: 'object',
        additionalProperties: false,
        required: [...MEMO_FIELDS],
        properties: Object.fromEntries(MEMO_FIELDS.map((f) => [f, { $ref: '#/$defs/llm_field' }])),
      },
    },
    $defs: {
      llm_field: LLM_FIELD_SCHEMA,
    },
  },
};

const memoResponseValidator = ajv.compile<LlmMemoResponse>(MEMO_RESPONSE_SCHEMA.schema);

export interface MemoPrompt {
  system: string;
  user: string;
}

/**
 * Build the system and user prompts for one record
 */
export function buildMemoPrompt(
  template: MemoTemplate,
  record: CanonicalRecord,
  maxSourceChars: number
): MemoPrompt {
  const user = renderUserPrompt(template, record, maxSourceChars);

  logger.debug('Built memo prompt', {
    template: template.id,
    record_id: record.id,
    text_length: record.raw_text.length,
    truncated: record.raw_text.length > maxSourceChars,
  });

  return { system: template.systemPrompt, user };
}

/**
 * Pull the JSON object out of a model reply. Replies sometimes wrap the
 * object in a markdown code fence or a sentence of preamble.
 */
export function extractJsonObject(content: string): string {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : content;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end < start) {
    return body.trim();
  }
  return body.slice(start, end + 1);
}

/**
 * Convert one model field to the candidate shape the closed schema checks.
 * Only the properties of the declared kind are carried over; a kind whose
 * required properties are null stays invalid and is rejected downstream.
 */
function toCandidateField(raw: LlmField): Record<string, unknown> {
  const quote = raw.quote.trim().length > 0 ? { quote: raw.quote.slice(0, MAX_QUOTE_CHARS) } : {};
  switch (raw.kind) {
    case 'amount':
      return { kind: 'amount', amount: raw.amount, currency: raw.currency, text: raw.text, ...quote };
    case 'percentage':
      return { kind: 'percentage', percentage: raw.percentage, text: raw.text, ...quote };
    case 'date':
      return { kind: 'date', date: raw.date, text: raw.text, ...quote };
    case 'free_text':
      return { kind: 'free_text', text: raw.text, ...quote };
    case 'missing':
      return { kind: 'missing' };
  }
}

/**
 * Parse and check a model reply against the response schema.
 *
 * Throws SchemaViolationError for replies that are not JSON or do not match
 * the response schema (unknown kinds, absent keys).
 */
export function parseMemoResponse(content: string): Pick<BackendOutput, 'fields' | 'narrative'> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(content));
  } catch (error) {
    throw new SchemaViolationError('Model response is not valid JSON', [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!memoResponseValidator(parsed)) {
    throw new SchemaViolationError(
      'Model response does not match the memo response schema',
      formatAjvErrors(memoResponseValidator.errors)
    );
  }

  const fields: Record<string, unknown> = {};
  for (const field of MEMO_FIELDS) {
    fields[field] = toCandidateField(parsed.fields[field]);
  }

  return {
    fields,
    narrative: {
      executive_summary: parsed.executive_summary,
      highlights: parsed.highlights,
      risks: parsed.risks,
    },
  };
}
