/**
 * Rule-Based Backend
 *
 * Pattern extraction over the canonical text. Deterministic and free: no
 * model call, no usage, zero cost. Every value it emits quotes the sentence
 * it was read from; a field with no matching sentence is reported missing.
 * The narrative is assembled from source sentences and extracted values only.
 */

import { mapFields, missing, renderFieldValue, splitSentences } from '../../fields';
import { logger } from '../../logger';
import {
  FIELD_LABELS,
  MEMO_FIELDS,
  type CandidateFields,
  type CanonicalRecord,
  type FieldName,
  type Narrative,
} from '../../types';
import type { BackendCallContext, BackendOutput, ExtractionBackend } from '../types';
import {
  COVENANT_PATTERN,
  findDealPrice,
  findDealSize,
  findInterestRate,
  findKeyCovenants,
  findMaturityDate,
  findPaymentFrequency,
  toQuote,
} from './patterns';

export * from './patterns';

export const RULE_BASED_BACKEND_ID = 'rule-based';

/** Fields reported as highlights; covenants are reported as risks */
const HIGHLIGHT_FIELDS: FieldName[] = ['deal_size', 'deal_price', 'interest_rate', 'maturity_date', 'payment_frequency'];

const SUMMARY_SENTENCE_COUNT = 3;
const MIN_SUMMARY_SENTENCE_CHARS = 30;

const TRANSACTION_PATTERN = /\b(?:amendment|amend|increase|joinder|agreement|credit)\b/i;

/**
 * Extract the six fields from sentences
 */
export function extractFields(sentences: string[]): CandidateFields {
  const finders: Record<FieldName, (s: string[]) => ReturnType<typeof findDealSize>> = {
    deal_size: findDealSize,
    deal_price: findDealPrice,
    interest_rate: findInterestRate,
    key_covenants: findKeyCovenants,
    maturity_date: findMaturityDate,
    payment_frequency: findPaymentFrequency,
  };
  return mapFields((field) => finders[field](sentences) ?? missing());
}

/**
 * Build the narrative from the document's own sentences and the extracted values
 */
export function buildNarrative(sentences: string[], fields: CandidateFields): Narrative {
  const longSentences = sentences.filter((s) => s.length >= MIN_SUMMARY_SENTENCE_CHARS);
  const summarySentences = (longSentences.length > 0 ? longSentences : sentences).slice(0, SUMMARY_SENTENCE_COUNT);

  const highlights = HIGHLIGHT_FIELDS.filter((field) => fields[field].kind !== 'missing').map(
    (field) => `${FIELD_LABELS[field]}: ${renderFieldValue(fields[field])}`
  );
  if (highlights.length === 0) {
    const transaction = sentences.find((s) => TRANSACTION_PATTERN.test(s)) ?? sentences[0];
    if (transaction) highlights.push(toQuote(transaction));
  }

  const risks = [
    ...sentences.filter((s) => COVENANT_PATTERN.test(s)).map((s) => `Covenant: ${toQuote(s)}`),
    ...MEMO_FIELDS.filter((field) => fields[field].kind === 'missing').map(
      (field) => `${FIELD_LABELS[field]} not stated in the source`
    ),
  ];

  return {
    executive_summary: summarySentences.join(' '),
    highlights,
    risks: [...new Set(risks)],
  };
}

export class RuleBasedBackend implements ExtractionBackend {
  readonly id: string;
  readonly description = 'Regex extraction over credit-agreement sentences';
  readonly kind = 'rule_based';
  readonly capabilities = { freeTextGeneration: false, structuredFields: true };

  constructor(id: string = RULE_BASED_BACKEND_ID) {
    this.id = id;
  }

  async extract(record: CanonicalRecord, _ctx: BackendCallContext): Promise<BackendOutput> {
    const sentences = splitSentences(record.raw_text);
    const fields = extractFields(sentences);

    logger.debug('Rule-based extraction complete', {
      sentence_count: sentences.length,
      found: MEMO_FIELDS.filter((field) => fields[field].kind !== 'missing'),
    });

    return {
      fields,
      narrative: buildNarrative(sentences, fields),
    };
  }
}
