/**
 * Field Value Constructors
 *
 * Builders for the closed FieldValue union, provenance attachment and the
 * rendering used by the Key Deal Information table.
 */

import type {
  AmountValue,
  CandidateFieldValue,
  DateValue,
  FieldName,
  FieldValue,
  FieldValueData,
  FreeTextValue,
  MissingValue,
  PercentageValue,
  StructuredFields,
} from '../types';

export function amount(value: number, currency: string, text: string): AmountValue {
  return { kind: 'amount', amount: value, currency, text };
}

export function percentage(value: number, text: string): PercentageValue {
  return { kind: 'percentage', percentage: value, text };
}

export function date(iso: string, text: string): DateValue {
  return { kind: 'date', date: iso, text };
}

export function freeText(text: string): FreeTextValue {
  return { kind: 'free_text', text };
}

export function missing(): MissingValue {
  return { kind: 'missing' };
}

/**
 * Strip provenance and quote, keeping only the value itself.
 */
export function comparableValue(value: FieldValueData | FieldValue | CandidateFieldValue): FieldValueData {
  switch (value.kind) {
    case 'amount':
      return amount(value.amount, value.currency, value.text);
    case 'percentage':
      return percentage(value.percentage, value.text);
    case 'date':
      return date(value.date, value.text);
    case 'free_text':
      return freeText(value.text);
    case 'missing':
      return missing();
  }
}

/**
 * Attach provenance to a backend's candidate value. The candidate's quote
 * moves into provenance; the value itself is copied unchanged.
 */
export function withProvenance(
  candidate: CandidateFieldValue,
  source: { backend_id: string; record_id: string }
): FieldValue {
  return {
    ...comparableValue(candidate),
    provenance: {
      backend_id: source.backend_id,
      record_id: source.record_id,
      quote: candidate.kind === 'missing' ? null : candidate.quote ?? null,
    },
  };
}

/**
 * All six fields forced to missing, used for degraded artifacts.
 */
export function allMissing(source: { backend_id: string; record_id: string }): StructuredFields {
  return mapFields(() => withProvenance(missing(), source));
}

/**
 * Build a record over the six fields, in canonical order.
 */
export function mapFields<T>(fn: (field: FieldName) => T): Record<FieldName, T> {
  return {
    deal_size: fn('deal_size'),
    deal_price: fn('deal_price'),
    interest_rate: fn('interest_rate'),
    key_covenants: fn('key_covenants'),
    maturity_date: fn('maturity_date'),
    payment_frequency: fn('payment_frequency'),
  };
}

export function isMissing(value: FieldValueData): value is MissingValue {
  return value.kind === 'missing';
}

export function formatAmount(value: number, currency: string): string {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency,
    minimumFractionDigits: 0,
    maximumFractionDigits: 2,
  }).format(value);
}

/**
 * Table text for a value: the wording as stated when present, a formatted
 * value otherwise, "N/A" for missing.
 */
export function renderFieldValue(value: FieldValueData): string {
  switch (value.kind) {
    case 'amount':
      return value.text || formatAmount(value.amount, value.currency);
    case 'percentage':
      return value.text || `${value.percentage}%`;
    case 'date':
      return value.text || value.date;
    case 'free_text':
      return value.text;
    case 'missing':
      return 'N/A';
  }
}
