/**
 * Credit Agreement Extraction Patterns
 *
 * Keyword patterns that locate each key deal field in credit-agreement prose.
 * Each finder scans sentences in document order and returns the first
 * sentence that carries both the field's keyword and a value of the right
 * kind. The sentence is kept as the value's quote.
 */

import { findAmounts, findDates, findPercentages, amount, date, freeText, percentage } from '../../fields';
import type { CandidateFieldValue } from '../../types';

/** Sentence length kept as a quote */
const MAX_QUOTE_CHARS = 300;

export const DEAL_SIZE_KEYWORDS =
  /\b(?:aggregate\s+(?:principal\s+)?amount|principal\s+amount|commitments?|facility|term\s+loans?|revolving\s+credit|incremental)\b/i;

export const DEAL_PRICE_KEYWORDS = /\b(?:issue\s+price|offering\s+price|purchase\s+price|issued\s+at|priced\s+at)\b/i;

export const PAR_PATTERN = /\bat\s+par\b/i;

export const INTEREST_KEYWORDS =
  /\b(?:interest|applicable\s+(?:rate|margin)|SOFR|LIBOR|base\s+rate|coupon|per\s+annum)\b/i;

export const COVENANT_PATTERN =
  /\b(?:(?:total\s+|senior\s+|net\s+|consolidated\s+)?leverage\s+ratio|(?:fixed\s+charge|interest|debt\s+service)\s+coverage\s+ratio|minimum\s+liquidity|tangible\s+net\s+worth)\b/i;

export const MATURITY_KEYWORDS = /\b(?:maturity\s+date|matur(?:e|es|ity)|termination\s+date)\b/i;

export const PAYMENT_CONTEXT = /\b(?:pay|paid|payable|payment|payments|installments?|due)\b/i;

export const FREQUENCY_PATTERN =
  /\b(quarterly|monthly|semi-annually|semi-annual|semiannually|annually|weekly)\b/i;

export function toQuote(sentence: string): string {
  return sentence.length <= MAX_QUOTE_CHARS ? sentence : sentence.slice(0, MAX_QUOTE_CHARS);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function findDealSize(sentences: string[]): CandidateFieldValue | null {
  for (const sentence of sentences) {
    if (!DEAL_SIZE_KEYWORDS.test(sentence)) continue;
    const [first] = findAmounts(sentence);
    if (first) {
      return { ...amount(first.amount, first.currency, first.text), quote: toQuote(sentence) };
    }
  }
  return null;
}

export function findDealPrice(sentences: string[]): CandidateFieldValue | null {
  for (const sentence of sentences) {
    if (!DEAL_PRICE_KEYWORDS.test(sentence)) continue;
    const [first] = findPercentages(sentence);
    if (first) {
      return { ...percentage(first.percentage, first.text), quote: toQuote(sentence) };
    }
    if (PAR_PATTERN.test(sentence)) {
      return { ...freeText('Par'), quote: toQuote(sentence) };
    }
  }
  return null;
}

export function findInterestRate(sentences: string[]): CandidateFieldValue | null {
  for (const sentence of sentences) {
    if (!INTEREST_KEYWORDS.test(sentence)) continue;
    const [first] = findPercentages(sentence);
    if (first) {
      return { ...percentage(first.percentage, first.text), quote: toQuote(sentence) };
    }
  }
  return null;
}

/**
 * Every distinct covenant sentence, joined into one free-text value.
 * The first sentence is the quote.
 */
export function findKeyCovenants(sentences: string[]): CandidateFieldValue | null {
  const covenants = [...new Set(sentences.filter((s) => COVENANT_PATTERN.test(s)))];
  if (covenants.length === 0) return null;
  return { ...freeText(covenants.join('; ')), quote: toQuote(covenants[0]) };
}

export function findMaturityDate(sentences: string[]): CandidateFieldValue | null {
  for (const sentence of sentences) {
    if (!MATURITY_KEYWORDS.test(sentence)) continue;
    const [first] = findDates(sentence);
    if (first) {
      return { ...date(first.date, first.text), quote: toQuote(sentence) };
    }
  }
  return null;
}

export function findPaymentFrequency(sentences: string[]): CandidateFieldValue | null {
  for (const sentence of sentences) {
    if (!PAYMENT_CONTEXT.test(sentence)) continue;
    const match = sentence.match(FREQUENCY_PATTERN);
    if (match) {
      return { ...freeText(capitalize(match[1])), quote: toQuote(sentence) };
    }
  }
  return null;
}
