/**
 * Traceability Spot-Checks
 *
 * A matched value must be traceable to the source text: the same amount,
 * percentage or date is found there, or the stated text appears verbatim
 * after normalization.
 */

import { findAmounts, findDates, findPercentages, normalizeText } from '../fields';
import type { FieldValueData } from '../types';

const AMOUNT_SLACK = 0.5;
const PERCENTAGE_SLACK = 0.01;

function textAppears(text: string, normalizedSource: string): boolean {
  const parts = text
    .split(/;\s+/)
    .map((part) => normalizeText(part))
    .filter((part) => part.length > 0);
  return parts.length > 0 && parts.every((part) => normalizedSource.includes(part));
}

export function isTraceable(value: FieldValueData, sourceText: string): boolean {
  const normalizedSource = normalizeText(sourceText);

  switch (value.kind) {
    case 'missing':
      return true;
    case 'amount':
      return (
        findAmounts(sourceText).some(
          (found) => found.currency === value.currency && Math.abs(found.amount - value.amount) <= AMOUNT_SLACK
        ) || textAppears(value.text, normalizedSource)
      );
    case 'percentage':
      return (
        findPercentages(sourceText).some(
          (found) => Math.abs(found.percentage - value.percentage) <= PERCENTAGE_SLACK
        ) || textAppears(value.text, normalizedSource)
      );
    case 'date':
      return findDates(sourceText).some((found) => found.date === value.date);
    case 'free_text':
      return textAppears(value.text, normalizedSource);
  }
}
