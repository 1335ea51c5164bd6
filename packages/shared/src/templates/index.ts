/**
 * Memo Prompt Templates
 */

import type { CanonicalRecord } from '../types';
import type { MemoTemplate } from './types';
import { CREDIT_AGREEMENT_MEMO_TEMPLATE } from './memo.template';

export type { MemoTemplate } from './types';
export { CREDIT_AGREEMENT_MEMO_TEMPLATE } from './memo.template';

export const TRUNCATION_MARKER = '[...document truncated]';

/**
 * Cut the document text at a character limit, marking the cut.
 */
export function truncateDocumentText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n${TRUNCATION_MARKER}`;
}

/**
 * Fill a template's user prompt for one record.
 */
export function renderUserPrompt(
  template: MemoTemplate,
  record: CanonicalRecord,
  maxChars: number
): string {
  return template.userPromptTemplate
    .replace('{{record_id}}', record.id)
    .replace('{{source_uri}}', record.source_uri)
    .replace('{{document_text}}', () => truncateDocumentText(record.raw_text, maxChars));
}

export function getDefaultTemplate(): MemoTemplate {
  return CREDIT_AGREEMENT_MEMO_TEMPLATE;
}
