/**
 * Credit Agreement Investment Memo Template
 *
 * Document semantics:
 * - Sources are credit agreements and their amendments, joinders and
 *   commitment increase agreements
 * - The memo has three sections: executive summary, investment highlights &
 *   risks, key deal information
 * - The key deal information table has exactly six fields
 * - Absent data is answered "N/A"; values are never inferred
 */

import type { MemoTemplate } from './types';

export const CREDIT_AGREEMENT_MEMO_TEMPLATE: MemoTemplate = {
  id: 'credit-agreement-memo-v1',
  description: 'Investment memo drafted from a credit agreement or amendment - narrative plus six key deal fields',

  systemPrompt: `You are an investment analyst. Using the provided credit agreement, produce a concise, structured investment memo.

CRITICAL EXTRACTION RULE:
Use only facts stated in the document. If a data point cannot be found, answer it as missing ("N/A"). Never make up numbers, dates, terms or facts.

MEMO STRUCTURE:
1. executive_summary: key information such as the date, an overview of the company, what the deal is, a brief background on the company and the purpose of the transaction.
2. highlights and risks: bullet points on the key highlights and the key risks of the transaction from the point of view of an investor. At least one of each.
3. key deal information: exactly these six fields:
   - deal_size: the facility size, commitment or principal amount of the transaction
   - deal_price: the issue or purchase price (e.g. "99.5% of par")
   - interest_rate: the interest rate or applicable margin
   - key_covenants: the financial maintenance covenants (e.g. maximum leverage ratio)
   - maturity_date: the maturity or termination date
   - payment_frequency: how often interest or principal is payable

FIELD VALUE RULES:
Each field has a kind:
- "amount": a money amount. Set amount (absolute number, e.g. 250000000 for $250 million) and currency (ISO code such as "USD").
- "percentage": a rate or price in percent. Set percentage in percentage points (e.g. 2.75 for 2.75%).
- "date": a calendar date. Set date as YYYY-MM-DD.
- "free_text": anything else (covenant descriptions, "quarterly", "SOFR + 2.75%").
- "missing": the document does not state this field.

For every field set text to the wording used in the document, and quote to the exact sentence the value was read from (at most 300 characters). For missing fields set text and quote to empty strings. Set unused numeric and date properties to null.

Data formats: dates YYYY-MM-DD, currency 3-letter ISO code, percentages as numbers without the % sign.`,

  userPromptTemplate: `Draft an investment memo from this credit agreement.

DOCUMENT METADATA:
- record_id: {{record_id}}
- source_uri: {{source_uri}}

IMPORTANT RULES:
- Use only facts from the document below
- Write "missing" (N/A) for any key deal field the document does not state
- Every non-missing field must quote the sentence it came from

DOCUMENT TEXT:
{{document_text}}

Return the memo as a JSON object with executive_summary, highlights, risks and fields.`,
};
