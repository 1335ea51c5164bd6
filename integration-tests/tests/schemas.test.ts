/**
 * Schema Validation Tests
 *
 * The closed FieldValue set is enforced at the backend boundary.
 */

import {
  validateBenchmarkRequest,
  validateNarrative,
  validateStructuredFields,
  type CandidateFields,
} from '@memobench/shared';

function completeFields(): CandidateFields {
  return {
    deal_size: { kind: 'amount', amount: 250000000, currency: 'USD', text: '$250,000,000', quote: 'aggregate principal amount of $250,000,000' },
    deal_price: { kind: 'percentage', percentage: 99.5, text: '99.5%' },
    interest_rate: { kind: 'percentage', percentage: 3.25, text: '3.25%' },
    key_covenants: { kind: 'free_text', text: 'Total Leverage Ratio not to exceed 4.50 to 1.00' },
    maturity_date: { kind: 'date', date: '2031-03-01', text: 'March 1, 2031' },
    payment_frequency: { kind: 'missing' },
  };
}

describe('Structured field schema', () => {
  it('should accept all six fields with closed kinds', () => {
    const result = validateStructuredFields(completeFields());
    expect(result.valid).toBe(true);
  });

  it('should reject a payload missing a field key', () => {
    const { payment_frequency: _dropped, ...partial } = completeFields();
    const result = validateStructuredFields(partial);

    expect(result).toEqual({
      valid: false,
      errors: ["/: must have required property 'payment_frequency'"],
    });
  });

  it('should reject an extra field', () => {
    expect(validateStructuredFields({ ...completeFields(), administrative_agent: { kind: 'missing' } }).valid).toBe(false);
  });

  it.each([
    ['an unknown kind', { kind: 'range', text: '2-3%' }],
    ['a lowercase currency', { kind: 'amount', amount: 5, currency: 'usd', text: '$5' }],
    ['an amount without currency', { kind: 'amount', amount: 5, text: '$5' }],
    ['an impossible date', { kind: 'date', date: '2031-02-30', text: 'February 30, 2031' }],
    ['empty free text', { kind: 'free_text', text: '' }],
    ['a negative percentage', { kind: 'percentage', percentage: -1, text: '-1%' }],
    ['a non-finite amount', { kind: 'amount', amount: Number.NaN, currency: 'USD', text: '$?' }],
  ])('should reject %s', (_label, value) => {
    expect(validateStructuredFields({ ...completeFields(), deal_size: value }).valid).toBe(false);
  });
});

describe('Narrative schema', () => {
  it('should accept summary, highlights and risks', () => {
    expect(validateNarrative({ executive_summary: 'Summary.', highlights: ['A'], risks: [] }).valid).toBe(true);
  });

  it('should reject highlights that are not strings', () => {
    expect(validateNarrative({ executive_summary: 'Summary.', highlights: [1], risks: [] }).valid).toBe(false);
  });
});

describe('Benchmark request schema', () => {
  const body = {
    sources: [{ source_uri: 'https://filings.example.com/a.htm', raw_text: 'Term loans of $5,000,000.' }],
    eval_membership: ['https://filings.example.com/a.htm'],
    backends: ['rule-based'],
  };

  it('should accept a minimal request', () => {
    expect(validateBenchmarkRequest(body).valid).toBe(true);
  });

  it('should accept references and scope', () => {
    const result = validateBenchmarkRequest({
      ...body,
      scope: 'all',
      references: { 'sha256:abc': { fields: { deal_size: { kind: 'missing' } } } },
    });
    expect(result.valid).toBe(true);
  });

  it.each([
    ['no backends', { ...body, backends: [] }],
    ['an unknown scope', { ...body, scope: 'train' }],
    ['a malformed content hash', { ...body, eval_membership: [{ content_hash: 'md5:abc' }] }],
    ['an empty membership object', { ...body, eval_membership: [{}] }],
    ['a reference to an unknown field', { ...body, references: { r: { fields: { agent: { kind: 'missing' } } } } }],
  ])('should reject %s', (_label, request) => {
    expect(validateBenchmarkRequest(request).valid).toBe(false);
  });
});
