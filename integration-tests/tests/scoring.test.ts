/**
 * Scoring Tests
 *
 * Field comparison with tolerances, per-artifact scoring against reference
 * annotations and the traceability spot-check.
 */

import {
  RuleBasedBackend,
  amount,
  compareText,
  compose,
  composeOutcome,
  date,
  extractWithPolicy,
  failedResult,
  freeText,
  isTraceable,
  missing,
  percentage,
  score,
  scoreField,
  withProvenance,
  ExtractionTimeoutError,
  type CanonicalRecord,
  type MemoArtifact,
  type ReferenceAnnotation,
} from '@memobench/shared';
import {
  ACME_URI,
  FIXED_NOW,
  HARBOR_URI,
  NORTHWIND_URI,
  STUB_NARRATIVE,
  loadFixtureRecord,
  loadFixtureReferences,
} from './helpers';

const POLICY = { timeoutMs: 1000, maxAttempts: 1, backoffBaseMs: 1 };

async function ruleBasedArtifact(record: CanonicalRecord): Promise<MemoArtifact> {
  const outcome = await extractWithPolicy(record, new RuleBasedBackend(), POLICY);
  return composeOutcome(record, outcome, { now: FIXED_NOW, minHighlights: 1, minRisks: 1 });
}

function referenceFor(record: CanonicalRecord): ReferenceAnnotation {
  const reference = loadFixtureReferences().find((r) => r.record_id === record.id);
  if (!reference) throw new Error(`No reference for ${record.source_uri}`);
  return reference;
}

describe('Scoring', () => {
  describe('scoreField', () => {
    it('should match amounts within the relative tolerance', () => {
      expect(scoreField(amount(250_000_000, 'USD', ''), amount(250_500_000, 'USD', ''))).toBe('match');
      expect(scoreField(amount(250_000_000, 'USD', ''), amount(252_000_000, 'USD', ''))).toBe('miss');
    });

    it('should miss amounts in different currencies', () => {
      expect(scoreField(amount(75_000_000, 'EUR', ''), amount(75_000_000, 'USD', ''))).toBe('miss');
    });

    it('should match percentages within one basis point', () => {
      expect(scoreField(percentage(3.26, ''), percentage(3.25, ''))).toBe('match');
      expect(scoreField(percentage(3.3, ''), percentage(3.25, ''))).toBe('miss');
    });

    it('should compare dates exactly', () => {
      expect(scoreField(date('2031-03-01', 'March 1, 2031'), date('2031-03-01', '1 March 2031'))).toBe('match');
      expect(scoreField(date('2031-03-02', ''), date('2031-03-01', ''))).toBe('miss');
    });

    it('should treat missing on both sides as a match and on one side as a miss', () => {
      expect(scoreField(missing(), missing())).toBe('match');
      expect(scoreField(freeText('Quarterly'), missing())).toBe('miss');
      expect(scoreField(missing(), freeText('Quarterly'))).toBe('miss');
    });

    it('should compare free text after normalization', () => {
      expect(scoreField(freeText('Quarterly.'), freeText('quarterly'))).toBe('match');
      expect(scoreField(freeText('Leverage Ratio: 4.75x; Fixed Charge 1.25x'), freeText('Leverage Ratio 4.75x'))).toBe(
        'partial'
      );
      expect(scoreField(freeText('Monthly'), freeText('Quarterly'))).toBe('miss');
    });

    it('should give at most partial credit across kinds', () => {
      expect(scoreField(freeText('3.25%'), percentage(3.25, '3.25%'))).toBe('partial');
      expect(scoreField(freeText('Par'), percentage(100, '100%'))).toBe('miss');
    });
  });

  describe('compareText', () => {
    it('should never match empty text', () => {
      expect(compareText('', '')).toBe('miss');
      expect(compareText('...', 'Quarterly')).toBe('miss');
    });
  });

  describe('score', () => {
    it('should score the rule-based memo against the reference', async () => {
      const record = loadFixtureRecord(ACME_URI);
      const result = score(await ruleBasedArtifact(record), referenceFor(record), { record });

      expect(result.status).toBe('scored');
      expect(result.field_scores).toEqual({
        deal_size: 'match',
        deal_price: 'match',
        interest_rate: 'match',
        key_covenants: 'partial',
        maturity_date: 'match',
        payment_frequency: 'match',
      });
      expect(result.untraceable_fields).toEqual([]);
      expect(result.cost_usd).toBe(0);
      expect(result.error).toBeNull();
      expect(result.compared_values?.maturity_date).toEqual({ kind: 'date', date: '2031-03-01', text: 'March 1, 2031' });
    });

    it('should count a correctly missing field as a match and leave unannotated fields unscored', async () => {
      const record = loadFixtureRecord(NORTHWIND_URI);
      const result = score(await ruleBasedArtifact(record), referenceFor(record), { record });

      expect(result.field_scores).toEqual({
        deal_size: 'match',
        deal_price: 'unscored',
        interest_rate: 'unscored',
        key_covenants: 'partial',
        maturity_date: 'match',
        payment_frequency: 'unscored',
      });
    });

    it('should leave every field unscored without a reference', async () => {
      const record = loadFixtureRecord(HARBOR_URI);
      const result = score(await ruleBasedArtifact(record));

      expect(Object.values(result.field_scores)).toEqual(Array(6).fill('unscored'));
      expect(result.compared_values?.deal_size).toEqual({
        kind: 'amount',
        amount: 75_000_000,
        currency: 'USD',
        text: '$75 million',
      });
    });

    it('should downgrade a match that cannot be traced to the source', () => {
      const record = loadFixtureRecord(ACME_URI);
      const source = { backend_id: 'stub', record_id: record.id };
      const artifact = compose(
        record,
        {
          deal_size: withProvenance(amount(300_000_000, 'USD', '$300,000,000'), source),
          deal_price: withProvenance(missing(), source),
          interest_rate: withProvenance(missing(), source),
          key_covenants: withProvenance(missing(), source),
          maturity_date: withProvenance(missing(), source),
          payment_frequency: withProvenance(missing(), source),
        },
        STUB_NARRATIVE,
        { backend_id: 'stub', extraction_metadata: { model: null, attempts: 1, latency_ms: 5, usage: null, cost_usd: null } }
      );
      const reference: ReferenceAnnotation = {
        record_id: record.id,
        fields: { deal_size: amount(300_000_000, 'USD', '$300,000,000') },
      };

      expect(score(artifact, reference).field_scores.deal_size).toBe('match');

      const checked = score(artifact, reference, { record });
      expect(checked.field_scores.deal_size).toBe('miss');
      expect(checked.untraceable_fields).toEqual(['deal_size']);
    });

    it('should not score a degraded artifact', () => {
      const record = loadFixtureRecord(ACME_URI);
      const error = new ExtractionTimeoutError('stub', 20);
      const artifact = composeOutcome(record, {
        record_id: record.id,
        backend_id: 'stub',
        fields: {
          deal_size: withProvenance(missing(), { backend_id: 'stub', record_id: record.id }),
          deal_price: withProvenance(missing(), { backend_id: 'stub', record_id: record.id }),
          interest_rate: withProvenance(missing(), { backend_id: 'stub', record_id: record.id }),
          key_covenants: withProvenance(missing(), { backend_id: 'stub', record_id: record.id }),
          maturity_date: withProvenance(missing(), { backend_id: 'stub', record_id: record.id }),
          payment_frequency: withProvenance(missing(), { backend_id: 'stub', record_id: record.id }),
        },
        narrative: { executive_summary: '', highlights: [], risks: [] },
        degraded: true,
        metadata: { model: null, attempts: 2, latency_ms: 41, usage: null, cost_usd: null },
        error: { code: error.code, message: error.message },
      });

      const result = score(artifact, referenceFor(record), {
        record,
        error: { code: error.code, message: error.message },
      });

      expect(result).toEqual({
        record_id: record.id,
        backend_id: 'stub',
        status: 'degraded',
        field_scores: {
          deal_size: 'unscored',
          deal_price: 'unscored',
          interest_rate: 'unscored',
          key_covenants: 'unscored',
          maturity_date: 'unscored',
          payment_frequency: 'unscored',
        },
        compared_values: null,
        untraceable_fields: [],
        cost_usd: null,
        latency_ms: 41,
        error: { code: 'EXTRACTION_TIMEOUT', message: 'Backend stub did not respond within 20ms' },
      });
    });
  });

  describe('failedResult', () => {
    it('should record the error code', () => {
      const result = failedResult('sha256:abc', 'stub', new Error('boom'));

      expect(result.status).toBe('failed');
      expect(result.error).toEqual({ code: 'INTERNAL_ERROR', message: 'boom' });
      expect(result.cost_usd).toBeNull();
      expect(result.latency_ms).toBeNull();
    });
  });

  describe('isTraceable', () => {
    const harborText = (): string => loadFixtureRecord(HARBOR_URI).raw_text;

    it('should find amounts and percentages by value', () => {
      expect(isTraceable(amount(75_000_000, 'USD', 'USD 75,000,000'), harborText())).toBe(true);
      expect(isTraceable(percentage(2.25, '2.25%'), harborText())).toBe(true);
    });

    it('should require every joined free-text part to appear', () => {
      const text = loadFixtureRecord(NORTHWIND_URI).raw_text;
      expect(
        isTraceable(
          freeText(
            'Leverage Ratio: 4.75x; The Borrower shall not permit the Leverage Ratio to exceed the level set forth above as of the last day of any fiscal quarter.'
          ),
          text
        )
      ).toBe(true);
      expect(isTraceable(freeText('Leverage Ratio: 4.75x; Fixed Charge Coverage Ratio: 1.10x'), text)).toBe(false);
    });

    it('should reject a date the source never states', () => {
      expect(isTraceable(date('2028-09-30', ''), harborText())).toBe(true);
      expect(isTraceable(date('2029-09-30', ''), harborText())).toBe(false);
    });
  });
});
