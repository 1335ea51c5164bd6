/**
 * Composer Tests
 */

import {
  SECTION_ORDER,
  TemplateMismatchError,
  allMissing,
  amount,
  canonicalize,
  compose,
  composeOutcome,
  date,
  freeText,
  missing,
  percentage,
  renderMemoMarkdown,
  withProvenance,
  type CanonicalRecord,
  type ComposeOptions,
  type ExtractionMetadata,
  type Narrative,
  type StructuredFields,
} from '@memobench/shared';
import { FIXED_NOW } from './helpers';

const METADATA: ExtractionMetadata = { model: null, attempts: 1, latency_ms: 12, usage: null, cost_usd: 0 };

const NARRATIVE: Narrative = {
  executive_summary: 'Bridge loan to Placeholder Co.',
  highlights: ['Short tenor', '  '],
  risks: ['Single lender'],
};

describe('Composer', () => {
  const record: CanonicalRecord = canonicalize(
    { source_uri: 'https://filings.example.com/placeholder/bridge.htm', raw_text: 'Bridge loans of $5,000,000.' },
    { now: FIXED_NOW }
  );
  const source = { backend_id: 'stub', record_id: record.id };
  const options: ComposeOptions = { backend_id: 'stub', extraction_metadata: METADATA, minHighlights: 1, minRisks: 1, now: FIXED_NOW };

  function buildFields(): StructuredFields {
    return {
      deal_size: withProvenance({ ...amount(5000000, 'USD', '$5,000,000'), quote: 'Bridge loans of $5,000,000.' }, source),
      deal_price: withProvenance(missing(), source),
      interest_rate: withProvenance(percentage(4.5, '4.50%'), source),
      key_covenants: withProvenance(freeText('Leverage | 3.00x'), source),
      maturity_date: withProvenance(date('2027-06-30', ''), source),
      payment_frequency: withProvenance(missing(), source),
    };
  }

  describe('compose', () => {
    it('should lay out the three sections in order', () => {
      const artifact = compose(record, buildFields(), NARRATIVE, options);

      expect(artifact.sections.map((s) => s.id)).toEqual([...SECTION_ORDER]);
      expect(artifact.sections.map((s) => s.title)).toEqual([
        'Executive Summary',
        'Investment Highlights & Risks',
        'Key Deal Information',
      ]);
      expect(artifact.generated_at).toBe('2024-06-01T00:00:00.000Z');
      expect(artifact.degraded).toBe(false);
      expect(artifact.extraction_metadata).toEqual(METADATA);
    });

    it('should list exactly the six fields in canonical order', () => {
      const [, , table] = compose(record, buildFields(), NARRATIVE, options).sections;

      expect(table).toEqual({
        id: 'key_deal_information',
        title: 'Key Deal Information',
        rows: [
          { field: 'deal_size', label: 'Deal Size', value: '$5,000,000' },
          { field: 'deal_price', label: 'Deal Price', value: 'N/A' },
          { field: 'interest_rate', label: 'Interest Rate', value: '4.50%' },
          { field: 'key_covenants', label: 'Key Covenants', value: 'Leverage | 3.00x' },
          { field: 'maturity_date', label: 'Maturity Date', value: '2027-06-30' },
          { field: 'payment_frequency', label: 'Payment Frequency', value: 'N/A' },
        ],
      });
    });

    it('should copy field values without changing them', () => {
      const fields = buildFields();
      const artifact = compose(record, fields, NARRATIVE, options);

      expect(artifact.schema.deal_size).toEqual(fields.deal_size);
      expect(artifact.schema.deal_size).not.toBe(fields.deal_size);
      expect(artifact.schema.executive_summary).toBe('Bridge loan to Placeholder Co.');
    });

    it('should reject an empty executive summary', () => {
      expect(() => compose(record, buildFields(), { ...NARRATIVE, executive_summary: '  ' }, options)).toThrow(
        new TemplateMismatchError('Executive summary is empty')
      );
    });

    it('should not count blank highlights', () => {
      expect(() => compose(record, buildFields(), NARRATIVE, { ...options, minHighlights: 2 })).toThrow(
        'Expected at least 2 highlight(s), got 1'
      );
    });

    it('should reject too few risks', () => {
      expect(() => compose(record, buildFields(), { ...NARRATIVE, risks: [] }, options)).toThrow(
        'Expected at least 1 risk(s), got 0'
      );
    });

    it('should reject a field produced by another backend', () => {
      const fields = { ...buildFields(), deal_price: withProvenance(missing(), { ...source, backend_id: 'other' }) };

      expect(() => compose(record, fields, NARRATIVE, options)).toThrow(
        `Field deal_price was produced for ${record.id} by other, not ${record.id} by stub`
      );
    });
  });

  describe('composeOutcome', () => {
    it('should compose a degraded outcome without narrative checks', () => {
      const artifact = composeOutcome(
        record,
        {
          record_id: record.id,
          backend_id: 'stub',
          fields: allMissing(source),
          narrative: { executive_summary: '', highlights: [], risks: [] },
          degraded: true,
          metadata: { ...METADATA, attempts: 3, cost_usd: null },
          error: { code: 'EXTRACTION_TIMEOUT', message: 'Backend stub did not respond within 20ms' },
        },
        { now: FIXED_NOW }
      );

      expect(artifact.degraded).toBe(true);
      expect(artifact.extraction_metadata.attempts).toBe(3);
      expect(artifact.sections[2]).toMatchObject({
        rows: [
          { value: 'N/A' },
          { value: 'N/A' },
          { value: 'N/A' },
          { value: 'N/A' },
          { value: 'N/A' },
          { value: 'N/A' },
        ],
      });
    });
  });

  describe('renderMemoMarkdown', () => {
    it('should render sections verbatim with escaped table cells', () => {
      const markdown = renderMemoMarkdown(compose(record, buildFields(), NARRATIVE, options));

      expect(markdown).toBe(
        [
          '# Investment Memo',
          '',
          `Record: \`${record.id}\`  `,
          'Backend: `stub`',
          '',
          '## Executive Summary',
          '',
          'Bridge loan to Placeholder Co.',
          '',
          '## Investment Highlights & Risks',
          '',
          '### Highlights',
          '',
          '- Short tenor',
          '',
          '### Risks',
          '',
          '- Single lender',
          '',
          '## Key Deal Information',
          '',
          '| Field | Value |',
          '| --- | --- |',
          '| Deal Size | $5,000,000 |',
          '| Deal Price | N/A |',
          '| Interest Rate | 4.50% |',
          '| Key Covenants | Leverage \\| 3.00x |',
          '| Maturity Date | 2027-06-30 |',
          '| Payment Frequency | N/A |',
          '',
        ].join('\n')
      );
    });
  });
});
