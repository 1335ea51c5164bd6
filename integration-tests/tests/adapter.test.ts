/**
 * Adapter Tests
 *
 * Timeout, retry, degrade and schema enforcement around a backend call.
 */

import {
  InMemoryExtractionCache,
  RuleBasedBackend,
  SchemaViolationError,
  backoffDelayMs,
  extractWithPolicy,
  estimateCostUsd,
  readNotAvailable,
  type BackendOutput,
  type CanonicalRecord,
  type ExtractionPolicy,
} from '@memobench/shared';
import { ACME_URI, STUB_NARRATIVE, StubBackend, hangingBackend, loadFixtureRecord, missingFields } from './helpers';

const FAST_POLICY: ExtractionPolicy = {
  timeoutMs: 20,
  maxAttempts: 2,
  backoffBaseMs: 1,
  sleep: async () => {},
};

describe('Extraction adapter', () => {
  let record: CanonicalRecord;

  beforeAll(() => {
    record = loadFixtureRecord(ACME_URI);
  });

  describe('extractWithPolicy', () => {
    it('should attach provenance to every field', async () => {
      const outcome = await extractWithPolicy(record, new RuleBasedBackend(), FAST_POLICY);

      expect(outcome.degraded).toBe(false);
      expect(outcome.error).toBeNull();
      expect(outcome.fields.deal_size).toEqual({
        kind: 'amount',
        amount: 250000000,
        currency: 'USD',
        text: '$250,000,000',
        provenance: {
          backend_id: 'rule-based',
          record_id: record.id,
          quote: 'The Lenders agree to make term loans in an aggregate principal amount of $250,000,000 to the Borrower on the Closing Date.',
        },
      });
      expect(outcome.fields.deal_price.provenance.quote).toBe('The Term Loans shall be issued at 99.5% of their principal amount.');
      expect(outcome.metadata).toMatchObject({ model: null, attempts: 1, usage: null, cost_usd: 0 });
    });

    it('should degrade after exhausting retries on timeout', async () => {
      const backend = hangingBackend('slow-model');
      const sleeps: number[] = [];

      const outcome = await extractWithPolicy(record, backend, {
        ...FAST_POLICY,
        maxAttempts: 3,
        backoffBaseMs: 100,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      });

      expect(backend.calls).toBe(3);
      expect(sleeps).toEqual([100, 200]);
      expect(outcome.degraded).toBe(true);
      expect(outcome.metadata.attempts).toBe(3);
      expect(outcome.metadata.cost_usd).toBeNull();
      expect(outcome.narrative).toEqual({ executive_summary: '', highlights: [], risks: [] });
      expect(Object.values(outcome.fields).map((f) => f.kind)).toEqual([
        'missing',
        'missing',
        'missing',
        'missing',
        'missing',
        'missing',
      ]);
      expect(outcome.error).toEqual({
        code: 'EXTRACTION_TIMEOUT',
        message: 'Backend slow-model did not respond within 20ms',
      });
    });

    it('should abort the backend signal when a call times out', async () => {
      let aborted = false;
      const backend = new StubBackend(
        'abort-aware',
        (_record, ctx) =>
          new Promise<BackendOutput>((_, reject) => {
            ctx.signal.addEventListener('abort', () => {
              aborted = true;
              reject(new Error('aborted'));
            });
          })
      );

      await extractWithPolicy(record, backend, { ...FAST_POLICY, maxAttempts: 1 });
      expect(aborted).toBe(true);
    });

    it('should succeed on a retry after one timeout', async () => {
      let attempt = 0;
      const backend = new StubBackend('flaky-model', (_record, ctx) => {
        attempt++;
        if (attempt === 1) {
          return new Promise<BackendOutput>((_, reject) => {
            ctx.signal.addEventListener('abort', () => reject(new Error('aborted')));
          });
        }
        return Promise.resolve({ fields: missingFields(), narrative: STUB_NARRATIVE });
      });

      const outcome = await extractWithPolicy(record, backend, FAST_POLICY);

      expect(outcome.degraded).toBe(false);
      expect(outcome.metadata.attempts).toBe(2);
    });

    it('should reject a schema violation without retrying', async () => {
      const backend = new StubBackend('bad-model', async () => ({
        fields: { ...missingFields(), deal_size: { kind: 'amount', amount: 'lots', currency: 'USD', text: 'lots' } },
        narrative: STUB_NARRATIVE,
      }));

      await expect(extractWithPolicy(record, backend, FAST_POLICY)).rejects.toThrow(SchemaViolationError);
      expect(backend.calls).toBe(1);
    });

    it('should reject a narrative without highlights', async () => {
      const backend = new StubBackend('bad-narrative', async () => ({
        fields: missingFields(),
        narrative: { executive_summary: 'Summary.', risks: [] },
      }));

      await expect(extractWithPolicy(record, backend, FAST_POLICY)).rejects.toMatchObject({ code: 'SCHEMA_VIOLATION' });
    });

    it('should wrap other backend errors as extraction failures', async () => {
      const backend = new StubBackend('broken-model', async () => {
        throw new Error('connection reset');
      });

      await expect(extractWithPolicy(record, backend, FAST_POLICY)).rejects.toMatchObject({
        code: 'EXTRACTION_FAILED',
        message: 'Backend broken-model failed: connection reset',
      });
      expect(backend.calls).toBe(1);
    });

    it('should read a free-text "N/A" as missing', async () => {
      const backend = new StubBackend('na-model', async () => ({
        fields: { ...missingFields(), payment_frequency: { kind: 'free_text', text: 'N/A' } },
        narrative: STUB_NARRATIVE,
      }));

      const outcome = await extractWithPolicy(record, backend, FAST_POLICY);
      expect(outcome.fields.payment_frequency).toEqual({
        kind: 'missing',
        provenance: { backend_id: 'na-model', record_id: record.id, quote: null },
      });
    });

    it('should price model usage', async () => {
      const backend = new StubBackend('priced-model', async () => ({
        fields: missingFields(),
        narrative: STUB_NARRATIVE,
        model: 'gpt-4o-mini-2024-07-18',
        usage: { input_tokens: 1000, output_tokens: 500 },
      }));

      const outcome = await extractWithPolicy(record, backend, FAST_POLICY);
      expect(outcome.metadata.model).toBe('gpt-4o-mini-2024-07-18');
      expect(outcome.metadata.cost_usd).toBeCloseTo(0.00045, 10);
    });

    it('should serve a second call from the cache', async () => {
      const cache = new InMemoryExtractionCache();
      const backend = new StubBackend('cached-model', async () => ({ fields: missingFields(), narrative: STUB_NARRATIVE }));

      const first = await extractWithPolicy(record, backend, { ...FAST_POLICY, cache });
      const second = await extractWithPolicy(record, backend, { ...FAST_POLICY, cache });

      expect(backend.calls).toBe(1);
      expect(second).toEqual(first);
      expect(cache.size).toBe(1);
    });

    it('should not cache a degraded outcome', async () => {
      const cache = new InMemoryExtractionCache();
      await extractWithPolicy(record, hangingBackend('slow-model'), { ...FAST_POLICY, maxAttempts: 1, cache });
      expect(cache.size).toBe(0);
    });
  });

  describe('backoffDelayMs', () => {
    it('should double from the base', () => {
      expect([1, 2, 3, 4].map((n) => backoffDelayMs(250, n))).toEqual([250, 500, 1000, 2000]);
    });
  });

  describe('readNotAvailable', () => {
    it.each(['N/A', 'n/a', 'NA', 'Not available.', 'not stated'])('should treat "%s" as missing', (text) => {
      expect(readNotAvailable({ kind: 'free_text', text })).toEqual({ kind: 'missing' });
    });

    it('should keep real text', () => {
      expect(readNotAvailable({ kind: 'free_text', text: 'Quarterly' })).toEqual({ kind: 'free_text', text: 'Quarterly' });
    });
  });

  describe('estimateCostUsd', () => {
    it('should use the longest matching price prefix', () => {
      expect(estimateCostUsd('gpt-4o-2024-08-06', { input_tokens: 1_000_000, output_tokens: 0 })).toBe(2.5);
    });

    it('should return null for an unpriced model or missing usage', () => {
      expect(estimateCostUsd('house-model', { input_tokens: 10, output_tokens: 10 })).toBeNull();
      expect(estimateCostUsd('gpt-4o', null)).toBeNull();
    });
  });
});
