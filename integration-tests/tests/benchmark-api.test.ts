/**
 * Benchmark API Tests
 *
 * Request handling with in-process fakes for the backend registry and the
 * persistence queue.
 */

import {
  PipelineHaltedError,
  RuleBasedBackend,
  UnknownBackendError,
  validateBenchmarkRequest,
  type BenchmarkRequestBody,
  type PersistResultsJob,
} from '@memobench/shared';
import { handleBenchmarkRequest, type BenchmarkDeps } from '../../services/benchmark-api/src/lib/benchmark';
import { invalidRequest, toHttpError } from '../../services/benchmark-api/src/lib/errors';
import { ACME_URI, FIXED_NOW, NORTHWIND_URI, readDocument } from './helpers';

function requestBody(): BenchmarkRequestBody {
  return {
    sources: [
      { source_uri: ACME_URI, raw_text: readDocument('acme-credit-agreement.md') },
      { source_uri: NORTHWIND_URI, raw_text: readDocument('northwind-amendment.md') },
    ],
    eval_membership: [ACME_URI],
    backends: ['rule-based'],
    references: {},
  };
}

describe('Benchmark API', () => {
  describe('handleBenchmarkRequest', () => {
    let jobs: PersistResultsJob[];
    let requestedIds: string[][];
    let deps: BenchmarkDeps;

    beforeEach(() => {
      jobs = [];
      requestedIds = [];
      deps = {
        resolveBackends: (ids) => {
          requestedIds.push(ids);
          return ids.map((id) => new RuleBasedBackend(id));
        },
        enqueuePersist: async (job) => {
          jobs.push(job);
        },
        options: { now: FIXED_NOW, policy: { timeoutMs: 1000, maxAttempts: 1, backoffBaseMs: 1 } },
      };
    });

    it('should run the benchmark and queue it for persistence with the correlation id', async () => {
      const response = await handleBenchmarkRequest(requestBody(), 'corr-123', deps);

      expect(requestedIds).toEqual([['rule-based']]);
      expect(response.run_id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
      expect(response.scope).toBe('eval');
      expect(response.assignments.map((a) => a.partition)).toEqual(['eval', 'train']);
      expect(response.results).toHaveLength(1);
      expect(response.report.tally).toEqual({ scored: 1, degraded: 0, failed: 0, total: 1 });
      expect(response.report).not.toHaveProperty('accumulator');

      expect(jobs).toHaveLength(1);
      expect(jobs[0]).toMatchObject({
        event_type: 'benchmark.complete',
        correlation_id: 'corr-123',
        run_id: response.run_id,
        scope: 'eval',
        failures: [],
      });
      expect(jobs[0].artifacts).toEqual(response.artifacts);
      expect(jobs[0].report).toEqual(response.report);
    });

    it('should give each request its own run id when the correlation id repeats', async () => {
      const first = await handleBenchmarkRequest(requestBody(), 'corr-123', deps);
      const second = await handleBenchmarkRequest(requestBody(), 'corr-123', deps);

      expect(first.run_id).not.toBe(second.run_id);
      expect(jobs.map((job) => job.run_id)).toEqual([first.run_id, second.run_id]);
      expect(jobs.map((job) => job.correlation_id)).toEqual(['corr-123', 'corr-123']);
    });

    it('should not queue anything when a backend cannot be resolved', async () => {
      deps.resolveBackends = (ids) => {
        throw new UnknownBackendError(ids[0]);
      };

      await expect(handleBenchmarkRequest(requestBody(), 'corr-123', deps)).rejects.toThrow(UnknownBackendError);
      expect(jobs).toEqual([]);
    });
  });

  describe('validateBenchmarkRequest', () => {
    it('should accept the request body shape', () => {
      expect(validateBenchmarkRequest(requestBody()).valid).toBe(true);
    });

    it('should reject a body without backends', () => {
      const { backends: _omitted, ...body } = requestBody();
      expect(validateBenchmarkRequest(body).valid).toBe(false);
    });
  });

  describe('toHttpError', () => {
    it('should map an unknown backend to 400', () => {
      expect(toHttpError(new UnknownBackendError('openai:nope'), 'corr-1')).toEqual({
        status: 400,
        body: {
          error: {
            code: 'unknown_backend',
            message: 'No extraction backend registered with id: openai:nope',
            correlation_id: 'corr-1',
          },
        },
      });
    });

    it('should map a halted run to 422', () => {
      const halted = new PipelineHaltedError('2 of 3 records have ambiguous membership (threshold 0.1)', 2, 3);
      expect(toHttpError(halted, 'corr-1')).toEqual({
        status: 422,
        body: {
          error: {
            code: 'pipeline_halted',
            message: '2 of 3 records have ambiguous membership (threshold 0.1)',
            correlation_id: 'corr-1',
          },
        },
      });
    });

    it('should hide the message of an unexpected error', () => {
      expect(toHttpError(new Error('connect ECONNREFUSED 127.0.0.1:6379'), 'corr-1')).toEqual({
        status: 500,
        body: { error: { code: 'internal_error', message: 'Benchmark run failed', correlation_id: 'corr-1' } },
      });
    });
  });

  describe('invalidRequest', () => {
    it('should build the invalid_request envelope', () => {
      expect(invalidRequest('/backends must NOT have fewer than 1 items', 'corr-1')).toEqual({
        error: {
          code: 'invalid_request',
          message: '/backends must NOT have fewer than 1 items',
          correlation_id: 'corr-1',
        },
      });
    });
  });
});
