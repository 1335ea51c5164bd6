/**
 * Extraction Backend Adapter
 *
 * The single place where backend output is forced into the closed schema.
 *
 * Per call:
 * - a timeout through an AbortController; the timer is cleared and the
 *   controller aborted on every outcome
 * - timeouts are retried with exponential backoff until maxAttempts calls
 *   have been made, then the outcome is degraded (all fields missing)
 * - schema violations are rejected, never retried or coerced
 * - any other backend error becomes ExtractionFailedError
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import { config } from '../config';
import { getCorrelationId } from '../context';
import {
  ExtractionFailedError,
  ExtractionTimeoutError,
  SchemaViolationError,
  isMemoBenchError,
  toErrorInfo,
} from '../errors';
import { allMissing, mapFields, missing, withProvenance } from '../fields';
import { logger } from '../logger';
import {
  extractionDurationHistogram,
  extractionOutcomesCounter,
  extractionRetriesCounter,
} from '../metrics';
import { validateNarrative, validateStructuredFields } from '../schemas';
import type { CandidateFieldValue, CanonicalRecord, ExtractionMetadata } from '../types';
import type { ExtractionCache } from './cache';
import { estimateCostUsd } from './pricing';
import type { BackendOutput, ExtractionBackend, ExtractionOutcome } from './types';

export interface ExtractionPolicy {
  /** Per-call timeout */
  timeoutMs: number;
  /** Calls made before degrading, the first call included */
  maxAttempts: number;
  /** Delay before retry n is backoffBaseMs * 2^(n-1) */
  backoffBaseMs: number;
  cache?: ExtractionCache;
  sleep?: (ms: number) => Promise<void>;
}

export function defaultExtractionPolicy(): ExtractionPolicy {
  return {
    timeoutMs: config.extractionTimeoutMs,
    maxAttempts: config.extractionMaxAttempts,
    backoffBaseMs: config.extractionBackoffBaseMs,
  };
}

const NOT_AVAILABLE_PATTERN = /^\s*(?:n\/?a|not\s+(?:available|applicable|stated))\.?\s*$/i;

/**
 * A free-text "N/A" is how model backends assert absence.
 */
export function readNotAvailable(candidate: CandidateFieldValue): CandidateFieldValue {
  if (candidate.kind === 'free_text' && NOT_AVAILABLE_PATTERN.test(candidate.text)) {
    return missing();
  }
  return candidate;
}

export function backoffDelayMs(backoffBaseMs: number, attempt: number): number {
  return backoffBaseMs * 2 ** (attempt - 1);
}

/**
 * One backend call bounded by a timeout. The controller is aborted when the
 * call settles either way, releasing the backend's network handles.
 */
async function callWithTimeout(
  backend: ExtractionBackend,
  record: CanonicalRecord,
  timeoutMs: number
): Promise<BackendOutput> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExtractionTimeoutError(backend.id, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      backend.extract(record, {
        signal: controller.signal,
        correlationId: getCorrelationId(),
        timeoutMs,
      }),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}

/**
 * Validate raw output and attach provenance. Throws SchemaViolationError.
 */
export function acceptOutput(
  record: CanonicalRecord,
  backend: ExtractionBackend,
  output: BackendOutput,
  metadata: Pick<ExtractionMetadata, 'attempts' | 'latency_ms'>
): ExtractionOutcome {
  const fields = validateStructuredFields(output.fields);
  if (!fields.valid) {
    throw new SchemaViolationError(`Backend ${backend.id} returned fields outside the schema`, fields.errors);
  }

  const narrative = validateNarrative(output.narrative);
  if (!narrative.valid) {
    throw new SchemaViolationError(`Backend ${backend.id} returned a malformed narrative`, narrative.errors);
  }

  const source = { backend_id: backend.id, record_id: record.id };
  const model = output.model ?? null;
  const usage = output.usage ?? null;

  return {
    record_id: record.id,
    backend_id: backend.id,
    fields: mapFields((field) => withProvenance(readNotAvailable(fields.value[field]), source)),
    narrative: narrative.value,
    degraded: false,
    metadata: {
      model,
      attempts: metadata.attempts,
      latency_ms: metadata.latency_ms,
      usage,
      cost_usd: backend.kind === 'rule_based' ? 0 : estimateCostUsd(model, usage),
    },
    error: null,
  };
}

function degradedOutcome(
  record: CanonicalRecord,
  backend: ExtractionBackend,
  attempts: number,
  latencyMs: number,
  error: ExtractionTimeoutError
): ExtractionOutcome {
  return {
    record_id: record.id,
    backend_id: backend.id,
    fields: allMissing({ backend_id: backend.id, record_id: record.id }),
    narrative: { executive_summary: '', highlights: [], risks: [] },
    degraded: true,
    metadata: { model: null, attempts, latency_ms: latencyMs, usage: null, cost_usd: null },
    error: toErrorInfo(error),
  };
}

/**
 * Extract one record with one backend under the timeout/retry/degrade policy.
 *
 * Resolves with a valid outcome (possibly degraded). Rejects with
 * SchemaViolationError or ExtractionFailedError.
 */
export async function extractWithPolicy(
  record: CanonicalRecord,
  backend: ExtractionBackend,
  policy: ExtractionPolicy = defaultExtractionPolicy()
): Promise<ExtractionOutcome> {
  const sleep = policy.sleep ?? ((ms: number) => sleepFor(ms));
  const maxAttempts = Math.max(1, policy.maxAttempts);

  const cached = await policy.cache?.get(record.id, backend.id);
  if (cached) {
    logger.debug('Extraction cache hit');
    extractionOutcomesCounter.inc({ backend: backend.id, outcome: 'cache_hit' });
    return cached;
  }

  const startTime = Date.now();
  const endTimer = extractionDurationHistogram.startTimer({ backend: backend.id });
  let lastTimeout: ExtractionTimeoutError | undefined;
  let attempts = 0;

  try {
    while (attempts < maxAttempts) {
      attempts++;
      try {
        const output = await callWithTimeout(backend, record, policy.timeoutMs);
        const outcome = acceptOutput(record, backend, output, {
          attempts,
          latency_ms: Date.now() - startTime,
        });

        extractionOutcomesCounter.inc({ backend: backend.id, outcome: 'success' });
        logger.info('Extraction complete', {
          attempts,
          latency_ms: outcome.metadata.latency_ms,
          cost_usd: outcome.metadata.cost_usd,
        });

        await policy.cache?.set(outcome);
        return outcome;
      } catch (error) {
        if (error instanceof ExtractionTimeoutError) {
          lastTimeout = error;
          logger.warn('Backend call timed out', { attempt: attempts, max_attempts: maxAttempts });
          if (attempts < maxAttempts) {
            extractionRetriesCounter.inc({ backend: backend.id });
            await sleep(backoffDelayMs(policy.backoffBaseMs, attempts));
          }
          continue;
        }

        if (error instanceof SchemaViolationError) {
          extractionOutcomesCounter.inc({ backend: backend.id, outcome: 'schema_violation' });
          logger.warn('Backend output rejected', { violations: error.violations });
          throw error;
        }

        extractionOutcomesCounter.inc({ backend: backend.id, outcome: 'failed' });
        logger.error('Backend call failed', error, { attempt: attempts });
        if (isMemoBenchError(error)) {
          throw error;
        }
        throw new ExtractionFailedError(
          backend.id,
          `Backend ${backend.id} failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        );
      }
    }
  } finally {
    endTimer();
  }

  extractionOutcomesCounter.inc({ backend: backend.id, outcome: 'degraded' });
  logger.warn('Extraction degraded after exhausting retries', { attempts });

  return degradedOutcome(
    record,
    backend,
    attempts,
    Date.now() - startTime,
    lastTimeout ?? new ExtractionTimeoutError(backend.id, policy.timeoutMs)
  );
}
