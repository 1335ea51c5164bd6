/**
 * Extraction Backend Types
 *
 * One contract for every extraction engine, model-based or rule-based.
 * Backends return raw output; the adapter validates it against the closed
 * schema and attaches provenance.
 */

import type { ErrorInfo } from '../errors';
import type {
  BackendUsage,
  CanonicalRecord,
  ExtractionMetadata,
  Narrative,
  StructuredFields,
} from '../types';

/**
 * - 'model': a language model behind a provider API
 * - 'rule_based': pattern extraction over the canonical text
 */
export type BackendKind = 'model' | 'rule_based';

export interface BackendCapabilities {
  /** Writes narrative prose (executive summary, highlights, risks) */
  freeTextGeneration: boolean;
  /** Populates the six structured fields */
  structuredFields: boolean;
}

/**
 * Context passed to a backend for one call
 */
export interface BackendCallContext {
  /** Aborted when the per-call timeout fires or the call settles */
  signal: AbortSignal;
  correlationId: string;
  timeoutMs: number;
}

/**
 * Raw backend output. `fields` and `narrative` are untrusted until the
 * adapter has validated them.
 */
export interface BackendOutput {
  fields: unknown;
  narrative: unknown;
  /** Model that served the call, as reported by the provider */
  model?: string;
  usage?: BackendUsage;
}

export interface ExtractionBackend {
  readonly id: string;
  readonly description: string;
  readonly kind: BackendKind;
  readonly capabilities: BackendCapabilities;

  /**
   * Extract structured fields and narrative from one record. Must not keep
   * state between calls.
   */
  extract(record: CanonicalRecord, ctx: BackendCallContext): Promise<BackendOutput>;
}

/**
 * Validated result of extracting one record with one backend
 */
export interface ExtractionOutcome {
  record_id: string;
  backend_id: string;
  fields: StructuredFields;
  narrative: Narrative;
  /** Retries exhausted; all fields forced to missing */
  degraded: boolean;
  metadata: ExtractionMetadata;
  /** Why the outcome is degraded; null otherwise */
  error: ErrorInfo | null;
}
