/**
 * Shared TypeScript Types
 *
 * Data contracts for the memo extraction-and-evaluation harness. Exported
 * contracts use snake_case keys so they serialize unchanged to JSON.
 */

import type { ErrorInfo } from './errors';

// ============================================================================
// Sources & Canonical Records
// ============================================================================

/** One item of the ingestion stream. */
export interface RawSource {
  source_uri: string;
  raw_text: string | Uint8Array;
}

export interface CanonicalRecord {
  /** sha256:<hex> of the canonical text */
  readonly id: string;
  readonly source_uri: string;
  /** Canonical text (formatting noise and boilerplate removed) */
  readonly raw_text: string;
  readonly extracted_at: string;
}

// ============================================================================
// Split
// ============================================================================

export type Partition = 'train' | 'eval';

export type MembershipEntry = string | { source_uri?: string; content_hash?: string };

export type MembershipSignal = 'source_uri' | 'content_hash' | 'both';

export interface SplitAssignment {
  record_id: string;
  partition: Partition;
  matched_by: MembershipSignal | null;
}

// ============================================================================
// Field Values
// ============================================================================

export const MEMO_FIELDS = [
  'deal_size',
  'deal_price',
  'interest_rate',
  'key_covenants',
  'maturity_date',
  'payment_frequency',
] as const;

export type FieldName = (typeof MEMO_FIELDS)[number];

export const FIELD_LABELS: Record<FieldName, string> = {
  deal_size: 'Deal Size',
  deal_price: 'Deal Price',
  interest_rate: 'Interest Rate',
  key_covenants: 'Key Covenants',
  maturity_date: 'Maturity Date',
  payment_frequency: 'Payment Frequency',
};

export type FieldKind = 'amount' | 'percentage' | 'date' | 'free_text' | 'missing';

export interface AmountValue {
  kind: 'amount';
  /** Absolute amount in currency units (e.g. 250000000) */
  amount: number;
  /** ISO 4217 code */
  currency: string;
  /** Wording as stated in the source */
  text: string;
}

export interface PercentageValue {
  kind: 'percentage';
  /** Percentage points (e.g. 2.75 for 2.75%) */
  percentage: number;
  text: string;
}

export interface DateValue {
  kind: 'date';
  /** YYYY-MM-DD */
  date: string;
  text: string;
}

export interface FreeTextValue {
  kind: 'free_text';
  text: string;
}

export interface MissingValue {
  kind: 'missing';
}

/** A field value without provenance; what backends produce and references hold. */
export type FieldValueData = AmountValue | PercentageValue | DateValue | FreeTextValue | MissingValue;

export interface Provenance {
  backend_id: string;
  record_id: string;
  /** Source excerpt the value was read from */
  quote: string | null;
}

export type FieldValue = FieldValueData & { provenance: Provenance };

/** Field value as emitted by a backend, before provenance is attached. */
export type CandidateFieldValue = FieldValueData & { quote?: string };

export type StructuredFields = Record<FieldName, FieldValue>;

export type CandidateFields = Record<FieldName, CandidateFieldValue>;

// ============================================================================
// Memo Schema & Artifact
// ============================================================================

export interface Narrative {
  executive_summary: string;
  highlights: string[];
  risks: string[];
}

export type MemoSchema = StructuredFields & Narrative;

export type MemoSectionId = 'executive_summary' | 'highlights_risks' | 'key_deal_information';

export interface KeyDealRow {
  field: FieldName;
  label: string;
  value: string;
}

export type MemoSection =
  | { id: 'executive_summary'; title: 'Executive Summary'; body: string }
  | {
      id: 'highlights_risks';
      title: 'Investment Highlights & Risks';
      highlights: string[];
      risks: string[];
    }
  | { id: 'key_deal_information'; title: 'Key Deal Information'; rows: KeyDealRow[] };

export interface BackendUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface ExtractionMetadata {
  model: string | null;
  attempts: number;
  latency_ms: number;
  usage: BackendUsage | null;
  cost_usd: number | null;
}

export interface MemoArtifact {
  record_id: string;
  backend_id: string;
  schema: MemoSchema;
  sections: MemoSection[];
  degraded: boolean;
  generated_at: string;
  extraction_metadata: ExtractionMetadata;
}

// ============================================================================
// Evaluation
// ============================================================================

export interface ReferenceAnnotation {
  record_id: string;
  /** Omitted fields are not scored for accuracy */
  fields: Partial<Record<FieldName, FieldValueData>>;
}

export type FieldScore = 'match' | 'partial' | 'miss' | 'unscored';

export type ResultStatus = 'scored' | 'degraded' | 'failed';

export interface BenchmarkResult {
  record_id: string;
  backend_id: string;
  status: ResultStatus;
  field_scores: Record<FieldName, FieldScore>;
  /** Extracted values used for cross-backend agreement; null when not comparable */
  compared_values: Record<FieldName, FieldValueData> | null;
  untraceable_fields: FieldName[];
  cost_usd: number | null;
  latency_ms: number | null;
  error: ErrorInfo | null;
}

// ============================================================================
// Pipeline Failures
// ============================================================================

export type FailureStage = 'ingest' | 'split' | 'extract' | 'compose' | 'score';

export interface RecordFailure {
  stage: FailureStage;
  source_uri: string | null;
  record_id: string | null;
  backend_id: string | null;
  error: ErrorInfo;
}

// ============================================================================
// HTTP
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
