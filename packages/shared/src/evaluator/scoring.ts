/**
 * Field Scoring
 *
 * Per-field comparison of an extracted value against a reference value, and
 * per-artifact scoring into a BenchmarkResult.
 */

import { toErrorInfo, type ErrorInfo } from '../errors';
import { comparableValue, mapFields, normalizeText, renderFieldValue } from '../fields';
import {
  MEMO_FIELDS,
  type BenchmarkResult,
  type CanonicalRecord,
  type FieldName,
  type FieldScore,
  type FieldValueData,
  type MemoArtifact,
  type ReferenceAnnotation,
} from '../types';
import { isTraceable } from './traceability';

export interface ScoringTolerances {
  /** Absolute amount tolerance in currency units */
  amountAbsolute: number;
  /** Relative amount tolerance (0.005 = 0.5%) */
  amountRelative: number;
  /** Percentage tolerance in percentage points */
  percentagePoints: number;
}

export const DEFAULT_TOLERANCES: ScoringTolerances = {
  amountAbsolute: 0.5,
  amountRelative: 0.005,
  percentagePoints: 0.01,
};

/** Float slack so that a tolerance boundary is inclusive */
const EPSILON = 1e-9;

export type ComparisonScore = Exclude<FieldScore, 'unscored'>;

/**
 * Normalized free-text comparison: equal is a match, one a strict
 * substring of the other is partial.
 */
export function compareText(a: string, b: string): ComparisonScore {
  const left = normalizeText(a);
  const right = normalizeText(b);
  if (left.length === 0 || right.length === 0) return 'miss';
  if (left === right) return 'match';
  if (left.includes(right) || right.includes(left)) return 'partial';
  return 'miss';
}

/**
 * Compare two values of the closed set.
 *
 * Both missing is a match; exactly one missing is a miss (absent extraction
 * or hallucinated value). Values of different kinds are compared on their
 * rendered text and can be at best partial.
 */
export function scoreField(
  extracted: FieldValueData,
  reference: FieldValueData,
  tolerances: ScoringTolerances = DEFAULT_TOLERANCES
): ComparisonScore {
  if (extracted.kind === 'missing' || reference.kind === 'missing') {
    return extracted.kind === reference.kind ? 'match' : 'miss';
  }

  if (extracted.kind === 'amount' && reference.kind === 'amount') {
    if (extracted.currency !== reference.currency) return 'miss';
    const allowed = Math.max(
      tolerances.amountAbsolute,
      tolerances.amountRelative * Math.max(Math.abs(extracted.amount), Math.abs(reference.amount))
    );
    return Math.abs(extracted.amount - reference.amount) <= allowed + EPSILON ? 'match' : 'miss';
  }

  if (extracted.kind === 'percentage' && reference.kind === 'percentage') {
    return Math.abs(extracted.percentage - reference.percentage) <= tolerances.percentagePoints + EPSILON
      ? 'match'
      : 'miss';
  }

  if (extracted.kind === 'date' && reference.kind === 'date') {
    return extracted.date === reference.date ? 'match' : 'miss';
  }

  if (extracted.kind === 'free_text' && reference.kind === 'free_text') {
    return compareText(extracted.text, reference.text);
  }

  const mixed = compareText(renderFieldValue(extracted), renderFieldValue(reference));
  return mixed === 'match' ? 'partial' : mixed;
}

export interface ScoreOptions {
  /** When given, every match is checked for traceability to the source text */
  record?: CanonicalRecord;
  tolerances?: ScoringTolerances;
  /** Why a degraded artifact is degraded */
  error?: ErrorInfo | null;
}

function allUnscored(): Record<FieldName, FieldScore> {
  return mapFields((): FieldScore => 'unscored');
}

/**
 * Score one artifact against an optional reference.
 *
 * Fields without a reference value are unscored (they still feed
 * cross-backend agreement through compared_values). Degraded artifacts are
 * not scored at all.
 */
export function score(
  artifact: MemoArtifact,
  reference?: ReferenceAnnotation,
  options: ScoreOptions = {}
): BenchmarkResult {
  const metadata = artifact.extraction_metadata;

  if (artifact.degraded) {
    return {
      record_id: artifact.record_id,
      backend_id: artifact.backend_id,
      status: 'degraded',
      field_scores: allUnscored(),
      compared_values: null,
      untraceable_fields: [],
      cost_usd: metadata.cost_usd,
      latency_ms: metadata.latency_ms,
      error: options.error ?? null,
    };
  }

  const compared = mapFields((field) => comparableValue(artifact.schema[field]));
  const untraceable: FieldName[] = [];

  const fieldScores = mapFields((field): FieldScore => {
    const expected = reference?.fields[field];
    if (!expected) return 'unscored';

    const result = scoreField(compared[field], expected, options.tolerances);
    if (result === 'match' && options.record && !isTraceable(compared[field], options.record.raw_text)) {
      untraceable.push(field);
      return 'miss';
    }
    return result;
  });

  return {
    record_id: artifact.record_id,
    backend_id: artifact.backend_id,
    status: 'scored',
    field_scores: fieldScores,
    compared_values: compared,
    untraceable_fields: MEMO_FIELDS.filter((field) => untraceable.includes(field)),
    cost_usd: metadata.cost_usd,
    latency_ms: metadata.latency_ms,
    error: null,
  };
}

/**
 * Result for a (record, backend) pair that produced no artifact
 */
export function failedResult(recordId: string, backendId: string, error: unknown): BenchmarkResult {
  return {
    record_id: recordId,
    backend_id: backendId,
    status: 'failed',
    field_scores: allUnscored(),
    compared_values: null,
    untraceable_fields: [],
    cost_usd: null,
    latency_ms: null,
    error: toErrorInfo(error),
  };
}
