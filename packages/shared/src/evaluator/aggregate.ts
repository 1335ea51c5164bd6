/**
 * Benchmark Aggregation
 *
 * A report is an accumulator of integer counts plus metrics derived from it.
 * Accumulators merge by addition (and by multiset union for the per-record
 * compared values), and the metrics are a pure function of the accumulator,
 * so aggregate(A ++ B) equals mergeReports(aggregate(A), aggregate(B)).
 *
 * Records lost before extraction (malformed sources, ambiguous membership)
 * have no result; they are counted by stage and code alongside the results.
 */

import { mapFields } from '../fields';
import {
  MEMO_FIELDS,
  type BenchmarkResult,
  type FieldName,
  type FieldValueData,
  type RecordFailure,
} from '../types';
import { scoreField } from './scoring';

// ============================================================================
// Accumulator
// ============================================================================

export interface ScoreCounts {
  match: number;
  partial: number;
  miss: number;
  unscored: number;
}

export interface StatusTally {
  scored: number;
  degraded: number;
  failed: number;
}

export interface BackendAccumulator {
  status: StatusTally;
  fields: Record<FieldName, ScoreCounts>;
  /** Integer micro-dollars so that sums are exact */
  cost_micro_usd: number;
  cost_samples: number;
  latency_ms_total: number;
  latency_samples: number;
}

type ComparedValues = Record<FieldName, FieldValueData>;

export interface ReportAccumulator {
  backends: Record<string, BackendAccumulator>;
  failures_by_code: Record<string, number>;
  /** Failures of records that never reached a backend, by stage */
  record_failures: Record<string, number>;
  /**
   * record id -> backend id -> extracted values, for scored results only.
   * A list, so that a pair seen in more than one partial report is kept once
   * per occurrence.
   */
  compared: Record<string, Record<string, ComparedValues[]>>;
}

function emptyCounts(): ScoreCounts {
  return { match: 0, partial: 0, miss: 0, unscored: 0 };
}

function emptyTally(): StatusTally {
  return { scored: 0, degraded: 0, failed: 0 };
}

function emptyBackend(): BackendAccumulator {
  return {
    status: emptyTally(),
    fields: mapFields(emptyCounts),
    cost_micro_usd: 0,
    cost_samples: 0,
    latency_ms_total: 0,
    latency_samples: 0,
  };
}

export function emptyAccumulator(): ReportAccumulator {
  return { backends: {}, failures_by_code: {}, record_failures: {}, compared: {} };
}

function addCounts(a: ScoreCounts, b: ScoreCounts): ScoreCounts {
  return {
    match: a.match + b.match,
    partial: a.partial + b.partial,
    miss: a.miss + b.miss,
    unscored: a.unscored + b.unscored,
  };
}

function addTally(a: StatusTally, b: StatusTally): StatusTally {
  return { scored: a.scored + b.scored, degraded: a.degraded + b.degraded, failed: a.failed + b.failed };
}

function addBackends(a: BackendAccumulator, b: BackendAccumulator): BackendAccumulator {
  return {
    status: addTally(a.status, b.status),
    fields: mapFields((field) => addCounts(a.fields[field], b.fields[field])),
    cost_micro_usd: a.cost_micro_usd + b.cost_micro_usd,
    cost_samples: a.cost_samples + b.cost_samples,
    latency_ms_total: a.latency_ms_total + b.latency_ms_total,
    latency_samples: a.latency_samples + b.latency_samples,
  };
}

function mergeCountMaps(a: Record<string, number>, b: Record<string, number>): Record<string, number> {
  const out: Record<string, number> = { ...a };
  for (const [key, value] of Object.entries(b)) {
    out[key] = (out[key] ?? 0) + value;
  }
  return out;
}

export function mergeAccumulators(a: ReportAccumulator, b: ReportAccumulator): ReportAccumulator {
  const backends: Record<string, BackendAccumulator> = { ...a.backends };
  for (const [backendId, acc] of Object.entries(b.backends)) {
    const existing = backends[backendId];
    backends[backendId] = existing ? addBackends(existing, acc) : acc;
  }

  const compared: ReportAccumulator['compared'] = {};
  for (const source of [a.compared, b.compared]) {
    for (const [recordId, byBackend] of Object.entries(source)) {
      const target = (compared[recordId] ??= {});
      for (const [backendId, values] of Object.entries(byBackend)) {
        target[backendId] = [...(target[backendId] ?? []), ...values];
      }
    }
  }
  for (const byBackend of Object.values(compared)) {
    for (const values of Object.values(byBackend)) {
      values.sort(compareSerialized);
    }
  }

  return {
    backends,
    failures_by_code: mergeCountMaps(a.failures_by_code, b.failures_by_code),
    record_failures: mergeCountMaps(a.record_failures, b.record_failures),
    compared,
  };
}

// keeps merged accumulators identical whatever the merge order
function compareSerialized(a: ComparedValues, b: ComparedValues): number {
  const [left, right] = [JSON.stringify(a), JSON.stringify(b)];
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Accumulator holding exactly one result
 */
export function accumulate(result: BenchmarkResult): ReportAccumulator {
  const backend = emptyBackend();
  backend.status[result.status] += 1;

  for (const field of MEMO_FIELDS) {
    backend.fields[field][result.field_scores[field]] += 1;
  }

  if (result.cost_usd !== null) {
    backend.cost_micro_usd = Math.round(result.cost_usd * 1_000_000);
    backend.cost_samples = 1;
  }
  if (result.latency_ms !== null) {
    backend.latency_ms_total = Math.round(result.latency_ms);
    backend.latency_samples = 1;
  }

  const acc = emptyAccumulator();
  acc.backends[result.backend_id] = backend;

  if (result.error) {
    acc.failures_by_code[result.error.code] = 1;
  }

  if (result.status === 'scored' && result.compared_values) {
    acc.compared[result.record_id] = { [result.backend_id]: [result.compared_values] };
  }

  return acc;
}

/**
 * Accumulator holding one record that failed before extraction
 */
export function accumulateRecordFailure(failure: RecordFailure): ReportAccumulator {
  const acc = emptyAccumulator();
  acc.record_failures[failure.stage] = 1;
  acc.failures_by_code[failure.error.code] = 1;
  return acc;
}

// ============================================================================
// Derived Metrics
// ============================================================================

export interface FieldMetrics {
  /** match / (match + partial + miss); null when nothing was scored */
  accuracy: number | null;
  match: number;
  partial: number;
  miss: number;
  unscored: number;
  /** disagreeing pairs / compared pairs; null when no pair was compared */
  disagreement_rate: number | null;
  compared_pairs: number;
  disagreeing_pairs: number;
}

export interface BackendMetrics {
  tally: StatusTally & { total: number };
  fields: Record<FieldName, FieldMetrics>;
  avg_cost_usd: number | null;
  avg_latency_ms: number | null;
  total_cost_usd: number;
}

export interface RecordFailureTally {
  total: number;
  by_stage: Record<string, number>;
}

export interface BenchmarkReport {
  accumulator: ReportAccumulator;
  backends: Record<string, BackendMetrics>;
  /** Over all backends */
  fields: Record<FieldName, FieldMetrics>;
  /** Results by status */
  tally: StatusTally & { total: number };
  /** Records dropped before extraction */
  record_failures: RecordFailureTally;
  /** Failed and degraded results plus dropped records, by error code */
  failures_by_code: Record<string, number>;
}

export type BenchmarkReportExport = Omit<BenchmarkReport, 'accumulator'>;

interface PairCounts {
  compared: number;
  disagreeing: number;
}

function emptyPairs(): PairCounts {
  return { compared: 0, disagreeing: 0 };
}

function accuracyOf(counts: ScoreCounts): number | null {
  const scored = counts.match + counts.partial + counts.miss;
  return scored === 0 ? null : counts.match / scored;
}

function fieldMetrics(counts: ScoreCounts, pairs: PairCounts): FieldMetrics {
  return {
    accuracy: accuracyOf(counts),
    ...counts,
    disagreement_rate: pairs.compared === 0 ? null : pairs.disagreeing / pairs.compared,
    compared_pairs: pairs.compared,
    disagreeing_pairs: pairs.disagreeing,
  };
}

function withTotal(tally: StatusTally): StatusTally & { total: number } {
  return { ...tally, total: tally.scored + tally.degraded + tally.failed };
}

/**
 * Pairwise agreement between backends on the same record. Two values agree
 * when scoreField calls them a match.
 */
function countDisagreements(compared: ReportAccumulator['compared']): {
  overall: Record<FieldName, PairCounts>;
  byBackend: Record<string, Record<FieldName, PairCounts>>;
} {
  const overall = mapFields(emptyPairs);
  const byBackend: Record<string, Record<FieldName, PairCounts>> = {};

  const countPair = (left: string, right: string, a: ComparedValues, b: ComparedValues): void => {
    for (const field of MEMO_FIELDS) {
      const disagree = scoreField(a[field], b[field]) !== 'match';
      for (const counts of [
        overall[field],
        (byBackend[left] ??= mapFields(emptyPairs))[field],
        (byBackend[right] ??= mapFields(emptyPairs))[field],
      ]) {
        counts.compared += 1;
        if (disagree) counts.disagreeing += 1;
      }
    }
  };

  for (const byRecordBackend of Object.values(compared)) {
    const backendIds = Object.keys(byRecordBackend).sort();
    for (let i = 0; i < backendIds.length; i++) {
      for (let j = i + 1; j < backendIds.length; j++) {
        const [left, right] = [backendIds[i], backendIds[j]];
        for (const a of byRecordBackend[left]) {
          for (const b of byRecordBackend[right]) {
            countPair(left, right, a, b);
          }
        }
      }
    }
  }

  return { overall, byBackend };
}

/**
 * Derive every metric from an accumulator
 */
export function deriveReport(accumulator: ReportAccumulator): BenchmarkReport {
  const { overall, byBackend } = countDisagreements(accumulator.compared);

  const backends: Record<string, BackendMetrics> = {};
  let tally = emptyTally();
  let overallCounts = mapFields(emptyCounts);

  for (const backendId of Object.keys(accumulator.backends).sort()) {
    const acc = accumulator.backends[backendId];
    const pairs = byBackend[backendId] ?? mapFields(emptyPairs);

    backends[backendId] = {
      tally: withTotal(acc.status),
      fields: mapFields((field) => fieldMetrics(acc.fields[field], pairs[field])),
      avg_cost_usd: acc.cost_samples === 0 ? null : acc.cost_micro_usd / acc.cost_samples / 1_000_000,
      avg_latency_ms: acc.latency_samples === 0 ? null : acc.latency_ms_total / acc.latency_samples,
      total_cost_usd: acc.cost_micro_usd / 1_000_000,
    };

    tally = addTally(tally, acc.status);
    overallCounts = mapFields((field) => addCounts(overallCounts[field], acc.fields[field]));
  }

  return {
    accumulator,
    backends,
    fields: mapFields((field) => fieldMetrics(overallCounts[field], overall[field])),
    tally: withTotal(tally),
    record_failures: {
      total: Object.values(accumulator.record_failures).reduce((sum, n) => sum + n, 0),
      by_stage: { ...accumulator.record_failures },
    },
    failures_by_code: { ...accumulator.failures_by_code },
  };
}

/**
 * Aggregate results into a report. Order of results does not matter.
 * `recordFailures` are the ingest and split failures of the same run.
 */
export function aggregate(
  results: readonly BenchmarkResult[],
  recordFailures: readonly RecordFailure[] = []
): BenchmarkReport {
  return deriveReport(
    [...results.map(accumulate), ...recordFailures.map(accumulateRecordFailure)].reduce(
      mergeAccumulators,
      emptyAccumulator()
    )
  );
}

/**
 * Merge two partial reports into the report of their combined results
 */
export function mergeReports(a: BenchmarkReport, b: BenchmarkReport): BenchmarkReport {
  return deriveReport(mergeAccumulators(a.accumulator, b.accumulator));
}

/**
 * The report without its accumulator, for JSON or tabular rendering
 */
export function toReportExport(report: BenchmarkReport): BenchmarkReportExport {
  return {
    backends: report.backends,
    fields: report.fields,
    tally: report.tally,
    record_failures: report.record_failures,
    failures_by_code: report.failures_by_code,
  };
}

export interface ReportRow {
  backend_id: string;
  field: FieldName;
  accuracy: number | null;
  disagreement_rate: number | null;
  avg_cost_usd: number | null;
  avg_latency_ms: number | null;
}

/**
 * One row per (backend, field), for tabular presentation
 */
export function toReportRows(report: BenchmarkReport): ReportRow[] {
  return Object.entries(report.backends).flatMap(([backendId, metrics]) =>
    MEMO_FIELDS.map((field) => ({
      backend_id: backendId,
      field,
      accuracy: metrics.fields[field].accuracy,
      disagreement_rate: metrics.fields[field].disagreement_rate,
      avg_cost_usd: metrics.avg_cost_usd,
      avg_latency_ms: metrics.avg_latency_ms,
    }))
  );
}
