export {
  scoreField,
  score,
  failedResult,
  compareText,
  DEFAULT_TOLERANCES,
  type ScoringTolerances,
  type ScoreOptions,
  type ComparisonScore,
} from './scoring';

export { isTraceable } from './traceability';

export {
  aggregate,
  mergeReports,
  deriveReport,
  accumulate,
  accumulateRecordFailure,
  mergeAccumulators,
  emptyAccumulator,
  toReportExport,
  toReportRows,
  type BenchmarkReport,
  type BenchmarkReportExport,
  type RecordFailureTally,
  type BackendMetrics,
  type FieldMetrics,
  type ReportAccumulator,
  type BackendAccumulator,
  type ScoreCounts,
  type StatusTally,
  type ReportRow,
} from './aggregate';
