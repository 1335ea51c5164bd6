/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  MemoBenchError,
  MalformedSourceError,
  AmbiguousMembershipError,
  ExtractionTimeoutError,
  SchemaViolationError,
  TemplateMismatchError,
  ExtractionFailedError,
  PipelineHaltedError,
  UnknownBackendError,
  isMemoBenchError,
  toErrorInfo,
  type ErrorCode,
  type ErrorInfo,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type PersistResultsJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  type QueueCounts,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  recordsIngestedCounter,
  benchmarkRunsCounter,
  extractionOutcomesCounter,
  extractionRetriesCounter,
  extractionDurationHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  llmTokensCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateStructuredFields,
  validateNarrative,
  validateBenchmarkRequest,
  formatAjvErrors,
  STRUCTURED_FIELDS_SCHEMA,
  NARRATIVE_SCHEMA,
  BENCHMARK_REQUEST_SCHEMA,
  type BenchmarkRequestBody,
  type ValidationResult,
} from './schemas';

// Field values and parsing
export * from './fields';

// Canonicalizer
export {
  canonicalize,
  canonicalizeAll,
  canonicalText,
  computeRecordId,
  htmlToText,
  looksLikeHtml,
  stripMarkdown,
  stripBoilerplate,
  dropRepeatedLines,
  collapseWhitespace,
  type CanonicalizeOptions,
  type CanonicalizeAllResult,
} from './canonicalizer';

// Splitter
export {
  assign,
  splitRecords,
  selectEvalMembership,
  buildMembershipIndex,
  normalizeSourceUri,
  MembershipIndex,
  type IndexedEntry,
  type SplitOutcome,
} from './splitter';

// Templates
export {
  CREDIT_AGREEMENT_MEMO_TEMPLATE,
  TRUNCATION_MARKER,
  truncateDocumentText,
  renderUserPrompt,
  getDefaultTemplate,
  type MemoTemplate,
} from './templates';

// Extraction backends
export * from './backends';

// Composer
export { compose, composeOutcome, renderMemoMarkdown, SECTION_ORDER, type ComposeOptions } from './composer';

// Evaluator
export * from './evaluator';

// Pipeline
export {
  runBenchmark,
  runPool,
  type BenchmarkInput,
  type BenchmarkOptions,
  type BenchmarkRun,
  type BenchmarkScope,
} from './pipeline';
