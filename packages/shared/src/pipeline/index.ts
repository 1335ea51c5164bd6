/**
 * Benchmark Pipeline
 *
 * ingest -> split -> (record x backend) extraction tasks -> barrier -> report.
 *
 * Tasks run in a bounded pool inside their own AsyncLocalStorage context.
 * A failing task yields a failed result and never cancels its siblings;
 * aggregation starts only once every task has settled.
 */

import { ulid } from 'ulid';
import {
  defaultExtractionPolicy,
  extractWithPolicy,
  type ExtractionBackend,
  type ExtractionCache,
  type ExtractionPolicy,
} from '../backends';
import { canonicalizeAll, type CanonicalizeOptions } from '../canonicalizer';
import { composeOutcome } from '../composer';
import { config } from '../config';
import { getContext, runWithContextAsync } from '../context';
import { PipelineHaltedError, toErrorInfo } from '../errors';
import { aggregate, failedResult, score, type BenchmarkReport, type ScoringTolerances } from '../evaluator';
import { logger } from '../logger';
import { benchmarkRunsCounter, recordsIngestedCounter } from '../metrics';
import { splitRecords } from '../splitter';
import type {
  BenchmarkResult,
  CanonicalRecord,
  FailureStage,
  MemoArtifact,
  MembershipEntry,
  RawSource,
  RecordFailure,
  ReferenceAnnotation,
  SplitAssignment,
} from '../types';
import { runPool } from './pool';

export { runPool } from './pool';

export type BenchmarkScope = 'eval' | 'all';

export interface BenchmarkInput {
  sources: Iterable<RawSource> | AsyncIterable<RawSource>;
  eval_membership: readonly MembershipEntry[];
  backends: readonly ExtractionBackend[];
  /** Reference annotations, as a list or keyed by record id */
  references?: readonly ReferenceAnnotation[] | Record<string, Omit<ReferenceAnnotation, 'record_id'>>;
  scope?: BenchmarkScope;
}

export interface BenchmarkOptions {
  runId?: string;
  concurrency?: number;
  ambiguityThreshold?: number;
  policy?: Partial<ExtractionPolicy>;
  cache?: ExtractionCache;
  tolerances?: ScoringTolerances;
  minHighlights?: number;
  minRisks?: number;
  canonicalize?: CanonicalizeOptions;
  now?: () => Date;
}

export interface BenchmarkRun {
  run_id: string;
  scope: BenchmarkScope;
  assignments: SplitAssignment[];
  artifacts: MemoArtifact[];
  results: BenchmarkResult[];
  report: BenchmarkReport;
  failures: RecordFailure[];
  duplicates: Array<{ source_uri: string; record_id: string }>;
}

interface BenchmarkTask {
  record: CanonicalRecord;
  backend: ExtractionBackend;
}

interface TaskOutcome {
  artifact: MemoArtifact | null;
  result: BenchmarkResult;
  failure: RecordFailure | null;
}

function isReferenceList(
  references: NonNullable<BenchmarkInput['references']>
): references is readonly ReferenceAnnotation[] {
  return Array.isArray(references);
}

function indexReferences(references: BenchmarkInput['references']): Map<string, ReferenceAnnotation> {
  const byRecord = new Map<string, ReferenceAnnotation>();
  if (!references) return byRecord;

  if (isReferenceList(references)) {
    for (const reference of references) byRecord.set(reference.record_id, reference);
  } else {
    for (const [recordId, reference] of Object.entries(references)) {
      byRecord.set(recordId, { record_id: recordId, fields: reference.fields });
    }
  }
  return byRecord;
}

async function runTask(
  task: BenchmarkTask,
  reference: ReferenceAnnotation | undefined,
  policy: ExtractionPolicy,
  options: BenchmarkOptions
): Promise<TaskOutcome> {
  const { record, backend } = task;
  let stage: FailureStage = 'extract';

  try {
    const outcome = await extractWithPolicy(record, backend, policy);

    stage = 'compose';
    const artifact = composeOutcome(record, outcome, {
      minHighlights: options.minHighlights,
      minRisks: options.minRisks,
      now: options.now,
    });

    stage = 'score';
    const result = score(artifact, reference, {
      record,
      tolerances: options.tolerances,
      error: outcome.error,
    });

    return { artifact, result, failure: null };
  } catch (error) {
    logger.error(`Task failed at ${stage}`, error);
    return {
      artifact: null,
      result: failedResult(record.id, backend.id, error),
      failure: {
        stage,
        source_uri: record.source_uri,
        record_id: record.id,
        backend_id: backend.id,
        error: toErrorInfo(error),
      },
    };
  }
}

/**
 * Run a benchmark end to end.
 *
 * Throws PipelineHaltedError when the share of ambiguous records exceeds the
 * ambiguity threshold; nothing is extracted in that case.
 */
export async function runBenchmark(input: BenchmarkInput, options: BenchmarkOptions = {}): Promise<BenchmarkRun> {
  const outerCorrelationId = getContext()?.correlationId;
  const runId = options.runId ?? outerCorrelationId ?? ulid();
  const correlationId = outerCorrelationId ?? runId;
  const scope = input.scope ?? 'eval';

  return runWithContextAsync({ correlationId }, async () => {
    const ingested = await canonicalizeAll(input.sources, { now: options.now, ...options.canonicalize });
    recordsIngestedCounter.inc({ status: 'canonical' }, ingested.records.length);
    recordsIngestedCounter.inc({ status: 'malformed' }, ingested.failures.length);
    recordsIngestedCounter.inc({ status: 'duplicate' }, ingested.duplicates.length);

    const split = splitRecords(ingested.records, input.eval_membership);
    const threshold = options.ambiguityThreshold ?? config.ambiguityThreshold;
    const ambiguous = split.failures.length;
    const total = ingested.records.length;

    if (total > 0 && ambiguous / total > threshold) {
      const halted = new PipelineHaltedError(
        `${ambiguous} of ${total} records have ambiguous membership (threshold ${threshold})`,
        ambiguous,
        total
      );
      benchmarkRunsCounter.inc({ status: 'halted' });
      logger.error('Benchmark halted on ambiguous membership', halted, { ambiguous, total, threshold });
      throw halted;
    }

    const partitions = new Map(split.assignments.map((a) => [a.record_id, a.partition]));
    const inScope = ingested.records.filter((record) => {
      const partition = partitions.get(record.id);
      return partition !== undefined && (scope === 'all' || partition === 'eval');
    });

    const tasks: BenchmarkTask[] = inScope.flatMap((record) =>
      input.backends.map((backend) => ({ record, backend }))
    );
    const references = indexReferences(input.references);
    const policy: ExtractionPolicy = {
      ...defaultExtractionPolicy(),
      ...options.policy,
      ...(options.cache ? { cache: options.cache } : {}),
    };

    logger.info('Benchmark started', {
      run_id: runId,
      records: total,
      in_scope: inScope.length,
      backends: input.backends.map((b) => b.id),
      tasks: tasks.length,
      scope,
    });

    const settled = await runPool(tasks, options.concurrency ?? config.extractionConcurrency, (task) =>
      runWithContextAsync({ correlationId, recordId: task.record.id, backendId: task.backend.id }, () =>
        runTask(task, references.get(task.record.id), policy, options)
      )
    );

    const artifacts: MemoArtifact[] = [];
    const results: BenchmarkResult[] = [];
    const failures: RecordFailure[] = [...ingested.failures, ...split.failures];

    settled.forEach((entry, index) => {
      const task = tasks[index];
      const outcome: TaskOutcome =
        entry.status === 'fulfilled'
          ? entry.value
          : {
              artifact: null,
              result: failedResult(task.record.id, task.backend.id, entry.reason),
              failure: {
                stage: 'extract',
                source_uri: task.record.source_uri,
                record_id: task.record.id,
                backend_id: task.backend.id,
                error: toErrorInfo(entry.reason),
              },
            };

      if (outcome.artifact) artifacts.push(outcome.artifact);
      results.push(outcome.result);
      if (outcome.failure) failures.push(outcome.failure);
    });

    const report = aggregate(results, [...ingested.failures, ...split.failures]);
    benchmarkRunsCounter.inc({ status: 'completed' });
    logger.info('Benchmark complete', {
      results: results.length,
      scored: report.tally.scored,
      degraded: report.tally.degraded,
      failed: report.tally.failed,
      dropped_records: report.record_failures.total,
    });

    return {
      run_id: runId,
      scope,
      assignments: split.assignments,
      artifacts,
      results,
      report,
      failures,
      duplicates: ingested.duplicates,
    };
  });
}
