/**
 * Benchmark Request Handling
 *
 * Turns a validated POST /benchmarks body into a run, hands the run to the
 * persistence queue and shapes the response. Every request gets its own
 * run id; the correlation id only ties log lines and the job together.
 */

import { ulid } from 'ulid';
import {
  logger,
  runBenchmark,
  toReportExport,
  type BenchmarkOptions,
  type BenchmarkReportExport,
  type BenchmarkRequestBody,
  type BenchmarkResult,
  type BenchmarkScope,
  type ExtractionBackend,
  type MemoArtifact,
  type PersistResultsJob,
  type RecordFailure,
  type SplitAssignment,
} from '@memobench/shared';

export interface BenchmarkDeps {
  resolveBackends: (ids: string[]) => ExtractionBackend[];
  enqueuePersist: (job: PersistResultsJob) => Promise<void>;
  options?: BenchmarkOptions;
}

export interface BenchmarkResponse {
  run_id: string;
  scope: BenchmarkScope;
  assignments: SplitAssignment[];
  report: BenchmarkReportExport;
  results: BenchmarkResult[];
  artifacts: MemoArtifact[];
  failures: RecordFailure[];
}

export async function handleBenchmarkRequest(
  body: BenchmarkRequestBody,
  correlationId: string,
  deps: BenchmarkDeps
): Promise<BenchmarkResponse> {
  const backends = deps.resolveBackends(body.backends);

  const run = await runBenchmark(
    {
      sources: body.sources,
      eval_membership: body.eval_membership,
      backends,
      references: body.references,
      scope: body.scope,
    },
    { ...deps.options, runId: deps.options?.runId ?? ulid() }
  );

  const report = toReportExport(run.report);

  await deps.enqueuePersist({
    event_type: 'benchmark.complete',
    correlation_id: correlationId,
    run_id: run.run_id,
    scope: run.scope,
    artifacts: run.artifacts,
    results: run.results,
    report,
    failures: run.failures,
  });

  logger.info('Benchmark run queued for persistence', {
    run_id: run.run_id,
    correlation_id: correlationId,
    artifacts: run.artifacts.length,
    results: run.results.length,
  });

  return {
    run_id: run.run_id,
    scope: run.scope,
    assignments: run.assignments,
    report,
    results: run.results,
    artifacts: run.artifacts,
    failures: run.failures,
  };
}
