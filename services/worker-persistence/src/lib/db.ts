/**
 * Database Operations
 *
 * Writes one benchmark run per transaction: the run row, its memo artifacts
 * (upserted on (record_id, backend_id)), its per-pair results and its report.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type BenchmarkResult,
  type MemoArtifact,
  type PersistResultsJob,
} from '@memobench/shared';

const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

/** The part of a pg client these writes need */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

async function upsertRun(client: SqlClient, job: PersistResultsJob): Promise<void> {
  await client.query(
    `INSERT INTO benchmark_runs (run_id, correlation_id, scope)
     VALUES ($1, $2, $3)
     ON CONFLICT (run_id) DO UPDATE SET
       correlation_id = EXCLUDED.correlation_id,
       scope = EXCLUDED.scope`,
    [job.run_id, job.correlation_id, job.scope]
  );
}

async function upsertArtifact(client: SqlClient, runId: string, artifact: MemoArtifact): Promise<void> {
  await client.query(
    `INSERT INTO memo_artifacts (record_id, backend_id, run_id, degraded, generated_at, artifact)
     VALUES ($1, $2, $3, $4, $5, $6)
     ON CONFLICT (record_id, backend_id) DO UPDATE SET
       run_id = EXCLUDED.run_id,
       degraded = EXCLUDED.degraded,
       generated_at = EXCLUDED.generated_at,
       artifact = EXCLUDED.artifact,
       updated_at = NOW()`,
    [
      artifact.record_id,
      artifact.backend_id,
      runId,
      artifact.degraded,
      artifact.generated_at,
      JSON.stringify(artifact),
    ]
  );
}

async function upsertResult(client: SqlClient, runId: string, result: BenchmarkResult): Promise<void> {
  await client.query(
    `INSERT INTO benchmark_results
       (run_id, record_id, backend_id, status, field_scores, untraceable_fields,
        cost_usd, latency_ms, error_code, error)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
     ON CONFLICT (run_id, record_id, backend_id) DO UPDATE SET
       status = EXCLUDED.status,
       field_scores = EXCLUDED.field_scores,
       untraceable_fields = EXCLUDED.untraceable_fields,
       cost_usd = EXCLUDED.cost_usd,
       latency_ms = EXCLUDED.latency_ms,
       error_code = EXCLUDED.error_code,
       error = EXCLUDED.error`,
    [
      runId,
      result.record_id,
      result.backend_id,
      result.status,
      JSON.stringify(result.field_scores),
      JSON.stringify(result.untraceable_fields),
      result.cost_usd,
      result.latency_ms === null ? null : Math.round(result.latency_ms),
      result.error?.code ?? null,
      result.error ? JSON.stringify(result.error) : null,
    ]
  );
}

async function upsertReport(client: SqlClient, job: PersistResultsJob): Promise<void> {
  await client.query(
    `INSERT INTO benchmark_reports (run_id, report, failures)
     VALUES ($1, $2, $3)
     ON CONFLICT (run_id) DO UPDATE SET
       report = EXCLUDED.report,
       failures = EXCLUDED.failures`,
    [job.run_id, JSON.stringify(job.report), JSON.stringify(job.failures)]
  );
}

/**
 * Every statement for one run, in order. The caller owns the transaction.
 */
export async function writeBenchmarkRun(client: SqlClient, job: PersistResultsJob): Promise<void> {
  await upsertRun(client, job);

  for (const artifact of job.artifacts) {
    await upsertArtifact(client, job.run_id, artifact);
  }

  for (const result of job.results) {
    await upsertResult(client, job.run_id, result);
  }

  await upsertReport(client, job);
}

/**
 * Persist a benchmark run in a single transaction
 */
export async function persistBenchmarkRun(job: PersistResultsJob): Promise<void> {
  const client = await pool.connect();
  const startTime = Date.now();

  try {
    await client.query('BEGIN');
    await writeBenchmarkRun(client, job);
    await client.query('COMMIT');

    const duration = (Date.now() - startTime) / 1000;
    dbQueryDurationHistogram.observe({ operation: 'persist_benchmark_run' }, duration);

    logger.info('Persisted benchmark run', {
      run_id: job.run_id,
      artifact_count: job.artifacts.length,
      result_count: job.results.length,
      duration_seconds: duration,
    });
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error('Failed to persist benchmark run', error, { run_id: job.run_id });
    throw error;
  } finally {
    client.release();
  }
}

export { pool };
