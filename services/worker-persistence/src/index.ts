/**
 * Persistence Worker
 *
 * Consumes the persist_results queue and writes benchmark runs to Postgres.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  QUEUE_NAMES,
  type PersistResultsJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@memobench/shared';
import { persistBenchmarkRun, pool } from './lib/db';

/**
 * Process persist_results job
 */
async function processPersistResults(job: Job<PersistResultsJob, void>): Promise<void> {
  const { correlation_id, run_id } = job.data;

  return runWithContextAsync({ correlationId: correlation_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing persist_results', {
      jobId: job.id,
      run_id,
      artifact_count: job.data.artifacts.length,
      result_count: job.data.results.length,
      attempt: job.attemptsMade + 1,
    });

    try {
      await persistBenchmarkRun(job.data);

      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_RESULTS, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.PERSIST_RESULTS, status: 'success' }, duration);

      logger.info('Persist complete', { run_id, duration_seconds: duration });
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_RESULTS, status: 'failed' });
      throw error;
    }
  });
}

// Expose /metrics for Prometheus
serveMetrics(config.metricsPort);

// Create and start the worker
const worker = createWorker<PersistResultsJob, void>(QUEUE_NAMES.PERSIST_RESULTS, processPersistResults);

logger.info('Persistence worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
