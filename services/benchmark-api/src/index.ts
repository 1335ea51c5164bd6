/**
 * Benchmark API
 *
 * POST /benchmarks - Runs a benchmark over the posted sources and queues the
 * results for persistence
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  createQueue,
  getQueueMetrics,
  reportQueueMetrics,
  resolveBackends,
  validateBenchmarkRequest,
  QUEUE_NAMES,
  type PersistResultsJob,
} from '@memobench/shared';
import { handleBenchmarkRequest } from './lib/benchmark';
import { invalidRequest, toHttpError } from './lib/errors';

const app = express();
const port = config.apiPort;

const persistResultsQueue = createQueue<PersistResultsJob, void>(QUEUE_NAMES.PERSIST_RESULTS);

// Backends named in BENCHMARK_BACKENDS are built and registered up front
const preregistered = resolveBackends(config.benchmarkBackends);

// Middleware
app.use(express.json({ limit: '50mb' }));

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const correlationId = req.get('x-correlation-id') || ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const path = req.route?.path || req.path;

    httpRequestDurationHistogram.observe(
      { method: req.method, path, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    // Check Redis connection via queue
    const metrics = await getQueueMetrics(persistResultsQueue);

    res.json({
      status: 'healthy',
      service: 'benchmark-api',
      queue_depth: metrics.waiting + metrics.active,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'benchmark-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  await reportQueueMetrics([{ name: QUEUE_NAMES.PERSIST_RESULTS, queue: persistResultsQueue }]);
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * POST /benchmarks
 * Runs extraction, composition and scoring, then queues the run for persistence
 */
app.post('/benchmarks', async (req: Request, res: Response) => {
  const correlationId = getCorrelationId();

  const validation = validateBenchmarkRequest(req.body);
  if (!validation.valid) {
    res.status(400).json(invalidRequest(validation.errors.join('; '), correlationId));
    return;
  }

  try {
    const response = await handleBenchmarkRequest(validation.value, correlationId, {
      resolveBackends,
      enqueuePersist: async (job) => {
        await persistResultsQueue.add('persist', job, { jobId: job.run_id });
      },
    });

    res.json(response);
  } catch (error) {
    logger.error('Benchmark request failed', error);
    const { status, body } = toHttpError(error, correlationId);
    res.status(status).json(body);
  }
});

// Start server
app.listen(port, () => {
  logger.info('Benchmark API started', { port, backends: preregistered.map((b) => b.id) });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await persistResultsQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
