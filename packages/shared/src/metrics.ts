/**
 * Prometheus Metrics
 *
 * Metrics for queue depth, job processing, pipeline outcomes and text extraction.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'meterline_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'meterline_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'meterline_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'meterline_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const invoicesProcessedCounter = new promClient.Counter({
  name: 'meterline_invoices_processed_total',
  help: 'Invoices through the pipeline by final status',
  labelNames: ['service_type', 'status'],
  registers: [register],
});

export const rejectionsCounter = new promClient.Counter({
  name: 'meterline_rejections_total',
  help: 'Pipeline runs that ended in a rejection',
  labelNames: ['reason'],
  registers: [register],
});

export const fieldGapsCounter = new promClient.Counter({
  name: 'meterline_field_gaps_total',
  help: 'Template fields with no match in the document text',
  labelNames: ['field'],
  registers: [register],
});

export const confidenceHistogram = new promClient.Histogram({
  name: 'meterline_confidence_score',
  help: 'Confidence score of scored records',
  buckets: [0.1, 0.3, 0.5, 0.6, 0.7, 0.8, 0.9, 1],
  registers: [register],
});

export const pipelineDurationHistogram = new promClient.Histogram({
  name: 'meterline_pipeline_duration_seconds',
  help: 'Duration of a pipeline run from intake to disposition',
  labelNames: ['outcome'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const templateReloadsCounter = new promClient.Counter({
  name: 'meterline_template_reloads_total',
  help: 'Template directory reloads by result',
  labelNames: ['result'],
  registers: [register],
});

// ============================================================================
// Text Extraction Metrics
// ============================================================================

export const textExtractionRequestsCounter = new promClient.Counter({
  name: 'meterline_text_extraction_requests_total',
  help: 'Text extraction attempts by backend and result',
  labelNames: ['backend', 'status'],
  registers: [register],
});

export const textExtractionDurationHistogram = new promClient.Histogram({
  name: 'meterline_text_extraction_duration_seconds',
  help: 'Duration of a single text extraction attempt',
  labelNames: ['backend'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// Backpressure Metrics
// ============================================================================

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'meterline_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'meterline_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'meterline_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'meterline_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

let defaultMetricsEnabled = false;

/**
 * Add process metrics (CPU, memory, event loop) to the registry. Called by
 * long-running services only; the collectors keep timers alive.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  defaultMetricsEnabled = true;
  // Wrap to avoid crashes on Alpine/restricted environments
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      const depth = m.waiting + m.active;
      queueDepthGauge.set({ queue: name }, depth);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number, beforeScrape?: () => Promise<void>): http.Server {
  enableDefaultMetrics();

  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }
    (beforeScrape ? beforeScrape() : Promise.resolve())
      .then(() => getMetrics())
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.end(body);
      })
      .catch((err: unknown) => {
        logger.error('Metrics scrape failed', err);
        res.statusCode = 500;
        res.end();
      });
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
