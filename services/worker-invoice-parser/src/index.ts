/**
 * Invoice Parser Worker
 *
 * Consumes parse_invoice and reprocess_invoice, runs the extraction
 * pipeline and persists results to Postgres. SIGHUP reloads templates.
 */

import { Job } from 'bullmq';
import OpenAI from 'openai';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createQueue,
  serveMetrics,
  reportQueueMetrics,
  InvoicePipeline,
  LocalTextAdapter,
  RemoteOcrAdapter,
  TemplateRegistry,
  QUEUE_NAMES,
  jobsProcessedCounter,
  jobDurationHistogram,
  type ParseInvoiceJob,
  type QueueName,
  type ReprocessInvoiceJob,
  type TextExtractionAdapter,
} from '@meterline/shared';
import { PgBatchStore, PgHistoryStore, PgInvoiceStore, PgSourceStore, pool } from './lib/db';
import {
  handleParseInvoice,
  handleReprocessInvoice,
  type AttemptInfo,
  type JobDeps,
} from './lib/jobs';
import { readPdfPages } from './lib/pdf';

function createTextAdapter(): TextExtractionAdapter {
  if (config.textBackend === 'remote') {
    // Retries and timeouts are applied by the pipeline, per attempt
    const client = new OpenAI({
      apiKey: config.openaiApiKey,
      timeout: config.extractionTimeoutMs,
      maxRetries: 0,
    });
    return new RemoteOcrAdapter(client, { model: config.ocrModel });
  }
  return new LocalTextAdapter(readPdfPages);
}

const registry = TemplateRegistry.fromDirectory(config.templatesPath);
if (registry.size === 0) {
  logger.warn('No templates loaded; every document will be rejected', {
    templatesPath: config.templatesPath,
  });
}

const sourceStore = new PgSourceStore();

const deps: JobDeps = {
  pipeline: new InvoicePipeline({
    registry,
    textAdapter: createTextAdapter(),
    invoiceStore: new PgInvoiceStore(),
    sourceStore,
    historyStore: new PgHistoryStore(),
    confidenceThreshold: config.confidenceThreshold,
    fuzzyFallback: config.fuzzyFallback,
    duplicateKeys: config.duplicateKeys,
    extractionTimeoutMs: config.extractionTimeoutMs,
    retryPolicy: {
      maxAttempts: config.extractionMaxAttempts,
      baseDelayMs: config.extractionBackoffBaseMs,
      maxDelayMs: config.extractionBackoffMaxMs,
      factor: 2,
    },
  }),
  sourceStore,
  batchStore: new PgBatchStore(),
};

/**
 * Run a job handler with context, metrics and attempt bookkeeping.
 */
async function processJob<TData extends { correlation_id: string; source_reference: string }>(
  queue: QueueName,
  job: Job<TData, void>,
  handler: (data: TData, deps: JobDeps, attempt: AttemptInfo) => Promise<unknown>
): Promise<void> {
  const { correlation_id, source_reference } = job.data;

  return runWithContextAsync(
    { correlationId: correlation_id, sourceReference: source_reference },
    async () => {
      const startTime = Date.now();

      logger.info(`Processing ${queue}`, {
        jobId: job.id,
        attempt: job.attemptsMade + 1,
      });

      try {
        await handler(job.data, deps, {
          attemptsMade: job.attemptsMade,
          maxAttempts: job.opts.attempts ?? 1,
        });

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue, status: 'success' });
        jobDurationHistogram.observe({ queue, status: 'success' }, duration);
      } catch (error) {
        jobsProcessedCounter.inc({ queue, status: 'failed' });
        jobDurationHistogram.observe({ queue, status: 'failed' }, (Date.now() - startTime) / 1000);
        throw error;
      }
    }
  );
}

const parseQueue = createQueue<ParseInvoiceJob, void>(QUEUE_NAMES.PARSE_INVOICE);
const reprocessQueue = createQueue<ReprocessInvoiceJob, void>(QUEUE_NAMES.REPROCESS_INVOICE);

// Expose /metrics for Prometheus
serveMetrics(config.workerMetricsPort, () =>
  reportQueueMetrics([
    { name: QUEUE_NAMES.PARSE_INVOICE, queue: parseQueue },
    { name: QUEUE_NAMES.REPROCESS_INVOICE, queue: reprocessQueue },
  ])
);

const parseWorker = createWorker<ParseInvoiceJob, void>(QUEUE_NAMES.PARSE_INVOICE, (job) =>
  processJob(QUEUE_NAMES.PARSE_INVOICE, job, handleParseInvoice)
);
const reprocessWorker = createWorker<ReprocessInvoiceJob, void>(
  QUEUE_NAMES.REPROCESS_INVOICE,
  (job) => processJob(QUEUE_NAMES.REPROCESS_INVOICE, job, handleReprocessInvoice)
);

logger.info('Invoice parser worker started', {
  textBackend: config.textBackend,
  templates: registry.size,
});

process.on('SIGHUP', () => {
  const result = registry.reloadFromDirectory(config.templatesPath);
  logger.info('Templates reloaded', {
    loaded: result.templates.length,
    rejected: result.rejected.map((r) => r.file),
  });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await parseWorker.close();
  await reprocessWorker.close();
  await parseQueue.close();
  await reprocessQueue.close();
  await pool.end();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
