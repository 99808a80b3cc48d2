/**
 * Ingest API
 *
 * POST /documents                 - Accepts one PDF and enqueues parse_invoice
 * POST /batches                   - Accepts base64 PDFs as one processing batch
 * POST /documents/:ref/reprocess  - Enqueues reprocess_invoice
 * POST /documents/reprocess-failed - Enqueues reprocess_invoice for every failed document
 * GET  /documents/:ref            - Current invoice record for a source document
 * GET  /providers/stats           - Per-provider success rate and confidence
 * GET  /batches/:batch_id         - Batch progress
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import { v4 as uuidv4 } from 'uuid';
import {
  logger,
  runWithContext,
  enableDefaultMetrics,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  createQueue,
  checkBackpressure,
  compileTemplate,
  config,
  isServiceType,
  newBatch,
  parseJobId,
  sourceReferenceFor,
  validateBatchRequest,
  isBatchRequest,
  InvalidTemplateError,
  QUEUE_NAMES,
  type BatchAcceptedResponse,
  type DocumentAcceptedResponse,
  type ErrorEnvelope,
  type ParseInvoiceJob,
  type ReprocessInvoiceJob,
  type ServiceType,
} from '@meterline/shared';
import {
  createBatch,
  failedSourceReferences,
  getBatch,
  getInvoiceBySourceReference,
  getProviderStats,
  pool,
  saveSource,
  sourceExists,
} from './lib/db';

const app = express();
const port = config.ingestApiPort;

enableDefaultMetrics();

const parseQueue = createQueue<ParseInvoiceJob, void>(QUEUE_NAMES.PARSE_INVOICE);
const reprocessQueue = createQueue<ReprocessInvoiceJob, void>(QUEUE_NAMES.REPROCESS_INVOICE);

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const correlationId = req.header('x-correlation-id') || ulid();
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
    const path: string = req.route?.path || req.path;

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

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : ulid();
}

function queryString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: { code, message, correlation_id: correlationIdOf(res) },
  };
  res.status(status).json(error);
}

/**
 * Reject with 503 when the parse queue is over its limit.
 * @returns true when the request was rejected
 */
async function rejectedByBackpressure(res: Response): Promise<boolean> {
  const backpressure = await checkBackpressure(parseQueue);

  if (backpressure.shouldReject) {
    backpressureRejectionsCounter.inc();
    logger.warn('Request rejected due to backpressure', { queue_depth: backpressure.depth });
    sendError(res, 503, 'service_unavailable', 'System is under heavy load. Please retry later.');
    return true;
  }

  if (backpressure.shouldWarn) {
    logger.warn('Queue depth approaching threshold', { queue_depth: backpressure.depth });
  }
  return false;
}

interface IntakeItem {
  bytes: Uint8Array;
  providerHint: string | null;
  serviceType: ServiceType | null;
  filename: string | null;
}

async function accept(
  item: IntakeItem,
  correlationId: string,
  batch?: { batchId: string; index: number }
): Promise<string> {
  const sourceReference = sourceReferenceFor(item.bytes);

  await saveSource({
    source_reference: sourceReference,
    bytes: item.bytes,
    provider_hint: item.providerHint,
    service_type: item.serviceType,
    filename: item.filename,
  });

  const job: ParseInvoiceJob = {
    event_type: 'invoice.received',
    correlation_id: correlationId,
    source_reference: sourceReference,
    provider_hint: item.providerHint,
    service_type: item.serviceType,
    filename: item.filename,
    batch_id: batch?.batchId ?? null,
    received_at: new Date().toISOString(),
  };

  await parseQueue.add('invoice.received', job, {
    jobId: parseJobId(sourceReference, batch),
  });

  return sourceReference;
}

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    await pool.query('SELECT 1');
    const metrics = await checkBackpressure(parseQueue);

    res.json({
      status: 'healthy',
      service: 'ingest-api',
      database: 'connected',
      queue_depth: metrics.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'ingest-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * POST /documents?provider_hint=&service_type=&filename=
 * Body is the raw PDF
 */
app.post(
  '/documents',
  express.raw({ type: ['application/pdf', 'application/octet-stream'], limit: '25mb' }),
  async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const body: unknown = req.body;

    if (!Buffer.isBuffer(body) || body.length === 0) {
      sendError(res, 400, 'invalid_request', 'Request body must be a non-empty PDF');
      return;
    }

    const serviceType = queryString(req.query.service_type);
    if (serviceType !== null && !isServiceType(serviceType)) {
      sendError(res, 400, 'invalid_request', 'service_type must be Electricity, Gas or Water');
      return;
    }

    try {
      if (await rejectedByBackpressure(res)) return;

      const sourceReference = await accept(
        {
          bytes: new Uint8Array(body),
          providerHint: queryString(req.query.provider_hint),
          serviceType,
          filename: queryString(req.query.filename),
        },
        correlationId
      );

      logger.info('Document accepted', { source_reference: sourceReference });

      const response: DocumentAcceptedResponse = {
        correlation_id: correlationId,
        source_reference: sourceReference,
      };
      res.status(202).json(response);
    } catch (error) {
      logger.error('Document intake failed', error);
      sendError(res, 500, 'internal_error', 'Failed to accept document');
    }
  }
);

/**
 * POST /batches
 * Body: { documents: [{ content_base64, provider_hint?, service_type?, filename? }] }
 */
app.post('/batches', express.json({ limit: '100mb' }), async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);
  const body: unknown = req.body;

  if (!isBatchRequest(body)) {
    const validation = validateBatchRequest(body);
    sendError(res, 400, 'invalid_request', (validation.errors ?? ['invalid batch']).join('; '));
    return;
  }

  try {
    if (await rejectedByBackpressure(res)) return;

    const batch = newBatch(uuidv4(), body.documents.length, new Date().toISOString());
    await createBatch(batch.batch_id, batch.total, batch.started_at);

    const sourceReferences: string[] = [];
    for (const [index, doc] of body.documents.entries()) {
      sourceReferences.push(
        await accept(
          {
            bytes: new Uint8Array(Buffer.from(doc.content_base64, 'base64')),
            providerHint: doc.provider_hint ?? null,
            serviceType: doc.service_type ?? null,
            filename: doc.filename ?? null,
          },
          correlationId,
          { batchId: batch.batch_id, index }
        )
      );
    }

    logger.info('Batch accepted', { batch_id: batch.batch_id, total: batch.total });

    const response: BatchAcceptedResponse = {
      correlation_id: correlationId,
      batch_id: batch.batch_id,
      source_references: sourceReferences,
    };
    res.status(202).json(response);
  } catch (error) {
    logger.error('Batch intake failed', error);
    sendError(res, 500, 'internal_error', 'Failed to accept batch');
  }
});

/**
 * POST /documents/reprocess-failed
 * Body: { provider?: string, limit?: number }
 */
app.post(
  '/documents/reprocess-failed',
  express.json({ limit: '1mb' }),
  async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const body: unknown = req.body ?? {};
    const provider =
      body && typeof body === 'object' && 'provider' in body ? body.provider : undefined;
    const limit = body && typeof body === 'object' && 'limit' in body ? body.limit : undefined;

    if (provider !== undefined && (typeof provider !== 'string' || provider.trim() === '')) {
      sendError(res, 400, 'invalid_request', 'provider must be a non-empty string');
      return;
    }
    if (limit !== undefined && !(typeof limit === 'number' && Number.isInteger(limit) && limit > 0)) {
      sendError(res, 400, 'invalid_request', 'limit must be a positive integer');
      return;
    }

    try {
      const references = await failedSourceReferences(provider ?? null, limit ?? null);
      const requestedAt = new Date().toISOString();

      for (const sourceReference of references) {
        const job: ReprocessInvoiceJob = {
          event_type: 'invoice.reprocess_requested',
          correlation_id: correlationId,
          source_reference: sourceReference,
          template_override: null,
          requested_at: requestedAt,
        };
        await reprocessQueue.add('invoice.reprocess_requested', job);
      }

      logger.info('Failed documents queued for reprocessing', {
        provider: provider ?? null,
        count: references.length,
      });

      res.status(202).json({ correlation_id: correlationId, source_references: references });
    } catch (error) {
      logger.error('Reprocess of failed documents failed', error);
      sendError(res, 500, 'internal_error', 'Failed to enqueue reprocess');
    }
  }
);

/**
 * POST /documents/:source_reference/reprocess
 * Body: { template_override?: <template document> }
 */
app.post(
  '/documents/:source_reference/reprocess',
  express.json({ limit: '1mb' }),
  async (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const { source_reference } = req.params;
    const body: unknown = req.body;
    const templateOverride =
      body && typeof body === 'object' && 'template_override' in body ? body.template_override : null;

    try {
      // Reject a malformed override here rather than on the worker
      if (templateOverride !== null && templateOverride !== undefined) {
        compileTemplate(templateOverride, 'template_override');
      }

      if (!(await sourceExists(source_reference))) {
        sendError(res, 404, 'not_found', `Source document ${source_reference} not found`);
        return;
      }

      const job: ReprocessInvoiceJob = {
        event_type: 'invoice.reprocess_requested',
        correlation_id: correlationId,
        source_reference,
        template_override: templateOverride ?? null,
        requested_at: new Date().toISOString(),
      };
      await reprocessQueue.add('invoice.reprocess_requested', job);

      logger.info('Reprocess requested', {
        source_reference,
        with_override: job.template_override !== null,
      });

      res.status(202).json({ correlation_id: correlationId, source_reference });
    } catch (error) {
      if (error instanceof InvalidTemplateError) {
        sendError(res, 400, 'invalid_template', error.problems.join('; '));
        return;
      }
      logger.error('Reprocess request failed', error, { source_reference });
      sendError(res, 500, 'internal_error', 'Failed to enqueue reprocess');
    }
  }
);

/**
 * GET /documents/:source_reference
 */
app.get('/documents/:source_reference', async (req: Request, res: Response) => {
  const { source_reference } = req.params;

  try {
    const record = await getInvoiceBySourceReference(source_reference);
    if (!record) {
      sendError(res, 404, 'not_found', `No invoice record for ${source_reference}`);
      return;
    }
    res.json(record);
  } catch (error) {
    logger.error('Failed to get invoice', error, { source_reference });
    sendError(res, 500, 'internal_error', 'Failed to retrieve invoice');
  }
});

/**
 * GET /providers/stats
 */
app.get('/providers/stats', async (req: Request, res: Response) => {
  try {
    res.json({ providers: await getProviderStats() });
  } catch (error) {
    logger.error('Failed to get provider stats', error);
    sendError(res, 500, 'internal_error', 'Failed to retrieve provider stats');
  }
});

/**
 * GET /batches/:batch_id
 */
app.get('/batches/:batch_id', async (req: Request, res: Response) => {
  const { batch_id } = req.params;

  try {
    const batch = await getBatch(batch_id);
    if (!batch) {
      sendError(res, 404, 'not_found', `Batch ${batch_id} not found`);
      return;
    }
    res.json(batch);
  } catch (error) {
    logger.error('Failed to get batch', error, { batch_id });
    sendError(res, 500, 'internal_error', 'Failed to retrieve batch');
  }
});

// Start server
const server = app.listen(port, () => {
  logger.info('Ingest API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
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
