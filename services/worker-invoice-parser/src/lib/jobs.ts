/**
 * Job handlers for parse_invoice and reprocess_invoice.
 *
 * A retryable rejection (extraction timeout, transient OCR failure) is
 * thrown while BullMQ attempts remain so the queue retries with backoff.
 * The final result of a batched document is counted once, on its last
 * attempt, including when that attempt throws.
 */

import {
  SourceNotFoundError,
  categorize,
  isRejection,
  logger,
  toRejection,
  type BatchStore,
  type InvoicePipeline,
  type ParseInvoiceJob,
  type PipelineResult,
  type Rejection,
  type ReprocessInvoiceJob,
  type SourceStore,
} from '@meterline/shared';

export interface JobDeps {
  pipeline: InvoicePipeline;
  sourceStore: SourceStore;
  batchStore: BatchStore;
}

export interface AttemptInfo {
  /** Attempts already made before this one */
  attemptsMade: number;
  maxAttempts: number;
}

export class RetryableJobError extends Error {
  constructor(readonly rejection: Rejection) {
    super(`${rejection.reason} at ${rejection.stage}: ${rejection.message}`);
    this.name = 'RetryableJobError';
  }
}

function isFinalAttempt(attempt: AttemptInfo): boolean {
  return attempt.attemptsMade + 1 >= attempt.maxAttempts;
}

function attemptsRemain(rejection: Rejection, attempt: AttemptInfo): boolean {
  return rejection.retryable && !isFinalAttempt(attempt);
}

function summarize(result: PipelineResult): Record<string, unknown> {
  if (isRejection(result)) {
    return { outcome: 'rejection', reason: result.reason, stage: result.stage };
  }
  return {
    outcome: result.record.processing_status,
    disposition: result.disposition,
    confidence_score: result.record.confidence_score,
  };
}

export async function handleParseInvoice(
  data: ParseInvoiceJob,
  deps: JobDeps,
  attempt: AttemptInfo
): Promise<PipelineResult> {
  let result: PipelineResult;
  try {
    const stored = await deps.sourceStore.load(data.source_reference);
    result = stored
      ? await deps.pipeline.parse(stored.bytes, {
          providerHint: data.provider_hint ?? undefined,
          serviceType: data.service_type ?? undefined,
          sourceReference: data.source_reference,
          filename: data.filename ?? undefined,
        })
      : toRejection(new SourceNotFoundError(data.source_reference), data.source_reference);
  } catch (error) {
    // BullMQ gives up after this throw, so the batch must still hear about it
    if (data.batch_id && isFinalAttempt(attempt)) {
      await deps.batchStore.recordOutcome(data.batch_id, 'failed');
    }
    throw error;
  }

  if (isRejection(result) && attemptsRemain(result, attempt)) {
    throw new RetryableJobError(result);
  }

  if (data.batch_id) {
    await deps.batchStore.recordOutcome(data.batch_id, categorize(result));
  }

  logger.info('parse_invoice handled', { batch_id: data.batch_id, ...summarize(result) });
  return result;
}

export async function handleReprocessInvoice(
  data: ReprocessInvoiceJob,
  deps: JobDeps,
  attempt: AttemptInfo
): Promise<PipelineResult> {
  const result = await deps.pipeline.reprocess(data.source_reference, {
    templateOverride: data.template_override ?? undefined,
  });

  if (isRejection(result) && attemptsRemain(result, attempt)) {
    throw new RetryableJobError(result);
  }

  logger.info('reprocess_invoice handled', summarize(result));
  return result;
}
