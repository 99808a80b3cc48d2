/**
 * Batch runs: many documents through one pipeline with bounded concurrency,
 * aggregated into a ProcessingBatch.
 */

import { ulid } from 'ulid';
import { logger } from '../logger';
import type { BatchCategory, ProcessingBatch, ServiceType } from '../types';
import type { InvoicePipeline, PipelineResult } from './pipeline';
import type { BatchStore } from './stores';

export interface BatchItem {
  bytes: Uint8Array;
  providerHint?: string;
  serviceType?: ServiceType;
  sourceReference?: string;
  filename?: string;
}

export interface BatchOptions {
  concurrency?: number;
  batchId?: string;
  store?: BatchStore;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface BatchReport {
  batch: ProcessingBatch;
  /** In the order the items were given */
  results: PipelineResult[];
}

export const DEFAULT_BATCH_CONCURRENCY = 4;

export function categorize(result: PipelineResult): BatchCategory {
  if (result.kind === 'rejection') return 'failed';
  if (result.disposition === 'duplicate') return 'duplicate';
  switch (result.scored_status) {
    case 'validated':
      return 'succeeded';
    case 'needs_review':
      return 'needs_review';
    case 'failed':
      return 'failed';
  }
}

export function newBatch(batchId: string, total: number, startedAt: string): ProcessingBatch {
  return {
    batch_id: batchId,
    total,
    succeeded: 0,
    needs_review: 0,
    failed: 0,
    duplicate: 0,
    started_at: startedAt,
    finished_at: null,
  };
}

/**
 * Parse every item. At most `concurrency` runs are in flight at once. An
 * error that is not a rejection (a store failure) stops new items from
 * starting and is rethrown once in-flight runs settle.
 */
export async function runBatch(
  pipeline: InvoicePipeline,
  items: readonly BatchItem[],
  options: BatchOptions = {}
): Promise<BatchReport> {
  const now = options.now ?? (() => new Date());
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);
  const batch = newBatch(options.batchId ?? `batch_${ulid()}`, items.length, now().toISOString());
  const results: PipelineResult[] = new Array(items.length);

  await options.store?.createBatch({ ...batch });
  logger.info('Batch started', { batch_id: batch.batch_id, total: batch.total, concurrency });

  let next = 0;
  const errors: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (errors.length === 0 && next < items.length) {
      const index = next++;
      const item = items[index];
      try {
        const result = await pipeline.parse(item.bytes, {
          providerHint: item.providerHint,
          serviceType: item.serviceType,
          sourceReference: item.sourceReference,
          filename: item.filename,
          signal: options.signal,
        });
        results[index] = result;
        const category = categorize(result);
        batch[category] += 1;
        await options.store?.recordOutcome(batch.batch_id, category);
      } catch (error) {
        errors.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, worker));

  if (errors.length > 0) {
    logger.error('Batch aborted', errors[0], { batch_id: batch.batch_id, errors: errors.length });
    throw errors[0];
  }

  batch.finished_at = now().toISOString();
  await options.store?.finishBatch(batch.batch_id, batch.finished_at);

  logger.info('Batch finished', {
    batch_id: batch.batch_id,
    succeeded: batch.succeeded,
    needs_review: batch.needs_review,
    failed: batch.failed,
    duplicate: batch.duplicate,
  });

  return { batch, results };
}
