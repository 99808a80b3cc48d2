/**
 * Worker job handler tests
 */

import {
  ExtractionFailedError,
  newBatch,
  parseJobId,
  sourceReferenceFor,
  type ParseInvoiceJob,
  type ReprocessInvoiceJob,
} from '@meterline/shared';
import {
  RetryableJobError,
  handleParseInvoice,
  handleReprocessInvoice,
  type JobDeps,
} from '../../services/worker-invoice-parser/src/lib/jobs';
import {
  MemoryBatchStore,
  ScriptedTextAdapter,
  createTestPipeline,
  electricityInvoice,
  textBytes,
  textDocument,
  type TestPipeline,
} from './helpers';

const FIRST_OF_THREE = { attemptsMade: 0, maxAttempts: 3 };
const LAST_OF_THREE = { attemptsMade: 2, maxAttempts: 3 };

function parseJob(sourceReference: string, overrides: Partial<ParseInvoiceJob> = {}): ParseInvoiceJob {
  return {
    event_type: 'invoice.received',
    correlation_id: 'corr-1',
    source_reference: sourceReference,
    provider_hint: 'EnergyAustralia',
    service_type: null,
    filename: 'bill.pdf',
    batch_id: null,
    received_at: '2024-06-01T00:00:00.000Z',
    ...overrides,
  };
}

function reprocessJob(sourceReference: string, templateOverride: unknown = null): ReprocessInvoiceJob {
  return {
    event_type: 'invoice.reprocess_requested',
    correlation_id: 'corr-2',
    source_reference: sourceReference,
    template_override: templateOverride,
    requested_at: '2024-06-02T00:00:00.000Z',
  };
}

function depsFor(test: TestPipeline): JobDeps & { batchStore: MemoryBatchStore } {
  return { pipeline: test.pipeline, sourceStore: test.sourceStore, batchStore: new MemoryBatchStore() };
}

async function storeSource(test: TestPipeline, text: string): Promise<string> {
  const bytes = textBytes(text);
  const ref = sourceReferenceFor(bytes);
  await test.sourceStore.save({
    source_reference: ref,
    bytes,
    provider_hint: 'EnergyAustralia',
    service_type: null,
    filename: 'bill.pdf',
  });
  return ref;
}

describe('parse_invoice handler', () => {
  it('parses the stored source', async () => {
    const test = createTestPipeline();
    const ref = await storeSource(test, electricityInvoice());

    const result = await handleParseInvoice(parseJob(ref), depsFor(test), FIRST_OF_THREE);

    expect(result.kind).toBe('record');
    expect(test.invoiceStore.records.get(ref)?.processing_status).toBe('validated');
  });

  it('rejects a job whose source was never stored', async () => {
    const test = createTestPipeline();

    const result = await handleParseInvoice(parseJob('sha256:gone'), depsFor(test), FIRST_OF_THREE);

    expect(result).toEqual({
      kind: 'rejection',
      reason: 'SourceNotFound',
      retryable: false,
      source_reference: 'sha256:gone',
      stage: 'intake',
      message: 'No stored source document for sha256:gone',
    });
  });

  it('throws a retryable rejection while attempts remain', async () => {
    const adapter = new ScriptedTextAdapter([
      new ExtractionFailedError('OCR service unavailable', { retryable: true }),
    ]);
    const test = createTestPipeline({
      textAdapter: adapter,
      retryPolicy: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, factor: 2 },
    });
    const deps = depsFor(test);
    const ref = await storeSource(test, electricityInvoice());

    await expect(
      handleParseInvoice(parseJob(ref, { batch_id: 'b-1' }), deps, FIRST_OF_THREE)
    ).rejects.toThrow(RetryableJobError);
    expect(deps.batchStore.outcomes).toEqual([]);

    const final = await handleParseInvoice(parseJob(ref, { batch_id: 'b-1' }), deps, LAST_OF_THREE);
    expect(final.kind).toBe('rejection');
    expect(deps.batchStore.outcomes).toEqual([{ batchId: 'b-1', category: 'failed' }]);
  });

  it('records the outcome of a batched document', async () => {
    const test = createTestPipeline();
    const deps = depsFor(test);
    await deps.batchStore.createBatch(newBatch('b-2', 1, '2024-06-01T00:00:00.000Z'));
    const ref = await storeSource(test, electricityInvoice({ total: '12,500.00' }));

    await handleParseInvoice(parseJob(ref, { batch_id: 'b-2' }), deps, FIRST_OF_THREE);

    expect(deps.batchStore.batches.get('b-2')?.needs_review).toBe(1);
  });

  it('counts a repeated document in a batch as a duplicate and finishes the batch', async () => {
    const test = createTestPipeline();
    const deps = depsFor(test);
    await deps.batchStore.createBatch(newBatch('b-3', 2, '2024-06-01T00:00:00.000Z'));
    const ref = await storeSource(test, electricityInvoice());

    await handleParseInvoice(parseJob(ref, { batch_id: 'b-3' }), deps, FIRST_OF_THREE);
    expect(deps.batchStore.batches.get('b-3')?.finished_at).toBeNull();
    await handleParseInvoice(parseJob(ref, { batch_id: 'b-3' }), deps, FIRST_OF_THREE);

    expect(deps.batchStore.outcomes.map((o) => o.category)).toEqual(['succeeded', 'duplicate']);
    expect(deps.batchStore.batches.get('b-3')?.finished_at).not.toBeNull();
  });

  it('leaves the batch alone when an attempt that will be retried throws', async () => {
    const test = createTestPipeline();
    const deps = depsFor(test);
    await deps.batchStore.createBatch(newBatch('b-4', 1, '2024-06-01T00:00:00.000Z'));
    const ref = await storeSource(test, electricityInvoice());
    test.invoiceStore.failNext = new Error('connection reset');

    await expect(
      handleParseInvoice(parseJob(ref, { batch_id: 'b-4' }), deps, FIRST_OF_THREE)
    ).rejects.toThrow('connection reset');

    expect(deps.batchStore.outcomes).toEqual([]);
  });

  it('records a failure when the final attempt throws', async () => {
    const test = createTestPipeline();
    const deps = depsFor(test);
    await deps.batchStore.createBatch(newBatch('b-5', 1, '2024-06-01T00:00:00.000Z'));
    const ref = await storeSource(test, electricityInvoice());
    test.invoiceStore.failNext = new Error('connection reset');

    await expect(
      handleParseInvoice(parseJob(ref, { batch_id: 'b-5' }), deps, LAST_OF_THREE)
    ).rejects.toThrow('connection reset');

    expect(deps.batchStore.outcomes).toEqual([{ batchId: 'b-5', category: 'failed' }]);
    expect(deps.batchStore.batches.get('b-5')?.failed).toBe(1);
    expect(deps.batchStore.batches.get('b-5')?.finished_at).not.toBeNull();
  });
});

describe('parseJobId', () => {
  it('gives every batch item its own job id', () => {
    const ref = 'sha256:abc';

    expect(parseJobId(ref, { batchId: 'b-1', index: 0 })).toBe('b-1_0');
    expect(parseJobId(ref, { batchId: 'b-1', index: 1 })).toBe('b-1_1');
  });

  it('keys a standalone document by its source reference', () => {
    expect(parseJobId('sha256:abc')).toBe('sha256_abc');
  });
});

describe('reprocess_invoice handler', () => {
  it('reprocesses with the override from the job', async () => {
    const test = createTestPipeline();
    const ref = await storeSource(test, electricityInvoice());

    const result = await handleReprocessInvoice(
      reprocessJob(ref, { provider: 'EnergyAustralia' }),
      depsFor(test),
      FIRST_OF_THREE
    );

    expect(result.kind === 'rejection' && result.reason).toBe('InvalidTemplate');
  });

  it('falls back to the registry without an override', async () => {
    const test = createTestPipeline();
    const ref = await storeSource(test, electricityInvoice());

    const result = await handleReprocessInvoice(reprocessJob(ref), depsFor(test), FIRST_OF_THREE);

    expect(result.kind === 'record' && result.record.template_version).toBe('1.2');
  });

  it('retries a timed out reprocess while attempts remain', async () => {
    const adapter = new ScriptedTextAdapter(['hang', textDocument(electricityInvoice())]);
    const test = createTestPipeline({
      textAdapter: adapter,
      extractionTimeoutMs: 20,
      retryPolicy: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, factor: 2 },
    });
    const ref = await storeSource(test, electricityInvoice());

    const error = await handleReprocessInvoice(reprocessJob(ref), depsFor(test), FIRST_OF_THREE).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(RetryableJobError);
    expect(error instanceof RetryableJobError && error.message).toBe(
      'ExtractionFailed at text_extraction: Text extraction timed out after 20ms'
    );
  });
});
