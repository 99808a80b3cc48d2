/**
 * Run state machine and batch runner tests
 */

import {
  InvalidTransitionError,
  PipelineRun,
  canTransition,
  isTerminal,
  runBatch,
  sourceReferenceFor,
  type BatchItem,
} from '@meterline/shared';
import { MemoryBatchStore, createTestPipeline, electricityInvoice, gasInvoice, textBytes, waterInvoice } from './helpers';

const NOW = new Date('2024-06-01T00:00:00.000Z');

describe('PipelineRun', () => {
  it('starts pending', () => {
    const run = new PipelineRun('ref-1');

    expect(run.state).toBe('pending');
    expect(run.history).toEqual(['pending']);
  });

  it('moves forward along allowed edges', () => {
    const run = new PipelineRun('ref-1');

    run.advance('text_extracted');
    run.advance('fields_extracted');
    run.advance('needs_review');
    run.advance('ready_to_persist');
    run.advance('persisted');

    expect(run.state).toBe('persisted');
    expect(isTerminal(run.state)).toBe(true);
  });

  it('refuses to skip or revisit states', () => {
    const run = new PipelineRun('ref-1');

    expect(() => run.advance('persisted')).toThrow(InvalidTransitionError);
    expect(() => run.advance('persisted')).toThrow('Invalid run transition pending -> persisted');
    expect(run.history).toEqual(['pending']);
  });

  it('has no way out of failed', () => {
    expect(canTransition('failed', 'ready_to_persist')).toBe(false);
    expect(isTerminal('failed')).toBe(true);
    expect(canTransition('validated', 'duplicate')).toBe(true);
    expect(isTerminal('validated')).toBe(false);
  });
});

describe('runBatch', () => {
  const valid = textBytes(electricityInvoice());

  function mixedItems(): BatchItem[] {
    return [
      { bytes: valid, providerHint: 'EnergyAustralia' },
      { bytes: textBytes(electricityInvoice({ total: '12,500.00' })), providerHint: 'EnergyAustralia' },
      { bytes: valid, providerHint: 'EnergyAustralia', sourceReference: 'resubmitted' },
      { bytes: textBytes(electricityInvoice({ reference: 'X-1' })), providerHint: 'Acme Power' },
      { bytes: textBytes('EnergyAustralia\nThis page intentionally left blank'), providerHint: 'EnergyAustralia' },
    ];
  }

  it('counts every outcome category', async () => {
    const { pipeline } = createTestPipeline();
    const store = new MemoryBatchStore();

    const { batch, results } = await runBatch(pipeline, mixedItems(), {
      concurrency: 1,
      batchId: 'batch-test',
      store,
      now: () => NOW,
    });

    expect(batch).toEqual({
      batch_id: 'batch-test',
      total: 5,
      succeeded: 1,
      needs_review: 1,
      failed: 2,
      duplicate: 1,
      started_at: '2024-06-01T00:00:00.000Z',
      finished_at: '2024-06-01T00:00:00.000Z',
    });
    expect(results.map((r) => r.kind)).toEqual(['record', 'record', 'record', 'rejection', 'record']);
    expect(store.outcomes.map((o) => o.category)).toEqual([
      'succeeded',
      'needs_review',
      'duplicate',
      'failed',
      'failed',
    ]);
    expect(store.batches.get('batch-test')).toEqual(batch);
  });

  it('returns results in item order under concurrency', async () => {
    const { pipeline, invoiceStore } = createTestPipeline();
    const items: BatchItem[] = [
      { bytes: textBytes(electricityInvoice()), providerHint: 'EnergyAustralia' },
      { bytes: textBytes(gasInvoice()) },
      { bytes: textBytes(waterInvoice()), providerHint: 'Sydney Water' },
    ];

    const { batch, results } = await runBatch(pipeline, items, { concurrency: 3 });

    expect(
      results.map((r) => (r.kind === 'record' ? r.record.source_reference : r.source_reference))
    ).toEqual(items.map((i) => sourceReferenceFor(i.bytes)));
    expect(batch.succeeded).toBe(3);
    expect(batch.batch_id).toMatch(/^batch_[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(invoiceStore.records.size).toBe(3);
  });

  it('finishes an empty batch at once', async () => {
    const { pipeline } = createTestPipeline();

    const { batch, results } = await runBatch(pipeline, [], { now: () => NOW });

    expect(results).toEqual([]);
    expect(batch.total).toBe(0);
    expect(batch.finished_at).toBe('2024-06-01T00:00:00.000Z');
  });

  it('stops starting documents after a store failure and rethrows it', async () => {
    const { pipeline, invoiceStore, sourceStore } = createTestPipeline();
    const store = new MemoryBatchStore();
    invoiceStore.failNext = new Error('connection reset');

    await expect(
      runBatch(pipeline, mixedItems(), { concurrency: 1, batchId: 'batch-fail', store })
    ).rejects.toThrow('connection reset');

    expect(sourceStore.sources.size).toBe(1);
    expect(store.outcomes).toEqual([]);
    expect(store.batches.get('batch-fail')?.finished_at).toBeNull();
  });
});
