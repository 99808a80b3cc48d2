/**
 * Test Helpers
 *
 * In-memory stores, scripted text backends and invoice text fixtures. Nothing
 * here touches Redis, Postgres or the network.
 */

import * as path from 'path';
import {
  DEFAULT_DUPLICATE_KEYS,
  InvoicePipeline,
  LocalTextAdapter,
  TemplateRegistry,
  failedSourcesOf,
  providerStatsOf,
  type BatchCategory,
  type BatchStore,
  type ChatCompletionBody,
  type ExistsOptions,
  type ExtractCallOptions,
  type FailedSourceQuery,
  type Fingerprint,
  type HistoryStore,
  type InvoiceRecord,
  type InvoiceStore,
  type OcrCompletion,
  type OcrCompletionClient,
  type PageText,
  type PersistOptions,
  type PersistOutcome,
  type PipelineOptions,
  type ProcessingBatch,
  type ProcessingHistoryEntry,
  type ProviderStats,
  type SourceStore,
  type StoredSource,
  type TextBackendName,
  type TextDocument,
  type TextExtractionAdapter,
} from '@meterline/shared';

export const TEMPLATES_DIR = path.join(__dirname, '../../config/templates');

export function loadSampleRegistry(): TemplateRegistry {
  return TemplateRegistry.fromDirectory(TEMPLATES_DIR);
}

/** Test documents are UTF-8 text standing in for PDF bytes. */
export function textBytes(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'utf8'));
}

/** Page reader over UTF-8 bytes; a form feed separates pages. */
export async function utf8PageReader(bytes: Uint8Array): Promise<PageText[]> {
  return Buffer.from(bytes)
    .toString('utf8')
    .split('\f')
    .map((text, i) => ({ pageNumber: i + 1, text }));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Stores
// ============================================================================

export class MemoryInvoiceStore implements InvoiceStore {
  readonly records = new Map<string, InvoiceRecord>();
  persistCalls = 0;
  /** Thrown from the next persist() call */
  failNext: Error | null = null;

  async exists(fingerprint: Fingerprint, options: ExistsOptions = {}): Promise<boolean> {
    for (const record of this.records.values()) {
      if (record.source_reference === options.excludeSourceReference) continue;
      const value =
        fingerprint.kind === 'content' ? record.content_hash : record.semantic_fingerprint;
      if (value === fingerprint.value) return true;
    }
    return false;
  }

  async persist(record: InvoiceRecord, options: PersistOptions = {}): Promise<PersistOutcome> {
    this.persistCalls++;
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }

    const previous = this.records.get(record.source_reference);
    if (previous && !options.supersede) return 'duplicate';

    const keys = options.duplicateKeys ?? DEFAULT_DUPLICATE_KEYS;
    for (const other of this.records.values()) {
      if (other.source_reference === record.source_reference) continue;
      if (keys.includes('content') && other.content_hash === record.content_hash) {
        return 'duplicate';
      }
      if (
        keys.includes('semantic') &&
        record.semantic_fingerprint !== null &&
        other.semantic_fingerprint === record.semantic_fingerprint
      ) {
        return 'duplicate';
      }
    }

    this.records.set(record.source_reference, record);
    return 'inserted';
  }
}

export class MemorySourceStore implements SourceStore {
  readonly sources = new Map<string, StoredSource>();

  async save(source: StoredSource): Promise<void> {
    if (!this.sources.has(source.source_reference)) {
      this.sources.set(source.source_reference, source);
    }
  }

  async load(sourceReference: string): Promise<StoredSource | null> {
    return this.sources.get(sourceReference) ?? null;
  }
}

export class MemoryHistoryStore implements HistoryStore {
  readonly entries: ProcessingHistoryEntry[] = [];

  async record(entry: ProcessingHistoryEntry): Promise<void> {
    this.entries.push(entry);
  }

  async failedSources(query: FailedSourceQuery = {}): Promise<string[]> {
    return failedSourcesOf(this.entries, query);
  }

  async providerStats(): Promise<ProviderStats[]> {
    return providerStatsOf(this.entries);
  }
}

export class MemoryBatchStore implements BatchStore {
  readonly batches = new Map<string, ProcessingBatch>();
  readonly outcomes: Array<{ batchId: string; category: BatchCategory }> = [];

  async createBatch(batch: ProcessingBatch): Promise<void> {
    this.batches.set(batch.batch_id, { ...batch });
  }

  async recordOutcome(batchId: string, category: BatchCategory): Promise<void> {
    this.outcomes.push({ batchId, category });
    const batch = this.batches.get(batchId);
    if (!batch) return;
    batch[category] += 1;
    const counted = batch.succeeded + batch.needs_review + batch.failed + batch.duplicate;
    if (counted >= batch.total) batch.finished_at = new Date().toISOString();
  }

  async finishBatch(batchId: string, finishedAt: string): Promise<void> {
    const batch = this.batches.get(batchId);
    if (batch) batch.finished_at = finishedAt;
  }

  async getBatch(batchId: string): Promise<ProcessingBatch | null> {
    return this.batches.get(batchId) ?? null;
  }
}

// ============================================================================
// Text backends
// ============================================================================

export type ScriptedOutcome = TextDocument | Error | 'hang';

/**
 * Adapter that plays back a fixed list of outcomes, one per call. 'hang'
 * never settles until the call's signal aborts.
 */
export class ScriptedTextAdapter implements TextExtractionAdapter {
  calls = 0;
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(
    private readonly outcomes: ScriptedOutcome[],
    readonly backend: TextBackendName = 'local'
  ) {}

  async extract(_bytes: Uint8Array, options: ExtractCallOptions = {}): Promise<TextDocument> {
    const outcome = this.outcomes[Math.min(this.calls, this.outcomes.length - 1)];
    this.calls++;
    this.signals.push(options.signal);

    if (outcome === 'hang') {
      return new Promise<TextDocument>(() => undefined);
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

export function textDocument(text: string, overrides: Partial<TextDocument> = {}): TextDocument {
  return {
    text,
    pages: [{ pageNumber: 1, text }],
    backend: 'local',
    reliability: 0.95,
    degraded: false,
    warnings: [],
    ...overrides,
  };
}

/**
 * Stand-in for the OpenAI client. Each call takes the next scripted reply:
 * a message content string, or an Error to throw.
 */
export class FakeOcrClient implements OcrCompletionClient {
  readonly requests: ChatCompletionBody[] = [];
  private index = 0;

  constructor(private readonly replies: Array<string | null | Error>) {}

  readonly chat = {
    completions: {
      create: async (body: ChatCompletionBody): Promise<OcrCompletion> => {
        this.requests.push(body);
        const reply = this.replies[Math.min(this.index, this.replies.length - 1)];
        this.index++;
        if (reply instanceof Error) throw reply;
        return { id: `chatcmpl-test-${this.index}`, choices: [{ message: { content: reply } }] };
      },
    },
  };
}

// ============================================================================
// Pipeline
// ============================================================================

export interface TestPipeline {
  pipeline: InvoicePipeline;
  invoiceStore: MemoryInvoiceStore;
  sourceStore: MemorySourceStore;
  historyStore: MemoryHistoryStore;
  registry: TemplateRegistry;
}

/**
 * Pipeline over the sample templates, the local adapter reading UTF-8
 * bytes, and in-memory stores.
 */
export function createTestPipeline(overrides: Partial<PipelineOptions> = {}): TestPipeline {
  const invoiceStore = new MemoryInvoiceStore();
  const sourceStore = new MemorySourceStore();
  const historyStore = new MemoryHistoryStore();
  const registry = loadSampleRegistry();

  const pipeline = new InvoicePipeline({
    registry,
    textAdapter: new LocalTextAdapter(utf8PageReader),
    invoiceStore,
    sourceStore,
    historyStore,
    sleep: async () => undefined,
    ...overrides,
  });

  return { pipeline, invoiceStore, sourceStore, historyStore, registry };
}

// ============================================================================
// Invoice text fixtures
// ============================================================================

export interface ElectricityInvoiceFields {
  account: string;
  issueDate: string;
  periodStart: string;
  periodEnd: string;
  usage: string;
  rate: string;
  supply: string;
  total: string;
  reference: string;
}

const ELECTRICITY_DEFAULTS: ElectricityInvoiceFields = {
  account: '1234 5678 90',
  issueDate: '15/03/2024',
  periodStart: '01/02/2024',
  periodEnd: '29/02/2024',
  usage: '450',
  rate: '0.30',
  supply: '30.00',
  total: '165.00',
  reference: 'INV-1001',
};

/**
 * An EnergyAustralia electricity bill. With the defaults every field is
 * present and 450 kWh x $0.30 + $30.00 supply equals the $165.00 total.
 */
export function electricityInvoice(fields: Partial<ElectricityInvoiceFields> = {}): string {
  const f = { ...ELECTRICITY_DEFAULTS, ...fields };
  return [
    'EnergyAustralia',
    'Tax Invoice',
    `Reference: ${f.reference}`,
    `Account Number: ${f.account}`,
    `Issue Date: ${f.issueDate}`,
    `Billing Period: ${f.periodStart} to ${f.periodEnd}`,
    `Total Usage: ${f.usage} kWh`,
    `Usage Rate: $${f.rate} per kWh`,
    `Supply Charges: $${f.supply}`,
    `Total Amount Due: $${f.total}`,
  ].join('\n');
}

/** An Origin Energy gas bill: 5,000 MJ x $0.03 + $40.00 = $190.00. */
export function gasInvoice(): string {
  return [
    'Origin Energy - Natural Gas',
    'Account No: 77001234',
    'Meter Number: GM4471A',
    'Date of Issue: 05 Apr 2024',
    'Supply Period: 01 Jan 2024 - 31 Mar 2024',
    'Gas Used: 5,000 MJ',
    'Usage charge at $0.03 per MJ',
    'Daily Supply Charge: $40.00',
    'Total Due: $190.00',
  ].join('\n');
}

/** A Sydney Water bill with a 91 day charge period. */
export function waterInvoice(): string {
  return [
    'Sydney Water',
    'Account Number: 1234 567 890',
    'Issue Date: 10/07/2024',
    'Charge period: 01/04/2024 to 01/07/2024',
    'Water usage: 42 kL',
    'Usage charge $2.67 per kL',
    'Service charges: $150.36',
    'Total amount due: $262.50',
  ].join('\n');
}
