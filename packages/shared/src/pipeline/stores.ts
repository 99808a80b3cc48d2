/**
 * Storage contracts the pipeline depends on. Services implement them over
 * Postgres; tests use in-memory versions.
 */

import type { FingerprintLookup } from '../dedupe/duplicate-guard';
import type { DuplicateKeyKind } from '../dedupe/fingerprint';
import type {
  BatchCategory,
  InvoiceRecord,
  ProcessingBatch,
  ProcessingHistoryEntry,
  ProviderStats,
  ServiceType,
} from '../types';

export type PersistOutcome = 'inserted' | 'duplicate';

export interface PersistOptions {
  /** Replace the record stored under the same source reference */
  supersede?: boolean;
  /** Fingerprints that must be unique across documents; defaults to both */
  duplicateKeys?: readonly DuplicateKeyKind[];
}

/**
 * Invoice persistence. `persist` must be atomic against the source reference
 * and the configured fingerprints, and report a conflict as 'duplicate'
 * instead of throwing.
 */
export interface InvoiceStore extends FingerprintLookup {
  persist(record: InvoiceRecord, options?: PersistOptions): Promise<PersistOutcome>;
}

export interface StoredSource {
  source_reference: string;
  bytes: Uint8Array;
  provider_hint: string | null;
  service_type: ServiceType | null;
  filename: string | null;
}

/** Source documents kept for reprocessing. `save` is idempotent per reference. */
export interface SourceStore {
  save(source: StoredSource): Promise<void>;
  load(sourceReference: string): Promise<StoredSource | null>;
}

export interface BatchStore {
  createBatch(batch: ProcessingBatch): Promise<void>;
  recordOutcome(batchId: string, category: BatchCategory): Promise<void>;
  finishBatch(batchId: string, finishedAt: string): Promise<void>;
  getBatch(batchId: string): Promise<ProcessingBatch | null>;
}

export interface FailedSourceQuery {
  /** Provider name or alias as written on the record; compared normalized */
  provider?: string;
  limit?: number;
}

/**
 * Append-only log of pipeline runs. Queries look at the latest entry of each
 * source document; 'failed' and 'rejected' count as failures.
 */
export interface HistoryStore {
  record(entry: ProcessingHistoryEntry): Promise<void>;
  /** Source references whose latest run failed, oldest first */
  failedSources(query?: FailedSourceQuery): Promise<string[]>;
  providerStats(): Promise<ProviderStats[]>;
}
