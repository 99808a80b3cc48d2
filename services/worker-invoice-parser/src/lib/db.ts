/**
 * Database Operations
 *
 * Postgres implementations of the pipeline's invoice, source, batch and
 * history stores. The source reference is unique in the invoices table.
 * Fingerprint uniqueness follows the configured duplicate keys: writers of
 * the same fingerprint are serialized by a transaction-level advisory lock
 * and a conflict reads as a duplicate rather than an error.
 */

import { Pool } from 'pg';
import {
  DEFAULT_DUPLICATE_KEYS,
  config,
  dbQueryDurationHistogram,
  fingerprintsOf,
  isServiceType,
  logger,
  normalizeProviderName,
  type BatchCategory,
  type BatchStore,
  type ExistsOptions,
  type FailedSourceQuery,
  type Fingerprint,
  type HistoryStore,
  type InvoiceRecord,
  type InvoiceStore,
  type PersistOptions,
  type PersistOutcome,
  type ProcessingBatch,
  type ProcessingHistoryEntry,
  type ProviderStats,
  type SourceStore,
  type StoredSource,
} from '@meterline/shared';

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

export interface SqlResult {
  rowCount: number | null;
  rows: unknown[];
}

export interface SqlSession {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(): void;
}

/** The part of a pg Pool the invoice store needs */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  connect(): Promise<SqlSession>;
}

export function sqlPool(db: Pool): SqlPool {
  return {
    query: (text, values) => db.query(text, values),
    connect: async () => {
      const client = await db.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
  };
}

async function timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    return await fn();
  } finally {
    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
  }
}

// ============================================================================
// Invoices
// ============================================================================

const FINGERPRINT_COLUMNS: Record<Fingerprint['kind'], string> = {
  semantic: 'semantic_fingerprint',
  content: 'content_hash',
};

const INSERT_INVOICE = `
  INSERT INTO invoices (
    id, source_reference, provider_name, service_type, invoice_date, total_amount,
    usage_quantity, usage_rate, service_charge, billing_period_start, billing_period_end,
    account_number, extra_fields, processing_status, confidence_score, semantic_fingerprint,
    content_hash, template_version, text_backend, text_reliability, field_results, issues,
    created_at, updated_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18,
          $19, $20, $21, $22, $23, $24)
  ON CONFLICT (source_reference) DO NOTHING`;

function invoiceParams(record: InvoiceRecord): unknown[] {
  return [
    record.id,
    record.source_reference,
    record.provider_name,
    record.service_type,
    record.invoice_date,
    record.total_amount,
    record.usage_quantity,
    record.usage_rate,
    record.service_charge,
    record.billing_period_start,
    record.billing_period_end,
    record.account_number,
    JSON.stringify(record.extra_fields),
    record.processing_status,
    record.confidence_score,
    record.semantic_fingerprint,
    record.content_hash,
    record.template_version,
    record.text_backend,
    record.text_reliability,
    JSON.stringify(record.field_results),
    JSON.stringify(record.issues),
    record.created_at,
    record.updated_at,
  ];
}

export class PgInvoiceStore implements InvoiceStore {
  constructor(private readonly db: SqlPool = sqlPool(pool)) {}

  async exists(fingerprint: Fingerprint, options: ExistsOptions = {}): Promise<boolean> {
    const column = FINGERPRINT_COLUMNS[fingerprint.kind];
    return timed('invoice_exists', async () => {
      const result = await this.db.query(
        `SELECT 1 FROM invoices
         WHERE ${column} = $1 AND ($2::text IS NULL OR source_reference <> $2)
         LIMIT 1`,
        [fingerprint.value, options.excludeSourceReference ?? null]
      );
      return (result.rowCount ?? 0) > 0;
    });
  }

  /**
   * Insert a record. With `supersede`, the record stored for the same source
   * reference is replaced in the same transaction; if the new record
   * conflicts with another document the old one is kept.
   */
  async persist(record: InvoiceRecord, options: PersistOptions = {}): Promise<PersistOutcome> {
    const fingerprints = fingerprintsOf(record, options.duplicateKeys ?? DEFAULT_DUPLICATE_KEYS);
    const session = await this.db.connect();

    try {
      return await timed<PersistOutcome>('persist_invoice', async () => {
        await session.query('BEGIN');

        // Taken in sorted order so concurrent writers cannot deadlock
        const lockKeys = fingerprints.map((f) => `${f.kind}:${f.value}`).sort();
        for (const key of lockKeys) {
          await session.query('SELECT pg_advisory_xact_lock(hashtext($1))', [key]);
        }

        if (options.supersede) {
          await session.query('DELETE FROM invoices WHERE source_reference = $1', [
            record.source_reference,
          ]);
        }

        for (const fingerprint of fingerprints) {
          const taken = await session.query(
            `SELECT 1 FROM invoices
             WHERE ${FINGERPRINT_COLUMNS[fingerprint.kind]} = $1 AND source_reference <> $2
             LIMIT 1`,
            [fingerprint.value, record.source_reference]
          );
          if ((taken.rowCount ?? 0) > 0) {
            await session.query('ROLLBACK');
            logger.info('Fingerprint already stored', { level: fingerprint.kind });
            return 'duplicate';
          }
        }

        const result = await session.query(INSERT_INVOICE, invoiceParams(record));
        if ((result.rowCount ?? 0) === 0) {
          await session.query('ROLLBACK');
          return 'duplicate';
        }

        await session.query('COMMIT');
        logger.info('Persisted invoice', {
          id: record.id,
          status: record.processing_status,
          superseded: options.supersede ?? false,
        });
        return 'inserted';
      });
    } catch (error) {
      await rollbackQuietly(session);
      logger.error('Failed to persist invoice', error, { id: record.id });
      throw error;
    } finally {
      session.release();
    }
  }
}

async function rollbackQuietly(session: SqlSession): Promise<void> {
  try {
    await session.query('ROLLBACK');
  } catch (error) {
    logger.warn('Rollback failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

// ============================================================================
// Source documents
// ============================================================================

type SourceRow = {
  source_reference: string;
  content: Buffer;
  provider_hint: string | null;
  service_type: string | null;
  filename: string | null;
};

export class PgSourceStore implements SourceStore {
  constructor(private readonly db: Pool = pool) {}

  async save(source: StoredSource): Promise<void> {
    await timed('save_source', () =>
      this.db.query(
        `INSERT INTO source_documents (source_reference, content, provider_hint, service_type, filename)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (source_reference) DO NOTHING`,
        [
          source.source_reference,
          Buffer.from(source.bytes),
          source.provider_hint,
          source.service_type,
          source.filename,
        ]
      )
    );
  }

  async load(sourceReference: string): Promise<StoredSource | null> {
    const result = await timed('load_source', () =>
      this.db.query<SourceRow>(
        `SELECT source_reference, content, provider_hint, service_type, filename
         FROM source_documents WHERE source_reference = $1`,
        [sourceReference]
      )
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      source_reference: row.source_reference,
      bytes: new Uint8Array(row.content),
      provider_hint: row.provider_hint,
      service_type: isServiceType(row.service_type) ? row.service_type : null,
      filename: row.filename,
    };
  }
}

// ============================================================================
// Processing batches
// ============================================================================

const BATCH_COLUMNS: Record<BatchCategory, string> = {
  succeeded: 'succeeded',
  needs_review: 'needs_review',
  failed: 'failed',
  duplicate: 'duplicate',
};

type BatchRow = {
  batch_id: string;
  total: number;
  succeeded: number;
  needs_review: number;
  failed: number;
  duplicate: number;
  started_at: Date;
  finished_at: Date | null;
};

export class PgBatchStore implements BatchStore {
  constructor(private readonly db: Pool = pool) {}

  async createBatch(batch: ProcessingBatch): Promise<void> {
    await this.db.query(
      `INSERT INTO processing_batches (batch_id, total, started_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (batch_id) DO NOTHING`,
      [batch.batch_id, batch.total, batch.started_at]
    );
  }

  /**
   * Count one outcome. The batch is finished by the update that brings the
   * outcome count up to the total.
   */
  async recordOutcome(batchId: string, category: BatchCategory): Promise<void> {
    const column = BATCH_COLUMNS[category];
    await this.db.query(
      `UPDATE processing_batches
       SET ${column} = ${column} + 1,
           finished_at = CASE
             WHEN succeeded + needs_review + failed + duplicate + 1 >= total THEN NOW()
             ELSE finished_at
           END
       WHERE batch_id = $1`,
      [batchId]
    );
  }

  async finishBatch(batchId: string, finishedAt: string): Promise<void> {
    await this.db.query(
      `UPDATE processing_batches SET finished_at = COALESCE(finished_at, $2) WHERE batch_id = $1`,
      [batchId, finishedAt]
    );
  }

  async getBatch(batchId: string): Promise<ProcessingBatch | null> {
    const result = await this.db.query<BatchRow>(
      `SELECT batch_id, total, succeeded, needs_review, failed, duplicate, started_at, finished_at
       FROM processing_batches WHERE batch_id = $1`,
      [batchId]
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      batch_id: row.batch_id,
      total: row.total,
      succeeded: row.succeeded,
      needs_review: row.needs_review,
      failed: row.failed,
      duplicate: row.duplicate,
      started_at: row.started_at.toISOString(),
      finished_at: row.finished_at ? row.finished_at.toISOString() : null,
    };
  }
}

// ============================================================================
// Processing history
// ============================================================================

/** Latest history row per source document */
const LATEST_RUNS = `
  SELECT DISTINCT ON (source_reference) *
  FROM processing_history
  ORDER BY source_reference, recorded_at DESC, id DESC`;

/** Same rule as normalizeProviderName */
const NORMALIZED_PROVIDER = `regexp_replace(lower(trim(provider_name)), '[[:space:]_-]+', ' ', 'g')`;

type StatsRow = {
  provider_name: string;
  total: number;
  successful: number;
  success_rate: number;
  avg_confidence: number | null;
};

export class PgHistoryStore implements HistoryStore {
  constructor(private readonly db: Pool = pool) {}

  async record(entry: ProcessingHistoryEntry): Promise<void> {
    await timed('record_history', () =>
      this.db.query(
        `INSERT INTO processing_history (
           source_reference, provider_name, service_type, outcome, stage, reason, message,
           confidence_score, text_backend, text_reliability, template_version, reprocess, recorded_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
        [
          entry.source_reference,
          entry.provider_name,
          entry.service_type,
          entry.outcome,
          entry.stage,
          entry.reason,
          entry.message,
          entry.confidence_score,
          entry.text_backend,
          entry.text_reliability,
          entry.template_version,
          entry.reprocess,
          entry.recorded_at,
        ]
      )
    );
  }

  async failedSources(query: FailedSourceQuery = {}): Promise<string[]> {
    const provider = query.provider === undefined ? null : normalizeProviderName(query.provider);
    const result = await timed('failed_sources', () =>
      this.db.query<{ source_reference: string }>(
        `SELECT source_reference FROM (${LATEST_RUNS}) latest
         WHERE outcome IN ('failed', 'rejected')
           AND ($1::text IS NULL OR ${NORMALIZED_PROVIDER} = $1)
         ORDER BY recorded_at, id
         LIMIT $2`,
        [provider, query.limit ?? null]
      )
    );
    return result.rows.map((row) => row.source_reference);
  }

  async providerStats(): Promise<ProviderStats[]> {
    const result = await timed('provider_stats', () =>
      this.db.query<StatsRow>(
        `SELECT provider_name,
                COUNT(*)::int AS total,
                COUNT(*) FILTER (WHERE outcome NOT IN ('failed', 'rejected'))::int AS successful,
                ROUND(COUNT(*) FILTER (WHERE outcome NOT IN ('failed', 'rejected'))::numeric
                      / COUNT(*), 4)::float8 AS success_rate,
                ROUND(AVG(confidence_score), 4)::float8 AS avg_confidence
         FROM (${LATEST_RUNS}) latest
         WHERE provider_name IS NOT NULL
         GROUP BY provider_name
         ORDER BY provider_name`
      )
    );
    return result.rows;
  }
}
