/**
 * Database Queries
 *
 * Source document intake, batch creation and read-side lookups for the
 * ingest API. Numeric and date columns are cast in SQL so rows come back in
 * the InvoiceRecord wire shape.
 */

import { Pool } from 'pg';
import {
  config,
  dbQueryDurationHistogram,
  normalizeProviderName,
  type InvoiceRecord,
  type ProcessingBatch,
  type ProviderStats,
  type StoredSource,
} from '@meterline/shared';

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 10,
  idleTimeoutMillis: 30000,
});

async function timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    return await fn();
  } finally {
    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
  }
}

/**
 * Store source bytes ahead of enqueueing. Re-submitting the same bytes is a no-op.
 */
export async function saveSource(source: StoredSource): Promise<void> {
  await timed('save_source', () =>
    pool.query(
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

export async function sourceExists(sourceReference: string): Promise<boolean> {
  const result = await timed('source_exists', () =>
    pool.query('SELECT 1 FROM source_documents WHERE source_reference = $1', [sourceReference])
  );
  return (result.rowCount ?? 0) > 0;
}

type InvoiceRow = Omit<InvoiceRecord, 'created_at' | 'updated_at'> & {
  created_at: Date;
  updated_at: Date;
};

/**
 * Get the current record for a source document
 */
export async function getInvoiceBySourceReference(
  sourceReference: string
): Promise<InvoiceRecord | null> {
  const result = await timed('get_invoice', () =>
    pool.query<InvoiceRow>(
      `SELECT id, source_reference, provider_name, service_type,
              to_char(invoice_date, 'YYYY-MM-DD') AS invoice_date,
              total_amount::float8 AS total_amount,
              usage_quantity::float8 AS usage_quantity,
              usage_rate::float8 AS usage_rate,
              service_charge::float8 AS service_charge,
              to_char(billing_period_start, 'YYYY-MM-DD') AS billing_period_start,
              to_char(billing_period_end, 'YYYY-MM-DD') AS billing_period_end,
              account_number, extra_fields, processing_status,
              confidence_score::float8 AS confidence_score,
              semantic_fingerprint, content_hash, template_version, text_backend,
              text_reliability::float8 AS text_reliability,
              field_results, issues, created_at, updated_at
       FROM invoices WHERE source_reference = $1`,
      [sourceReference]
    )
  );

  const row = result.rows[0];
  if (!row) return null;

  return {
    ...row,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

export async function createBatch(batchId: string, total: number, startedAt: string): Promise<void> {
  await timed('create_batch', () =>
    pool.query(
      `INSERT INTO processing_batches (batch_id, total, started_at) VALUES ($1, $2, $3)`,
      [batchId, total, startedAt]
    )
  );
}

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

export async function getBatch(batchId: string): Promise<ProcessingBatch | null> {
  const result = await timed('get_batch', () =>
    pool.query<BatchRow>(
      `SELECT batch_id, total, succeeded, needs_review, failed, duplicate, started_at, finished_at
       FROM processing_batches WHERE batch_id = $1`,
      [batchId]
    )
  );

  const row = result.rows[0];
  if (!row) return null;

  return {
    ...row,
    started_at: row.started_at.toISOString(),
    finished_at: row.finished_at ? row.finished_at.toISOString() : null,
  };
}

// ============================================================================
// Processing history
// ============================================================================

const LATEST_RUNS = `
  SELECT DISTINCT ON (source_reference) *
  FROM processing_history
  ORDER BY source_reference, recorded_at DESC, id DESC`;

/**
 * Source documents whose latest run failed or was rejected, oldest first.
 */
export async function failedSourceReferences(
  provider: string | null,
  limit: number | null
): Promise<string[]> {
  const result = await timed('failed_sources', () =>
    pool.query<{ source_reference: string }>(
      `SELECT source_reference FROM (${LATEST_RUNS}) latest
       WHERE outcome IN ('failed', 'rejected')
         AND ($1::text IS NULL
              OR regexp_replace(lower(trim(provider_name)), '[[:space:]_-]+', ' ', 'g') = $1)
       ORDER BY recorded_at, id
       LIMIT $2`,
      [provider === null ? null : normalizeProviderName(provider), limit]
    )
  );
  return result.rows.map((row) => row.source_reference);
}

export async function getProviderStats(): Promise<ProviderStats[]> {
  const result = await timed('provider_stats', () =>
    pool.query<ProviderStats>(
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
