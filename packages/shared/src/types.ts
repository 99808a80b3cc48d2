/**
 * Shared TypeScript Types
 *
 * Invoice records, per-field results and batch aggregates for the utility
 * invoice extraction pipeline.
 */

// ============================================================================
// Enumerations
// ============================================================================

export const SERVICE_TYPES = ['Electricity', 'Gas', 'Water'] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

export function isServiceType(value: unknown): value is ServiceType {
  return typeof value === 'string' && (SERVICE_TYPES as readonly string[]).includes(value);
}

/** Status of an invoice record as persisted. */
export type ProcessingStatus =
  | 'pending'
  | 'extracted'
  | 'validated'
  | 'needs_review'
  | 'failed'
  | 'duplicate';

/** Per-run pipeline state. */
export type RunState =
  | 'pending'
  | 'text_extracted'
  | 'fields_extracted'
  | 'validated'
  | 'needs_review'
  | 'failed'
  | 'ready_to_persist'
  | 'duplicate'
  | 'persisted';

export type PipelineStage =
  | 'intake'
  | 'text_extraction'
  | 'template_lookup'
  | 'field_extraction'
  | 'validation'
  | 'duplicate_check'
  | 'persistence';

// ============================================================================
// Field Results
// ============================================================================

export type FieldValue = number | string;

export type IssueCode = 'FieldExtractionGap' | 'ValidationFailure';

/** Non-fatal, recorded problem with a single field or a cross-field check. */
export interface FieldIssue {
  code: IssueCode;
  /** Field name, or null for cross-field checks */
  field: string | null;
  message: string;
}

/** What the Field Extractor captured for one field. */
export interface RawField {
  field: string;
  /** Capture group text as it appeared in the document */
  matched_text: string | null;
  /** Capture with currency symbols and thousands separators stripped */
  raw: string | null;
  method: 'pattern' | 'fuzzy' | 'none';
  /** Offset of the winning match in the document text */
  offset: number | null;
}

/** A field after normalization and rule checks. */
export interface FieldResult extends RawField {
  normalized: FieldValue | null;
  valid: boolean;
  has_rule: boolean;
  required: boolean;
}

// ============================================================================
// Invoice Record
// ============================================================================

export interface InvoiceRecord {
  id: string;
  source_reference: string;
  provider_name: string;
  service_type: ServiceType;
  invoice_date: string | null;
  total_amount: number | null;
  usage_quantity: number | null;
  usage_rate: number | null;
  service_charge: number | null;
  billing_period_start: string | null;
  billing_period_end: string | null;
  account_number: string | null;
  extra_fields: Record<string, FieldValue | null>;
  processing_status: ProcessingStatus;
  confidence_score: number;
  semantic_fingerprint: string | null;
  content_hash: string;
  template_version: string;
  text_backend: string;
  text_reliability: number;
  field_results: FieldResult[];
  issues: FieldIssue[];
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Batches
// ============================================================================

export type BatchCategory = 'succeeded' | 'needs_review' | 'failed' | 'duplicate';

export interface ProcessingBatch {
  batch_id: string;
  total: number;
  succeeded: number;
  needs_review: number;
  failed: number;
  duplicate: number;
  started_at: string;
  finished_at: string | null;
}

// ============================================================================
// Processing history
// ============================================================================

/** Outcome of one pipeline run; 'rejected' covers every Rejection. */
export type HistoryOutcome = 'validated' | 'needs_review' | 'failed' | 'duplicate' | 'rejected';

export interface ProcessingHistoryEntry {
  source_reference: string;
  /** Template provider, or the caller's hint when the run never reached a template */
  provider_name: string | null;
  service_type: ServiceType | null;
  outcome: HistoryOutcome;
  stage: PipelineStage | null;
  reason: string | null;
  message: string | null;
  confidence_score: number | null;
  text_backend: string | null;
  text_reliability: number | null;
  template_version: string | null;
  reprocess: boolean;
  recorded_at: string;
}

/** Per-provider totals over the latest run of each source document. */
export interface ProviderStats {
  provider_name: string;
  total: number;
  successful: number;
  success_rate: number;
  avg_confidence: number | null;
}

// ============================================================================
// Ingest API
// ============================================================================

export interface DocumentAcceptedResponse {
  correlation_id: string;
  source_reference: string;
}

export interface BatchDocument {
  /** PDF bytes, base64 encoded */
  content_base64: string;
  provider_hint?: string;
  service_type?: ServiceType;
  filename?: string;
}

export interface BatchRequest {
  documents: BatchDocument[];
}

export interface BatchAcceptedResponse {
  correlation_id: string;
  batch_id: string;
  source_references: string[];
}

export interface ReprocessRequest {
  template_override?: unknown;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
