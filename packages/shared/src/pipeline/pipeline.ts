/**
 * Invoice Pipeline
 *
 * intake -> text extraction -> template lookup -> field extraction ->
 * validation -> duplicate check -> persistence
 *
 * Fatal conditions end the run as a Rejection. Store failures are not
 * pipeline errors: they propagate so the caller (a queue worker) can retry.
 */

import { ulid } from 'ulid';
import { v4 as uuidv4 } from 'uuid';
import { getContext, runWithContextAsync, setContextStage } from '../context';
import { DuplicateGuard, DEFAULT_DUPLICATE_KEYS } from '../dedupe/duplicate-guard';
import {
  contentHash,
  semanticFingerprint,
  sourceReferenceFor,
  type DuplicateKeyKind,
} from '../dedupe/fingerprint';
import {
  CancelledError,
  SourceNotFoundError,
  isPipelineError,
  type PipelineError,
  type PipelineErrorCode,
} from '../errors';
import { extractFields } from '../extractors/field-extractor';
import { logger } from '../logger';
import {
  confidenceHistogram,
  invoicesProcessedCounter,
  pipelineDurationHistogram,
  rejectionsCounter,
} from '../metrics';
import { compileTemplate } from '../templates/loader';
import type { TemplateRegistry } from '../templates/registry';
import type { InvoiceTemplate } from '../templates/types';
import { DEFAULT_RETRY_POLICY, extractText, type RetryPolicy, type Sleep } from '../text/invoke';
import type { TextDocument, TextExtractionAdapter } from '../text/types';
import type { InvoiceRecord, PipelineStage, RunState, ServiceType } from '../types';
import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  validateExtraction,
  type ScoredExtraction,
  type ScoredStatus,
} from '../validation/validator';
import { historyEntryFor } from './history';
import { PipelineRun } from './run';
import type { HistoryStore, InvoiceStore, SourceStore } from './stores';

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 60_000;

export type Disposition = 'persisted' | 'duplicate' | 'not_persisted';

export interface DuplicateInfo {
  code: 'DuplicateDetected';
  /** 'store' when the conflict surfaced at insert time */
  level: DuplicateKeyKind | 'store';
  fingerprint: string | null;
  message: string;
}

export interface ScoredRecord {
  kind: 'record';
  record: InvoiceRecord;
  disposition: Disposition;
  /** Validation outcome before duplicate handling */
  scored_status: ScoredStatus;
  duplicate: DuplicateInfo | null;
  text_warnings: string[];
  run_states: RunState[];
}

export interface Rejection {
  kind: 'rejection';
  reason: PipelineErrorCode;
  retryable: boolean;
  source_reference: string;
  stage: PipelineStage;
  message: string;
}

export type PipelineResult = ScoredRecord | Rejection;

export function isRejection(result: PipelineResult): result is Rejection {
  return result.kind === 'rejection';
}

export function toRejection(error: PipelineError, sourceReference: string): Rejection {
  const reference = error.sourceReference ?? sourceReference;
  error.sourceReference = reference;
  return {
    kind: 'rejection',
    reason: error.code,
    retryable: error.retryable,
    source_reference: reference,
    stage: error.stage,
    message: error.message,
  };
}

export interface PipelineOptions {
  registry: TemplateRegistry;
  textAdapter: TextExtractionAdapter;
  invoiceStore: InvoiceStore;
  sourceStore: SourceStore;
  historyStore: HistoryStore;
  confidenceThreshold?: number;
  fuzzyFallback?: boolean;
  duplicateKeys?: readonly DuplicateKeyKind[];
  extractionTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Backoff sleep between extraction attempts */
  sleep?: Sleep;
  now?: () => Date;
}

export interface ParseOptions {
  providerHint?: string;
  serviceType?: ServiceType;
  /** Defaults to the sha256 of the bytes */
  sourceReference?: string;
  filename?: string;
  signal?: AbortSignal;
}

export interface ReprocessOptions {
  /** Template document to use instead of the registry's */
  templateOverride?: unknown;
  /** Replaces the hint stored with the source */
  providerHint?: string;
  serviceType?: ServiceType;
  signal?: AbortSignal;
}

export interface ReprocessFailedOptions {
  /** Only documents whose latest run names this provider */
  provider?: string;
  limit?: number;
  signal?: AbortSignal;
}

export interface ReprocessFailedSummary {
  attempted: number;
  results: PipelineResult[];
}

interface RunInput {
  bytes: Uint8Array;
  sourceReference: string;
  providerHint: string | null;
  serviceType: ServiceType | null;
  filename: string | null;
  templateOverride: unknown;
  reprocess: boolean;
  signal?: AbortSignal;
}

/**
 * Tracks the current stage and checks for cancellation on every boundary.
 */
class StageCursor {
  current: PipelineStage = 'intake';

  constructor(private readonly signal?: AbortSignal) {}

  enter(stage: PipelineStage): void {
    if (this.signal?.aborted) {
      throw new CancelledError(stage);
    }
    this.current = stage;
    setContextStage(stage);
  }
}

export class InvoicePipeline {
  private readonly guard: DuplicateGuard;
  private readonly threshold: number;
  private readonly now: () => Date;

  constructor(private readonly options: PipelineOptions) {
    this.guard = new DuplicateGuard(
      options.invoiceStore,
      options.duplicateKeys ?? DEFAULT_DUPLICATE_KEYS
    );
    this.threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run a new document through the pipeline. The source bytes are stored
   * first so the document can be reprocessed whatever the outcome.
   */
  async parse(bytes: Uint8Array, options: ParseOptions = {}): Promise<PipelineResult> {
    const sourceReference = options.sourceReference ?? sourceReferenceFor(bytes);

    return this.withRunContext(sourceReference, async () => {
      await this.options.sourceStore.save({
        source_reference: sourceReference,
        bytes,
        provider_hint: options.providerHint ?? null,
        service_type: options.serviceType ?? null,
        filename: options.filename ?? null,
      });

      return this.execute({
        bytes,
        sourceReference,
        providerHint: options.providerHint ?? null,
        serviceType: options.serviceType ?? null,
        filename: options.filename ?? null,
        templateOverride: undefined,
        reprocess: false,
        signal: options.signal,
      });
    });
  }

  /**
   * Start a fresh run against stored source bytes. A persisted result
   * supersedes the record previously stored for the same reference.
   */
  async reprocess(sourceReference: string, options: ReprocessOptions = {}): Promise<PipelineResult> {
    return this.withRunContext(sourceReference, async () => {
      const stored = await this.options.sourceStore.load(sourceReference);
      if (!stored) {
        return this.reject(new SourceNotFoundError(sourceReference), sourceReference);
      }

      logger.info('Reprocessing source document', {
        has_template_override: options.templateOverride !== undefined,
      });

      return this.execute({
        bytes: stored.bytes,
        sourceReference,
        providerHint: options.providerHint ?? stored.provider_hint,
        serviceType: options.serviceType ?? stored.service_type,
        filename: stored.filename,
        templateOverride: options.templateOverride,
        reprocess: true,
        signal: options.signal,
      });
    });
  }

  /**
   * Reprocess every document whose latest run failed or was rejected, one at
   * a time, oldest failure first.
   */
  async reprocessFailed(options: ReprocessFailedOptions = {}): Promise<ReprocessFailedSummary> {
    const references = await this.options.historyStore.failedSources({
      provider: options.provider,
      limit: options.limit,
    });

    if (references.length === 0) {
      logger.info('No failed documents to reprocess', { provider: options.provider });
      return { attempted: 0, results: [] };
    }

    const results: PipelineResult[] = [];
    for (const reference of references) {
      results.push(await this.reprocess(reference, { signal: options.signal }));
    }

    logger.info('Reprocessed failed documents', {
      provider: options.provider,
      attempted: references.length,
      still_failing: results.filter(
        (r) => r.kind === 'rejection' || r.record.processing_status === 'failed'
      ).length,
    });
    return { attempted: references.length, results };
  }

  private withRunContext(
    sourceReference: string,
    fn: () => Promise<PipelineResult>
  ): Promise<PipelineResult> {
    const correlationId = getContext()?.correlationId ?? ulid();
    return runWithContextAsync({ correlationId, sourceReference, stage: 'intake' }, fn);
  }

  private async execute(input: RunInput): Promise<PipelineResult> {
    const startTime = Date.now();
    const run = new PipelineRun(input.sourceReference);
    const cursor = new StageCursor(input.signal);

    try {
      cursor.enter('intake');
      const hash = contentHash(input.bytes);

      // An override is checked before any text extraction work is spent
      const override =
        input.templateOverride === undefined
          ? null
          : compileTemplate(input.templateOverride, 'template override');

      cursor.enter('text_extraction');
      const textDocument = await extractText(this.options.textAdapter, input.bytes, {
        timeoutMs: this.options.extractionTimeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS,
        retry: this.options.retryPolicy ?? DEFAULT_RETRY_POLICY,
        filename: input.filename ?? undefined,
        sleep: this.options.sleep,
      });
      run.advance('text_extracted');

      cursor.enter('template_lookup');
      const template = override ?? this.resolveTemplate(input, textDocument.text);

      cursor.enter('field_extraction');
      const extraction = extractFields(textDocument.text, template, {
        fuzzyFallback: this.options.fuzzyFallback,
      });
      run.advance('fields_extracted');

      cursor.enter('validation');
      const scored = validateExtraction(extraction, template, {
        confidenceThreshold: this.threshold,
        text: textDocument,
      });
      run.advance(scored.status);

      const record = this.buildRecord(input.sourceReference, hash, template, textDocument, scored);
      const result = await this.dispose(record, scored, textDocument, run, cursor, input.reprocess);

      pipelineDurationHistogram.observe(
        { outcome: result.record.processing_status },
        (Date.now() - startTime) / 1000
      );
      invoicesProcessedCounter.inc({
        service_type: record.service_type,
        status: result.record.processing_status,
      });
      confidenceHistogram.observe(record.confidence_score);
      await this.recordHistory(result, input);

      logger.info('Pipeline run complete', {
        template: template.key,
        status: result.record.processing_status,
        disposition: result.disposition,
        confidence_score: record.confidence_score,
        issues: record.issues.length,
      });

      return result;
    } catch (error) {
      if (isPipelineError(error)) {
        pipelineDurationHistogram.observe({ outcome: 'rejected' }, (Date.now() - startTime) / 1000);
        const rejection = this.reject(error, input.sourceReference);
        await this.recordHistory(rejection, input);
        return rejection;
      }
      logger.error('Pipeline run aborted', error, { stage: cursor.current });
      throw error;
    }
  }

  private async recordHistory(result: PipelineResult, input: RunInput): Promise<void> {
    await this.options.historyStore.record(
      historyEntryFor(result, {
        providerHint: input.providerHint,
        serviceType: input.serviceType,
        reprocess: input.reprocess,
        recordedAt: this.now().toISOString(),
      })
    );
  }

  private resolveTemplate(input: RunInput, text: string): InvoiceTemplate {
    const { registry } = this.options;
    if (input.providerHint) {
      return registry.lookup(input.providerHint, input.serviceType ?? undefined, text);
    }
    return registry.detect(text, input.serviceType ?? undefined);
  }

  private buildRecord(
    sourceReference: string,
    hash: string,
    template: InvoiceTemplate,
    textDocument: TextDocument,
    scored: ScoredExtraction
  ): InvoiceRecord {
    const timestamp = this.now().toISOString();
    const { columns } = scored;

    return {
      id: uuidv4(),
      source_reference: sourceReference,
      provider_name: template.provider,
      service_type: template.serviceType,
      ...columns,
      processing_status: scored.status,
      confidence_score: scored.confidence,
      semantic_fingerprint: semanticFingerprint({
        provider_name: template.provider,
        invoice_date: columns.invoice_date,
        total_amount: columns.total_amount,
      }),
      content_hash: hash,
      template_version: template.version,
      text_backend: textDocument.backend,
      text_reliability: textDocument.reliability,
      field_results: scored.fields,
      issues: scored.issues,
      created_at: timestamp,
      updated_at: timestamp,
    };
  }

  /**
   * Duplicate check and persistence. Failed records are returned but never stored.
   */
  private async dispose(
    record: InvoiceRecord,
    scored: ScoredExtraction,
    textDocument: TextDocument,
    run: PipelineRun,
    cursor: StageCursor,
    reprocess: boolean
  ): Promise<ScoredRecord> {
    const result = (disposition: Disposition, duplicate: DuplicateInfo | null): ScoredRecord => ({
      kind: 'record',
      record: duplicate ? { ...record, processing_status: 'duplicate' } : record,
      disposition,
      scored_status: scored.status,
      duplicate,
      text_warnings: textDocument.warnings,
      run_states: [...run.history],
    });

    if (scored.status === 'failed') {
      logger.warn('No usable fields extracted; record not persisted');
      return result('not_persisted', null);
    }

    cursor.enter('duplicate_check');
    const decision = await this.guard.check(record, {
      excludeSourceReference: reprocess ? record.source_reference : undefined,
    });
    if (decision.status === 'duplicate') {
      run.advance('duplicate');
      return result('duplicate', {
        code: 'DuplicateDetected',
        level: decision.level,
        fingerprint: decision.fingerprint,
        message: `A record with the same ${decision.level} fingerprint is already stored`,
      });
    }
    run.advance('ready_to_persist');

    cursor.enter('persistence');
    const outcome = await this.options.invoiceStore.persist(record, {
      supersede: reprocess,
      duplicateKeys: this.guard.keys,
    });
    if (outcome === 'duplicate') {
      logger.info('Store reported a duplicate at insert time');
      run.advance('duplicate');
      return result('duplicate', {
        code: 'DuplicateDetected',
        level: 'store',
        fingerprint: null,
        message: 'The store rejected the record as a duplicate',
      });
    }

    run.advance('persisted');
    return result('persisted', null);
  }

  private reject(error: PipelineError, sourceReference: string): Rejection {
    const rejection = toRejection(error, sourceReference);

    rejectionsCounter.inc({ reason: error.code });
    logger.warn('Pipeline run rejected', {
      reason: rejection.reason,
      retryable: rejection.retryable,
      stage: rejection.stage,
      diagnostic: rejection.message,
    });

    return rejection;
  }
}
