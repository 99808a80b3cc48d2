/**
 * Pipeline Error Taxonomy
 *
 * Fatal conditions are thrown as PipelineError subclasses inside a run and
 * converted to Rejection values at the pipeline boundary. Per-field problems
 * are never thrown; they are recorded as FieldIssue entries.
 */

import type { PipelineStage } from './types';

export type PipelineErrorCode =
  | 'NoTemplateFound'
  | 'ExtractionFailed'
  | 'DuplicateDetected'
  | 'Cancelled'
  | 'SourceNotFound'
  | 'InvalidTemplate';

export interface PipelineErrorOptions {
  stage: PipelineStage;
  retryable?: boolean;
  sourceReference?: string;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly stage: PipelineStage;
  readonly retryable: boolean;
  sourceReference?: string;

  constructor(code: PipelineErrorCode, message: string, options: PipelineErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = code;
    this.code = code;
    this.stage = options.stage;
    this.retryable = options.retryable ?? false;
    this.sourceReference = options.sourceReference;
  }
}

export class NoTemplateFoundError extends PipelineError {
  constructor(message: string, sourceReference?: string) {
    super('NoTemplateFound', message, { stage: 'template_lookup', sourceReference });
  }
}

export class ExtractionFailedError extends PipelineError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super('ExtractionFailed', message, { stage: 'text_extraction', ...options });
  }
}

/** Text extraction exceeded its time budget. Always retryable. */
export class ExtractionTimeoutError extends ExtractionFailedError {
  constructor(timeoutMs: number) {
    super(`Text extraction timed out after ${timeoutMs}ms`, { retryable: true });
  }
}

export class InvalidTemplateError extends PipelineError {
  readonly problems: string[];

  constructor(templateName: string, problems: string[]) {
    super('InvalidTemplate', `Template ${templateName} is invalid: ${problems.join('; ')}`, {
      stage: 'template_lookup',
    });
    this.problems = problems;
  }
}

export class CancelledError extends PipelineError {
  constructor(stage: PipelineStage) {
    super('Cancelled', `Pipeline run cancelled before ${stage}`, { stage, retryable: true });
  }
}

export class SourceNotFoundError extends PipelineError {
  constructor(sourceReference: string) {
    super('SourceNotFound', `No stored source document for ${sourceReference}`, {
      stage: 'intake',
      sourceReference,
    });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
