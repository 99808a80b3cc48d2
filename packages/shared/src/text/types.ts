/**
 * Text Extraction Types
 */

export interface PageText {
  pageNumber: number;
  text: string;
}

export type TextBackendName = 'local' | 'remote';

/**
 * Text recovered from a document, with how far the backend trusts it.
 * `degraded` marks partial or noisy reads; downstream scoring is reduced
 * by `reliability` when it is set.
 */
export interface TextDocument {
  text: string;
  pages: PageText[];
  backend: TextBackendName;
  /** 0..1 */
  reliability: number;
  degraded: boolean;
  warnings: string[];
}

export interface ExtractCallOptions {
  /** Aborted when the caller's timeout expires */
  signal?: AbortSignal;
  /** Used in remote requests and diagnostics */
  filename?: string;
}

/**
 * One contract for every text backend. Implementations throw
 * ExtractionFailedError when nothing at all can be read.
 */
export interface TextExtractionAdapter {
  readonly backend: TextBackendName;
  extract(bytes: Uint8Array, options?: ExtractCallOptions): Promise<TextDocument>;
}
