/**
 * Local Text Adapter
 *
 * Reads the embedded text layer of a PDF. The page reader is injected so the
 * adapter can run against pdf.js in services and against fixtures in tests.
 */

import { ExtractionFailedError, isPipelineError } from '../errors';
import { logger } from '../logger';
import { cleanOcrText, countNoiseChars } from './ocr-cleanup';
import type {
  ExtractCallOptions,
  PageText,
  TextDocument,
  TextExtractionAdapter,
} from './types';

export type PdfPageReader = (bytes: Uint8Array) => Promise<PageText[]>;

/** Below this many readable characters the document is unreadable. */
export const MIN_READABLE_CHARS = 10;
/** Below this many the text is treated as a partial read. */
export const SPARSE_TEXT_CHARS = 50;

const BASE_RELIABILITY = 0.95;
const SPARSE_RELIABILITY_CAP = 0.5;
const NOISE_TOLERANCE = 0.02;

function nonWhitespaceLength(text: string): number {
  return text.replace(/\s+/g, '').length;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface TextAssessment {
  readableChars: number;
  pageCoverage: number;
  noiseRatio: number;
  reliability: number;
  degraded: boolean;
  warnings: string[];
}

/**
 * Score a set of pages read from a text layer.
 *
 * reliability = 0.95 x (readable pages / pages) x (1 - noise ratio),
 * capped at 0.5 when fewer than 50 characters were read.
 */
export function assessPages(pages: PageText[]): TextAssessment {
  const warnings: string[] = [];
  const totalChars = pages.reduce((n, p) => n + nonWhitespaceLength(p.text), 0);
  const noiseChars = pages.reduce((n, p) => n + countNoiseChars(p.text), 0);
  const readableChars = totalChars - noiseChars;

  const emptyPages = pages.filter((p) => nonWhitespaceLength(p.text) === 0);
  const pageCoverage = pages.length === 0 ? 0 : (pages.length - emptyPages.length) / pages.length;
  const noiseRatio = totalChars === 0 ? 0 : noiseChars / totalChars;

  let reliability = BASE_RELIABILITY * pageCoverage * (1 - noiseRatio);
  let degraded = false;

  if (emptyPages.length > 0) {
    degraded = true;
    warnings.push(`No text layer on page(s) ${emptyPages.map((p) => p.pageNumber).join(', ')}`);
  }
  if (noiseRatio > NOISE_TOLERANCE) {
    degraded = true;
    warnings.push(`Unreadable characters make up ${Math.round(noiseRatio * 100)}% of the text`);
  }
  if (readableChars < SPARSE_TEXT_CHARS) {
    degraded = true;
    reliability = Math.min(reliability, SPARSE_RELIABILITY_CAP);
    warnings.push(`Only ${readableChars} readable characters recovered`);
  }

  return {
    readableChars,
    pageCoverage,
    noiseRatio,
    reliability: round2(reliability),
    degraded,
    warnings,
  };
}

export class LocalTextAdapter implements TextExtractionAdapter {
  readonly backend = 'local' as const;

  constructor(private readonly readPages: PdfPageReader) {}

  async extract(bytes: Uint8Array, options: ExtractCallOptions = {}): Promise<TextDocument> {
    let pages: PageText[];
    try {
      pages = await this.readPages(bytes);
    } catch (error) {
      if (isPipelineError(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionFailedError(`PDF text layer could not be read: ${reason}`, {
        retryable: false,
        cause: error,
      });
    }

    const assessment = assessPages(pages);
    if (assessment.readableChars < MIN_READABLE_CHARS) {
      throw new ExtractionFailedError(
        `Document has no readable text (${assessment.readableChars} characters recovered)`
      );
    }

    const joined = pages.map((p) => p.text).join('\n\n');
    const text = assessment.degraded ? cleanOcrText(joined) : joined.trim();

    if (assessment.degraded) {
      logger.warn('Degraded text layer', {
        filename: options.filename,
        reliability: assessment.reliability,
        warnings: assessment.warnings,
      });
    }

    return {
      text,
      pages,
      backend: this.backend,
      reliability: assessment.reliability,
      degraded: assessment.degraded,
      warnings: assessment.warnings,
    };
  }
}
