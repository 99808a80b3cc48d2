/**
 * Timeout and retry around a text extraction adapter.
 *
 * Every attempt gets its own time budget. Retryable failures (timeouts,
 * transient OCR errors) back off exponentially; anything else fails at once.
 */

import { ExtractionFailedError, ExtractionTimeoutError, isPipelineError } from '../errors';
import { logger } from '../logger';
import { textExtractionDurationHistogram, textExtractionRequestsCounter } from '../metrics';
import type { ExtractCallOptions, TextDocument, TextExtractionAdapter } from './types';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 15000,
  factor: 2,
};

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the attempt that follows failed attempt `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.factor ** (attempt - 1));
}

export interface RetryOptions {
  isRetryable: (error: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function invokeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !options.isRetryable(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * Run `operation` with an abort signal that fires after `timeoutMs`. The
 * returned promise rejects with ExtractionTimeoutError at that point even if
 * the operation ignores the signal.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new ExtractionTimeoutError(timeoutMs));
    }, timeoutMs);

    operation(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export interface ExtractTextOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  filename?: string;
  sleep?: Sleep;
}

function isRetryableExtractionError(error: unknown): boolean {
  return isPipelineError(error) && error.retryable;
}

/**
 * Extract text through an adapter under the timeout and retry policy.
 *
 * @throws ExtractionFailedError once attempts are exhausted or on a
 * non-retryable failure; `retryable` tells the caller whether a later
 * reprocess may succeed.
 */
export async function extractText(
  adapter: TextExtractionAdapter,
  bytes: Uint8Array,
  options: ExtractTextOptions
): Promise<TextDocument> {
  const callOptions: ExtractCallOptions = { filename: options.filename };

  try {
    return await invokeWithRetry(
      async (attempt) => {
        const startTime = Date.now();
        try {
          const document = await withTimeout(
            (signal) => adapter.extract(bytes, { ...callOptions, signal }),
            options.timeoutMs
          );
          textExtractionRequestsCounter.inc({ backend: adapter.backend, status: 'success' });
          return document;
        } catch (error) {
          const status = error instanceof ExtractionTimeoutError ? 'timeout' : 'error';
          textExtractionRequestsCounter.inc({ backend: adapter.backend, status });
          logger.warn('Text extraction attempt failed', {
            backend: adapter.backend,
            attempt,
            error: error instanceof Error ? error.message : String(error),
          });
          throw error;
        } finally {
          textExtractionDurationHistogram.observe(
            { backend: adapter.backend },
            (Date.now() - startTime) / 1000
          );
        }
      },
      options.retry,
      {
        isRetryable: isRetryableExtractionError,
        sleep: options.sleep,
        onRetry: (_error, attempt, delayMs) => {
          logger.info('Retrying text extraction', { backend: adapter.backend, attempt, delayMs });
        },
      }
    );
  } catch (error) {
    if (isPipelineError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExtractionFailedError(`Text extraction failed: ${reason}`, {
      retryable: true,
      cause: error,
    });
  }
}
