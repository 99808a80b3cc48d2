/**
 * Text Extraction Tests
 *
 * Local text layer scoring, remote OCR responses, OCR clean-up and the
 * timeout/retry wrapper.
 */

import {
  ExtractionFailedError,
  ExtractionTimeoutError,
  LocalTextAdapter,
  RemoteOcrAdapter,
  assessPages,
  backoffDelay,
  cleanOcrText,
  countNoiseChars,
  extractText,
  invokeWithRetry,
  isPipelineError,
  withTimeout,
  type PipelineError,
  type RetryPolicy,
} from '@meterline/shared';
import {
  FakeOcrClient,
  ScriptedTextAdapter,
  electricityInvoice,
  textBytes,
  textDocument,
  utf8PageReader,
} from './helpers';

const POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 15000, factor: 2 };

async function pipelineFailure(promise: Promise<unknown>): Promise<PipelineError> {
  try {
    await promise;
  } catch (error) {
    if (isPipelineError(error)) return error;
    throw error;
  }
  throw new Error('expected a pipeline error');
}

function transcription(text: string, legibility: number, unreadable: string[] = []): string {
  return JSON.stringify({
    pages: [{ page_number: 1, text }],
    legibility,
    unreadable_regions: unreadable,
  });
}

describe('OCR clean-up', () => {
  it('fixes common misreads of invoice words', () => {
    expect(cleanOcrText('Tota1 arnount due')).toBe('total amount due');
    expect(cleanOcrText('Bil1 date')).toBe('bill date');
    expect(cleanOcrText('Usage 450 k w h')).toBe('Usage 450 kWh');
  });

  it('replaces letters read as digits inside dollar amounts', () => {
    expect(cleanOcrText('Due: $1O2.5O')).toBe('Due: $102.50');
    expect(cleanOcrText('Paid $ l,2S0.00')).toBe('Paid $ 1,250.00');
  });

  it('leaves dollar signs followed by words alone', () => {
    expect(cleanOcrText('$SOS')).toBe('$SOS');
  });

  it('drops replacement and control characters', () => {
    expect(countNoiseChars('a�b\u0001c')).toBe(2);
    expect(cleanOcrText('a�b\u0001c')).toBe('abc');
  });

  it('normalizes whitespace', () => {
    expect(cleanOcrText('  a  \t b\n\n\n\nc  \n d ')).toBe('a b\n\nc\nd');
  });
});

describe('Local text layer', () => {
  it('trusts a complete text layer', () => {
    const assessment = assessPages([
      { pageNumber: 1, text: electricityInvoice() },
      { pageNumber: 2, text: 'Payment slip: pay by BPAY or direct debit before the due date' },
    ]);

    expect(assessment.reliability).toBe(0.95);
    expect(assessment.degraded).toBe(false);
    expect(assessment.warnings).toEqual([]);
  });

  it('scales reliability by page coverage', () => {
    const assessment = assessPages([
      { pageNumber: 1, text: electricityInvoice() },
      { pageNumber: 2, text: '   ' },
      { pageNumber: 3, text: 'Terms and conditions apply to every account' },
    ]);

    expect(assessment.pageCoverage).toBeCloseTo(2 / 3);
    expect(assessment.reliability).toBe(0.63);
    expect(assessment.degraded).toBe(true);
    expect(assessment.warnings).toEqual(['No text layer on page(s) 2']);
  });

  it('caps reliability for sparse text', () => {
    const assessment = assessPages([{ pageNumber: 1, text: 'Total $12.00 due' }]);

    expect(assessment.readableChars).toBe(14);
    expect(assessment.reliability).toBe(0.5);
    expect(assessment.warnings).toEqual(['Only 14 readable characters recovered']);
  });

  it('penalises garbage characters', () => {
    const assessment = assessPages([
      { pageNumber: 1, text: 'x'.repeat(95) + '�'.repeat(5) },
    ]);

    expect(assessment.noiseRatio).toBe(0.05);
    expect(assessment.reliability).toBe(0.9);
    expect(assessment.warnings).toEqual(['Unreadable characters make up 5% of the text']);
  });

  it('returns the text of a clean document unchanged', async () => {
    const adapter = new LocalTextAdapter(utf8PageReader);

    const document = await adapter.extract(textBytes(electricityInvoice()));

    expect(document.text).toBe(electricityInvoice());
    expect(document.backend).toBe('local');
    expect(document.reliability).toBe(0.95);
    expect(document.degraded).toBe(false);
  });

  it('cleans a degraded document', async () => {
    const adapter = new LocalTextAdapter(utf8PageReader);
    const bytes = textBytes(`${electricityInvoice()}\f\fPage 3 notes Tota1 arnount`);

    const document = await adapter.extract(bytes);

    expect(document.text).toBe(`${electricityInvoice()}\n\nPage 3 notes total amount`);
    expect(document.pages).toHaveLength(3);
    expect(document.degraded).toBe(true);
    expect(document.reliability).toBe(0.63);
  });

  it('fails when nothing readable is recovered', async () => {
    const adapter = new LocalTextAdapter(utf8PageReader);

    const error = await pipelineFailure(adapter.extract(textBytes('  \f ')));

    expect(error).toBeInstanceOf(ExtractionFailedError);
    expect(error.message).toBe('Document has no readable text (0 characters recovered)');
    expect(error.retryable).toBe(false);
  });

  it('wraps reader errors', async () => {
    const adapter = new LocalTextAdapter(async () => {
      throw new Error('bad xref table');
    });

    const error = await pipelineFailure(adapter.extract(textBytes('%PDF-1.7')));

    expect(error.code).toBe('ExtractionFailed');
    expect(error.stage).toBe('text_extraction');
    expect(error.message).toBe('PDF text layer could not be read: bad xref table');
    expect(error.retryable).toBe(false);
  });
});

describe('Remote OCR', () => {
  const bytes = textBytes('%PDF-1.7 scanned');

  it('sends the PDF as a file part with a structured response format', async () => {
    const client = new FakeOcrClient([transcription('EnergyAustralia invoice text', 0.97)]);
    const adapter = new RemoteOcrAdapter(client, { model: 'gpt-4o-test' });

    await adapter.extract(bytes, { filename: 'bill.pdf' });

    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]).toMatchObject({
      model: 'gpt-4o-test',
      messages: [
        { role: 'system' },
        {
          role: 'user',
          content: [
            {
              type: 'file',
              file: {
                filename: 'bill.pdf',
                file_data: `data:application/pdf;base64,${Buffer.from(bytes).toString('base64')}`,
              },
            },
            { type: 'text', text: 'Transcribe this invoice.' },
          ],
        },
      ],
      response_format: { type: 'json_schema', json_schema: { name: 'invoice_transcription', strict: true } },
    });
  });

  it('cleans the transcription and takes reliability from legibility', async () => {
    const client = new FakeOcrClient([transcription('EnergyAustralia\nTota1 arnount due $1O.00', 0.85)]);
    const adapter = new RemoteOcrAdapter(client, { model: 'gpt-4o-test' });

    const document = await adapter.extract(bytes);

    expect(document).toEqual({
      text: 'EnergyAustralia\ntotal amount due $10.00',
      pages: [{ pageNumber: 1, text: 'EnergyAustralia\nTota1 arnount due $1O.00' }],
      backend: 'remote',
      reliability: 0.85,
      degraded: true,
      warnings: [],
    });
  });

  it('marks unreadable regions as degraded', async () => {
    const client = new FakeOcrClient([
      transcription('EnergyAustralia invoice text', 0.97, ['stamp over total']),
    ]);

    const document = await new RemoteOcrAdapter(client, { model: 'm' }).extract(bytes);

    expect(document.degraded).toBe(true);
    expect(document.warnings).toEqual(['Unreadable region: stamp over total']);
  });

  it('trusts a legible transcription', async () => {
    const client = new FakeOcrClient([transcription('EnergyAustralia invoice text', 0.97)]);

    const document = await new RemoteOcrAdapter(client, { model: 'm' }).extract(bytes);

    expect(document.degraded).toBe(false);
    expect(document.reliability).toBe(0.97);
  });

  it.each([
    [new Error('socket hang up'), 'OCR request failed: socket hang up'],
    [null, 'Empty OCR response'],
    ['not json', 'OCR response is not valid JSON'],
  ])('treats a bad response (%s) as retryable', async (reply, message) => {
    const adapter = new RemoteOcrAdapter(new FakeOcrClient([reply]), { model: 'm' });

    const error = await pipelineFailure(adapter.extract(bytes));

    expect(error.message).toBe(message);
    expect(error.retryable).toBe(true);
  });

  it('rejects a response that does not match the schema', async () => {
    const adapter = new RemoteOcrAdapter(new FakeOcrClient(['{"pages":[]}']), { model: 'm' });

    const error = await pipelineFailure(adapter.extract(bytes));

    expect(error.message).toMatch(/^OCR response does not match the transcription schema: /);
    expect(error.retryable).toBe(true);
  });

  it('fails without retry when the scan has no readable text', async () => {
    const adapter = new RemoteOcrAdapter(new FakeOcrClient([transcription('n/a', 0.1)]), {
      model: 'm',
    });

    const error = await pipelineFailure(adapter.extract(bytes));

    expect(error.message).toBe('OCR recovered no readable text (3 characters)');
    expect(error.retryable).toBe(false);
  });
});

describe('Retry and timeout', () => {
  it('backs off exponentially up to the cap', () => {
    expect(backoffDelay(POLICY, 1)).toBe(1000);
    expect(backoffDelay(POLICY, 2)).toBe(2000);
    expect(backoffDelay(POLICY, 5)).toBe(15000);
  });

  it('retries retryable failures and returns the first success', async () => {
    const delays: number[] = [];
    let attempts = 0;

    const result = await invokeWithRetry(
      async (attempt) => {
        attempts = attempt;
        if (attempt < 3) throw new Error('transient');
        return 'ok';
      },
      POLICY,
      { isRetryable: () => true, sleep: async (ms) => void delays.push(ms) }
    );

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('does not retry other failures', async () => {
    let attempts = 0;

    await expect(
      invokeWithRetry(
        async () => {
          attempts++;
          throw new Error('permanent');
        },
        POLICY,
        { isRetryable: () => false, sleep: async () => undefined }
      )
    ).rejects.toThrow('permanent');
    expect(attempts).toBe(1);
  });

  it('gives up after the last attempt', async () => {
    let attempts = 0;

    await expect(
      invokeWithRetry(
        async (attempt) => {
          attempts++;
          throw new Error(`failure ${attempt}`);
        },
        POLICY,
        { isRetryable: () => true, sleep: async () => undefined }
      )
    ).rejects.toThrow('failure 3');
    expect(attempts).toBe(3);
  });

  it('aborts an operation that overruns its budget', async () => {
    const seen: { signal?: AbortSignal } = {};

    const error = await pipelineFailure(
      withTimeout((signal) => {
        seen.signal = signal;
        return new Promise<string>(() => undefined);
      }, 20)
    );

    expect(error).toBeInstanceOf(ExtractionTimeoutError);
    expect(error.message).toBe('Text extraction timed out after 20ms');
    expect(error.retryable).toBe(true);
    expect(seen.signal?.aborted).toBe(true);
  });

  it('resolves an operation that finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 1000)).resolves.toBe('done');
  });

  it('retries a timed out extraction', async () => {
    const adapter = new ScriptedTextAdapter(['hang', textDocument('EnergyAustralia invoice text')]);
    const delays: number[] = [];

    const document = await extractText(adapter, textBytes('pdf'), {
      timeoutMs: 20,
      retry: POLICY,
      sleep: async (ms) => void delays.push(ms),
    });

    expect(document.text).toBe('EnergyAustralia invoice text');
    expect(adapter.calls).toBe(2);
    expect(adapter.signals[0]?.aborted).toBe(true);
    expect(delays).toEqual([1000]);
  });

  it('stops at the first non-retryable failure', async () => {
    const adapter = new ScriptedTextAdapter([new ExtractionFailedError('encrypted PDF')]);

    const error = await pipelineFailure(
      extractText(adapter, textBytes('pdf'), { timeoutMs: 1000, retry: POLICY, sleep: async () => undefined })
    );

    expect(error.message).toBe('encrypted PDF');
    expect(adapter.calls).toBe(1);
  });

  it('surfaces the last retryable failure once attempts run out', async () => {
    const adapter = new ScriptedTextAdapter([
      new ExtractionFailedError('OCR service unavailable', { retryable: true }),
    ]);

    const error = await pipelineFailure(
      extractText(adapter, textBytes('pdf'), { timeoutMs: 1000, retry: POLICY, sleep: async () => undefined })
    );

    expect(error.message).toBe('OCR service unavailable');
    expect(error.retryable).toBe(true);
    expect(adapter.calls).toBe(3);
  });

  it('wraps unexpected adapter errors as retryable extraction failures', async () => {
    const adapter = new ScriptedTextAdapter([new TypeError('boom')]);

    const error = await pipelineFailure(
      extractText(adapter, textBytes('pdf'), { timeoutMs: 1000, retry: POLICY, sleep: async () => undefined })
    );

    expect(error.message).toBe('Text extraction failed: boom');
    expect(error.retryable).toBe(true);
    expect(adapter.calls).toBe(1);
  });
});
