/**
 * Remote OCR Adapter
 *
 * Sends the PDF to an OpenAI vision model as a file part and asks for a
 * structured transcription with the model's own legibility estimate.
 */

import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { ExtractionFailedError } from '../errors';
import { logger } from '../logger';
import { compileSchema, describeSchemaErrors } from '../schemas';
import { MIN_READABLE_CHARS } from './local-adapter';
import { cleanOcrText, countNoiseChars } from './ocr-cleanup';
import type { ExtractCallOptions, PageText, TextDocument, TextExtractionAdapter } from './types';

/** Legibility below this marks the transcription degraded. */
const LEGIBLE_THRESHOLD = 0.9;

const SYSTEM_PROMPT = `You transcribe scanned utility invoices.
Return the text of every page exactly as printed, preserving line breaks and label/value order.
Do not correct, summarize or reformat numbers, dates or account identifiers.
Estimate legibility from 0 (unreadable) to 1 (perfectly clear) and list any regions you could not read.`;

export interface OcrTranscription {
  pages: Array<{ page_number: number; text: string }>;
  legibility: number;
  unreadable_regions: string[];
}

const TRANSCRIPTION_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: ['pages', 'legibility', 'unreadable_regions'],
  properties: {
    pages: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['page_number', 'text'],
        properties: {
          page_number: { type: 'integer' },
          text: { type: 'string' },
        },
      },
    },
    legibility: { type: 'number', minimum: 0, maximum: 1 },
    unreadable_regions: { type: 'array', items: { type: 'string' } },
  },
};

const validateTranscription = compileSchema<OcrTranscription>(TRANSCRIPTION_SCHEMA);

export type ChatCompletionBody = ChatCompletionCreateParamsNonStreaming;

export interface OcrCompletion {
  id: string;
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the OpenAI client this adapter calls. */
export interface OcrCompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionBody,
        options?: { signal?: AbortSignal; timeout?: number }
      ): Promise<OcrCompletion>;
    };
  };
}

export interface RemoteOcrOptions {
  model: string;
}

export class RemoteOcrAdapter implements TextExtractionAdapter {
  readonly backend = 'remote' as const;

  constructor(
    private readonly client: OcrCompletionClient,
    private readonly options: RemoteOcrOptions
  ) {}

  async extract(bytes: Uint8Array, options: ExtractCallOptions = {}): Promise<TextDocument> {
    const { model } = this.options;
    const base64Pdf = Buffer.from(bytes).toString('base64');

    let completion: OcrCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            {
              role: 'user',
              content: [
                {
                  type: 'file',
                  file: {
                    filename: options.filename ?? 'invoice.pdf',
                    file_data: `data:application/pdf;base64,${base64Pdf}`,
                  },
                },
                { type: 'text', text: 'Transcribe this invoice.' },
              ],
            },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: { name: 'invoice_transcription', strict: true, schema: TRANSCRIPTION_SCHEMA },
          },
        },
        { signal: options.signal }
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionFailedError(`OCR request failed: ${reason}`, {
        retryable: true,
        cause: error,
      });
    }

    const transcription = parseTranscription(completion);
    const pages: PageText[] = transcription.pages.map((p) => ({
      pageNumber: p.page_number,
      text: p.text,
    }));
    const joined = pages.map((p) => p.text).join('\n\n');

    const readable = joined.replace(/\s+/g, '').length - countNoiseChars(joined);
    if (readable < MIN_READABLE_CHARS) {
      throw new ExtractionFailedError(
        `OCR recovered no readable text (${readable} characters)`
      );
    }

    const warnings = transcription.unreadable_regions.map((r) => `Unreadable region: ${r}`);
    const reliability = Math.round(transcription.legibility * 100) / 100;
    const degraded = reliability < LEGIBLE_THRESHOLD || warnings.length > 0;

    logger.info('OCR transcription received', {
      model,
      request_id: completion.id,
      pages: pages.length,
      reliability,
      degraded,
    });

    return {
      text: cleanOcrText(joined),
      pages,
      backend: this.backend,
      reliability,
      degraded,
      warnings,
    };
  }
}

function parseTranscription(completion: OcrCompletion): OcrTranscription {
  const content = completion.choices[0]?.message.content;
  if (!content) {
    throw new ExtractionFailedError('Empty OCR response', { retryable: true });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ExtractionFailedError('OCR response is not valid JSON', {
      retryable: true,
      cause: error,
    });
  }

  if (!validateTranscription(parsed)) {
    throw new ExtractionFailedError(
      `OCR response does not match the transcription schema: ${describeSchemaErrors(validateTranscription).join('; ')}`,
      { retryable: true }
    );
  }
  return parsed;
}
