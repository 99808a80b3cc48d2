export * from './types';
export { cleanOcrText, countNoiseChars } from './ocr-cleanup';
export {
  LocalTextAdapter,
  assessPages,
  MIN_READABLE_CHARS,
  SPARSE_TEXT_CHARS,
  type PdfPageReader,
  type TextAssessment,
} from './local-adapter';
export {
  RemoteOcrAdapter,
  type ChatCompletionBody,
  type OcrCompletion,
  type OcrCompletionClient,
  type OcrTranscription,
  type RemoteOcrOptions,
} from './remote-adapter';
export {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  extractText,
  invokeWithRetry,
  withTimeout,
  type ExtractTextOptions,
  type RetryOptions,
  type RetryPolicy,
  type Sleep,
} from './invoke';
