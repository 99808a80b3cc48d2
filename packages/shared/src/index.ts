/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  setContextStage,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type TextBackend } from './config';

// Types
export * from './types';

// Errors
export * from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ParseInvoiceJob,
  type ReprocessInvoiceJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  parseJobId,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  invoicesProcessedCounter,
  rejectionsCounter,
  fieldGapsCounter,
  confidenceHistogram,
  pipelineDurationHistogram,
  templateReloadsCounter,
  textExtractionRequestsCounter,
  textExtractionDurationHistogram,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  enableDefaultMetrics,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  isTemplateDocument,
  validateTemplateDocument,
  isBatchRequest,
  validateBatchRequest,
  compileSchema,
  describeSchemaErrors,
  schemas,
  type ValidationResult,
} from './schemas';

// Templates
export * from './templates';

// Text extraction
export * from './text';

// Field extraction
export * from './extractors';

// Validation & scoring
export * from './validation';

// Duplicate detection
export * from './dedupe';

// Pipeline
export * from './pipeline';
