export {
  InvoicePipeline,
  isRejection,
  toRejection,
  DEFAULT_EXTRACTION_TIMEOUT_MS,
  type Disposition,
  type DuplicateInfo,
  type ParseOptions,
  type PipelineOptions,
  type PipelineResult,
  type Rejection,
  type ReprocessFailedOptions,
  type ReprocessFailedSummary,
  type ReprocessOptions,
  type ScoredRecord,
} from './pipeline';
export {
  historyEntryFor,
  isFailureOutcome,
  latestRuns,
  failedSourcesOf,
  providerStatsOf,
  type RunFacts,
} from './history';
export { PipelineRun, InvalidTransitionError, canTransition, isTerminal } from './run';
export {
  runBatch,
  categorize,
  newBatch,
  DEFAULT_BATCH_CONCURRENCY,
  type BatchItem,
  type BatchOptions,
  type BatchReport,
} from './batch';
export type {
  BatchStore,
  FailedSourceQuery,
  HistoryStore,
  InvoiceStore,
  PersistOptions,
  PersistOutcome,
  SourceStore,
  StoredSource,
} from './stores';
