export {
  validateExtraction,
  computeConfidence,
  DEFAULT_CONFIDENCE_THRESHOLD,
  type ConfidenceInputs,
  type RecordColumns,
  type ScoredExtraction,
  type ScoredStatus,
  type TextQuality,
  type ValidatorOptions,
} from './validator';
export { normalizeField, checkRule, roundTo, AMOUNT_FIELDS, ROUNDED_FIELDS, type Normalized } from './normalize';
export {
  runCrossChecks,
  checkAmountUsageCorrelation,
  checkDateSequence,
  checkReasonableRate,
  RATE_BANDS,
  USAGE_AMOUNT_TOLERANCE,
  MAX_BILLING_PERIOD_DAYS,
  type CrossCheckInput,
} from './cross-checks';
