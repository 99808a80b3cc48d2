/**
 * Invoice Templates
 *
 * Template document types, the load-time compiler and the registry.
 */

export type {
  FieldType,
  FieldPatternDocument,
  PostProcessingDocument,
  ValidationRulesDocument,
  TemplateDocument,
  FieldRule,
  FieldSpec,
  InvoiceTemplate,
  TemplateInfo,
} from './types';

export {
  compileTemplate,
  describeTemplate,
  loadTemplatesFromDirectory,
  normalizeProviderName,
  templateKey,
  toJsPatternSource,
  PATTERN_FLAGS,
  type DirectoryLoadResult,
} from './loader';

export {
  translateDateFormat,
  parseDateWithFormat,
  formatDateWithFormat,
  toIsoDate,
} from './date-format';

export { TemplateRegistry } from './registry';
