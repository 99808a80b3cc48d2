export {
  extractFields,
  type ExtractionResult,
  type FieldExtractorOptions,
} from './field-extractor';
export { cleanCapture, cleanNumeric, cleanText } from './clean';
export { FUZZY_PATTERNS, hasFuzzyPattern } from './fuzzy';
