/**
 * JSON Schema Validation
 *
 * Structural validation of template documents and ingest requests using
 * Ajv (draft 2020-12).
 * Semantic checks (pattern compilation, date formats) live in the template loader.
 */

import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import templateSchema from '../contracts/template.schema.json';
import batchRequestSchema from '../contracts/batch-request.schema.json';
import type { TemplateDocument } from './templates/types';
import type { BatchRequest } from './types';

const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const validateTemplate = ajv.compile<TemplateDocument>(templateSchema);
const validateBatch = ajv.compile<BatchRequest>(batchRequestSchema);

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a parsed template file against template.schema.json.
 * Narrows the value to TemplateDocument on success.
 */
export function isTemplateDocument(data: unknown): data is TemplateDocument {
  return validateTemplate(data);
}

/**
 * Validate a template document and report every structural problem.
 */
export function validateTemplateDocument(data: unknown): ValidationResult {
  if (validateTemplate(data)) {
    return { valid: true };
  }

  return { valid: false, errors: describeSchemaErrors(validateTemplate) };
}

export function isBatchRequest(data: unknown): data is BatchRequest {
  return validateBatch(data);
}

export function validateBatchRequest(data: unknown): ValidationResult {
  if (validateBatch(data)) {
    return { valid: true };
  }

  return { valid: false, errors: describeSchemaErrors(validateBatch) };
}

/**
 * Compile an ad-hoc schema (e.g. a structured response body) on the shared instance.
 */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/** Render Ajv errors the same way for every schema. */
export function describeSchemaErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

export const schemas = {
  template: templateSchema,
  batchRequest: batchRequestSchema,
};
