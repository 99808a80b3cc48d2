/**
 * Invoice Template Types
 *
 * `TemplateDocument` mirrors the JSON files under config/templates exactly.
 * `InvoiceTemplate` is the compiled, frozen form the pipeline works with.
 */

import type { ServiceType } from '../types';

// ============================================================================
// On-disk format
// ============================================================================

export type FieldType = 'decimal' | 'integer' | 'date' | 'string';

export interface FieldPatternDocument {
  regex: string[];
  type: FieldType;
  required?: boolean;
  /** strftime-style format for date fields, e.g. "%d/%m/%Y" */
  format?: string;
  validation?: {
    min?: number;
    max?: number;
  };
  /** Unit conversion applied to numeric values, e.g. 1000 for MWh -> kWh */
  multiplier?: number;
}

export interface ValidationRulesDocument {
  amount_usage_correlation?: boolean;
  date_sequence_check?: boolean;
  reasonable_rates_check?: boolean;
}

export interface PostProcessingDocument {
  amount_multiplier?: number;
  round_decimals?: number;
  date_format?: string;
  validation_rules?: ValidationRulesDocument;
}

export interface TemplateDocument {
  provider: string;
  service_type: ServiceType;
  version?: string;
  aliases?: string[];
  patterns: Record<string, FieldPatternDocument>;
  post_processing?: PostProcessingDocument;
  ocr_settings?: Record<string, unknown>;
}

// ============================================================================
// Compiled form
// ============================================================================

export type FieldRule =
  | { kind: 'range'; min: number | null; max: number | null }
  | { kind: 'date_format'; format: string };

export interface FieldSpec {
  readonly name: string;
  readonly type: FieldType;
  readonly required: boolean;
  readonly patterns: readonly RegExp[];
  readonly rule: FieldRule | null;
  /** Date format of the captured text (date fields only) */
  readonly inputFormat: string | null;
  readonly multiplier: number;
}

export interface InvoiceTemplate {
  readonly key: string;
  readonly provider: string;
  readonly serviceType: ServiceType;
  readonly version: string;
  readonly aliases: readonly string[];
  /** Fields in declared order */
  readonly fields: readonly FieldSpec[];
  readonly amountMultiplier: number;
  readonly roundDecimals: number;
  readonly outputDateFormat: string;
  readonly validationRules: Readonly<Required<ValidationRulesDocument>>;
  /** The document the template was compiled from */
  readonly source: Readonly<TemplateDocument>;
}

export interface TemplateInfo {
  key: string;
  provider: string;
  service_type: ServiceType;
  version: string;
  fields: string[];
  required_fields: string[];
  optional_fields: string[];
  has_validation: boolean;
}
