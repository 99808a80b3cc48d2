/**
 * Validator & Confidence Scorer
 *
 * Normalizes raw captures per the template's post-processing rules, checks
 * each value against its field rule and the template's cross-field checks,
 * and scores the result.
 *
 *   confidence = 0.6 x required_present / required_total
 *              + 0.4 x within_rule / fields_with_rule
 *
 * scaled by text reliability when the text was degraded. Only fields that
 * produced a value count towards fields_with_rule; a missing field is
 * already penalised through required_present.
 */

import { toIsoDate } from '../templates/date-format';
import type { InvoiceTemplate } from '../templates/types';
import type { ExtractionResult } from '../extractors/field-extractor';
import type { FieldIssue, FieldResult, FieldValue, RawField } from '../types';
import { runCrossChecks } from './cross-checks';
import { checkRule, normalizeField } from './normalize';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

const REQUIRED_WEIGHT = 0.6;
const RULE_WEIGHT = 0.4;

export type ScoredStatus = 'validated' | 'needs_review' | 'failed';

export interface TextQuality {
  reliability: number;
  degraded: boolean;
}

export interface ValidatorOptions {
  confidenceThreshold?: number;
  text?: TextQuality;
}

export interface ConfidenceInputs {
  requiredPresent: number;
  requiredTotal: number;
  withinRule: number;
  fieldsWithRule: number;
  /** Set when the text was degraded */
  reliability: number | null;
}

/** Fixed record columns filled from template fields of the same name. */
export interface RecordColumns {
  invoice_date: string | null;
  total_amount: number | null;
  usage_quantity: number | null;
  usage_rate: number | null;
  service_charge: number | null;
  billing_period_start: string | null;
  billing_period_end: string | null;
  account_number: string | null;
  extra_fields: Record<string, FieldValue | null>;
}

export interface ScoredExtraction {
  fields: FieldResult[];
  issues: FieldIssue[];
  confidence: number;
  status: ScoredStatus;
  inputs: ConfidenceInputs;
  columns: RecordColumns;
}

const DATE_COLUMNS = ['invoice_date', 'billing_period_start', 'billing_period_end'] as const;
const NUMBER_COLUMNS = ['total_amount', 'usage_quantity', 'usage_rate', 'service_charge'] as const;

type DateColumn = (typeof DATE_COLUMNS)[number];
type NumberColumn = (typeof NUMBER_COLUMNS)[number];

function isDateColumn(name: string): name is DateColumn {
  return (DATE_COLUMNS as readonly string[]).includes(name);
}

function isNumberColumn(name: string): name is NumberColumn {
  return (NUMBER_COLUMNS as readonly string[]).includes(name);
}

export function computeConfidence(inputs: ConfidenceInputs): number {
  const requiredRatio = inputs.requiredTotal === 0 ? 1 : inputs.requiredPresent / inputs.requiredTotal;
  const ruleRatio = inputs.fieldsWithRule === 0 ? 1 : inputs.withinRule / inputs.fieldsWithRule;

  let score = REQUIRED_WEIGHT * requiredRatio + RULE_WEIGHT * ruleRatio;
  if (inputs.reliability !== null) {
    score *= inputs.reliability;
  }
  return Math.round(Math.min(1, Math.max(0, score)) * 10000) / 10000;
}

function emptyColumns(): RecordColumns {
  return {
    invoice_date: null,
    total_amount: null,
    usage_quantity: null,
    usage_rate: null,
    service_charge: null,
    billing_period_start: null,
    billing_period_end: null,
    account_number: null,
    extra_fields: {},
  };
}

export function validateExtraction(
  extraction: ExtractionResult,
  template: InvoiceTemplate,
  options: ValidatorOptions = {}
): ScoredExtraction {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const issues: FieldIssue[] = [...extraction.issues];
  const fields: FieldResult[] = [];
  const columns = emptyColumns();
  const dates = new Map<string, Date>();

  for (const spec of template.fields) {
    const raw: RawField = extraction.fields.find((f) => f.field === spec.name) ?? {
      field: spec.name,
      matched_text: null,
      raw: null,
      method: 'none',
      offset: null,
    };

    let normalized: FieldValue | null = null;
    let valid = false;

    if (raw.raw !== null) {
      const result = normalizeField(spec, raw.raw, template);
      if (result.ok) {
        normalized = result.value;
        if (result.date) dates.set(spec.name, result.date);
        const problem = checkRule(spec.name, spec.rule, result.value);
        valid = problem === null;
        if (problem) issues.push({ code: 'ValidationFailure', field: spec.name, message: problem });
      } else {
        issues.push({ code: 'ValidationFailure', field: spec.name, message: result.reason });
      }
    }

    fields.push({
      ...raw,
      normalized,
      valid,
      has_rule: spec.rule !== null,
      required: spec.required,
    });

    if (isDateColumn(spec.name)) {
      const date = dates.get(spec.name);
      columns[spec.name] = date ? toIsoDate(date) : null;
    } else if (isNumberColumn(spec.name)) {
      columns[spec.name] = typeof normalized === 'number' ? normalized : null;
    } else if (spec.name === 'account_number') {
      columns.account_number = normalized === null ? null : String(normalized);
    } else {
      columns.extra_fields[spec.name] = normalized;
    }
  }

  issues.push(
    ...runCrossChecks(template.validationRules, {
      serviceType: template.serviceType,
      totalAmount: columns.total_amount,
      usageQuantity: columns.usage_quantity,
      usageRate: columns.usage_rate,
      serviceCharge: columns.service_charge,
      periodStart: dates.get('billing_period_start') ?? null,
      periodEnd: dates.get('billing_period_end') ?? null,
    })
  );

  const required = fields.filter((f) => f.required);
  const ruled = fields.filter((f) => f.has_rule && f.raw !== null);
  const inputs: ConfidenceInputs = {
    requiredPresent: required.filter((f) => f.normalized !== null).length,
    requiredTotal: required.length,
    withinRule: ruled.filter((f) => f.valid).length,
    fieldsWithRule: ruled.length,
    reliability: options.text?.degraded ? options.text.reliability : null,
  };
  const confidence = computeConfidence(inputs);

  let status: ScoredStatus;
  if (fields.every((f) => f.normalized === null)) {
    status = 'failed';
  } else if (
    confidence >= threshold &&
    inputs.requiredPresent === inputs.requiredTotal &&
    !issues.some((i) => i.code === 'ValidationFailure')
  ) {
    status = 'validated';
  } else {
    status = 'needs_review';
  }

  return { fields, issues, confidence, status, inputs, columns };
}
