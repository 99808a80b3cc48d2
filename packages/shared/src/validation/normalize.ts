/**
 * Post-processing of cleaned captures into typed values.
 */

import { formatDateWithFormat, parseDateWithFormat } from '../templates/date-format';
import type { FieldRule, FieldSpec, InvoiceTemplate } from '../templates/types';
import type { FieldValue } from '../types';

/** Fields the template-level amount multiplier applies to. */
export const AMOUNT_FIELDS: ReadonlySet<string> = new Set(['total_amount', 'service_charge']);

/** Fields rounded to the template's decimal places. */
export const ROUNDED_FIELDS: ReadonlySet<string> = new Set([
  'total_amount',
  'usage_rate',
  'service_charge',
]);

const DECIMAL = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;
const INTEGER = /^-?\d+$/;

export type Normalized =
  | { ok: true; value: FieldValue; date: Date | null }
  | { ok: false; reason: string };

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function normalizeField(spec: FieldSpec, raw: string, template: InvoiceTemplate): Normalized {
  switch (spec.type) {
    case 'decimal': {
      if (!DECIMAL.test(raw)) {
        return { ok: false, reason: `"${raw}" is not a decimal number` };
      }
      let value = parseFloat(raw) * spec.multiplier;
      if (AMOUNT_FIELDS.has(spec.name)) value *= template.amountMultiplier;
      if (ROUNDED_FIELDS.has(spec.name)) value = roundTo(value, template.roundDecimals);
      return { ok: true, value, date: null };
    }

    case 'integer': {
      if (!INTEGER.test(raw)) {
        return { ok: false, reason: `"${raw}" is not an integer` };
      }
      return { ok: true, value: parseInt(raw, 10) * spec.multiplier, date: null };
    }

    case 'date': {
      const format = spec.inputFormat ?? '%Y-%m-%d';
      const date = parseDateWithFormat(raw, format);
      if (!date) {
        return { ok: false, reason: `"${raw}" does not match date format ${format}` };
      }
      return { ok: true, value: formatDateWithFormat(date, template.outputDateFormat), date };
    }

    case 'string':
      return { ok: true, value: raw, date: null };
  }
}

/**
 * Check a normalized value against its field rule. Returns a diagnostic when
 * the value is outside the rule, otherwise null.
 */
export function checkRule(name: string, rule: FieldRule | null, value: FieldValue): string | null {
  if (!rule || rule.kind === 'date_format') return null;
  if (typeof value !== 'number') return `${name} is not numeric`;
  if (rule.min !== null && value < rule.min) {
    return `${name} ${value} is below the minimum ${rule.min}`;
  }
  if (rule.max !== null && value > rule.max) {
    return `${name} ${value} is above the maximum ${rule.max}`;
  }
  return null;
}
