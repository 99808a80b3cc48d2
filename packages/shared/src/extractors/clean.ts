/**
 * Value cleaning applied to captures before normalization.
 */

import type { FieldType } from '../templates/types';

// Currency codes written before a dollar sign (A$, AU$, US$) and common symbols
const CURRENCY = /[A-Z]{0,3}\$|[€£¥]/g;

/**
 * Strip currency symbols, thousands separators and whitespace from a numeric capture.
 */
export function cleanNumeric(raw: string): string {
  return raw.replace(CURRENCY, '').replace(/,/g, '').replace(/\s+/g, '');
}

export function cleanText(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

export function cleanCapture(raw: string, type: FieldType): string {
  return type === 'decimal' || type === 'integer' ? cleanNumeric(raw) : cleanText(raw);
}
