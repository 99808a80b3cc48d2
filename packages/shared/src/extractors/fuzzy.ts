/**
 * Generic patterns tried for a required field that the template's own
 * patterns missed. Matches are flagged so reviewers can tell them apart.
 */

import { PATTERN_FLAGS } from '../templates/loader';

export const FUZZY_PATTERNS: Readonly<Record<string, readonly RegExp[]>> = {
  total_amount: [
    new RegExp(
      String.raw`(?:total\s+(?:amount\s+)?due|amount\s+due|balance\s+due|amount\s+payable|total)\b[^\d\n$]{0,30}([A-Z]{0,3}\$?\s?[0-9][0-9,]*\.[0-9]{2})`,
      PATTERN_FLAGS
    ),
  ],
  invoice_date: [
    new RegExp(
      String.raw`(?:invoice|issue|bill|statement)\s+date\b[^\d\n]{0,10}(\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}|\d{1,2}\s+[A-Za-z]{3,9}\s+\d{4})`,
      PATTERN_FLAGS
    ),
  ],
  usage_quantity: [
    new RegExp(String.raw`([0-9][0-9,]*(?:\.[0-9]+)?)\s*(?:kWh|MJ|kL)\b`, PATTERN_FLAGS),
  ],
};

export function hasFuzzyPattern(field: string): boolean {
  return Object.prototype.hasOwnProperty.call(FUZZY_PATTERNS, field);
}
