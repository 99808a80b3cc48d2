/**
 * Record fingerprints used for duplicate detection.
 */

import crypto from 'crypto';
import { normalizeProviderName } from '../templates/loader';

export type DuplicateKeyKind = 'semantic' | 'content';

export interface Fingerprint {
  kind: DuplicateKeyKind;
  value: string;
}

function sha256(data: string | Uint8Array): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/** sha256 of the source document bytes */
export function contentHash(bytes: Uint8Array): string {
  return sha256(bytes);
}

/** Source reference for a document submitted without one. */
export function sourceReferenceFor(bytes: Uint8Array): string {
  return `sha256:${contentHash(bytes)}`;
}

export interface SemanticKeyFields {
  provider_name: string;
  invoice_date: string | null;
  total_amount: number | null;
}

/**
 * sha256 over provider, ISO invoice date and amount to two decimals.
 * Null when the date or amount is missing: such records cannot be compared.
 */
export function semanticFingerprint(fields: SemanticKeyFields): string | null {
  if (fields.invoice_date === null || fields.total_amount === null) return null;
  const key = [
    normalizeProviderName(fields.provider_name),
    fields.invoice_date,
    fields.total_amount.toFixed(2),
  ].join('|');
  return sha256(key);
}
