/**
 * Duplicate Guard
 *
 * Optimistic pre-check before persistence. The store's unique constraints
 * remain the authority: two runs can both pass this check, and the loser
 * learns it is a duplicate from persist().
 */

import { logger } from '../logger';
import type { DuplicateKeyKind, Fingerprint } from './fingerprint';

export interface ExistsOptions {
  /** Ignore records stored under this source reference (reprocessing) */
  excludeSourceReference?: string;
}

export interface FingerprintLookup {
  exists(fingerprint: Fingerprint, options?: ExistsOptions): Promise<boolean>;
}

export interface FingerprintedRecord {
  source_reference: string;
  semantic_fingerprint: string | null;
  content_hash: string;
}

export type GuardDecision =
  | { status: 'ready' }
  | { status: 'duplicate'; level: DuplicateKeyKind; fingerprint: string };

export const DEFAULT_DUPLICATE_KEYS: readonly DuplicateKeyKind[] = ['semantic', 'content'];

export function fingerprintsOf(
  record: FingerprintedRecord,
  keys: readonly DuplicateKeyKind[]
): Fingerprint[] {
  const fingerprints: Fingerprint[] = [];
  // Content first: an exact resubmission is the common case
  if (keys.includes('content')) {
    fingerprints.push({ kind: 'content', value: record.content_hash });
  }
  if (keys.includes('semantic') && record.semantic_fingerprint !== null) {
    fingerprints.push({ kind: 'semantic', value: record.semantic_fingerprint });
  }
  return fingerprints;
}

export class DuplicateGuard {
  constructor(
    private readonly lookup: FingerprintLookup,
    readonly keys: readonly DuplicateKeyKind[] = DEFAULT_DUPLICATE_KEYS
  ) {}

  async check(record: FingerprintedRecord, options: ExistsOptions = {}): Promise<GuardDecision> {
    for (const fingerprint of fingerprintsOf(record, this.keys)) {
      if (await this.lookup.exists(fingerprint, options)) {
        logger.info('Duplicate detected', {
          level: fingerprint.kind,
          fingerprint: fingerprint.value,
        });
        return { status: 'duplicate', level: fingerprint.kind, fingerprint: fingerprint.value };
      }
    }
    return { status: 'ready' };
  }
}
