export {
  contentHash,
  semanticFingerprint,
  sourceReferenceFor,
  type DuplicateKeyKind,
  type Fingerprint,
  type SemanticKeyFields,
} from './fingerprint';
export {
  DuplicateGuard,
  DEFAULT_DUPLICATE_KEYS,
  fingerprintsOf,
  type ExistsOptions,
  type FingerprintLookup,
  type FingerprintedRecord,
  type GuardDecision,
} from './duplicate-guard';
