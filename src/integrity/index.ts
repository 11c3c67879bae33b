/**
 * Metadata Integrity
 *
 * Proves that documenting a set of files did not alter their metadata:
 * baseline digest → post digest → compare → attestation.
 */

export type {
  MetadataRecord,
  CriticalField,
  DigestMode,
  FieldChange,
  RecordCheck,
  MissingRecord,
  VerificationVerdict,
  CompareOptions,
  AttestationContext,
} from './types.js';
export {
  CRITICAL_FIELDS,
  CRITICAL_FIELD_KEYS,
  CRITICAL_FIELD_LABELS,
  HASH_ALGORITHM,
} from './types.js';

export { canonicalize, digest, digestUnordered, digestCriticalFields } from './digest.js';
export { compareSnapshots, checkRecord } from './verifier.js';
export { renderAttestation, PASS_MARKER, FAIL_MARKER } from './attestation.js';
