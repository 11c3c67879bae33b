/**
 * Metadata Integrity Types
 */

import type { JsonObject } from '../types.js';

/** One file's captured state at one point in time. */
export type MetadataRecord = JsonObject;

/**
 * Timestamp fields checked record by record, keyed by report label.
 */
export const CRITICAL_FIELDS = {
  created: 'createdTime',
  modified: 'modifiedTime',
  viewed: 'viewedByMeTime',
} as const;

export type CriticalField = keyof typeof CRITICAL_FIELDS;

export const CRITICAL_FIELD_KEYS: readonly CriticalField[] = ['created', 'modified', 'viewed'];

/** Human-readable names used in attestations. */
export const CRITICAL_FIELD_LABELS: Record<CriticalField, string> = {
  created: 'Created Time',
  modified: 'Modified Time',
  viewed: 'Viewed By Me Time (Last Opened)',
};

/**
 * `ordered` digests the snapshot as a list (reordering changes the digest).
 * `unordered` digests the sorted per-record digests.
 */
export type DigestMode = 'ordered' | 'unordered';

export const HASH_ALGORITHM = 'SHA-256';

export interface FieldChange {
  before: unknown;
  after: unknown;
}

/**
 * Position-paired comparison of one record.
 */
export interface RecordCheck {
  recordId: string | null;
  recordName: string | null;
  /** Digest of the record's identity and critical timestamps */
  beforeDigest: string;
  afterDigest: string;
  timestampsMatch: boolean;
  changes: Partial<Record<CriticalField, FieldChange>>;
}

/** A baseline record whose id is absent from the post snapshot. */
export interface MissingRecord {
  recordId: string;
  recordName: string | null;
}

export interface VerificationVerdict {
  beforeDigest: string;
  afterDigest: string;
  /** True iff the two snapshot digests are equal */
  match: boolean;
  digestMode: DigestMode;
  /** Records in the baseline snapshot */
  totalRecords: number;
  /** One check per position present in both snapshots, missing records skipped */
  records: RecordCheck[];
  /** Checks with at least one changed critical timestamp */
  violations: RecordCheck[];
  /** Baseline records that vanished before the post capture */
  missing: MissingRecord[];
}

export interface CompareOptions {
  digestMode?: DigestMode;
}

export interface AttestationContext {
  sessionId?: string;
  /** ISO 8601 time of the verification */
  verifiedAt?: string;
}
