/**
 * Snapshot Verification
 *
 * Compares a baseline snapshot against a post-capture snapshot. The overall
 * verdict is digest equality; the per-record checks pair records strictly by
 * position. Baseline and post must therefore list records in the same order:
 * a reordered snapshot fails the ordered digest and misaligns the checks.
 * Baseline records whose id no longer appears in the post snapshot are
 * reported as missing and left out of the pairing.
 */

import { canonicalize, digest, digestCriticalFields, digestUnordered } from './digest.js';
import type {
  CompareOptions,
  CriticalField,
  FieldChange,
  MetadataRecord,
  MissingRecord,
  RecordCheck,
  VerificationVerdict,
} from './types.js';
import { CRITICAL_FIELDS, CRITICAL_FIELD_KEYS } from './types.js';

/**
 * Compare two snapshots.
 *
 * @param before - Baseline records, in capture order
 * @param after - Post-capture records, in the same order
 */
export function compareSnapshots(
  before: ReadonlyArray<MetadataRecord>,
  after: ReadonlyArray<MetadataRecord>,
  options: CompareOptions = {},
): VerificationVerdict {
  const digestMode = options.digestMode ?? 'ordered';
  const snapshotDigest = digestMode === 'unordered' ? digestUnordered : digest;

  const beforeDigest = snapshotDigest(before);
  const afterDigest = snapshotDigest(after);

  const missing = findMissing(before, after);
  const missingIds = new Set(missing.map((record) => record.recordId));
  const present =
    missing.length === 0
      ? before
      : before.filter((record) => {
          const id = readIdentity(record.id);
          return id === null || !missingIds.has(id);
        });

  const records: RecordCheck[] = [];
  const paired = Math.min(present.length, after.length);
  for (let i = 0; i < paired; i++) {
    records.push(checkRecord(present[i], after[i]));
  }

  return {
    beforeDigest,
    afterDigest,
    match: beforeDigest === afterDigest,
    digestMode,
    totalRecords: before.length,
    records,
    violations: records.filter((check) => !check.timestampsMatch),
    missing,
  };
}

function findMissing(
  before: ReadonlyArray<MetadataRecord>,
  after: ReadonlyArray<MetadataRecord>,
): MissingRecord[] {
  const afterIds = new Set<string>();
  for (const record of after) {
    const id = readIdentity(record.id);
    if (id !== null) afterIds.add(id);
  }

  const missing: MissingRecord[] = [];
  for (const record of before) {
    const id = readIdentity(record.id);
    if (id !== null && !afterIds.has(id)) {
      missing.push({ recordId: id, recordName: readIdentity(record.name) });
    }
  }
  return missing;
}

/**
 * Compare the critical timestamps of one record pair.
 * Identity is taken from the baseline record.
 */
export function checkRecord(before: MetadataRecord, after: MetadataRecord): RecordCheck {
  const changes: Partial<Record<CriticalField, FieldChange>> = {};

  for (const label of CRITICAL_FIELD_KEYS) {
    const field = CRITICAL_FIELDS[label];
    const previous = before[field] ?? null;
    const current = after[field] ?? null;
    if (canonicalize(previous) !== canonicalize(current)) {
      changes[label] = { before: previous, after: current };
    }
  }

  return {
    recordId: readIdentity(before.id),
    recordName: readIdentity(before.name),
    beforeDigest: digestCriticalFields(before),
    afterDigest: digestCriticalFields(after),
    timestampsMatch: Object.keys(changes).length === 0,
    changes,
  };
}

function readIdentity(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}
