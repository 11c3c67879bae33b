/**
 * Canonical Digests
 *
 * Deterministic SHA-256 fingerprints of metadata snapshots. Object keys are
 * sorted at every level; list order is significant.
 */

import { createHash } from 'node:crypto';
import type { MetadataRecord } from './types.js';
import { CRITICAL_FIELDS } from './types.js';

function sha256(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Serialize a JSON-like value with sorted keys and no insignificant
 * whitespace. `undefined` members are dropped and non-finite numbers become
 * `null`, as `JSON.stringify` does.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return `[${items.map((item) => canonicalize(item)).join(',')}]`;
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? JSON.stringify(value) : 'null';
    case 'bigint':
      return value.toString();
    case 'object': {
      const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined && typeof v !== 'function' && typeof v !== 'symbol')
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
    }
    default:
      return 'null';
  }
}

/**
 * Digest a record or an ordered list of records.
 */
export function digest(value: MetadataRecord | ReadonlyArray<MetadataRecord>): string {
  return sha256(canonicalize(value));
}

/**
 * Digest a snapshot without regard to record order.
 */
export function digestUnordered(records: ReadonlyArray<MetadataRecord>): string {
  const perRecord = records.map((record) => digest(record)).sort();
  return sha256(perRecord.join('\n'));
}

/**
 * Digest of a record's identity and critical timestamps only.
 * Absent fields digest as `null`.
 */
export function digestCriticalFields(record: MetadataRecord): string {
  return sha256(
    canonicalize({
      id: record.id ?? null,
      name: record.name ?? null,
      [CRITICAL_FIELDS.created]: record[CRITICAL_FIELDS.created] ?? null,
      [CRITICAL_FIELDS.modified]: record[CRITICAL_FIELDS.modified] ?? null,
      [CRITICAL_FIELDS.viewed]: record[CRITICAL_FIELDS.viewed] ?? null,
    }),
  );
}
