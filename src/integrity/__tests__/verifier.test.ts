/**
 * Snapshot Verification Tests
 */

import { describe, it, expect } from 'vitest';
import { checkRecord, compareSnapshots, digest, digestUnordered } from '../index.js';
import type { MetadataRecord } from '../index.js';

function record(id: string, overrides: MetadataRecord = {}): MetadataRecord {
  return {
    id,
    name: `${id}.docx`,
    createdTime: '2024-01-01T08:00:00.000Z',
    modifiedTime: '2024-02-01T08:00:00.000Z',
    viewedByMeTime: '2024-03-01T08:00:00.000Z',
    size: '2048',
    ...overrides,
  };
}

const before = [record('a'), record('b'), record('c')];

describe('compareSnapshots', () => {
  it('should match a snapshot against itself', () => {
    const verdict = compareSnapshots(before, before);

    expect(verdict.match).toBe(true);
    expect(verdict.beforeDigest).toBe(digest(before));
    expect(verdict.afterDigest).toBe(verdict.beforeDigest);
    expect(verdict.digestMode).toBe('ordered');
    expect(verdict.totalRecords).toBe(3);
    expect(verdict.records).toHaveLength(3);
    expect(verdict.violations).toEqual([]);
    expect(verdict.missing).toEqual([]);
  });

  it('should report one changed modifiedTime as one violation', () => {
    const after = [record('a'), record('b', { modifiedTime: '2024-09-09T09:09:09.000Z' }), record('c')];
    const verdict = compareSnapshots(before, after);

    expect(verdict.match).toBe(false);
    expect(verdict.violations).toHaveLength(1);
    expect(verdict.violations[0].recordId).toBe('b');
    expect(verdict.violations[0].recordName).toBe('b.docx');
    expect(verdict.violations[0].changes).toEqual({
      modified: { before: '2024-02-01T08:00:00.000Z', after: '2024-09-09T09:09:09.000Z' },
    });
  });

  it('should fail without violations when only other fields change', () => {
    const after = [record('a', { size: '4096' }), record('b'), record('c')];
    const verdict = compareSnapshots(before, after);

    expect(verdict.match).toBe(false);
    expect(verdict.violations).toEqual([]);
    expect(verdict.records.every((check) => check.timestampsMatch)).toBe(true);
  });

  it('should fail a reordered snapshot in ordered mode', () => {
    const reordered = [before[1], before[0], before[2]];
    const verdict = compareSnapshots(before, reordered);

    expect(verdict.match).toBe(false);
    // position pairing now compares different files
    expect(verdict.violations).toEqual([]);
    expect(verdict.records[0].recordId).toBe('a');
  });

  it('should pass a reordered snapshot in unordered mode', () => {
    const reordered = [before[2], before[0], before[1]];
    const verdict = compareSnapshots(before, reordered, { digestMode: 'unordered' });

    expect(verdict.match).toBe(true);
    expect(verdict.digestMode).toBe('unordered');
    expect(verdict.beforeDigest).toBe(digestUnordered(before));
  });

  it('should pair only positions present in both snapshots', () => {
    const verdict = compareSnapshots(before, before.slice(0, 2));

    expect(verdict.match).toBe(false);
    expect(verdict.totalRecords).toBe(3);
    expect(verdict.records).toHaveLength(2);
  });

  it('should report vanished records and pair the rest', () => {
    const verdict = compareSnapshots(before, [before[0], before[2]]);

    expect(verdict.match).toBe(false);
    expect(verdict.missing).toEqual([{ recordId: 'b', recordName: 'b.docx' }]);
    expect(verdict.records.map((check) => check.recordId)).toEqual(['a', 'c']);
    expect(verdict.violations).toEqual([]);
  });

  it('should handle empty snapshots', () => {
    const verdict = compareSnapshots([], []);
    expect(verdict.match).toBe(true);
    expect(verdict.records).toEqual([]);
  });
});

describe('checkRecord', () => {
  it('should treat an absent field and null as equal', () => {
    const check = checkRecord(record('a', { viewedByMeTime: null }), omitViewed(record('a')));
    expect(check.timestampsMatch).toBe(true);
    expect(check.beforeDigest).toBe(check.afterDigest);
  });

  it('should report a field that appears', () => {
    const check = checkRecord(omitViewed(record('a')), record('a'));
    expect(check.changes).toEqual({
      viewed: { before: null, after: '2024-03-01T08:00:00.000Z' },
    });
  });

  it('should report every changed timestamp', () => {
    const check = checkRecord(
      record('a'),
      record('a', { createdTime: '2025-01-01T00:00:00.000Z', viewedByMeTime: '2025-01-02T00:00:00.000Z' }),
    );
    expect(Object.keys(check.changes)).toEqual(['created', 'viewed']);
    expect(check.timestampsMatch).toBe(false);
  });

  it('should read numeric ids and tolerate missing names', () => {
    const check = checkRecord({ id: 17 }, { id: 17 });
    expect(check.recordId).toBe('17');
    expect(check.recordName).toBeNull();
  });
});

function omitViewed(value: MetadataRecord): MetadataRecord {
  const { viewedByMeTime: _viewed, ...rest } = value;
  return rest;
}
