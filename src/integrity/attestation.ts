/**
 * Integrity Attestations
 *
 * Renders a verification verdict as a printable statement for the evidence
 * file. Pure string construction; writing it out is the caller's job.
 */

import { canonicalize } from './digest.js';
import type { AttestationContext, RecordCheck, VerificationVerdict } from './types.js';
import { CRITICAL_FIELD_KEYS, CRITICAL_FIELD_LABELS, HASH_ALGORITHM } from './types.js';

export const PASS_MARKER = 'RESULT: [PASS] HASHES MATCH';
export const FAIL_MARKER = 'RESULT: [FAIL] HASHES DO NOT MATCH';

const RULE = '='.repeat(70);

/**
 * Render the attestation text for a verdict.
 */
export function renderAttestation(
  verdict: VerificationVerdict,
  context: AttestationContext = {},
): string {
  const lines: string[] = [
    verdict.match ? 'METADATA INTEGRITY ATTESTATION' : 'METADATA INTEGRITY VIOLATION',
    RULE,
    '',
  ];

  if (context.sessionId) lines.push(`Session: ${context.sessionId}`);
  if (context.verifiedAt) lines.push(`Verification Timestamp: ${context.verifiedAt}`);
  lines.push(
    `Total Files Examined: ${verdict.totalRecords}`,
    `Digest Mode: ${verdict.digestMode}`,
    '',
    'METADATA HASH VERIFICATION:',
    `  Before Hash (${HASH_ALGORITHM}): ${verdict.beforeDigest}`,
    `  After Hash (${HASH_ALGORITHM}):  ${verdict.afterDigest}`,
    '',
  );

  if (verdict.match) {
    lines.push(
      PASS_MARKER,
      '',
      'ATTESTATION:',
      'Cryptographic hash verification confirms no modifications were made to',
      'file metadata during the documentation process. The hashes of all file',
      'metadata remained identical before and after capture.',
      '',
      'Critical timestamps verified unaltered:',
      ...CRITICAL_FIELD_KEYS.map((field) => `- ${CRITICAL_FIELD_LABELS[field]}`),
    );
  } else {
    lines.push(FAIL_MARKER, '');
    if (verdict.missing.length > 0) {
      lines.push('WARNING: FILES MISSING FROM POST CAPTURE', '');
      lines.push('The following baselined files were not found:');
      verdict.missing.forEach((record, i) => {
        lines.push(`  ${i + 1}. ${record.recordName ?? '(unnamed)'} (id: ${record.recordId})`);
      });
      if (verdict.violations.length > 0) lines.push('');
    }
    if (verdict.violations.length > 0) {
      lines.push('WARNING: TIMESTAMP MODIFICATIONS DETECTED', '');
      lines.push('The following files had timestamp changes:');
      verdict.violations.forEach((check, i) => {
        lines.push(...describeViolation(check, i + 1));
      });
    } else if (verdict.missing.length === 0) {
      lines.push(
        'WARNING: METADATA CHANGED',
        '',
        'No critical timestamp changed between paired records; other metadata',
        'fields or the record order differ between snapshots.',
      );
    }
    lines.push(
      '',
      'The documentation process may have altered evidence.',
      'Manual review and remediation required.',
    );
  }

  lines.push('', RULE);
  return lines.join('\n') + '\n';
}

function describeViolation(check: RecordCheck, ordinal: number): string[] {
  const name = check.recordName ?? '(unnamed)';
  const id = check.recordId ? ` (id: ${check.recordId})` : '';
  const lines = [`  ${ordinal}. ${name}${id}`];

  for (const field of CRITICAL_FIELD_KEYS) {
    const change = check.changes[field];
    if (!change) continue;
    lines.push(
      `     - ${CRITICAL_FIELD_LABELS[field]}: ${formatValue(change.before)} → ${formatValue(change.after)}`,
    );
  }

  return lines;
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '(none)';
  if (typeof value === 'string') return value;
  return canonicalize(value);
}
