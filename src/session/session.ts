/**
 * Capture Session Transitions
 *
 * Sessions are plain values: every transition returns a new session and
 * leaves its input untouched. Callers thread the current value through
 * their workflow instead of keeping it in shared state.
 */

import { z } from 'zod';
import { compareSnapshots, digest } from '../integrity/index.js';
import type { CompareOptions, MetadataRecord } from '../integrity/types.js';
import type {
  BaselineSession,
  CaptureSession,
  NewSession,
  PostSession,
  SnapshotCapture,
  VerifiedSession,
} from './types.js';

/** Session ids become part of file names. */
export const SessionIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Session id may only contain letters, digits, ".", "_" and "-"');

/**
 * Validate a caller-chosen session id.
 */
export function parseSessionId(value: string): string {
  const result = SessionIdSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid session id '${value}': ${result.error.issues[0].message}`);
  }
  return result.data;
}

/**
 * Format a session id from a local time: YYYYMMDD_HHMMSS.
 */
export function formatSessionId(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Start a new session.
 */
export function createSession(id?: string, now: Date = new Date()): NewSession {
  return {
    id: id === undefined ? formatSessionId(now) : parseSessionId(id),
    state: 'NEW',
    createdAt: now.toISOString(),
  };
}

/**
 * Record the baseline snapshot. Only valid on a NEW session.
 */
export function recordBaseline(
  session: CaptureSession,
  records: ReadonlyArray<MetadataRecord>,
  now: Date = new Date(),
): BaselineSession {
  if (session.state !== 'NEW') {
    throw transitionError('record baseline for', session);
  }
  return {
    id: session.id,
    createdAt: session.createdAt,
    state: 'BASELINE_CAPTURED',
    baseline: snapshot(records, now),
  };
}

/**
 * Record the post-capture snapshot. Only valid after the baseline.
 */
export function recordPost(
  session: CaptureSession,
  records: ReadonlyArray<MetadataRecord>,
  now: Date = new Date(),
): PostSession {
  if (session.state !== 'BASELINE_CAPTURED') {
    throw transitionError('record post capture for', session);
  }
  return {
    id: session.id,
    createdAt: session.createdAt,
    state: 'POST_CAPTURED',
    baseline: session.baseline,
    post: snapshot(records, now),
  };
}

/**
 * Compare baseline and post snapshots. The result is terminal.
 */
export function verifySession(
  session: CaptureSession,
  options: CompareOptions = {},
  now: Date = new Date(),
): VerifiedSession {
  if (session.state !== 'POST_CAPTURED') {
    throw transitionError('verify', session);
  }
  const verdict = compareSnapshots(session.baseline.records, session.post.records, options);
  return {
    id: session.id,
    createdAt: session.createdAt,
    state: 'VERIFIED',
    baseline: session.baseline,
    post: session.post,
    verdict,
    verifiedAt: now.toISOString(),
    outcome: verdict.match ? 'pass' : 'fail',
  };
}

/**
 * Ids of the baseline records, in capture order. Records without a string
 * id cannot be re-captured and are reported by the caller.
 */
export function baselineIds(session: BaselineSession): { ids: string[]; missing: number } {
  const ids: string[] = [];
  let missing = 0;
  for (const record of session.baseline.records) {
    if (typeof record.id === 'string' && record.id !== '') {
      ids.push(record.id);
    } else {
      missing++;
    }
  }
  return { ids, missing };
}

function snapshot(records: ReadonlyArray<MetadataRecord>, now: Date): SnapshotCapture {
  const copy = [...records];
  return {
    capturedAt: now.toISOString(),
    digest: digest(copy),
    records: copy,
  };
}

/**
 * The error every refused transition throws.
 */
export function transitionError(action: string, session: Pick<CaptureSession, 'id' | 'state'>): Error {
  return new Error(`Cannot ${action} session ${session.id} in state ${session.state}`);
}
