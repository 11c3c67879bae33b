/**
 * Capture Session Types
 *
 * A session moves NEW → BASELINE_CAPTURED → POST_CAPTURED → VERIFIED.
 * Each state carries exactly the data captured so far. VERIFIED is terminal:
 * a failed verification is surfaced, never retried.
 */

import type { MetadataRecord, VerificationVerdict } from '../integrity/types.js';

export type SessionState = 'NEW' | 'BASELINE_CAPTURED' | 'POST_CAPTURED' | 'VERIFIED';

export interface SnapshotCapture {
  /** ISO 8601 capture time */
  capturedAt: string;
  /** Ordered digest of the records */
  digest: string;
  records: MetadataRecord[];
}

interface SessionBase {
  /** YYYYMMDD_HHMMSS of the session start, or a caller-chosen id */
  id: string;
  createdAt: string;
}

export interface NewSession extends SessionBase {
  state: 'NEW';
}

export interface BaselineSession extends SessionBase {
  state: 'BASELINE_CAPTURED';
  baseline: SnapshotCapture;
}

export interface PostSession extends SessionBase {
  state: 'POST_CAPTURED';
  baseline: SnapshotCapture;
  post: SnapshotCapture;
}

export interface VerifiedSession extends SessionBase {
  state: 'VERIFIED';
  baseline: SnapshotCapture;
  post: SnapshotCapture;
  verdict: VerificationVerdict;
  verifiedAt: string;
  outcome: 'pass' | 'fail';
}

export type CaptureSession = NewSession | BaselineSession | PostSession | VerifiedSession;

// ─── Session files ───────────────────────────────────────────

export interface SessionPaths {
  baseline: string;
  post: string;
  verification: string;
  attestation: string;
  needsScreenshotsJson: string;
  needsScreenshotsText: string;
  screenshotQueue: string;
}
