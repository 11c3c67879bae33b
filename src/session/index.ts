/**
 * Capture Sessions
 *
 * Baseline capture → documentation → post capture → verification,
 * with the session passed explicitly as a value and stored as flat files.
 */

export type {
  SessionState,
  SnapshotCapture,
  NewSession,
  BaselineSession,
  PostSession,
  VerifiedSession,
  CaptureSession,
  SessionPaths,
} from './types.js';

export {
  SessionIdSchema,
  parseSessionId,
  formatSessionId,
  createSession,
  recordBaseline,
  recordPost,
  verifySession,
  baselineIds,
} from './session.js';

export {
  SessionStore,
  readSnapshotFile,
  assertRecordedDigest,
  verdictToJson,
} from './store.js';
export type { SessionStoreOptions, SnapshotFile } from './store.js';
