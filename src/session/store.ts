/**
 * Session File Store
 *
 * Persists capture sessions as flat report files in one directory:
 *
 *   session_<id>_BASELINE.json
 *   session_<id>_POST.json
 *   session_<id>_VERIFICATION.json
 *   session_<id>_ATTESTATION.txt
 *   session_<id>_NEEDS_SCREENSHOTS.json / .txt
 *   screenshot_queue_<id>.json
 *
 * Writes go through a temp file and rename so a crash never leaves a
 * half-written evidence file behind.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { digest, renderAttestation } from '../integrity/index.js';
import type { MetadataRecord, RecordCheck, VerificationVerdict } from '../integrity/types.js';
import type { CoverageReport } from '../capture/coverage.js';
import type { JsonObject } from '../types.js';
import { parseSessionId, transitionError } from './session.js';
import type {
  BaselineSession,
  PostSession,
  SessionPaths,
  SessionState,
  VerifiedSession,
} from './types.js';

const BASELINE_FILE_PATTERN = /^session_([A-Za-z0-9][A-Za-z0-9._-]*)_BASELINE\.json$/;

const RecordsSchema = z.array(z.record(z.string(), z.unknown()));

const SnapshotFileSchema = z
  .object({
    session_id: z.string(),
    capture_time: z.string(),
    total_files: z.number(),
    baseline_hash_sha256: z.string().optional(),
    post_hash_sha256: z.string().optional(),
    files: RecordsSchema,
  })
  .passthrough();

export interface SnapshotFile {
  sessionId: string;
  capturedAt: string;
  /** Hash recorded in the file when it was written */
  recordedDigest: string | null;
  records: MetadataRecord[];
}

export interface SessionStoreOptions {
  /** Directory holding the session files */
  dir: string;
}

export class SessionStore {
  readonly dir: string;

  constructor(options: SessionStoreOptions) {
    this.dir = options.dir;
  }

  /**
   * File paths used for a session id.
   */
  paths(sessionId: string): SessionPaths {
    parseSessionId(sessionId);
    const base = join(this.dir, `session_${sessionId}`);
    return {
      baseline: `${base}_BASELINE.json`,
      post: `${base}_POST.json`,
      verification: `${base}_VERIFICATION.json`,
      attestation: `${base}_ATTESTATION.txt`,
      needsScreenshotsJson: `${base}_NEEDS_SCREENSHOTS.json`,
      needsScreenshotsText: `${base}_NEEDS_SCREENSHOTS.txt`,
      screenshotQueue: join(this.dir, `screenshot_queue_${sessionId}.json`),
    };
  }

  async writeBaseline(session: BaselineSession | PostSession | VerifiedSession): Promise<string> {
    const path = this.paths(session.id).baseline;
    await this.writeJson(path, {
      session_id: session.id,
      capture_time: session.baseline.capturedAt,
      total_files: session.baseline.records.length,
      baseline_hash_sha256: session.baseline.digest,
      files: session.baseline.records,
    });
    return path;
  }

  async writePost(session: PostSession | VerifiedSession): Promise<string> {
    const path = this.paths(session.id).post;
    await this.writeJson(path, {
      session_id: session.id,
      capture_time: session.post.capturedAt,
      total_files: session.post.records.length,
      post_hash_sha256: session.post.digest,
      files: session.post.records,
    });
    return path;
  }

  /**
   * Write the verification report and the attestation text.
   */
  async writeVerification(
    session: VerifiedSession,
  ): Promise<{ verification: string; attestation: string }> {
    const paths = this.paths(session.id);

    await this.writeJson(paths.verification, {
      session_id: session.id,
      verified_at: session.verifiedAt,
      baseline_hash: session.verdict.beforeDigest,
      post_hash: session.verdict.afterDigest,
      hashes_match: session.verdict.match,
      verification_result: verdictToJson(session.verdict),
    });

    const text = renderAttestation(session.verdict, {
      sessionId: session.id,
      verifiedAt: session.verifiedAt,
    });
    await this.writeAtomic(paths.attestation, text);

    return { verification: paths.verification, attestation: paths.attestation };
  }

  /**
   * Write the screenshot coverage reports and queue for a session.
   * Returns the written paths; nothing is written when every file has history.
   */
  async writeCoverage(
    sessionId: string,
    report: CoverageReport,
    analyzedAt: Date = new Date(),
  ): Promise<string[]> {
    if (report.needsScreenshots.length === 0) {
      return [];
    }

    const paths = this.paths(sessionId);
    const when = analyzedAt.toISOString();

    await this.writeJson(paths.needsScreenshotsJson, {
      session_id: sessionId,
      analysis_date: when,
      total_files: report.totalFiles,
      files_with_revisions: report.withRevisions.length,
      files_without_revisions: report.needsScreenshots.length,
      files: report.needsScreenshots.map(({ file_id, file_name, reason, comment_count, permission_count }) => ({
        file_id,
        file_name,
        reason,
        comment_count,
        permission_count,
      })),
    });

    const lines = [
      'FILES NEEDING SCREENSHOT CAPTURE',
      '='.repeat(70),
      '',
      `Session ID: ${sessionId}`,
      `Analysis Date: ${when}`,
      `Total Files Analyzed: ${report.totalFiles}`,
      `Files Without Revisions: ${report.needsScreenshots.length}`,
      '',
      '='.repeat(70),
      '',
      'REASON:',
      'These files did not provide revision history through the provider API.',
      'This typically means the account has view-only or comment-only access.',
      '',
      'FILE LIST:',
      '',
      ...report.needsScreenshots.map((item, i) => `${i + 1}. ${item.file_name}`),
      '',
    ];
    await this.writeAtomic(paths.needsScreenshotsText, lines.join('\n'));

    await this.writeJson(paths.screenshotQueue, {
      created: when,
      session_id: sessionId,
      total_files: report.needsScreenshots.length,
      files: report.needsScreenshots.map(({ file_id, file_name, reason, screenshot_tabs }) => ({
        file_name,
        file_id,
        reason,
        screenshot_tabs,
      })),
    });

    return [paths.needsScreenshotsJson, paths.needsScreenshotsText, paths.screenshotQueue];
  }

  /**
   * State of a session as recorded on disk, read from which files exist.
   */
  storedState(sessionId: string): SessionState {
    const paths = this.paths(sessionId);
    if (existsSync(paths.verification)) return 'VERIFIED';
    if (existsSync(paths.post)) return 'POST_CAPTURED';
    if (existsSync(paths.baseline)) return 'BASELINE_CAPTURED';
    return 'NEW';
  }

  /**
   * Load a session awaiting its post capture.
   * Fails once a post capture or verification has been written, and if the
   * recorded hash no longer matches the stored records.
   */
  async loadBaseline(sessionId: string): Promise<BaselineSession> {
    const path = this.paths(sessionId).baseline;
    const state = this.storedState(sessionId);
    if (state === 'NEW') {
      throw new Error(`No baseline found for session ${sessionId} in ${this.dir}`);
    }
    if (state !== 'BASELINE_CAPTURED') {
      throw transitionError('record post capture for', { id: sessionId, state });
    }

    const file = await readSnapshotFile(path);
    if (file.sessionId !== sessionId) {
      throw new Error(`Baseline file ${path} belongs to session ${file.sessionId}`);
    }
    assertRecordedDigest(path, file);

    return {
      id: sessionId,
      createdAt: file.capturedAt,
      state: 'BASELINE_CAPTURED',
      baseline: {
        capturedAt: file.capturedAt,
        digest: digest(file.records),
        records: file.records,
      },
    };
  }

  /**
   * Session ids that have a baseline in the directory, oldest first.
   */
  async listSessions(): Promise<string[]> {
    if (!existsSync(this.dir)) {
      return [];
    }
    const entries = await readdir(this.dir);
    return entries
      .map((entry) => BASELINE_FILE_PATTERN.exec(entry)?.[1])
      .filter((id): id is string => typeof id === 'string')
      .sort();
  }

  private async writeJson(path: string, data: unknown): Promise<void> {
    await this.writeAtomic(path, JSON.stringify(data, null, 2) + '\n');
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const tempPath = `${path}.tmp.${randomBytes(4).toString('hex')}`;
    try {
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, path);
    } catch (err) {
      await unlink(tempPath).catch(() => undefined);
      throw new Error(
        `Failed to write ${path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}

/**
 * Read a BASELINE or POST session file.
 */
export async function readSnapshotFile(path: string): Promise<SnapshotFile> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new Error(
      `Cannot read session file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = SnapshotFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid session file ${path}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  const parsed = result.data;
  return {
    sessionId: parsed.session_id,
    capturedAt: parsed.capture_time,
    recordedDigest: parsed.baseline_hash_sha256 ?? parsed.post_hash_sha256 ?? null,
    records: parsed.files.map(toRecord),
  };
}

/**
 * Throw if a snapshot file's recorded hash disagrees with its records.
 */
export function assertRecordedDigest(path: string, file: SnapshotFile): void {
  if (file.recordedDigest !== null && file.recordedDigest !== digest(file.records)) {
    throw new Error(`Session file ${path} does not match its recorded hash; it was modified after capture`);
  }
}

/**
 * Snake-case report shape of a verdict, as stored in VERIFICATION.json.
 */
export function verdictToJson(verdict: VerificationVerdict): JsonObject {
  return {
    before_hash: verdict.beforeDigest,
    after_hash: verdict.afterDigest,
    match: verdict.match,
    digest_mode: verdict.digestMode,
    total_files: verdict.totalRecords,
    file_details: verdict.records.map(checkToJson),
    violations: verdict.violations.map(checkToJson),
    missing_files: verdict.missing.map((record) => ({
      file_id: record.recordId,
      file_name: record.recordName,
    })),
  };
}

function checkToJson(check: RecordCheck): JsonObject {
  const changes: JsonObject = {};
  for (const [field, change] of Object.entries(check.changes)) {
    if (change) {
      changes[field] = { before: toJson(change.before), after: toJson(change.after) };
    }
  }
  return {
    file_id: check.recordId,
    file_name: check.recordName,
    before_hash: check.beforeDigest,
    after_hash: check.afterDigest,
    timestamps_match: check.timestampsMatch,
    changes: check.timestampsMatch ? null : changes,
  };
}

/** Parsed JSON values are already JSON; this narrows them for the type checker. */
function toJson(value: unknown): JsonObject[string] {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJson(item));
  }
  if (typeof value === 'object') {
    return toRecord(value);
  }
  return null;
}

function toRecord(value: object): JsonObject {
  const record: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) record[key] = toJson(item);
  }
  return record;
}
