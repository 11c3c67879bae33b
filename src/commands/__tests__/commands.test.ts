import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { initializeProject, loadConfig } from '../../config.js';
import { FAIL_MARKER, PASS_MARKER } from '../../integrity/attestation.js';
import { SessionStore } from '../../session/store.js';
import { baselineCommand } from '../baseline.js';
import { configCommand } from '../config.js';
import { matchCommand } from '../match.js';
import { postCommand } from '../post.js';
import { sessionsCommand } from '../sessions.js';
import { verifyCommand } from '../verify.js';

const FILES = [
  { id: 'id-1', name: 'Lease Agreement', modifiedTime: '2024-04-02T10:00:00.000Z', size: '12000' },
  { id: 'id-2', name: 'Lease Agreement', modifiedTime: '2024-04-03T10:00:00.000Z', size: '900' },
  { id: 'id-3', name: 'Lease Agreement (1)', modifiedTime: '2024-04-01T10:00:00.000Z' },
  { id: 'id-4', name: 'Photos', modifiedTime: '2024-03-01T10:00:00.000Z', revision_count: 3 },
];

function spyLog() {
  return vi.spyOn(console, 'log').mockImplementation(() => {});
}

function jsonOutput(spy: ReturnType<typeof spyLog>): unknown {
  const raw = spy.mock.calls
    .map((call) => call[0])
    .find((entry) => typeof entry === 'string' && /^\s*[[{]/.test(entry));
  if (typeof raw !== 'string') {
    throw new Error('No JSON output');
  }
  return JSON.parse(raw);
}

describe.sequential('commands', () => {
  let cwd: string;
  let originalCwd: string;
  let logSpy: ReturnType<typeof spyLog>;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'metaseal-commands-'));
    originalCwd = process.cwd();
    await initializeProject(cwd);
    await writeFile(join(cwd, 'export.json'), JSON.stringify({ files: FILES }), 'utf-8');
    process.chdir(cwd);
    logSpy = spyLog();
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await rm(cwd, { recursive: true, force: true });
  });

  describe('match', () => {
    it('should leave duplicates unresolved under the ask strategy', async () => {
      await matchCommand('Lease Agreement', { source: 'export.json', json: true });

      expect(jsonOutput(logSpy)).toMatchObject({
        query: 'Lease Agreement',
        total_matches: 3,
        has_duplicates: true,
        strategy: 'ask',
        duplicate_groups: [['id-1', 'id-2', 'id-3']],
        selection: null,
      });
    });

    it('should resolve index notation', async () => {
      await matchCommand('Lease Agreement [2]', { source: 'export.json', json: true });

      expect(jsonOutput(logSpy)).toMatchObject({
        clean_term: 'Lease Agreement',
        explicit_index: 2,
        strategy: 'indexed',
        selection: { id: 'id-2', rank: 2, reason: 'Selected by index #2' },
      });
    });

    it('should apply a metadata strategy', async () => {
      await matchCommand('Lease Agreement', { source: 'export.json', json: true, strategy: 'largest' });

      expect(jsonOutput(logSpy)).toMatchObject({
        selection: { id: 'id-1', reason: 'Selected by largest file size' },
      });
    });

    it('should pick the best match when it is unambiguous', async () => {
      await matchCommand('photos', { source: 'export.json', json: true });

      expect(jsonOutput(logSpy)).toMatchObject({
        has_duplicates: false,
        strategy: 'first',
        selection: { id: 'id-4', reason: 'Highest similarity score' },
      });
    });
  });

  describe('baseline and post', () => {
    it('should capture, re-capture and verify a session', async () => {
      await baselineCommand({ source: 'export.json', names: ['Lease Agreement #2', 'Photos'], id: 'case-1' });

      const store = new SessionStore({ dir: join(cwd, '.metaseal', 'sessions') });
      const baseline = await store.loadBaseline('case-1');
      expect(baseline.baseline.records.map((r) => r.id)).toEqual(['id-2', 'id-4']);

      await postCommand('case-1', { source: 'export.json' });

      const paths = store.paths('case-1');
      expect(existsSync(paths.post)).toBe(true);
      const verification = JSON.parse(await readFile(paths.verification, 'utf-8'));
      expect(verification.hashes_match).toBe(true);
      expect(await readFile(paths.attestation, 'utf-8')).toContain(PASS_MARKER);
      expect(process.exitCode).toBeUndefined();
    });

    it('should exit with code 2 when metadata changed', async () => {
      await baselineCommand({ source: 'export.json', id: 'case-2' });

      const changed = FILES.map((file) =>
        file.id === 'id-3' ? { ...file, modifiedTime: '2024-10-27T14:05:00.000Z' } : file,
      );
      await writeFile(join(cwd, 'export.json'), JSON.stringify(changed), 'utf-8');

      await postCommand('case-2', { source: 'export.json' });

      const paths = new SessionStore({ dir: join(cwd, '.metaseal', 'sessions') }).paths('case-2');
      const attestation = await readFile(paths.attestation, 'utf-8');
      expect(attestation).toContain(FAIL_MARKER);
      expect(attestation).toContain(
        '     - Modified Time: 2024-04-01T10:00:00.000Z → 2024-10-27T14:05:00.000Z',
      );
      expect(process.exitCode).toBe(2);
    });

    it('should refuse to capture a verified session again', async () => {
      await baselineCommand({ source: 'export.json', id: 'case-4' });
      const changed = FILES.map((file) =>
        file.id === 'id-1' ? { ...file, modifiedTime: '2024-10-27T14:05:00.000Z' } : file,
      );
      await writeFile(join(cwd, 'export.json'), JSON.stringify(changed), 'utf-8');
      await postCommand('case-4', { source: 'export.json' });
      expect(process.exitCode).toBe(2);

      await writeFile(join(cwd, 'export.json'), JSON.stringify(FILES), 'utf-8');
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${code}`);
      });

      await expect(postCommand('case-4', { source: 'export.json' })).rejects.toThrow('exit 1');

      expect(errorSpy).toHaveBeenCalledWith(
        expect.stringContaining('Cannot record post capture for session case-4 in state VERIFIED'),
      );
      const paths = new SessionStore({ dir: join(cwd, '.metaseal', 'sessions') }).paths('case-4');
      const verification = JSON.parse(await readFile(paths.verification, 'utf-8'));
      expect(verification.hashes_match).toBe(false);
      expect(await readFile(paths.attestation, 'utf-8')).toContain(FAIL_MARKER);
      expect(process.exitCode).toBe(2);
    });

    it('should refuse a session id outside the session directory', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${code}`);
      });

      await expect(baselineCommand({ source: 'export.json', id: '../escape' })).rejects.toThrow('exit 1');

      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Invalid session id '../escape'"));
      expect(existsSync(join(cwd, '.metaseal', 'sessions'))).toBe(false);
    });

    it('should record a file that vanished as a failed verification', async () => {
      await baselineCommand({ source: 'export.json', id: 'case-5' });
      const remaining = FILES.filter((file) => file.id !== 'id-3');
      await writeFile(join(cwd, 'export.json'), JSON.stringify(remaining), 'utf-8');

      await postCommand('case-5', { source: 'export.json' });

      const paths = new SessionStore({ dir: join(cwd, '.metaseal', 'sessions') }).paths('case-5');
      const post = JSON.parse(await readFile(paths.post, 'utf-8'));
      expect(post.files.map((file: { id: string }) => file.id)).toEqual(['id-1', 'id-2', 'id-4']);
      const verification = JSON.parse(await readFile(paths.verification, 'utf-8'));
      expect(verification.hashes_match).toBe(false);
      expect(verification.verification_result.missing_files).toEqual([
        { file_id: 'id-3', file_name: 'Lease Agreement (1)' },
      ]);
      expect(verification.verification_result.violations).toEqual([]);
      expect(await readFile(paths.attestation, 'utf-8')).toContain('  1. Lease Agreement (1) (id: id-3)');
      expect(process.exitCode).toBe(2);
    });
  });

  describe('verify', () => {
    it('should compare two capture files', async () => {
      await baselineCommand({ source: 'export.json', id: 'case-3' });
      await postCommand('case-3', { source: 'export.json' });
      logSpy.mockClear();

      const paths = new SessionStore({ dir: join(cwd, '.metaseal', 'sessions') }).paths('case-3');
      await verifyCommand(paths.baseline, paths.post, { json: true });

      expect(jsonOutput(logSpy)).toMatchObject({ match: true, digest_mode: 'ordered', total_files: 4 });
      expect(process.exitCode).toBeUndefined();
    });

    it('should exit with code 1 on an unreadable file', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`exit ${code}`);
      });

      await expect(verifyCommand('missing.json', 'missing.json', {})).rejects.toThrow('exit 1');
    });
  });

  describe('sessions', () => {
    it('should list sessions with their progress', async () => {
      await baselineCommand({ source: 'export.json', id: 'a-first' });
      await baselineCommand({ source: 'export.json', id: 'b-second' });
      await postCommand('b-second', { source: 'export.json' });
      logSpy.mockClear();

      await sessionsCommand({ json: true });

      expect(jsonOutput(logSpy)).toMatchObject([
        { session_id: 'a-first', state: 'BASELINE_CAPTURED', post_captured: false, verified: false },
        { session_id: 'b-second', state: 'VERIFIED', post_captured: true, verified: true },
      ]);
    });
  });

  describe('config', () => {
    it('should set a value', async () => {
      await configCommand({ set: 'matching.strategy=newest' });
      expect((await loadConfig()).matching.strategy).toBe('newest');
    });
  });
});
