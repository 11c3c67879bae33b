import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  defaultConfig,
  initializeProject,
  isInitialized,
  loadConfig,
  localConfigPath,
  parseConfig,
  resolveSessionDir,
  setConfigValue,
} from '../config.js';

describe('config', () => {
  it('should provide defaults', () => {
    expect(defaultConfig()).toEqual({
      version: '0.1.0',
      matching: { similarityThreshold: 0.6, duplicateCloseness: 0.95, maxResults: 10, strategy: 'ask' },
      sessions: { dir: join('.metaseal', 'sessions') },
      verification: { digestMode: 'ordered' },
    });
  });

  it('should fill in missing sections', () => {
    const config = parseConfig({ matching: { strategy: 'newest' } });
    expect(config.matching.strategy).toBe('newest');
    expect(config.matching.maxResults).toBe(10);
    expect(config.verification.digestMode).toBe('ordered');
  });

  it('should name the first invalid field', () => {
    expect(() => parseConfig({ matching: { similarityThreshold: 2 } }, 'test.json')).toThrow(
      'Invalid test.json: matching.similarityThreshold:',
    );
  });

  describe('setConfigValue', () => {
    it('should coerce numbers and validate', () => {
      const updated = setConfigValue(defaultConfig(), 'matching.maxResults', '25');
      expect(updated.matching.maxResults).toBe(25);
    });

    it('should set enum values', () => {
      const updated = setConfigValue(defaultConfig(), 'verification.digestMode', 'unordered');
      expect(updated.verification.digestMode).toBe('unordered');
    });

    it('should not modify its input', () => {
      const config = defaultConfig();
      setConfigValue(config, 'matching.strategy', 'first');
      expect(config.matching.strategy).toBe('ask');
    });

    it('should reject unknown keys', () => {
      expect(() => setConfigValue(defaultConfig(), 'matching.colour', 'red')).toThrow(
        'Unknown config key: matching.colour',
      );
      expect(() => setConfigValue(defaultConfig(), 'nope.deeper', '1')).toThrow('Unknown config key: nope.deeper');
      expect(() => setConfigValue(defaultConfig(), '', '1')).toThrow('Config key must not be empty');
    });

    it('should reject invalid values', () => {
      expect(() => setConfigValue(defaultConfig(), 'matching.strategy', 'random')).toThrow(
        'Invalid value for matching.strategy: matching.strategy:',
      );
    });
  });

  describe('files', () => {
    let cwd: string;

    beforeEach(async () => {
      cwd = await mkdtemp(join(tmpdir(), 'metaseal-config-'));
    });

    afterEach(async () => {
      await rm(cwd, { recursive: true, force: true });
    });

    it('should initialize and load a project config', async () => {
      expect(isInitialized(cwd)).toBe(false);
      await initializeProject(cwd);
      expect(isInitialized(cwd)).toBe(true);

      const saved = JSON.parse(await readFile(localConfigPath(cwd), 'utf-8'));
      expect(saved.matching.strategy).toBe('ask');
      expect(await loadConfig(cwd)).toEqual(defaultConfig());
    });

    it('should reject an invalid config file', async () => {
      await mkdir(join(cwd, '.metaseal'), { recursive: true });
      await writeFile(localConfigPath(cwd), JSON.stringify({ matching: { maxResults: 0 } }), 'utf-8');
      await expect(loadConfig(cwd)).rejects.toThrow('matching.maxResults');
    });

    it('should resolve the session directory', () => {
      const config = defaultConfig();
      expect(resolveSessionDir(config, undefined, cwd)).toBe(join(cwd, '.metaseal', 'sessions'));
      expect(resolveSessionDir(config, 'evidence', cwd)).toBe(join(cwd, 'evidence'));
      expect(resolveSessionDir(config, '/tmp/elsewhere', cwd)).toBe('/tmp/elsewhere');
    });
  });
});
