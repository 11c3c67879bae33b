/**
 * metaseal Configuration
 *
 * Manages .metaseal/config.json in the current working directory.
 * Also supports global config at ~/.metaseal/config.json.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';

/** Directory name for local metaseal config */
export const METASEAL_DIR = '.metaseal';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global metaseal home directory */
export const GLOBAL_METASEAL_DIR = join(homedir(), '.metaseal');

export const MetasealConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  matching: z
    .object({
      similarityThreshold: z.number().min(0).max(1).default(0.6),
      duplicateCloseness: z.number().min(0).max(1).default(0.95),
      maxResults: z.number().int().positive().default(10),
      strategy: z.enum(['first', 'indexed', 'newest', 'oldest', 'largest', 'ask']).default('ask'),
    })
    .default({}),
  sessions: z
    .object({
      /** Where session report files are written; relative paths resolve against cwd */
      dir: z.string().default(join(METASEAL_DIR, 'sessions')),
    })
    .default({}),
  verification: z
    .object({
      digestMode: z.enum(['ordered', 'unordered']).default('ordered'),
    })
    .default({}),
});

export type MetasealConfig = z.infer<typeof MetasealConfigSchema>;

/**
 * Default configuration for new projects.
 */
export function defaultConfig(): MetasealConfig {
  return MetasealConfigSchema.parse({});
}

/**
 * Resolve the local .metaseal directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), METASEAL_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Check if metaseal is initialized in the given directory.
 */
export function isInitialized(cwd?: string): boolean {
  return existsSync(localConfigPath(cwd));
}

/**
 * Validate raw config data, filling in defaults.
 * Throws with the file path and the first issue on invalid input.
 */
export function parseConfig(data: unknown, source = 'config'): MetasealConfig {
  const result = MetasealConfigSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.') || '(root)';
    throw new Error(`Invalid ${source}: ${path}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Load the metaseal config from the local .metaseal/ directory.
 * Falls back to global config, then to defaults.
 */
export async function loadConfig(cwd?: string): Promise<MetasealConfig> {
  const localPath = localConfigPath(cwd);
  const globalPath = join(GLOBAL_METASEAL_DIR, CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      const raw = await readFile(configPath, 'utf-8');
      return parseConfig(JSON.parse(raw), configPath);
    }
  }

  return defaultConfig();
}

/**
 * Save the metaseal config to the local .metaseal/ directory.
 */
export async function saveConfig(config: MetasealConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Initialize metaseal in the given directory.
 * Creates .metaseal/ and writes default config.
 */
export async function initializeProject(cwd?: string): Promise<MetasealConfig> {
  const config = defaultConfig();
  await saveConfig(config, cwd);
  return config;
}

/**
 * Resolve the session directory, honoring an explicit override.
 */
export function resolveSessionDir(config: MetasealConfig, override?: string, cwd?: string): string {
  return resolve(cwd ?? process.cwd(), override ?? config.sessions.dir);
}

/**
 * Set a dotted key (e.g. "matching.maxResults") from a CLI string value.
 * Numbers are coerced; the result is validated against the schema.
 */
export function setConfigValue(config: MetasealConfig, key: string, value: string): MetasealConfig {
  const path = key.split('.').filter(Boolean);
  if (path.length === 0) {
    throw new Error('Config key must not be empty');
  }

  const draft: unknown = JSON.parse(JSON.stringify(config));
  let cursor: unknown = draft;
  for (const segment of path.slice(0, -1)) {
    if (!isRecord(cursor) || !isRecord(cursor[segment])) {
      throw new Error(`Unknown config key: ${key}`);
    }
    cursor = cursor[segment];
  }

  const leaf = path[path.length - 1];
  if (!isRecord(cursor) || !(leaf in cursor)) {
    throw new Error(`Unknown config key: ${key}`);
  }
  cursor[leaf] = coerce(value);

  return parseConfig(draft, `value for ${key}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return value;
}
