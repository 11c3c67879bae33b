/**
 * metaseal — Fuzzy file resolution and metadata integrity verification
 *
 * Public API for programmatic usage.
 */

// Core types
export type { JsonValue, JsonObject, MetasealConfig } from './types.js';

// Name matching
export * from './matching/index.js';

// Integrity verification
export * from './integrity/index.js';

// Capture sources & coverage
export * from './capture/index.js';

// Sessions
export * from './session/index.js';

// Config
export {
  loadConfig,
  saveConfig,
  defaultConfig,
  parseConfig,
  setConfigValue,
  initializeProject,
  isInitialized,
  localConfigDir,
  localConfigPath,
  resolveSessionDir,
  MetasealConfigSchema,
  METASEAL_DIR,
  CONFIG_FILE,
} from './config.js';
