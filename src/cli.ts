#!/usr/bin/env node

/**
 * metaseal CLI
 *
 * Find files by approximate name, and prove that documenting them left
 * their metadata untouched.
 *
 * Usage:
 *   metaseal init                              Write default config
 *   metaseal match <query> -s <export>         Resolve a name to a file
 *   metaseal baseline -s <export> [-n ...]     Capture the baseline
 *   metaseal post <session-id> -s <export>     Capture again and verify
 *   metaseal verify <baseline> <post>          Compare two capture files
 *   metaseal analyze <capture>                 List files needing screenshots
 *   metaseal sessions                          List sessions
 *   metaseal config                            View/edit configuration
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'node:module';
import {
  initCommand,
  matchCommand,
  baselineCommand,
  postCommand,
  verifyCommand,
  analyzeCommand,
  sessionsCommand,
  configCommand,
} from './commands/index.js';
import { setColorsEnabled } from './cli/prompts.js';
import { parseCount, parseFraction, parseSessionIdArgument, parseStrategy } from './cli/options.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('metaseal')
  .description('Fuzzy file resolution and metadata integrity verification for evidence capture.')
  .version(version)
  .option('--no-color', 'Disable colorized output')
  .hook('preAction', (command) => {
    if (command.opts().color === false) {
      chalk.level = 0;
      setColorsEnabled(false);
    }
  });

// ─── metaseal init ───────────────────────────────────────────

program
  .command('init')
  .description('Initialize metaseal in the current directory')
  .action(initCommand);

// ─── metaseal match ──────────────────────────────────────────

program
  .command('match <query>')
  .description("Find files by approximate name; supports index notation like 'report [2]'")
  .requiredOption('-s, --source <file>', 'Exported metadata listing (JSON)')
  .option('--strategy <strategy>', 'first, indexed, newest, oldest, largest or ask', parseStrategy)
  .option('--threshold <n>', 'Minimum similarity (0-1)', parseFraction)
  .option('--closeness <n>', 'Duplicate closeness (0-1)', parseFraction)
  .option('--limit <n>', 'Maximum matches to show', parseCount)
  .option('--json', 'Output as JSON')
  .action(matchCommand);

// ─── metaseal baseline ───────────────────────────────────────

program
  .command('baseline')
  .description('Start a session and capture baseline metadata')
  .requiredOption('-s, --source <file>', 'Exported metadata listing (JSON)')
  .option('-n, --names <names...>', 'File names to capture (default: every listed file)')
  .option('--strategy <strategy>', 'How to choose among duplicate names', parseStrategy)
  .option('--id <id>', 'Session id (default: YYYYMMDD_HHMMSS)', parseSessionIdArgument)
  .option('-d, --dir <dir>', 'Session directory')
  .action(baselineCommand);

// ─── metaseal post ───────────────────────────────────────────

program
  .command('post')
  .argument('<session-id>', 'Session to verify', parseSessionIdArgument)
  .description('Capture metadata again after documentation and verify it')
  .requiredOption('-s, --source <file>', 'Exported metadata listing (JSON)')
  .option('-d, --dir <dir>', 'Session directory')
  .option('--unordered', 'Ignore record order when hashing')
  .action(postCommand);

// ─── metaseal verify ─────────────────────────────────────────

program
  .command('verify <baseline> <post>')
  .description('Compare a baseline and a post capture file (exit code 2 on mismatch)')
  .option('--unordered', 'Ignore record order when hashing')
  .option('--json', 'Output as JSON')
  .action(verifyCommand);

// ─── metaseal analyze ────────────────────────────────────────

program
  .command('analyze <capture>')
  .description('List captured files without revision history that need screenshots')
  .option('-d, --dir <dir>', 'Output directory (default: next to the capture file)')
  .option('--json', 'Output as JSON')
  .action(analyzeCommand);

// ─── metaseal sessions ───────────────────────────────────────

program
  .command('sessions')
  .alias('ls')
  .description('List capture sessions')
  .option('-d, --dir <dir>', 'Session directory')
  .option('--json', 'Output as JSON')
  .action(sessionsCommand);

// ─── metaseal config ─────────────────────────────────────────

program
  .command('config')
  .description('View or edit configuration')
  .option('--set <key=value>', 'Set a value, e.g. matching.strategy=newest')
  .option('--json', 'Output as JSON')
  .action(configCommand);

// ─── Parse & run ─────────────────────────────────────────────

program.parse();
