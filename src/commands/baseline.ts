/**
 * metaseal baseline — Start a session and capture the baseline snapshot
 */

import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, resolveSessionDir } from '../config.js';
import { ExportFileSource } from '../capture/export-file.js';
import { formatScore } from '../matching/format.js';
import type { SelectionStrategy } from '../matching/types.js';
import { createSession, recordBaseline } from '../session/session.js';
import { SessionStore } from '../session/store.js';
import { resolveName } from './resolve.js';

export interface BaselineCommandOptions {
  source: string;
  /** File names to resolve; every listed file when omitted */
  names?: string[];
  dir?: string;
  strategy?: SelectionStrategy;
  /** Session id; generated from the current time when omitted */
  id?: string;
}

export async function baselineCommand(options: BaselineCommandOptions): Promise<void> {
  console.log();
  const spinner = ora('Reading export...').start();

  try {
    const config = await loadConfig();
    const source = new ExportFileSource({ path: options.source });
    const entries = await source.listCandidates();
    spinner.succeed(`Read ${entries.length} files from ${options.source}`);

    let ids: string[];
    if (options.names && options.names.length > 0) {
      ids = [];
      const strategy = options.strategy ?? config.matching.strategy;
      for (const name of options.names) {
        const { selection } = await resolveName(name, entries, config.matching, strategy);
        if (!selection) {
          throw new Error(`No file selected for '${name}'`);
        }
        const id = selection.candidate.handle.id;
        console.log(
          `  ${chalk.green('✓')} ${name} → ${selection.candidate.name} ${chalk.dim(`(${formatScore(selection.score)})`)}`,
        );
        if (ids.includes(id)) {
          console.log(chalk.yellow(`  ⚠ '${name}' resolved to a file already selected; captured once`));
          continue;
        }
        ids.push(id);
      }
    } else {
      ids = entries.map((entry) => entry.id);
    }

    if (ids.length === 0) {
      throw new Error('Nothing to capture: the export lists no files');
    }

    spinner.start(`Capturing baseline for ${ids.length} files...`);
    const records = await source.capture(ids);
    const session = recordBaseline(createSession(options.id), records);

    const store = new SessionStore({ dir: resolveSessionDir(config, options.dir) });
    const path = await store.writeBaseline(session);
    spinner.succeed(`Baseline captured: ${records.length} files`);

    console.log();
    console.log(`  ${chalk.dim('Session:')}  ${chalk.cyan(session.id)}`);
    console.log(`  ${chalk.dim('Hash:')}     ${session.baseline.digest}`);
    console.log(`  ${chalk.dim('Saved to:')} ${path}`);
    console.log();
    console.log(chalk.dim('  Document the files now, then capture again with:'));
    console.log(`    ${chalk.cyan(`metaseal post ${session.id} -s ${options.source}`)}`);
    console.log();
  } catch (err) {
    if (spinner.isSpinning) {
      spinner.fail('Baseline capture failed');
    }
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}
