/**
 * metaseal post — Re-capture a session's files and verify them
 */

import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, resolveSessionDir } from '../config.js';
import { ExportFileSource } from '../capture/export-file.js';
import { showVerdict } from '../cli/summary.js';
import { baselineIds, recordPost, verifySession } from '../session/session.js';
import { SessionStore } from '../session/store.js';

export interface PostCommandOptions {
  source: string;
  dir?: string;
  unordered?: boolean;
}

export async function postCommand(sessionId: string, options: PostCommandOptions): Promise<void> {
  console.log();
  const spinner = ora(`Loading baseline for session ${sessionId}...`).start();

  try {
    const config = await loadConfig();
    const store = new SessionStore({ dir: resolveSessionDir(config, options.dir) });
    const baseline = await store.loadBaseline(sessionId);
    const { ids, missing } = baselineIds(baseline);
    spinner.succeed(`Baseline loaded: ${baseline.baseline.records.length} files`);

    if (missing > 0) {
      throw new Error(`${missing} baseline record(s) have no id and cannot be captured again`);
    }

    spinner.start(`Capturing post-documentation metadata for ${ids.length} files...`);
    const source = new ExportFileSource({ path: options.source });
    const { records, missing: vanished } = await source.captureAvailable(ids);
    if (vanished.length > 0) {
      spinner.warn(`${vanished.length} baselined file(s) missing from ${options.source}: ${vanished.join(', ')}`);
      spinner.start('Recording verification...');
    }
    const verified = verifySession(recordPost(baseline, records), {
      digestMode: options.unordered ? 'unordered' : config.verification.digestMode,
    });

    await store.writePost(verified);
    const written = await store.writeVerification(verified);
    spinner.succeed('Post capture complete');

    showVerdict(verified.verdict);
    console.log();
    console.log(`  ${chalk.dim('Report:')}      ${written.verification}`);
    console.log(`  ${chalk.dim('Attestation:')} ${written.attestation}`);
    console.log();

    if (verified.outcome === 'fail') {
      process.exitCode = 2;
    }
  } catch (err) {
    if (spinner.isSpinning) {
      spinner.fail('Post capture failed');
    }
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}
