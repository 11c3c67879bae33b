/**
 * metaseal analyze — Find captured files that need screenshot evidence
 */

import { dirname } from 'node:path';
import chalk from 'chalk';
import { analyzeCoverage } from '../capture/coverage.js';
import { showCoverage } from '../cli/summary.js';
import { SessionStore, readSnapshotFile } from '../session/store.js';

export interface AnalyzeCommandOptions {
  /** Output directory; defaults to the capture file's directory */
  dir?: string;
  json?: boolean;
}

export async function analyzeCommand(capturePath: string, options: AnalyzeCommandOptions): Promise<void> {
  try {
    const file = await readSnapshotFile(capturePath);
    const report = analyzeCoverage(file.records);
    const store = new SessionStore({ dir: options.dir ?? dirname(capturePath) });
    const written = await store.writeCoverage(file.sessionId, report);

    if (options.json) {
      console.log(JSON.stringify({ ...report, written }, null, 2));
      return;
    }

    console.log();
    console.log(chalk.bold(`🔍 Coverage for session ${file.sessionId}`));
    console.log(chalk.dim(`   ${report.totalFiles} files analyzed`));
    console.log();
    showCoverage(report);

    if (written.length > 0) {
      console.log();
      for (const path of written) {
        console.log(chalk.dim(`  Saved: ${path}`));
      }
    }
    console.log();
  } catch (err) {
    console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }
}
