/**
 * metaseal verify — Compare two capture files offline
 */

import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { compareSnapshots } from '../integrity/verifier.js';
import { showVerdict } from '../cli/summary.js';
import { assertRecordedDigest, readSnapshotFile, verdictToJson } from '../session/store.js';

export interface VerifyCommandOptions {
  json?: boolean;
  unordered?: boolean;
}

export async function verifyCommand(
  baselinePath: string,
  postPath: string,
  options: VerifyCommandOptions,
): Promise<void> {
  try {
    const config = await loadConfig();
    const before = await readSnapshotFile(baselinePath);
    const after = await readSnapshotFile(postPath);
    assertRecordedDigest(baselinePath, before);
    assertRecordedDigest(postPath, after);

    const verdict = compareSnapshots(before.records, after.records, {
      digestMode: options.unordered ? 'unordered' : config.verification.digestMode,
    });

    if (options.json) {
      console.log(JSON.stringify(verdictToJson(verdict), null, 2));
    } else {
      showVerdict(verdict);
      console.log();
    }

    if (!verdict.match) {
      process.exitCode = 2;
    }
  } catch (err) {
    console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }
}
