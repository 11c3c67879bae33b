/**
 * metaseal sessions — List capture sessions
 */

import chalk from 'chalk';
import { loadConfig, resolveSessionDir } from '../config.js';
import { SessionStore } from '../session/store.js';

interface SessionsOptions {
  dir?: string;
  json?: boolean;
}

export async function sessionsCommand(options: SessionsOptions): Promise<void> {
  try {
    const config = await loadConfig();
    const store = new SessionStore({ dir: resolveSessionDir(config, options.dir) });
    const ids = await store.listSessions();

    if (options.json) {
      console.log(
        JSON.stringify(
          ids.map((id) => {
            const state = store.storedState(id);
            return {
              session_id: id,
              baseline: store.paths(id).baseline,
              state,
              post_captured: state === 'POST_CAPTURED' || state === 'VERIFIED',
              verified: state === 'VERIFIED',
            };
          }),
          null,
          2,
        ),
      );
      return;
    }

    console.log();
    console.log(chalk.bold('📋 Sessions'));
    console.log(chalk.dim(`   ${store.dir}`));
    console.log();

    if (ids.length === 0) {
      console.log(chalk.dim('  No sessions yet. Start one with:'));
      console.log();
      console.log(`    ${chalk.cyan('metaseal baseline -s export.json')}`);
      console.log();
      return;
    }

    for (const id of ids) {
      const state = store.storedState(id);
      const status =
        state === 'VERIFIED'
          ? chalk.green('verified')
          : state === 'POST_CAPTURED'
            ? chalk.yellow('post captured')
            : chalk.dim('baseline only');
      console.log(`  ${chalk.cyan(id.padEnd(20))} ${status}`);
    }
    console.log();
  } catch (err) {
    console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }
}
