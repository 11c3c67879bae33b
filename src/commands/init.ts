/**
 * metaseal init — Initialize metaseal in the current directory
 */

import chalk from 'chalk';
import ora from 'ora';
import { isInitialized, initializeProject, localConfigPath } from '../config.js';

export async function initCommand(): Promise<void> {
  console.log();
  console.log(chalk.bold('🔏 metaseal — Metadata integrity for evidence capture'));
  console.log();

  if (isInitialized()) {
    console.log(chalk.yellow('⚠  metaseal is already initialized in this directory.'));
    console.log(chalk.dim(`   Config: ${localConfigPath()}`));
    return;
  }

  const spinner = ora('Initializing metaseal...').start();

  try {
    const config = await initializeProject();
    spinner.succeed('Created .metaseal/ directory');

    console.log();
    console.log(chalk.dim(`  Sessions are written to ${config.sessions.dir}`));
    console.log(chalk.dim(`  Duplicate names are resolved with the '${config.matching.strategy}' strategy`));
    console.log();
    console.log(chalk.green('✓ metaseal initialized!'));
    console.log();
    console.log(chalk.dim('  Next steps:'));
    console.log(chalk.dim(`  ${chalk.white('metaseal match <name> -s export.json')}     Find a file by name`));
    console.log(chalk.dim(`  ${chalk.white('metaseal baseline -s export.json')}         Capture the baseline`));
    console.log(chalk.dim(`  ${chalk.white('metaseal config')}                          Review settings`));
    console.log();
  } catch (err) {
    spinner.fail('Failed to initialize metaseal');
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}
