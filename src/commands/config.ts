/**
 * metaseal config — View/edit configuration
 */

import chalk from 'chalk';
import { isInitialized, loadConfig, localConfigPath, saveConfig, setConfigValue } from '../config.js';
import type { MetasealConfig } from '../config.js';

interface ConfigOptions {
  set?: string;
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  let config: MetasealConfig;
  try {
    config = await loadConfig();
  } catch (err) {
    console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }

  if (options.set) {
    const eq = options.set.indexOf('=');
    if (eq <= 0) {
      console.error(chalk.red('✗ Expected key=value, e.g. matching.strategy=newest'));
      process.exit(1);
    }
    const key = options.set.slice(0, eq).trim();
    const value = options.set.slice(eq + 1).trim();

    try {
      const updated = setConfigValue(config, key, value);
      await saveConfig(updated);
      console.log(chalk.green(`✓ ${key} = ${value}`));
      console.log(chalk.dim(`  ${localConfigPath()}`));
    } catch (err) {
      console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold('⚙️  metaseal Configuration'));
  console.log(chalk.dim(`   ${isInitialized() ? localConfigPath() : '(defaults; run `metaseal init` to save)'}`));
  console.log();

  console.log(`  ${chalk.dim('Version:')}              ${config.version}`);
  console.log(`  ${chalk.dim('Matching:')}`);
  console.log(`  ${chalk.dim('  Threshold:')}          ${config.matching.similarityThreshold}`);
  console.log(`  ${chalk.dim('  Duplicate closeness:')} ${config.matching.duplicateCloseness}`);
  console.log(`  ${chalk.dim('  Max results:')}        ${config.matching.maxResults}`);
  console.log(`  ${chalk.dim('  Strategy:')}           ${config.matching.strategy}`);
  console.log(`  ${chalk.dim('Sessions dir:')}         ${config.sessions.dir}`);
  console.log(`  ${chalk.dim('Digest mode:')}          ${config.verification.digestMode}`);
  console.log();
}
