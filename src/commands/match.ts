/**
 * metaseal match — Resolve a file name against an export listing
 */

import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { ExportFileSource } from '../capture/export-file.js';
import { showMatches, showSelection } from '../cli/summary.js';
import type { SelectionStrategy } from '../matching/types.js';
import { effectiveStrategy, resolveName } from './resolve.js';

export interface MatchCommandOptions {
  source: string;
  strategy?: SelectionStrategy;
  threshold?: number;
  closeness?: number;
  limit?: number;
  json?: boolean;
}

export async function matchCommand(query: string, options: MatchCommandOptions): Promise<void> {
  const spinner = options.json ? null : ora('Reading export...').start();

  try {
    const config = await loadConfig();
    const entries = await new ExportFileSource({ path: options.source }).listCandidates();
    spinner?.succeed(`Read ${entries.length} files from ${options.source}`);

    const strategy = options.strategy ?? config.matching.strategy;
    const matchOptions = {
      similarityThreshold: options.threshold ?? config.matching.similarityThreshold,
      duplicateCloseness: options.closeness ?? config.matching.duplicateCloseness,
      maxResults: options.limit ?? config.matching.maxResults,
    };

    // JSON output never prompts
    const { result, selection } = await resolveName(query, entries, matchOptions, strategy, !options.json);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            query: result.query,
            clean_term: result.cleanTerm,
            explicit_index: result.explicitIndex,
            total_matches: result.totalMatches,
            has_duplicates: result.hasDuplicates,
            strategy: effectiveStrategy(result, strategy),
            matches: result.matches.map((match) => ({
              id: match.candidate.handle.id,
              name: match.candidate.name,
              score: match.score,
              position: match.position,
            })),
            duplicate_groups: result.duplicateGroups.map((group) =>
              group.map((match) => match.candidate.handle.id),
            ),
            selection: selection && {
              id: selection.candidate.handle.id,
              name: selection.candidate.name,
              score: selection.score,
              rank: selection.rank,
              reason: selection.reason,
            },
          },
          null,
          2,
        ),
      );
      return;
    }

    console.log();
    showMatches(result);
    console.log();

    if (selection) {
      showSelection(selection);
      console.log(chalk.dim(`    Id:     ${selection.candidate.handle.id}`));
    } else if (result.matches.length > 0) {
      console.log(chalk.yellow('  No file selected'));
    }
    console.log();
  } catch (err) {
    if (spinner?.isSpinning) {
      spinner.fail('Failed to resolve name');
    }
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}
