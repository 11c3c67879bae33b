/**
 * Interactive Prompts
 *
 * Arrow-key selection in raw terminal mode, used to disambiguate matches.
 */

import chalk from 'chalk';
import { describeCandidate } from '../matching/format.js';
import type { MatchResult, SideMetadata } from '../matching/types.js';

// ─── Types ───────────────────────────────────────────────────

export interface SelectOption<T = string> {
  value: T;
  label: string;
  description?: string;
  disabled?: boolean;
}

// ─── Color Wrapper ───────────────────────────────────────────

let colorsEnabled = true;

export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

function c(fn: typeof chalk.cyan, text: string): string {
  return colorsEnabled ? fn(text) : text;
}

// ─── Core Prompt Functions ───────────────────────────────────

/**
 * Select from a list of options with arrow key navigation
 */
export async function select<T>(
  message: string,
  options: SelectOption<T>[],
): Promise<T> {
  if (!process.stdin.isTTY) {
    throw new Error('Interactive selection requires a terminal; pass --strategy or use index notation');
  }

  return new Promise((resolve) => {
    let selectedIndex = options.findIndex((o) => !o.disabled);
    if (selectedIndex === -1) selectedIndex = 0;

    const render = () => {
      // Clear previous render
      process.stdout.write('\x1B[2K\x1B[1A'.repeat(options.length + 1));
      process.stdout.write('\x1B[2K');

      // Print question
      console.log(c(chalk.cyan, '?') + ' ' + c(chalk.white.bold, message));

      // Print options
      options.forEach((option, index) => {
        const isSelected = index === selectedIndex;
        const prefix = isSelected ? c(chalk.cyan, '❯') : ' ';
        const label = option.disabled
          ? c(chalk.dim, option.label)
          : isSelected
            ? c(chalk.cyan, option.label)
            : option.label;
        const desc = option.description ? ' ' + c(chalk.dim, `- ${option.description}`) : '';

        console.log(`  ${prefix} ${label}${desc}`);
      });
    };

    // Initial render with blank lines
    console.log('');
    options.forEach(() => console.log(''));
    render();

    // Handle keyboard input
    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.setEncoding('utf8');

    const onKeypress = (key: string) => {
      // Handle arrow keys
      if (key === '\x1B[A' || key === 'k') {
        // Up arrow or k
        do {
          selectedIndex = (selectedIndex - 1 + options.length) % options.length;
        } while (options[selectedIndex].disabled);
        render();
      } else if (key === '\x1B[B' || key === 'j') {
        // Down arrow or j
        do {
          selectedIndex = (selectedIndex + 1) % options.length;
        } while (options[selectedIndex].disabled);
        render();
      } else if (key === '\r' || key === '\n') {
        // Enter
        process.stdin.setRawMode(false);
        process.stdin.removeListener('data', onKeypress);
        process.stdin.pause();

        // Clear and show selected value
        process.stdout.write('\x1B[2K\x1B[1A'.repeat(options.length + 1));
        process.stdout.write('\x1B[2K');
        console.log(
          c(chalk.cyan, '✓') +
            ' ' +
            c(chalk.white.bold, message) +
            ' ' +
            c(chalk.cyan, options[selectedIndex].label),
        );

        resolve(options[selectedIndex].value);
      } else if (key === '\x03') {
        // Ctrl+C
        process.stdin.setRawMode(false);
        process.stdin.removeListener('data', onKeypress);
        process.stdin.pause();
        process.exit(130);
      }
    };

    process.stdin.on('data', onKeypress);
  });
}

// ─── Disambiguation ──────────────────────────────────────────

const CANCEL = -1;

/**
 * Build the prompt options for a match result: one per ranked match,
 * described with score and side metadata, plus a trailing Cancel.
 */
export function candidateOptions(
  result: MatchResult,
  sideMetadata: ReadonlyArray<SideMetadata> = [],
): SelectOption<number>[] {
  const options: SelectOption<number>[] = result.matches.map((match, i) => ({
    value: i,
    label: `${i + 1}. ${match.candidate.name}`,
    description: describeCandidate(match.score, sideMetadata[i]),
  }));
  options.push({ value: CANCEL, label: 'Cancel' });
  return options;
}

/**
 * Ask the user to pick one of several matching files.
 *
 * @returns 0-based index into `result.matches`, or `null` if cancelled
 */
export async function selectCandidate(
  result: MatchResult,
  sideMetadata?: ReadonlyArray<SideMetadata>,
): Promise<number | null> {
  console.log(c(chalk.yellow, `⚠️  Multiple files found for '${result.query}'`));
  console.log(
    c(chalk.dim, `   Tip: use index notation next time, e.g. '${result.cleanTerm} [2]' or '${result.cleanTerm} #2'`),
  );

  const choice = await select(
    `Found ${result.matches.length} similar files. Please select one:`,
    candidateOptions(result, sideMetadata),
  );
  return choice === CANCEL ? null : choice;
}
