/**
 * Result Display
 *
 * Formats match results, verification verdicts and coverage reports
 * for the terminal.
 */

import chalk from 'chalk';
import type { CoverageReport } from '../capture/coverage.js';
import { CRITICAL_FIELD_KEYS, CRITICAL_FIELD_LABELS } from '../integrity/types.js';
import type { VerificationVerdict } from '../integrity/types.js';
import { formatDuplicateWarning, formatScore } from '../matching/format.js';
import type { MatchResult, Selection } from '../matching/types.js';

const RULE = '━'.repeat(54);

// ─── Matches ─────────────────────────────────────────────────

/**
 * Display ranked matches and, if any, the duplicate warning.
 */
export function showMatches(result: MatchResult): void {
  if (result.matches.length === 0) {
    console.log(chalk.red(`  ✗ No files match '${result.query}'`));
    return;
  }

  const shown =
    result.totalMatches > result.matches.length
      ? `${result.matches.length} of ${result.totalMatches}`
      : `${result.matches.length}`;
  console.log(chalk.bold(`  Matches for '${result.cleanTerm}' (${shown})`));
  if (result.explicitIndex !== null) {
    console.log(chalk.dim(`  Requested index: #${result.explicitIndex}`));
  }

  result.matches.forEach((match, i) => {
    const rank = chalk.dim(`${String(i + 1).padStart(3)}.`);
    console.log(`  ${rank} ${match.candidate.name} ${chalk.cyan(formatScore(match.score))}`);
  });

  if (result.hasDuplicates) {
    console.log();
    console.log(chalk.yellow(formatDuplicateWarning(result)));
  }
}

/**
 * Display the chosen match.
 */
export function showSelection(selection: Selection): void {
  console.log(chalk.green(`  ✓ Selected: '${selection.candidate.name}'`));
  console.log(chalk.dim(`    Score:  ${formatScore(selection.score)}`));
  console.log(chalk.dim(`    Reason: ${selection.reason}`));
}

// ─── Verification ────────────────────────────────────────────

/**
 * Display a verification verdict.
 */
export function showVerdict(verdict: VerificationVerdict): void {
  const color = verdict.match ? chalk.green.bold : chalk.red.bold;

  console.log();
  console.log(color(RULE));
  console.log(color(verdict.match ? '  ✓ VERIFICATION PASSED' : '  ✗ VERIFICATION FAILED'));
  console.log(color(RULE));
  console.log();
  console.log(`  ${chalk.white('Files:')}       ${verdict.totalRecords}`);
  console.log(`  ${chalk.white('Before hash:')} ${chalk.dim(verdict.beforeDigest)}`);
  console.log(`  ${chalk.white('After hash:')}  ${chalk.dim(verdict.afterDigest)}`);
  console.log();

  if (verdict.match) {
    console.log(chalk.green('  Hashes match - no modifications detected'));
    return;
  }

  console.log(chalk.red('  Hashes do NOT match - modifications detected'));
  if (verdict.missing.length > 0) {
    console.log();
    console.log(chalk.red(`  Missing from post capture (${verdict.missing.length}):`));
    for (const record of verdict.missing) {
      console.log(`    ${chalk.bold(record.recordName ?? '(unnamed)')} ${chalk.dim(record.recordId)}`);
    }
  } else if (verdict.violations.length === 0) {
    console.log(chalk.yellow('  No critical timestamp changed; other fields or record order differ'));
  }

  for (const check of verdict.violations) {
    console.log();
    console.log(`  ${chalk.bold(check.recordName ?? '(unnamed)')} ${chalk.dim(check.recordId ?? '')}`);
    for (const field of CRITICAL_FIELD_KEYS) {
      const change = check.changes[field];
      if (!change) continue;
      console.log(`    ${CRITICAL_FIELD_LABELS[field]}:`);
      console.log(`      Before: ${String(change.before ?? '(none)')}`);
      console.log(`      After:  ${String(change.after ?? '(none)')}`);
    }
  }

  console.log();
  console.log(chalk.red('  Integrity: COMPROMISED - manual review required'));
}

// ─── Coverage ────────────────────────────────────────────────

/**
 * Display which files have revision history and which need screenshots.
 */
export function showCoverage(report: CoverageReport): void {
  console.log(`  ${chalk.green('✓')} Files with complete API access: ${report.withRevisions.length}`);
  console.log(`  ${chalk.yellow('⚠')} Files without revisions:       ${report.needsScreenshots.length}`);

  if (report.withRevisions.length > 0) {
    console.log();
    for (const file of report.withRevisions.slice(0, 10)) {
      console.log(`    ${file.name}`);
      console.log(
        chalk.dim(`      ↳ ${file.revisions} revisions, ${file.comments} comments, ${file.permissions} permissions`),
      );
    }
    if (report.withRevisions.length > 10) {
      console.log(chalk.dim(`    ... and ${report.withRevisions.length - 10} more`));
    }
  }

  if (report.needsScreenshots.length > 0) {
    console.log();
    console.log(chalk.yellow.bold('  Needs screenshot capture (Details + Activity):'));
    report.needsScreenshots.forEach((item, i) => {
      console.log(`    ${i + 1}. ${item.file_name}`);
    });
  } else {
    console.log();
    console.log(chalk.green('  All files provided revision history. No screenshots needed.'));
  }
}
