/**
 * Plain-text rendering of match results for terminals and prompts.
 * No colors here; the CLI styles these lines.
 */

import type { MatchResult, SideMetadata } from './types.js';

/**
 * Format a score as a percentage with one decimal, e.g. 0.9714 → "97.1%".
 */
export function formatScore(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

/**
 * Format a byte count the way the storage UI shows it.
 */
export function formatSize(bytes: number): string {
  if (bytes > 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  if (bytes > 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${bytes} B`;
}

/**
 * One-line description of a candidate for a selection prompt:
 * "Similarity: 97.1% • Modified: 2024-10-27 • Size: 1.0 KB • Location: My Drive"
 */
export function describeCandidate(score: number, meta: SideMetadata = {}): string {
  const parts = [`Similarity: ${formatScore(score)}`];

  if (typeof meta.modifiedTime === 'string' && meta.modifiedTime !== '') {
    parts.push(`Modified: ${meta.modifiedTime.split('T')[0]}`);
  }

  const size = typeof meta.size === 'string' ? Number(meta.size) : meta.size;
  if (typeof size === 'number' && Number.isFinite(size)) {
    parts.push(`Size: ${formatSize(size)}`);
  }

  if (typeof meta.location === 'string' && meta.location !== '') {
    parts.push(`Location: ${meta.location}`);
  }

  return parts.join(' • ');
}

/**
 * Warning block listing duplicate matches and how to pick one by index.
 * Empty string when the result has no duplicates.
 */
export function formatDuplicateWarning(result: MatchResult): string {
  if (!result.hasDuplicates) {
    return '';
  }

  const lines = [
    '⚠️  DUPLICATE FILES DETECTED!',
    `   Search: '${result.query}'`,
    `   Found ${result.totalMatches} similar files:`,
    '',
  ];

  result.matches.forEach((match, i) => {
    lines.push(`   ${i + 1}. ${match.candidate.name} (${formatScore(match.score)})`);
  });

  lines.push(
    '',
    '   💡 To select a specific file, use index notation:',
    `      '${result.cleanTerm} [2]'  or`,
    `      '${result.cleanTerm} #2'  or`,
    `      '${result.cleanTerm} (2)'`,
  );

  return lines.join('\n');
}
