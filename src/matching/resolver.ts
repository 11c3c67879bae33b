/**
 * Match Resolver
 *
 * Resolves a human-entered file name against a live listing: scores every
 * candidate, ranks the survivors, groups near-identical scores as duplicates
 * and picks one match according to a selection strategy.
 *
 * Pure and stateless. A `null` selection means the caller must prompt.
 */

import { parseIndexedQuery } from './index-notation.js';
import { scoreSimilarity } from './similarity.js';
import type {
  CandidateName,
  MatchOptions,
  MatchResult,
  ScoredMatch,
  Selection,
  SelectionStrategy,
  SideMetadata,
} from './types.js';

export const DEFAULT_MATCH_OPTIONS: Required<MatchOptions> = {
  similarityThreshold: 0.6,
  duplicateCloseness: 0.95,
  maxResults: 10,
};

// ─── Matching ────────────────────────────────────────────────

/**
 * Find candidates matching a query and detect duplicate groups.
 *
 * Duplicate detection runs over every match above the threshold,
 * before the list is capped at `maxResults`.
 */
export function findMatches<H>(
  query: string,
  candidates: ReadonlyArray<CandidateName<H>>,
  options: MatchOptions = {},
): MatchResult<H> {
  const similarityThreshold = options.similarityThreshold ?? DEFAULT_MATCH_OPTIONS.similarityThreshold;
  const duplicateCloseness = options.duplicateCloseness ?? DEFAULT_MATCH_OPTIONS.duplicateCloseness;
  const maxResults = options.maxResults ?? DEFAULT_MATCH_OPTIONS.maxResults;
  const { cleanTerm, index } = parseIndexedQuery(query);

  const ranked: ScoredMatch<H>[] = candidates
    .map((candidate, position) => ({
      candidate,
      score: scoreSimilarity(cleanTerm, candidate.name),
      position,
    }))
    .filter((match) => match.score >= similarityThreshold)
    .sort((a, b) => b.score - a.score);

  const duplicateGroups = groupDuplicates(ranked, 1.0 - duplicateCloseness);

  return {
    matches: ranked.slice(0, Math.max(0, maxResults)),
    hasDuplicates: duplicateGroups.length > 0,
    duplicateGroups,
    query,
    cleanTerm,
    explicitIndex: index,
    totalMatches: ranked.length,
  };
}

/**
 * Split a ranked list into runs whose adjacent gaps stay below `tolerance`.
 * Only runs of two or more are returned.
 */
function groupDuplicates<H>(
  ranked: ReadonlyArray<ScoredMatch<H>>,
  tolerance: number,
): ScoredMatch<H>[][] {
  const groups: ScoredMatch<H>[][] = [];
  let current: ScoredMatch<H>[] = [];

  for (const match of ranked) {
    const previous = current[current.length - 1];
    if (previous && Math.abs(previous.score - match.score) < tolerance) {
      current.push(match);
      continue;
    }
    if (current.length > 1) groups.push(current);
    current = [match];
  }
  if (current.length > 1) groups.push(current);

  return groups;
}

// ─── Selection ───────────────────────────────────────────────

/**
 * Pick one match from a result.
 *
 * @param result - Output of {@link findMatches}
 * @param strategy - How to choose among the matches
 * @param sideMetadata - Attributes aligned with `result.matches`, for
 *   `newest`, `oldest` and `largest`
 * @returns The selection, or `null` when the caller must ask the user
 */
export function selectMatch<H>(
  result: MatchResult<H>,
  strategy: SelectionStrategy,
  sideMetadata?: ReadonlyArray<SideMetadata>,
): Selection<H> | null {
  const { matches } = result;
  if (matches.length === 0) {
    return null;
  }

  switch (strategy) {
    case 'ask':
      return null;

    case 'first': {
      const reason = result.hasDuplicates
        ? 'Highest similarity score (duplicates detected - consider using index notation)'
        : 'Highest similarity score';
      return toSelection(matches, 0, reason);
    }

    case 'indexed': {
      const requested = result.explicitIndex;
      if (requested === null) {
        return null;
      }
      if (requested >= 1 && requested <= matches.length) {
        return toSelection(matches, requested - 1, `Selected by index #${requested}`);
      }
      return toSelection(
        matches,
        0,
        `Index #${requested} out of range (only ${matches.length} matches), using first match`,
      );
    }

    case 'newest':
    case 'oldest':
    case 'largest': {
      if (!sideMetadata || sideMetadata.length !== matches.length) {
        return toSelection(
          matches,
          0,
          `Metadata unavailable or misaligned for '${strategy}' strategy, using first match`,
        );
      }
      return selectByMetadata(matches, strategy, sideMetadata);
    }
  }
}

function selectByMetadata<H>(
  matches: ReadonlyArray<ScoredMatch<H>>,
  strategy: 'newest' | 'oldest' | 'largest',
  sideMetadata: ReadonlyArray<SideMetadata>,
): Selection<H> {
  switch (strategy) {
    case 'newest': {
      const times = sideMetadata.map((m) => readTimestamp(m.modifiedTime));
      return toSelection(matches, pickExtreme(times, (a, b) => a > b), 'Selected by newest modified date');
    }
    case 'oldest': {
      const times = sideMetadata.map((m) => readTimestamp(m.modifiedTime));
      return toSelection(matches, pickExtreme(times, (a, b) => a < b), 'Selected by oldest modified date');
    }
    case 'largest': {
      const sizes = sideMetadata.map((m) => readSize(m.size));
      return toSelection(matches, pickExtreme(sizes, (a, b) => a > b), 'Selected by largest file size');
    }
  }
}

/**
 * Index of the best present value. Absent values never win, and only a
 * strictly better value displaces the current pick, so ties keep ranked order.
 */
function pickExtreme<T>(values: ReadonlyArray<T | null>, better: (a: T, b: T) => boolean): number {
  let best = 0;
  let bestValue: T | null = values[0] ?? null;

  for (let i = 1; i < values.length; i++) {
    const value = values[i];
    if (value === null) continue;
    if (bestValue === null || better(value, bestValue)) {
      best = i;
      bestValue = value;
    }
  }

  return best;
}

function readTimestamp(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function readSize(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && /^\s*\d+(\.\d+)?\s*$/.test(value)) {
    return Number(value);
  }
  return null;
}

function toSelection<H>(
  matches: ReadonlyArray<ScoredMatch<H>>,
  index: number,
  reason: string,
): Selection<H> {
  const match = matches[index];
  return {
    candidate: match.candidate,
    score: match.score,
    position: match.position,
    rank: index + 1,
    reason,
  };
}
