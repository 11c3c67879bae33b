/**
 * Name resolution shared by `match` and `baseline`.
 */

import { findMatches, selectMatch } from '../matching/resolver.js';
import type {
  MatchOptions,
  MatchResult,
  Selection,
  SelectionStrategy,
  SideMetadata,
} from '../matching/types.js';
import type { SourceEntry } from '../capture/interface.js';
import { selectCandidate } from '../cli/prompts.js';

export interface Resolution {
  result: MatchResult<SourceEntry>;
  selection: Selection<SourceEntry> | null;
  /** Side metadata aligned with `result.matches` */
  sideMetadata: SideMetadata[];
}

/**
 * Strategy actually applied to a result. An index in the query always wins;
 * without duplicates the best match is unambiguous.
 */
export function effectiveStrategy(
  result: MatchResult<SourceEntry>,
  configured: SelectionStrategy,
): SelectionStrategy {
  if (result.explicitIndex !== null) return 'indexed';
  if (!result.hasDuplicates) return 'first';
  return configured;
}

/**
 * Resolve a query against listed entries. With `interactive`, a result the
 * strategy cannot decide is put to the user.
 */
export async function resolveName(
  query: string,
  entries: ReadonlyArray<SourceEntry>,
  options: MatchOptions,
  strategy: SelectionStrategy,
  interactive = true,
): Promise<Resolution> {
  const result = findMatches(
    query,
    entries.map((entry) => ({ name: entry.name, handle: entry })),
    options,
  );
  const sideMetadata = result.matches.map((match) => match.candidate.handle.side);
  const selection = selectMatch(result, effectiveStrategy(result, strategy), sideMetadata);

  if (selection !== null || !interactive || result.matches.length === 0) {
    return { result, selection, sideMetadata };
  }

  const choice = await selectCandidate(result, sideMetadata);
  if (choice === null) {
    return { result, selection: null, sideMetadata };
  }

  const match = result.matches[choice];
  return {
    result,
    sideMetadata,
    selection: {
      candidate: match.candidate,
      score: match.score,
      position: match.position,
      rank: choice + 1,
      reason: 'Selected by user',
    },
  };
}
