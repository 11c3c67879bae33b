/**
 * Name Matching
 *
 * Resolves human-entered file names against a listing:
 * - Similarity scoring (exact, containment, fuzzy blend)
 * - Index notation: "Report [2]", "Report #2", "Report (2)"
 * - Duplicate grouping by score proximity
 * - Selection strategies: first, indexed, newest, oldest, largest, ask
 */

export type {
  CandidateName,
  ScoredMatch,
  IndexedQuery,
  MatchOptions,
  MatchResult,
  SelectionStrategy,
  SideMetadata,
  Selection,
} from './types.js';
export { SELECTION_STRATEGIES } from './types.js';

export { scoreSimilarity, sequenceRatio, wordOverlap } from './similarity.js';
export { parseIndexedQuery } from './index-notation.js';
export { findMatches, selectMatch, DEFAULT_MATCH_OPTIONS } from './resolver.js';
export {
  formatScore,
  formatSize,
  describeCandidate,
  formatDuplicateWarning,
} from './format.js';
