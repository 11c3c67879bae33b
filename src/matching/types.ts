/**
 * Name Matching Types
 *
 * Shapes shared by the scorer, the index-notation parser and the resolver.
 * Handles are opaque: the resolver hands them back untouched.
 */

// ─── Candidates ──────────────────────────────────────────────

/**
 * One named item the query is resolved against.
 */
export interface CandidateName<H = unknown> {
  /** Display name as shown by the storage provider */
  name: string;
  /** Caller-owned reference (file id, element, ...) */
  handle: H;
}

/**
 * A candidate that passed the similarity threshold.
 */
export interface ScoredMatch<H = unknown> {
  candidate: CandidateName<H>;
  /** Similarity in [0, 1] */
  score: number;
  /** Index of the candidate in the input list */
  position: number;
}

// ─── Query & Result ──────────────────────────────────────────

export interface IndexedQuery {
  /** Query with any trailing index suffix removed */
  cleanTerm: string;
  /** 1-based index from `[n]`, `#n` or `(n)`, if present */
  index: number | null;
}

export interface MatchOptions {
  /** Minimum score to keep a candidate (default 0.6) */
  similarityThreshold?: number;
  /** Scores closer than `1 - duplicateCloseness` are grouped (default 0.95) */
  duplicateCloseness?: number;
  /** Cap on returned matches (default 10) */
  maxResults?: number;
}

export interface MatchResult<H = unknown> {
  /** Ranked matches, best first, capped at maxResults */
  readonly matches: ReadonlyArray<ScoredMatch<H>>;
  readonly hasDuplicates: boolean;
  /** Runs of adjacent matches with near-identical scores */
  readonly duplicateGroups: ReadonlyArray<ReadonlyArray<ScoredMatch<H>>>;
  /** Query exactly as entered */
  readonly query: string;
  readonly cleanTerm: string;
  readonly explicitIndex: number | null;
  /** Matches above threshold before capping */
  readonly totalMatches: number;
}

// ─── Selection ───────────────────────────────────────────────

export type SelectionStrategy = 'first' | 'indexed' | 'newest' | 'oldest' | 'largest' | 'ask';

export const SELECTION_STRATEGIES: readonly SelectionStrategy[] = [
  'first',
  'indexed',
  'newest',
  'oldest',
  'largest',
  'ask',
];

/**
 * Per-candidate attributes used by metadata strategies and prompts.
 * Values arrive from collaborators untyped; unusable ones count as absent.
 */
export interface SideMetadata {
  modifiedTime?: unknown;
  size?: unknown;
  location?: unknown;
  [key: string]: unknown;
}

export interface Selection<H = unknown> {
  candidate: CandidateName<H>;
  score: number;
  /** Index of the candidate in the input list */
  position: number;
  /** 1-based rank within the result's matches */
  rank: number;
  /** Human-readable explanation, including any fallback */
  reason: string;
}
