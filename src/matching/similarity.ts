/**
 * Similarity Scoring
 *
 * Scores how well a typed query matches a candidate file name.
 * Tiers, first applicable wins:
 *   1. exact (case-insensitive, trimmed)          → 1.0
 *   2. query contained in candidate               → 0.85 + 0.15 × coverage
 *   3. 0.7 × sequence ratio + 0.3 × word overlap
 */

const CONTAINMENT_BASE = 0.85;
const CONTAINMENT_SPAN = 0.15;
const SEQUENCE_WEIGHT = 0.7;
const WORD_WEIGHT = 0.3;

/**
 * Score a query against a candidate name. Always in [0, 1].
 */
export function scoreSimilarity(query: string, candidate: string): number {
  const q = query.trim().toLowerCase();
  const c = candidate.trim().toLowerCase();

  if (q === c) {
    return 1.0;
  }

  if (c.includes(q)) {
    return CONTAINMENT_BASE + CONTAINMENT_SPAN * (q.length / c.length);
  }

  return SEQUENCE_WEIGHT * sequenceRatio(q, c) + WORD_WEIGHT * wordOverlap(q, c);
}

/**
 * Fraction of the query's distinct words that also appear in the candidate.
 */
export function wordOverlap(query: string, candidate: string): number {
  const queryWords = new Set(splitWords(query));
  const candidateWords = new Set(splitWords(candidate));

  let common = 0;
  for (const word of queryWords) {
    if (candidateWords.has(word)) common++;
  }

  return common / Math.max(queryWords.size, 1);
}

/**
 * Ratcliff/Obershelp ratio: 2M / (|a| + |b|), where M counts the characters
 * in the longest common blocks found recursively left and right of each block.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1.0;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}

function countMatchingCharacters(a: string, b: string): number {
  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;

    const { i, j, size } = longestCommonBlock(a, b, aLo, aHi, bLo, bHi);
    if (size === 0) continue;

    matched += size;
    if (aLo < i && bLo < j) {
      queue.push([aLo, i, bLo, j]);
    }
    if (i + size < aHi && j + size < bHi) {
      queue.push([i + size, aHi, j + size, bHi]);
    }
  }

  return matched;
}

/**
 * Longest common substring of a[aLo:aHi] and b[bLo:bHi].
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function longestCommonBlock(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): { i: number; j: number; size: number } {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;

  // previous.get(j) = length of the common run ending at a[i-1], b[j]
  let previous = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const current = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, size);
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    previous = current;
  }

  return { i: bestI, j: bestJ, size: bestSize };
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}
