/**
 * Index notation in queries: "Report [2]", "Report #2", "Report (2)".
 */

import type { IndexedQuery } from './types.js';

/** Checked in this order; only the first match is stripped. */
const INDEX_PATTERNS: readonly RegExp[] = [
  /\s*\[(\d+)\]\s*$/,
  /\s*#(\d+)\s*$/,
  /\s*\((\d+)\)\s*$/,
];

/**
 * Split a trailing disambiguation index off a query.
 *
 * @example
 * parseIndexedQuery('Untitled Document [2]') // { cleanTerm: 'Untitled Document', index: 2 }
 * parseIndexedQuery('Resume')                // { cleanTerm: 'Resume', index: null }
 */
export function parseIndexedQuery(query: string): IndexedQuery {
  for (const pattern of INDEX_PATTERNS) {
    const match = pattern.exec(query);
    if (match) {
      return {
        cleanTerm: query.slice(0, match.index).trim(),
        index: Number.parseInt(match[1], 10),
      };
    }
  }

  return { cleanTerm: query, index: null };
}
