import { describe, it, expect } from 'vitest';
import { candidateOptions } from '../prompts.js';
import { findMatches } from '../../matching/resolver.js';

describe('candidateOptions', () => {
  const result = findMatches('Plan', [
    { name: 'Plan', handle: 'p1' },
    { name: 'Plan', handle: 'p2' },
  ]);

  it('should offer every match plus cancel', () => {
    const options = candidateOptions(result, [
      { modifiedTime: '2024-10-27T14:03:00.000Z', size: 2048, location: 'My Drive' },
      {},
    ]);

    expect(options).toEqual([
      {
        value: 0,
        label: '1. Plan',
        description: 'Similarity: 100.0% • Modified: 2024-10-27 • Size: 2.0 KB • Location: My Drive',
      },
      { value: 1, label: '2. Plan', description: 'Similarity: 100.0%' },
      { value: -1, label: 'Cancel' },
    ]);
  });

  it('should work without side metadata', () => {
    expect(candidateOptions(result).map((o) => o.description)).toEqual([
      'Similarity: 100.0%',
      'Similarity: 100.0%',
      undefined,
    ]);
  });
});
