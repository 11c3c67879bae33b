import { describe, it, expect } from 'vitest';
import { describeCandidate, formatDuplicateWarning, formatScore, formatSize } from '../format.js';
import { findMatches } from '../resolver.js';

describe('formatScore', () => {
  it('should render one decimal percentage', () => {
    expect(formatScore(1)).toBe('100.0%');
    expect(formatScore(0.97142857)).toBe('97.1%');
  });
});

describe('formatSize', () => {
  it('should pick a unit', () => {
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(1024)).toBe('1024 B');
    expect(formatSize(2048)).toBe('2.0 KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.0 MB');
  });
});

describe('describeCandidate', () => {
  it('should join the known attributes', () => {
    expect(
      describeCandidate(0.5, {
        modifiedTime: '2024-10-27T14:03:00.000Z',
        size: '2048',
        location: 'My Drive',
      }),
    ).toBe('Similarity: 50.0% • Modified: 2024-10-27 • Size: 2.0 KB • Location: My Drive');
  });

  it('should skip unusable attributes', () => {
    expect(describeCandidate(1, { modifiedTime: 7, size: 'n/a', location: '' })).toBe('Similarity: 100.0%');
  });
});

describe('formatDuplicateWarning', () => {
  it('should be empty without duplicates', () => {
    const result = findMatches('budget', [{ name: 'Budget 2024', handle: 1 }]);
    expect(formatDuplicateWarning(result)).toBe('');
  });

  it('should list matches and index notation hints', () => {
    const result = findMatches('Plan', [
      { name: 'Plan', handle: 1 },
      { name: 'Plan', handle: 2 },
    ]);

    expect(formatDuplicateWarning(result).split('\n')).toEqual([
      '⚠️  DUPLICATE FILES DETECTED!',
      "   Search: 'Plan'",
      '   Found 2 similar files:',
      '',
      '   1. Plan (100.0%)',
      '   2. Plan (100.0%)',
      '',
      '   💡 To select a specific file, use index notation:',
      "      'Plan [2]'  or",
      "      'Plan #2'  or",
      "      'Plan (2)'",
    ]);
  });
});
