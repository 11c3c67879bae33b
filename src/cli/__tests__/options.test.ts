import { InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';
import { parseCount, parseFraction, parseSessionIdArgument, parseStrategy } from '../options.js';

describe('option parsers', () => {
  it('should parse fractions in [0, 1]', () => {
    expect(parseFraction('0.75')).toBe(0.75);
    expect(parseFraction('1')).toBe(1);
    expect(() => parseFraction('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseFraction('')).toThrow('Expected a number between 0 and 1.');
  });

  it('should parse positive counts', () => {
    expect(parseCount('3')).toBe(3);
    expect(() => parseCount('0')).toThrow('Expected a positive integer.');
    expect(() => parseCount('2.5')).toThrow('Expected a positive integer.');
  });

  it('should parse strategies', () => {
    expect(parseStrategy('newest')).toBe('newest');
    expect(() => parseStrategy('random')).toThrow(
      'Expected one of: first, indexed, newest, oldest, largest, ask.',
    );
  });

  it('should parse session ids that are safe as file names', () => {
    expect(parseSessionIdArgument('20241027_140305')).toBe('20241027_140305');
    expect(parseSessionIdArgument('case-1.v2')).toBe('case-1.v2');
    expect(() => parseSessionIdArgument('../x')).toThrow(InvalidArgumentError);
    expect(() => parseSessionIdArgument('a/b')).toThrow(
      'Session id may only contain letters, digits, ".", "_" and "-".',
    );
  });
});
