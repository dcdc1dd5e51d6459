import { describe, it, expect } from 'vitest';
import { formatSeq, popcount, show } from './utils';

describe('popcount', () => {
  it('should count set bits across the full word', () => {
    expect(popcount(0)).toBe(0);
    expect(popcount(0b1011)).toBe(3);
    expect(popcount(1 << 31)).toBe(1);
    expect(popcount(-1)).toBe(32);
  });
});

describe('formatSeq', () => {
  it('should join everything without a limit', () => {
    expect(formatSeq([1, 2, 3], String)).toBe('1, 2, 3');
    expect(formatSeq([], String)).toBe('');
  });

  it('should truncate with an ellipsis', () => {
    expect(formatSeq([0, 1, 2, 3, 4, 5, 6, 7, 8, 9], String, 12)).toBe('0, 1, 2, ...');
  });

  it('should keep output that fits exactly', () => {
    expect(formatSeq([1, 2, 3], String, 7)).toBe('1, 2, 3');
  });

  it('should honor a custom separator', () => {
    expect(formatSeq(['a', 'b'], (s) => s, undefined, '|')).toBe('a|b');
  });

  it('should reject a limit too small for the ellipsis', () => {
    expect(() => formatSeq([1], String, 2)).toThrow(RangeError);
  });
});

describe('show', () => {
  it('should quote strings and mark bigints', () => {
    expect(show('a"b')).toBe('"a\\"b"');
    expect(show(10n)).toBe('10n');
    expect(show(null)).toBe('null');
    expect(show(1.5)).toBe('1.5');
  });
});
