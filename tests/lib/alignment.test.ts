import { describe, it, expect } from 'vitest';
import { splitPadding } from '@/lib/alignment.js';
import { Alignment } from '@/types/pad.js';

describe('splitPadding', () => {
  it('puts all fill after the source for Left', () => {
    expect(splitPadding(5, Alignment.Left)).toEqual({ leading: 0, trailing: 5 });
  });

  it('puts all fill before the source for Right', () => {
    expect(splitPadding(5, Alignment.Right)).toEqual({ leading: 5, trailing: 0 });
  });

  it('splits an even difference evenly for Center', () => {
    expect(splitPadding(4, Alignment.Center)).toEqual({ leading: 2, trailing: 2 });
  });

  it('gives the odd remainder to the trailing side for Center', () => {
    expect(splitPadding(5, Alignment.Center)).toEqual({ leading: 2, trailing: 3 });
    expect(splitPadding(1, Alignment.Center)).toEqual({ leading: 0, trailing: 1 });
  });

  it('returns no fill for a zero difference', () => {
    for (const alignment of [Alignment.Left, Alignment.Right, Alignment.Center]) {
      expect(splitPadding(0, alignment)).toEqual({ leading: 0, trailing: 0 });
    }
  });

  it('always sums to the difference', () => {
    for (let diff = 0; diff < 50; diff++) {
      for (const alignment of [Alignment.Left, Alignment.Right, Alignment.Center]) {
        const { leading, trailing } = splitPadding(diff, alignment);
        expect(leading + trailing).toBe(diff);
      }
    }
  });
});
