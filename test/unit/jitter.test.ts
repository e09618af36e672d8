import { describe, it, expect } from 'vitest';
import { getJitter, halton, JITTER_SEQUENCE_LENGTH } from '../../src/jitter';

describe('halton', () => {
  it('produces the radical inverse in base 2', () => {
    expect([1, 2, 3, 4].map((i) => halton(i, 2))).toEqual([0.5, 0.25, 0.75, 0.125]);
  });

  it('produces the radical inverse in base 3', () => {
    expect(halton(1, 3)).toBeCloseTo(1 / 3, 12);
    expect(halton(2, 3)).toBeCloseTo(2 / 3, 12);
    expect(halton(3, 3)).toBeCloseTo(1 / 9, 12);
  });

  it('is 0 for index 0', () => {
    expect(halton(0, 2)).toBe(0);
  });
});

describe('getJitter', () => {
  it('starts the sequence at Halton index 1', () => {
    const [x, y] = getJitter(0, [100, 50]);
    expect(x).toBe(0);
    expect(y).toBeCloseTo(-1 / 150, 12);
  });

  it('repeats after the sequence length', () => {
    expect(getJitter(JITTER_SEQUENCE_LENGTH + 3, [64, 32])).toEqual(getJitter(3, [64, 32]));
  });

  it('stays within one pixel', () => {
    for (let frame = 0; frame < JITTER_SEQUENCE_LENGTH; frame++) {
      const [x, y] = getJitter(frame, [64, 32]);
      expect(Math.abs(x)).toBeLessThanOrEqual(1 / 64);
      expect(Math.abs(y)).toBeLessThanOrEqual(1 / 32);
    }
  });
});
