import { describe, expect, it } from 'vitest';
import { mulberry32, randomInt, randomSigned } from './random';

describe('mulberry32', () => {
  it('repeats the sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const seqA = Array.from({ length: 16 }, () => a());
    const seqB = Array.from({ length: 16 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it('differs between seeds and stays in [0, 1)', () => {
    const a = mulberry32(1);
    const b = mulberry32(2);
    const seqA = Array.from({ length: 64 }, () => a());
    const seqB = Array.from({ length: 64 }, () => b());
    expect(seqA).not.toEqual(seqB);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe('randomInt', () => {
  it('maps [0, 1) onto [0, max)', () => {
    expect(randomInt(() => 0, 10)).toBe(0);
    expect(randomInt(() => 0.55, 10)).toBe(5);
    expect(randomInt(() => 0.999, 10)).toBe(9);
  });

  it('clamps a generator returning 1', () => {
    expect(randomInt(() => 1, 10)).toBe(9);
  });

  it('does not consume a value for a single candidate', () => {
    let calls = 0;
    const random = () => {
      calls += 1;
      return 0.5;
    };
    expect(randomInt(random, 1)).toBe(0);
    expect(calls).toBe(0);
  });
});

describe('randomSigned', () => {
  it('maps [0, 1) onto [-1, 1)', () => {
    expect(randomSigned(() => 0)).toBe(-1);
    expect(randomSigned(() => 0.5)).toBe(0);
    expect(randomSigned(() => 0.75)).toBe(0.5);
  });
});
