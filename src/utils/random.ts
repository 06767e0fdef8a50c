export type RandomFn = () => number;

/**
 * Small, fast seeded generator. Same seed, same sequence.
 */
export function mulberry32(seed: number): RandomFn {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in [0, maxExclusive). Guards against generators returning 1.
 */
export function randomInt(random: RandomFn, maxExclusive: number): number {
  if (maxExclusive <= 1) return 0;
  const value = Math.floor(random() * maxExclusive);
  return Math.max(0, Math.min(maxExclusive - 1, value));
}

/**
 * Uniform value in [-1, 1).
 */
export function randomSigned(random: RandomFn): number {
  return random() * 2 - 1;
}
