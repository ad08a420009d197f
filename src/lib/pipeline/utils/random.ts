/**
 * Seeded randomness for the optimizer.
 * Same seed, same stream: two runs on identical input give identical itineraries.
 */

export type RandomFn = () => number;

/**
 * mulberry32: small 32-bit generator, returns floats in [0, 1).
 */
export function createSeededRandom(seed: number): RandomFn {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [0, n) */
export function randomIndex(n: number, randomFn: RandomFn): number {
  return Math.floor(randomFn() * n);
}

export function pickWithRandom<T>(arr: readonly T[], randomFn: RandomFn): T {
  return arr[randomIndex(arr.length, randomFn)];
}
