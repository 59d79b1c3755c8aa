/**
 * Uniform random sources for word selection.
 */

import { randomInt } from 'node:crypto';

/**
 * Source of uniformly distributed integers.
 */
export interface RandomSource {
  /**
   * Return an integer in `[0, bound)`. `bound` is a positive safe integer.
   */
  nextInt(bound: number): number;
}

/**
 * Random source backed by `crypto.randomInt`, free of modulo bias.
 */
export const cryptoRandom: RandomSource = {
  nextInt: (bound) => randomInt(bound),
};

/**
 * Deterministic random source (mulberry32) for reproducible output.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    nextInt: (bound) => Math.floor(next() * bound),
  };
}

/**
 * Pick one element uniformly, or `undefined` from an empty list.
 */
export function choose<T>(
  items: readonly T[],
  random: RandomSource
): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[random.nextInt(items.length)];
}
