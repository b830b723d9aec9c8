/**
 * Random sources for generation
 */

import type { RandomSource } from './types.js';

/**
 * Mulberry32 PRNG. The same seed always produces the same stream of values
 * in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? Math.random : createSeededRandom(seed);
}
