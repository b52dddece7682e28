import type { RandomSource } from '../domain/index.js';

/** Backed by `Math.random`. Used when no seed is configured. */
export const mathRandom: RandomSource = {
  nextInt(bound: number): number {
    return Math.floor(Math.random() * bound);
  },
};

/**
 * Deterministic source (mulberry32). The same seed always yields the same
 * sequence, which makes a gateway's split reproducible across restarts.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return {
    nextInt(bound: number): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      const fraction = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
      return Math.floor(fraction * bound);
    },
  };
}
