/**
 * Random sources for dice rolls
 */

import { randomInt } from 'node:crypto';
import seedrandom from 'seedrandom';

/**
 * Supplies integers for die faces. Both bounds are inclusive.
 */
export interface RandomSource {
  nextInt(min: number, max: number): number;
}

/**
 * Default source backed by the platform CSPRNG
 */
export const cryptoRandomSource: RandomSource = {
  nextInt(min: number, max: number): number {
    return randomInt(min, max + 1);
  },
};

/**
 * Deterministic source: the same seed always yields the same sequence.
 */
export function createSeededRandomSource(seed: string): RandomSource {
  const prng = seedrandom(seed);
  return {
    nextInt(min: number, max: number): number {
      return min + Math.floor(prng() * (max - min + 1));
    },
  };
}
