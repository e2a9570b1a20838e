/**
 * Seedable random source
 * 
 * Every random draw of a render goes through one of these so a fixed seed
 * reproduces the exact output.
 */

import seedrandom from 'seedrandom';

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform float in [min, max] */
  range(min: number, max: number): number;
  /** Uniform integer in [min, max] */
  int(min: number, max: number): number;
}

export function createRandom(seed?: string): RandomSource {
  // no seed -> auto-seeded from entropy
  const rng = seedrandom(seed);

  return {
    next: () => rng(),
    range: (min, max) => min + rng() * (max - min),
    int: (min, max) => min + Math.floor(rng() * (max - min + 1)),
  };
}
