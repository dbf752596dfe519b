import crypto from 'crypto';

export type Rng = () => number;

const SUB_SEED_LIMIT = 2 ** 31 - 1;

/**
 * Mulberry32 PRNG, floats in [0, 1)
 */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/**
 * One independent sub-seed per trial, all drawn from a generator seeded with
 * the master seed: same master seed, same trial seeds.
 */
export function deriveTrialSeeds(masterSeed: number, trials: number): number[] {
  const master = mulberry32(masterSeed);
  const seeds: number[] = [];
  for (let trial = 0; trial < trials; trial += 1) {
    seeds.push(randomInt(master, 0, SUB_SEED_LIMIT));
  }
  return seeds;
}

/** Fresh master seed for runs that did not ask for one; callers record it. */
export function drawMasterSeed(): number {
  return crypto.randomInt(0, SUB_SEED_LIMIT);
}
