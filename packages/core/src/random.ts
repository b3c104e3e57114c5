/**
 * Seeded randomness for a session. Every stochastic step receives the session's
 * own generator so identical seeds give identical event streams and parallel
 * sessions never share state.
 */

export type Rng = () => number;

export const DEFAULT_SEED = 1337;

/**
 * mulberry32: 32-bit state, values in [0, 1).
 */
export function createRng(seed: number | undefined): Rng {
  let state = (seed ?? DEFAULT_SEED) >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

/** Box-Muller; `1 - rng()` keeps the log argument away from zero. */
export function gaussian(rng: Rng, mean: number, sd: number): number {
  const u1 = 1 - rng();
  const u2 = rng();
  return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Picks an index from a weighted table. Weights need not sum to one.
 */
export function weightedIndex(rng: Rng, weights: readonly number[]): number {
  if (weights.length === 0) {
    throw new Error("weightedIndex requires at least one weight");
  }
  const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0);
  if (total <= 0) {
    return 0;
  }
  let roll = rng() * total;
  for (let i = 0; i < weights.length; i++) {
    roll -= Math.max(0, weights[i]);
    if (roll < 0) {
      return i;
    }
  }
  return weights.length - 1;
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
