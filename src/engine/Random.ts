// ---------------------------------------------------------------------------
// Random.ts — Injectable random sources
// ---------------------------------------------------------------------------
// Every roll in combat (attack variance, skill variance, flee chance, enemy
// selection) goes through a RandomSource so encounters replay under a seed.
// ---------------------------------------------------------------------------

/** A source of floats in `[0, 1)`. */
export interface RandomSource {
  next(): number;
}

/** Production source backed by `Math.random`. */
export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic source (mulberry32).  The same seed always yields the same
 * sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let result = Math.imul(state ^ (state >>> 15), state | 1);
      result ^= result + Math.imul(result ^ (result >>> 7), result | 61);
      return ((result ^ (result >>> 14)) >>> 0) / 4_294_967_296;
    },
  };
}

/** Uniform float in `[min, max)`. */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/** Pick one element uniformly.  Returns `undefined` for an empty list. */
export function pickOne<T>(rng: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length));
  return items[index];
}
