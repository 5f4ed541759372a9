/**
 * Injectable randomness for sampling. Sessions use Math.random unless a
 * seed is configured; tests pass a seeded source.
 */

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * mulberry32 PRNG
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      let t = (state += 0x6d2b79f5);
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Integer in [0, maxExclusive) */
export function randomInt(rng: RandomSource, maxExclusive: number): number {
  return Math.floor(rng.next() * maxExclusive);
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const a = [...items];
  for (let i = a.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

/**
 * Uniform sample of min(k, items.length) distinct elements
 */
export function sampleWithoutReplacement<T>(items: readonly T[], k: number, rng: RandomSource): T[] {
  return shuffle(items, rng).slice(0, Math.max(0, Math.min(k, items.length)));
}
