/**
 * Seeded randomness for reproducible splits and sample selection.
 */

export type RandomSource = () => number;

/**
 * Seeded pseudo-random number generator (Mulberry32).
 *
 * @returns Function that generates numbers in [0, 1)
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed;
  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw a fresh 32-bit seed. Used when the caller does not supply one, so the
 * run can still be reproduced from the seed reported in its result.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}

/**
 * Fisher-Yates shuffle. Returns a new array; the input is left untouched.
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  return sampleWithoutReplacement(items, items.length, random);
}

/**
 * Pick `count` items uniformly at random without replacement (partial
 * Fisher-Yates). Returns every item, shuffled, when fewer are available.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource,
): T[] {
  const pool = [...items];
  const n = Math.min(Math.max(0, Math.floor(count)), pool.length);
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j]!, pool[i]!];
  }
  return pool.slice(0, n);
}
