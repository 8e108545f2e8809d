/**
 * Uniform random source for the engine.
 *
 * The engine draws randomness in exactly two places: seeding a cycle target
 * and rolling for a reflection token. Both go through this interface so
 * tests and replays can inject a deterministic source.
 */

/**
 * Rng: Returns a float in [0, 1) on every call.
 */
export interface Rng {
  next(): number;
}

/**
 * Process randomness. Used when no seed is configured.
 */
export const mathRandomRng: Rng = {
  next() {
    return Math.random();
  },
};

/**
 * Seeded generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRng(seed: number): Rng {
  let a = seed >>> 0;

  return {
    next() {
      a = (a + 0x6d2b79f5) >>> 0;
      let t = a;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Draws one index uniformly from [0, length).
 *
 * Clamped so a source that returns exactly 1 still lands on the last index.
 */
export function pickIndex(rng: Rng, length: number): number {
  if (length <= 0) {
    throw new RangeError('pickIndex requires a non-empty candidate set');
  }
  return Math.min(length - 1, Math.floor(rng.next() * length));
}
