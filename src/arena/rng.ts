/**
 * POKE ARENA - Seeded Random Source
 *
 * Every random draw in the engine (obstacle layout, target spawns, field type,
 * live damage jitter, search tie-breaks) goes through a RandomSource so a match
 * can be replayed exactly from its seed.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Uniform source of floats in [0, 1). */
export interface RandomSource {
  next(): number;
}

// ---------------------------------------------------------------------------
// Seeding
// ---------------------------------------------------------------------------

/**
 * Hash an arbitrary seed (number or string) down to a 32-bit unsigned int.
 * FNV-1a over the string form, so `42` and `'42'` seed identically.
 */
export function hashSeed(seed: number | string): number {
  const text = String(seed);
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Create a mulberry32 generator from a seed.
 */
export function createRng(seed: number | string): RandomSource {
  let state = hashSeed(seed);
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Wraps Math.random for callers that don't care about replays. */
export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Integer in [min, max) */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min));
}

/** Float in [min, max) */
export function randomRange(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/**
 * Pick one element uniformly. Throws on an empty list -- callers always have
 * at least one candidate.
 */
export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('pickOne called with an empty list');
  }
  return items[randomInt(rng, 0, items.length)];
}
