export type RandomSource = () => number;

/**
 * Deterministic seeded PRNG (mulberry32). Returns floats in [0, 1).
 */
export function createRng(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** A number seeds a PRNG, a function is used as is, nothing falls back to Math.random */
export function resolveRandomSource(seed?: number | RandomSource): RandomSource {
  if (typeof seed === "function") return seed;
  if (seed === undefined) return Math.random;
  return createRng(seed);
}

/** Shuffle an array in place (Fisher-Yates) */
export function shuffle<T>(items: T[], rng: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

export function pickRandom<T>(items: readonly T[], rng: RandomSource): T {
  if (items.length === 0) throw new Error("Cannot pick from an empty list");
  return items[Math.floor(rng() * items.length)];
}
