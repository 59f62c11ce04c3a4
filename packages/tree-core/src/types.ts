// ---------------------------------------------------------------------------
// Core Types
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning values in [0, 1). */
export type PRNG = () => number;

/**
 * Class label attached to a training item and produced by classification.
 * Categories are compared with SameValueZero, the semantics of `Map` keys.
 */
export type Category = string | number | boolean;

/** Votes per category, as returned by ensemble classification. */
export type CategoryHistogram = Map<Category | undefined, number>;

// ---------------------------------------------------------------------------
// Randomness
// ---------------------------------------------------------------------------

/** Create a seeded PRNG (mulberry32). */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates shuffle of a copy of `items`; the input is left untouched. */
export function shuffled<T>(items: readonly T[], rng: PRNG): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = out[i]!;
    out[i] = out[j]!;
    out[j] = tmp;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Category ordering
// ---------------------------------------------------------------------------

function typeRank(category: Category): number {
  switch (typeof category) {
    case 'number':
      return 0;
    case 'string':
      return 1;
    default:
      return 2;
  }
}

/**
 * Total order over categories used to break ties between equally frequent
 * categories: numbers (numerically), then strings (by code unit), then
 * `false` before `true`.
 */
export function compareCategories(a: Category, b: Category): number {
  const rank = typeRank(a) - typeRank(b);
  if (rank !== 0) return rank;
  if (typeof a === 'string' && typeof b === 'string') {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
  return Number(a) - Number(b);
}
