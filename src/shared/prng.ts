/** Seeded generator for reproducible playouts and fuzz fixtures. */
export interface Prng {
  /** Uniform in [0, 1). */
  next(): number;
  int(min: number, maxExclusive: number): number;
  pick<T>(items: readonly T[]): T;
}

// FNV-1a, so string seeds ("fuzz-7") are as usable as numeric ones.
function hashSeed(seed: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Mulberry32
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createPrng(seed: number | string): Prng {
  const next = mulberry32(typeof seed === "string" ? hashSeed(seed) : seed);

  const int = (min: number, maxExclusive: number): number => {
    const lo = Math.floor(min);
    const hi = Math.floor(maxExclusive);
    if (hi <= lo) return lo;
    return lo + Math.floor(next() * (hi - lo));
  };

  return {
    next,
    int,
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) throw new Error("prng: pick() from empty array");
      return items[int(0, items.length)];
    },
  };
}
