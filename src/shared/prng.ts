export type Prng = {
  nextFloat(): number; // [0,1)
  int(min: number, maxExclusive: number): number;
  pick<T>(arr: readonly T[]): T;
};

// Mulberry32: small, fast, deterministic.
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

export function createPrng(seed: number): Prng {
  const next = mulberry32(seed);

  const api: Prng = {
    nextFloat: () => next(),
    int: (min: number, maxExclusive: number) => {
      const lo = Math.floor(min);
      const hi = Math.floor(maxExclusive);
      if (hi <= lo) return lo;
      return lo + Math.floor(next() * (hi - lo));
    },
    pick: <T,>(arr: readonly T[]) => {
      const item = arr[api.int(0, arr.length)];
      if (arr.length === 0 || item === undefined) throw new Error("pick() from empty array");
      return item;
    },
  };

  return api;
}
