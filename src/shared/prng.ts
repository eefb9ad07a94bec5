export type Prng = {
  nextFloat(): number; // [0,1)
  int(min: number, maxExclusive: number): number;
  chance(p: number): boolean;
  pick<T>(arr: readonly T[]): T;
  /** Pick items[i] with probability weights[i] / sum(weights). */
  weightedPick<T>(items: readonly T[], weights: readonly number[]): T;
};

function fnv1a32(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

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

function fromSource(next: () => number): Prng {
  const api: Prng = {
    nextFloat: () => next(),
    int: (min, maxExclusive) => {
      const lo = Math.floor(min);
      const hi = Math.floor(maxExclusive);
      if (!Number.isFinite(lo) || !Number.isFinite(hi) || hi <= lo) return lo;
      return lo + Math.floor(next() * (hi - lo));
    },
    chance: (p) => {
      if (p <= 0) return false;
      if (p >= 1) return true;
      return next() < p;
    },
    pick: (arr) => {
      if (arr.length === 0) throw new Error("pick() from empty array");
      return arr[api.int(0, arr.length)];
    },
    weightedPick: (items, weights) => {
      if (items.length === 0) throw new Error("weightedPick() from empty array");
      const ws = items.map((_, i) => Math.max(0, weights[i] ?? 0));
      const total = ws.reduce((a, b) => a + b, 0);
      if (total <= 0) return items[0];
      let roll = next() * total;
      for (let i = 0; i < items.length; i++) {
        roll -= ws[i];
        if (roll < 0) return items[i];
      }
      return items[items.length - 1];
    },
  };
  return api;
}

export function createPrng(seed: number | string): Prng {
  const seed32 = typeof seed === "string" ? fnv1a32(seed) : (seed >>> 0);
  return fromSource(mulberry32(seed32));
}

/** Unseeded generator backed by Math.random. */
export function defaultPrng(): Prng {
  return fromSource(Math.random);
}
