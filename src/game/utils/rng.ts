/** Seedable random source owned by a single game session. */
export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number;
  /** Current internal state, for snapshots. */
  readonly state: number;
}

// mulberry32
export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    nextInt(maxExclusive: number): number {
      const bound = Math.floor(maxExclusive);
      if (!Number.isFinite(bound) || bound <= 0) {
        return 0;
      }
      return Math.floor(next() * bound);
    },
    get state() {
      return state;
    },
  };
}

/** Fresh non-deterministic seed for a new session. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0;
}
