export interface RandomSource {
  next(): number;
  nextInt(maxExclusive: number): number;
  pick<T>(values: readonly T[]): T;
}

const normalizeSeed = (seed: number) => (Number.isFinite(seed) ? Math.trunc(seed) | 0 : 0x12345678);

/**
 * Seeded mulberry32 generator. Each engine owns one, so runs with the same seed and
 * configuration replay identically.
 */
export const createRandom = (seed: number): RandomSource => {
  let state = normalizeSeed(seed);

  const next = () => {
    state = (state + 0x6d2b79f5) | 0;
    let r = Math.imul(state ^ (state >>> 15), 1 | state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };

  const nextInt = (maxExclusive: number) => Math.floor(next() * maxExclusive);

  return {
    next,
    nextInt,
    pick<T>(values: readonly T[]): T {
      const value = values[nextInt(values.length)];
      if (value === undefined) {
        throw new Error("Cannot pick random value from an empty collection");
      }
      return value;
    },
  };
};
