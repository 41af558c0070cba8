export interface RandomSource {
  /** Uniform integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number;
}

const assertPositive = (maxExclusive: number): number => {
  const m = Math.trunc(maxExclusive);
  if (!Number.isFinite(m) || m <= 0) {
    throw new RangeError('nextInt(maxExclusive) requires maxExclusive > 0');
  }
  return m;
};

/**
 * Deterministic xorshift32 generator; the same seed gives the same draws.
 */
export const createSeededRandom = (seed: number): RandomSource => {
  // Force into uint32; zero would lock the generator at zero.
  let state = seed >>> 0 || 0x12345678;

  const nextU32 = (): number => {
    let x = state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    state = x >>> 0;
    return state;
  };

  return {
    nextInt(maxExclusive: number): number {
      const m = assertPositive(maxExclusive);
      return Math.floor((nextU32() / 0x1_0000_0000) * m);
    },
  };
};

export const createMathRandom = (): RandomSource => ({
  nextInt(maxExclusive: number): number {
    return Math.floor(Math.random() * assertPositive(maxExclusive));
  },
});
