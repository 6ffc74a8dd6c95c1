export type Rng = () => number;

/** Seeded PRNG yielding floats in [0, 1). */
export const mulberry32 = (seed: number): Rng => {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/** Integer in [0, bound). */
export const randomInt = (rng: Rng, bound: number): number =>
  Math.floor(rng() * bound);

// Fisher–Yates
export const shuffleInPlace = <T>(arr: T[], rng: Rng): T[] => {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
};
