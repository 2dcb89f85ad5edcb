/** Uniform source in [0, 1). */
export type RandomSource = () => number;

/**
 * Mulberry32: a small seeded PRNG. Good enough for noise, not for anything
 * that needs to be unpredictable.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): RandomSource {
  return seed === undefined ? Math.random : seededRandom(seed);
}

/** Standard normal sample via the Box-Muller transform. */
export function gaussian(random: RandomSource): number {
  const u1 = Math.max(random(), Number.EPSILON);
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
