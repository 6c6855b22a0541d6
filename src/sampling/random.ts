/**
 * Uniform and normal random sources.
 */

/** A uniform source of numbers in [0, 1). `Math.random` satisfies it. */
export type RandomSource = () => number;

/**
 * Create a reproducible uniform source (mulberry32).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw one value from N(mean, stdDev) with the Box-Muller transform.
 */
export function sampleNormal(random: RandomSource, mean: number, stdDev: number): number {
  // 1 - u keeps the logarithm's argument in (0, 1]
  const u1 = 1 - random();
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}
