/**
 * Noise sources for the synthetic predictor. `next()` yields a standard
 * normal deviate; callers scale it.
 */
export interface NoiseSource {
  next(): number;
}

/** Mulberry32: small deterministic PRNG, uniform in [0, 1). */
export function mulberry32(seed: number): () => number {
  let state = seed | 0;
  return function() {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Box-Muller transform for N(0,1) */
export function gaussian(uniform: () => number): number {
  let u = 0, v = 0;
  while (u === 0) u = uniform();
  while (v === 0) v = uniform();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

export function createSeededNoise(seed: number): NoiseSource {
  const uniform = mulberry32(seed);
  return { next: () => gaussian(uniform) };
}

export function createRandomNoise(): NoiseSource {
  return { next: () => gaussian(Math.random) };
}

export const zeroNoise: NoiseSource = { next: () => 0 };

/** Seeded when a seed is given, ambient entropy otherwise. */
export function createNoise(seed?: number): NoiseSource {
  return seed === undefined ? createRandomNoise() : createSeededNoise(seed);
}
