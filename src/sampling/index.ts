export type { RandomSource } from './random.js';
export { createSeededRandom, sampleNormal } from './random.js';
export type { ScoreSamplerOptions } from './sampler.js';
export { DEFAULT_CACHE_SIZE, ScoreSampler } from './sampler.js';
