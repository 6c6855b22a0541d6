/**
 * ScoreSampler: draws labeled scores from a two-Gaussian mixture.
 *
 * Samples are memoized by their generation parameters so that a repeated
 * parameter set (for example, moving the AUC slider back to a previous value)
 * shows the same curve instead of a fresh random draw.
 */

import { InvalidParameterError } from '../errors.js';
import type { LabeledScore, ScoreSample } from '../types.js';
import { type RandomSource, sampleNormal } from './random.js';

export const DEFAULT_CACHE_SIZE = 32;

export interface ScoreSamplerOptions {
  /** Uniform source used for every draw. Defaults to `Math.random`. */
  random?: RandomSource;
  /** Maximum number of memoized samples. `0` disables memoization. */
  cacheSize?: number;
}

export class ScoreSampler {
  readonly cacheSize: number;
  private readonly random: RandomSource;
  // Map iteration order is insertion order; the first key is the least recently used.
  private readonly cache = new Map<string, ScoreSample>();

  constructor(opts?: ScoreSamplerOptions) {
    const cacheSize = opts?.cacheSize ?? DEFAULT_CACHE_SIZE;
    if (!Number.isInteger(cacheSize) || cacheSize < 0) {
      throw new InvalidParameterError('cacheSize', cacheSize, 'must be a non-negative integer');
    }
    this.cacheSize = cacheSize;
    this.random = opts?.random ?? Math.random;
  }

  /** Number of samples currently memoized. */
  get cachedCount(): number {
    return this.cache.size;
  }

  /**
   * Generate `size` labeled scores: `ceil(size / 2)` positives drawn from
   * N(posMean, posSpread) followed by `floor(size / 2)` negatives drawn from
   * N(negMean, negSpread).
   */
  generate(
    posMean: number,
    posSpread: number,
    negMean: number,
    negSpread: number,
    size: number,
  ): ScoreSample {
    requireFinite('posMean', posMean);
    requireFinite('negMean', negMean);
    requireSpread('posSpread', posSpread);
    requireSpread('negSpread', negSpread);
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidParameterError('size', size, 'must be a positive integer');
    }

    const key = JSON.stringify([posMean, posSpread, negMean, negSpread, size]);
    const cached = this.cache.get(key);
    if (cached) {
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    const positives = Math.ceil(size / 2);
    const negatives = size - positives;
    const sample: LabeledScore[] = [];
    for (let i = 0; i < positives; i++) {
      sample.push({ score: sampleNormal(this.random, posMean, posSpread), label: 'positive' });
    }
    for (let i = 0; i < negatives; i++) {
      sample.push({ score: sampleNormal(this.random, negMean, negSpread), label: 'negative' });
    }

    const frozen: ScoreSample = Object.freeze(sample);
    this.remember(key, frozen);
    return frozen;
  }

  /**
   * Generate a sample whose expected AUC is roughly `aucTarget`: positives
   * centered at `aucTarget`, negatives at `1 - aucTarget`, both with `spread`.
   */
  forAuc(aucTarget: number, spread: number, size: number): ScoreSample {
    return this.generate(aucTarget, spread, 1 - aucTarget, spread, size);
  }

  /** Drop every memoized sample. */
  clearCache(): void {
    this.cache.clear();
  }

  private remember(key: string, sample: ScoreSample): void {
    if (this.cacheSize === 0) return;
    while (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    this.cache.set(key, sample);
  }
}

function requireFinite(parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, value, 'must be a finite number');
  }
}

function requireSpread(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(parameter, value, 'must be a positive number');
  }
}
