import { describe, expect, it } from 'vitest';
import { InsufficientDataError, InvalidParameterError } from '../src/errors.js';
import {
  classificationMetrics,
  confusionMatrix,
  confusionMatrixFromCounts,
} from '../src/roc/confusion.js';
import { areaUnderCurve, buildCurve, operatingPoint } from '../src/roc/curve.js';
import { createSeededRandom } from '../src/sampling/random.js';
import { ScoreSampler } from '../src/sampling/sampler.js';
import type { RocPoint, ScoreSample } from '../src/types.js';

function makeSample(positives: number[], negatives: number[]): ScoreSample {
  return [
    ...positives.map((score) => ({ score, label: 'positive' as const })),
    ...negatives.map((score) => ({ score, label: 'negative' as const })),
  ];
}

function coords(curve: RocPoint[]): [number, number][] {
  return curve.map((p) => [p.falsePositiveRate, p.truePositiveRate]);
}

function point(falsePositiveRate: number, truePositiveRate: number): RocPoint {
  return { falsePositiveRate, truePositiveRate, threshold: null };
}

const separated = makeSample([0.9, 0.8, 0.7, 0.6], [0.4, 0.3, 0.2, 0.1]);

function seededSample(size: number, seed = 11): ScoreSample {
  return new ScoreSampler({ random: createSeededRandom(seed) }).forAuc(0.7, 0.2, size);
}

describe('buildCurve', () => {
  it('builds the curve of a perfectly separated sample', () => {
    const curve = buildCurve(separated);
    expect(coords(curve)).toEqual([
      [0, 0],
      [0, 0.25],
      [0, 0.5],
      [0, 0.75],
      [0, 1],
      [0.25, 1],
      [0.5, 1],
      [0.75, 1],
      [1, 1],
    ]);
    expect(curve.map((p) => p.threshold)).toEqual([
      Infinity,
      0.9,
      0.8,
      0.7,
      0.6,
      0.4,
      0.3,
      0.2,
      0.1,
    ]);
    expect(areaUnderCurve(curve)).toBe(1);
  });

  it('groups tied scores into a single threshold', () => {
    const curve = buildCurve(makeSample([0.5, 0.5], [0.5, 0.2]));
    expect(coords(curve)).toEqual([
      [0, 0],
      [0.5, 1],
      [1, 1],
    ]);
    expect(areaUnderCurve(curve)).toBe(0.75);
  });

  it('handles an inverted classifier', () => {
    const curve = buildCurve(makeSample([0.1, 0.2], [0.8, 0.9]));
    expect(coords(curve)).toEqual([
      [0, 0],
      [0.5, 0],
      [1, 0],
      [1, 0.5],
      [1, 1],
    ]);
    expect(areaUnderCurve(curve)).toBe(0);
  });

  it('starts at (0, 0), ends at (1, 1) and never decreases in FPR', () => {
    const curve = buildCurve(seededSample(301));
    expect(curve[0]).toMatchObject({ falsePositiveRate: 0, truePositiveRate: 0 });
    expect(curve[curve.length - 1]).toMatchObject({ falsePositiveRate: 1, truePositiveRate: 1 });
    for (let i = 1; i < curve.length; i++) {
      expect(curve[i]!.falsePositiveRate).toBeGreaterThanOrEqual(curve[i - 1]!.falsePositiveRate);
      if (curve[i]!.falsePositiveRate === curve[i - 1]!.falsePositiveRate) {
        expect(curve[i]!.truePositiveRate).toBeGreaterThan(curve[i - 1]!.truePositiveRate);
      }
    }
  });

  it('is deterministic', () => {
    const sample = seededSample(200);
    expect(buildCurve(sample)).toEqual(buildCurve(sample));
  });

  it('does not reorder the sample', () => {
    const sample = makeSample([0.2, 0.9], [0.5]);
    buildCurve(sample);
    expect(sample.map((s) => s.score)).toEqual([0.2, 0.9, 0.5]);
  });

  it('rejects a sample without negatives', () => {
    expect(() => buildCurve(makeSample([0.9, 0.8], []))).toThrow(InsufficientDataError);
  });

  it('rejects a sample without positives', () => {
    expect(() => buildCurve(makeSample([], [0.1]))).toThrow(InsufficientDataError);
  });

  it('rejects an empty sample', () => {
    expect(() => buildCurve([])).toThrow(InsufficientDataError);
  });

  it('rejects non-finite scores', () => {
    expect(() => buildCurve(makeSample([Number.NaN], [0.1]))).toThrow(InvalidParameterError);
  });
});

describe('areaUnderCurve', () => {
  it('returns 0 for a single point', () => {
    expect(areaUnderCurve([point(0, 0)])).toBe(0);
  });

  it('integrates the diagonal to one half', () => {
    expect(areaUnderCurve([point(0, 0), point(1, 1)])).toBe(0.5);
  });
});

describe('operatingPoint', () => {
  const curve = buildCurve(separated);

  it('selects (0, 0) for fraction 0', () => {
    expect(operatingPoint(curve, 0)).toEqual({
      falsePositiveRate: 0,
      truePositiveRate: 0,
      threshold: Infinity,
    });
  });

  it('selects (1, 1) for fraction 1', () => {
    expect(operatingPoint(curve, 1)).toMatchObject({ falsePositiveRate: 1, truePositiveRate: 1 });
  });

  it('selects the nearest FPR', () => {
    expect(operatingPoint(curve, 0.3)).toMatchObject({ falsePositiveRate: 0.25, truePositiveRate: 1 });
  });

  it('keeps the first point on ties', () => {
    expect(operatingPoint(curve, 0.375)).toMatchObject({
      falsePositiveRate: 0.25,
      truePositiveRate: 1,
    });
  });

  it('works on curves in any order', () => {
    expect(operatingPoint([point(1, 1), point(0.4, 0.9), point(0, 0)], 0.5)).toEqual(
      point(0.4, 0.9),
    );
  });

  it('rejects an empty curve', () => {
    expect(() => operatingPoint([], 0.5)).toThrow(InsufficientDataError);
  });

  it.each([-0.1, 1.1, Number.NaN])('rejects fraction %s', (fraction) => {
    expect(() => operatingPoint(curve, fraction)).toThrow(InvalidParameterError);
  });
});

describe('confusionMatrix', () => {
  const curve = buildCurve(separated);

  it('predicts nothing positive at fraction 0', () => {
    expect(confusionMatrix(separated, operatingPoint(curve, 0))).toEqual({
      truePositives: 0,
      falsePositives: 0,
      falseNegatives: 4,
      trueNegatives: 4,
    });
  });

  it('predicts everything positive at fraction 1', () => {
    expect(confusionMatrix(separated, operatingPoint(curve, 1))).toEqual({
      truePositives: 4,
      falsePositives: 4,
      falseNegatives: 0,
      trueNegatives: 0,
    });
  });

  it('is perfect at the (0, 1) corner', () => {
    expect(confusionMatrix(separated, point(0, 1))).toEqual({
      truePositives: 4,
      falsePositives: 0,
      falseNegatives: 0,
      trueNegatives: 4,
    });
  });

  it('derives true negatives from the false positive rate', () => {
    expect(confusionMatrix(separated, point(0.25, 1))).toEqual({
      truePositives: 4,
      falsePositives: 1,
      falseNegatives: 0,
      trueNegatives: 3,
    });
  });

  it('keeps TP + FN = P and TN + FP = N at every point', () => {
    const sample = seededSample(101);
    for (const p of buildCurve(sample)) {
      const m = confusionMatrix(sample, p);
      expect(m.truePositives + m.falseNegatives).toBe(51);
      expect(m.trueNegatives + m.falsePositives).toBe(50);
      expect(
        Math.min(m.truePositives, m.falsePositives, m.falseNegatives, m.trueNegatives),
      ).toBeGreaterThanOrEqual(0);
    }
  });

  it('rejects a sample with one class', () => {
    expect(() => confusionMatrix(makeSample([0.5], []), point(0, 0))).toThrow(
      InsufficientDataError,
    );
  });
});

describe('confusionMatrixFromCounts', () => {
  it('rounds rates to the nearest count', () => {
    expect(confusionMatrixFromCounts({ positives: 3, negatives: 3 }, point(0.5, 0.5))).toEqual({
      truePositives: 2,
      falsePositives: 1,
      falseNegatives: 1,
      trueNegatives: 2,
    });
  });

  it('rejects zero counts', () => {
    expect(() => confusionMatrixFromCounts({ positives: 0, negatives: 4 }, point(0, 0))).toThrow(
      InsufficientDataError,
    );
    expect(() => confusionMatrixFromCounts({ positives: 4, negatives: 0 }, point(0, 0))).toThrow(
      InsufficientDataError,
    );
  });
});

describe('classificationMetrics', () => {
  it('computes ratios from counts', () => {
    const m = classificationMetrics({
      truePositives: 4,
      falsePositives: 1,
      falseNegatives: 0,
      trueNegatives: 3,
    });
    expect(m.accuracy).toBe(0.875);
    expect(m.precision).toBe(0.8);
    expect(m.recall).toBe(1);
    expect(m.specificity).toBe(0.75);
    expect(m.f1).toBeCloseTo(8 / 9, 12);
  });

  it('reports null for undefined ratios', () => {
    expect(
      classificationMetrics({
        truePositives: 0,
        falsePositives: 0,
        falseNegatives: 4,
        trueNegatives: 4,
      }),
    ).toEqual({ accuracy: 0.5, precision: null, recall: 0, specificity: 1, f1: 0 });
  });

  it('reports null everywhere for an empty matrix', () => {
    expect(
      classificationMetrics({
        truePositives: 0,
        falsePositives: 0,
        falseNegatives: 0,
        trueNegatives: 0,
      }),
    ).toEqual({ accuracy: null, precision: null, recall: null, specificity: null, f1: null });
  });
});
