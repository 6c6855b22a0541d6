/**
 * ROC curve construction, area and operating-point selection.
 */

import { InsufficientDataError, InvalidParameterError } from '../errors.js';
import { countClasses, type RocPoint, type ScoreSample } from '../types.js';

/**
 * Build the ROC curve of a labeled sample.
 *
 * Every distinct score is tried as a cut-off (scores `>=` the cut-off are
 * predicted positive), bracketed by `Infinity` and `-Infinity`. The result is
 * ordered by ascending false positive rate, then ascending true positive rate,
 * runs from (0, 0) to (1, 1), and keeps only the first of consecutive points
 * that share coordinates.
 */
export function buildCurve(sample: ScoreSample): RocPoint[] {
  const { positives, negatives } = countClasses(sample);
  if (positives === 0 || negatives === 0) {
    throw new InsufficientDataError(
      `A ROC curve needs both classes; got ${positives} positive and ${negatives} negative scores`,
    );
  }
  for (const s of sample) {
    if (!Number.isFinite(s.score)) {
      throw new InvalidParameterError('sample', s.score, 'scores must be finite numbers');
    }
  }

  const sorted = [...sample].sort((a, b) => b.score - a.score);
  const points: RocPoint[] = [{ falsePositiveRate: 0, truePositiveRate: 0, threshold: Infinity }];

  let tp = 0;
  let fp = 0;
  let i = 0;
  while (i < sorted.length) {
    const threshold = sorted[i]!.score;
    while (i < sorted.length && sorted[i]!.score === threshold) {
      if (sorted[i]!.label === 'positive') tp++;
      else fp++;
      i++;
    }
    points.push({
      falsePositiveRate: fp / negatives,
      truePositiveRate: tp / positives,
      threshold,
    });
  }
  points.push({ falsePositiveRate: 1, truePositiveRate: 1, threshold: -Infinity });

  points.sort(
    (a, b) =>
      a.falsePositiveRate - b.falsePositiveRate || a.truePositiveRate - b.truePositiveRate,
  );

  const curve: RocPoint[] = [];
  for (const p of points) {
    const last = curve[curve.length - 1];
    if (
      last &&
      last.falsePositiveRate === p.falsePositiveRate &&
      last.truePositiveRate === p.truePositiveRate
    ) {
      continue;
    }
    curve.push(p);
  }
  return curve;
}

/**
 * Area under a curve, by the trapezoidal rule over the false positive rate.
 */
export function areaUnderCurve(curve: readonly RocPoint[]): number {
  let auc = 0;
  for (let i = 1; i < curve.length; i++) {
    const prev = curve[i - 1]!;
    const cur = curve[i]!;
    auc +=
      (Math.abs(cur.falsePositiveRate - prev.falsePositiveRate) *
        (cur.truePositiveRate + prev.truePositiveRate)) /
      2;
  }
  return auc;
}

/**
 * Select the point whose false positive rate is nearest to `thresholdFraction`.
 *
 * `thresholdFraction` is a slider position along the x axis in [0, 1], not a
 * raw score. On ties the earliest point in curve order wins.
 */
export function operatingPoint(curve: readonly RocPoint[], thresholdFraction: number): RocPoint {
  if (!Number.isFinite(thresholdFraction) || thresholdFraction < 0 || thresholdFraction > 1) {
    throw new InvalidParameterError('thresholdFraction', thresholdFraction, 'must be in [0, 1]');
  }

  let best: RocPoint | undefined;
  let bestDistance = Infinity;
  for (const p of curve) {
    const distance = Math.abs(p.falsePositiveRate - thresholdFraction);
    if (distance < bestDistance) {
      best = p;
      bestDistance = distance;
    }
  }

  if (!best) {
    throw new InsufficientDataError('Cannot select an operating point on an empty curve');
  }
  return best;
}
