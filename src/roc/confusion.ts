/**
 * Confusion matrix and summary metrics at an operating point.
 */

import { InsufficientDataError } from '../errors.js';
import {
  type ClassCounts,
  type ClassificationMetrics,
  type ConfusionMatrix,
  countClasses,
  type RocPoint,
  type ScoreSample,
} from '../types.js';

/**
 * Derive the confusion matrix of `sample` at `point`.
 *
 * Class counts are taken from the sample on every call.
 */
export function confusionMatrix(sample: ScoreSample, point: RocPoint): ConfusionMatrix {
  return confusionMatrixFromCounts(countClasses(sample), point);
}

/**
 * Turn the rates of `point` back into counts for the given class sizes.
 *
 * TP = round(TPR * P), FN = P - TP, TN = round((1 - FPR) * N), FP = N - TN.
 */
export function confusionMatrixFromCounts(counts: ClassCounts, point: RocPoint): ConfusionMatrix {
  const { positives, negatives } = counts;
  if (positives <= 0 || negatives <= 0) {
    throw new InsufficientDataError(
      `A confusion matrix needs both classes; got ${positives} positives and ${negatives} negatives`,
    );
  }

  const truePositives = Math.round(point.truePositiveRate * positives);
  const trueNegatives = Math.round((1 - point.falsePositiveRate) * negatives);
  return {
    truePositives,
    falsePositives: negatives - trueNegatives,
    falseNegatives: positives - truePositives,
    trueNegatives,
  };
}

export function classificationMetrics(matrix: ConfusionMatrix): ClassificationMetrics {
  const { truePositives: tp, falsePositives: fp, falseNegatives: fn, trueNegatives: tn } = matrix;
  return {
    accuracy: ratio(tp + tn, tp + fp + fn + tn),
    precision: ratio(tp, tp + fp),
    recall: ratio(tp, tp + fn),
    specificity: ratio(tn, tn + fp),
    f1: ratio(2 * tp, 2 * tp + fp + fn),
  };
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator > 0 ? numerator / denominator : null;
}
