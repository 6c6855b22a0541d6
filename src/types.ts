/**
 * Core type definitions for roc-explorer.
 */

/** Ground-truth class of a scored example. */
export type Label = 'positive' | 'negative';

/**
 * A single classifier score tagged with its true class.
 */
export interface LabeledScore {
  readonly score: number;
  readonly label: Label;
}

/**
 * An ordered set of labeled scores. Generated samples list positives first.
 */
export type ScoreSample = readonly LabeledScore[];

/**
 * The P/N bookkeeping used to turn rates back into counts.
 */
export interface ClassCounts {
  positives: number;
  negatives: number;
}

/**
 * A point on a ROC curve.
 */
export interface RocPoint {
  falsePositiveRate: number;
  truePositiveRate: number;
  /**
   * Score cut-off that produced this point: scores `>= threshold` are predicted positive.
   * `Infinity` marks the point where nothing is predicted positive; `null` marks a
   * point loaded from an external curve, whose cut-offs are unknown.
   */
  threshold: number | null;
}

/**
 * A pre-computed curve loaded from outside, with the class sizes it was built from.
 */
export interface ExternalCurve {
  curve: RocPoint[];
  counts: ClassCounts;
}

/**
 * Counts at a single operating point.
 */
export interface ConfusionMatrix {
  truePositives: number;
  falsePositives: number;
  falseNegatives: number;
  trueNegatives: number;
}

/**
 * Ratios derived from a confusion matrix. `null` when the denominator is zero.
 */
export interface ClassificationMetrics {
  accuracy: number | null;
  precision: number | null;
  /** Also known as sensitivity or true positive rate. */
  recall: number | null;
  specificity: number | null;
  f1: number | null;
}

/**
 * Count the members of each class in a sample.
 */
export function countClasses(sample: ScoreSample): ClassCounts {
  let positives = 0;
  let negatives = 0;
  for (const s of sample) {
    if (s.label === 'positive') positives++;
    else negatives++;
  }
  return { positives, negatives };
}

