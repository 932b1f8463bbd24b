/**
 * Core value types for cost-based threshold selection.
 */

/** A true binary label. */
export type BinaryLabel = 0 | 1;

/** One example: its true label and the model's score for it. */
export interface LabelScorePair {
  readonly label: BinaryLabel;
  readonly score: number;
}

/**
 * Validated examples for one model in original order, as produced by
 * `createLabelScorePairs`. Never empty; every score is finite.
 */
export interface LabelScorePairs {
  /** Name of the model the scores came from. Used in error messages. */
  readonly name: string;
  readonly examples: readonly LabelScorePair[];
}

/**
 * Cumulative confusion counts at every distinct score, highest score first.
 *
 * Row `i` describes the classifier that predicts positive for every example
 * scoring `>= thresholds[i]`.
 */
export interface ThresholdCurve {
  /** Strictly descending distinct scores. */
  readonly thresholds: readonly number[];
  readonly truePositives: readonly number[];
  readonly falsePositives: readonly number[];
  readonly falseNegatives: readonly number[];
  /** Number of positive labels in the input. */
  readonly totalPositives: number;
  /** Number of examples in the input. */
  readonly totalExamples: number;
}

/** Per-error business costs. */
export interface CostParameters {
  /** Cost of one false positive. */
  readonly costFp: number;
  /** Cost of one false negative. */
  readonly costFn: number;
}

/**
 * Total cost at every curve row: `costFp * FP + costFn * FN`.
 */
export interface CostCurve {
  readonly thresholds: readonly number[];
  readonly totalCost: readonly number[];
}

/**
 * Comparison of the empirical optimum against the closed-form threshold
 * `costFp / (costFn + costFp)`.
 */
export interface CalibrationComparison {
  readonly calibratedThreshold: number;
  /** Whether some curve row lies at or above the calibrated threshold. */
  readonly available: boolean;
  /** Curve row used as the calibrated decision boundary. */
  readonly index: number | null;
  /** Total cost at that row. */
  readonly cost: number | null;
  /** `cost - minCost`; zero when calibration matches the empirical optimum. */
  readonly excessCost: number | null;
}

/**
 * The cost-minimizing threshold for one model under one cost scenario.
 */
export interface ThresholdResult {
  readonly optimalThreshold: number;
  /** Row of the curve holding `optimalThreshold`. */
  readonly optimalIndex: number;
  readonly minCost: number;
  /** `minCost / totalExamples`. */
  readonly costPerExample: number;
  readonly precision: number;
  readonly recall: number;
  readonly truePositiveCount: number;
  readonly falsePositiveCount: number;
  readonly falseNegativeCount: number;
  readonly trueNegativeCount: number;
  readonly totalExamples: number;
  readonly costs: CostParameters;
  /** `null` when the calibration comparison was not requested. */
  readonly calibration: CalibrationComparison | null;
}

/** A curve row located for an arbitrary threshold. */
export interface ThresholdCost {
  readonly index: number;
  readonly threshold: number;
  readonly cost: number;
}
