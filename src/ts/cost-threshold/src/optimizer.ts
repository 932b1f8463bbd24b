/**
 * Cost optimizer: turns a threshold curve and per-error costs into the
 * cost-minimizing threshold, and compares it with the threshold that would be
 * optimal if the scores were well-calibrated probabilities.
 */

import { curveLength, curveRow, safeRatio } from './curve.js';
import { InvalidCostParametersError, InvalidInputError } from './errors.js';
import type {
  CalibrationComparison,
  CostCurve,
  CostParameters,
  ThresholdCost,
  ThresholdCurve,
  ThresholdResult,
} from './types.js';

export interface OptimizeOptions {
  /** Also locate the calibrated threshold `costFp / (costFn + costFp)` on the curve. */
  compareCalibrated?: boolean;
}

/**
 * Check that both costs are finite and non-negative.
 */
export function validateCosts(costs: CostParameters): void {
  for (const key of ['costFp', 'costFn'] as const) {
    const value = costs[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidCostParametersError(
        `${key} must be a finite number >= 0, got ${String(value)}`,
      );
    }
  }
}

/**
 * The threshold that minimizes expected cost when scores are calibrated probabilities.
 *
 * @throws InvalidCostParametersError when both costs are zero.
 */
export function calibratedThreshold(costs: CostParameters): number {
  validateCosts(costs);
  const total = costs.costFp + costs.costFn;
  if (total === 0) {
    throw new InvalidCostParametersError(
      'costFp and costFn are both 0; the calibrated threshold costFp / (costFn + costFp) is undefined',
    );
  }
  return costs.costFp / total;
}

/**
 * Total cost at every row of the curve.
 */
export function computeCostCurve(curve: ThresholdCurve, costs: CostParameters): CostCurve {
  validateCosts(costs);
  const k = curveLength(curve);
  const totalCost: number[] = [];
  for (let i = 0; i < k; i++) {
    const { fp, fn } = curveRow(curve, i);
    totalCost.push(costs.costFp * fp + costs.costFn * fn);
  }
  return { thresholds: [...curve.thresholds], totalCost };
}

/**
 * Locate the decision boundary for an arbitrary threshold: the last curve row
 * whose threshold is still `>= threshold`. Returns `null` when the threshold
 * lies above every observed score.
 */
export function costAtThreshold(
  curve: ThresholdCurve,
  costs: CostParameters,
  threshold: number,
): ThresholdCost | null {
  const costCurve = computeCostCurve(curve, costs);
  return lookupCost(costCurve, threshold);
}

/**
 * Find the cost-minimizing threshold on a curve.
 *
 * Ties between equal-cost rows go to the first row, i.e. the higher threshold.
 *
 * @throws InvalidInputError if the curve is empty or inconsistent with `totalExamples`.
 * @throws InvalidCostParametersError for negative costs, or zero costs with `compareCalibrated`.
 */
export function optimizeThreshold(
  curve: ThresholdCurve,
  totalExamples: number,
  costs: CostParameters,
  opts?: OptimizeOptions,
): ThresholdResult {
  const k = curveLength(curve);
  const last = curveRow(curve, k - 1);
  const covered = last.tp + last.fp;
  if (!Number.isInteger(totalExamples) || totalExamples < covered) {
    throw new InvalidInputError(
      `totalExamples must be an integer >= ${covered} (examples covered by the curve), got ${totalExamples}`,
    );
  }

  const calibrated = opts?.compareCalibrated ? calibratedThreshold(costs) : null;
  const costCurve = computeCostCurve(curve, costs);

  let optimalIndex = 0;
  let minCost = Number.POSITIVE_INFINITY;
  costCurve.totalCost.forEach((cost, i) => {
    if (cost < minCost) {
      minCost = cost;
      optimalIndex = i;
    }
  });

  const { threshold, tp, fp, fn } = curveRow(curve, optimalIndex);

  return {
    optimalThreshold: threshold,
    optimalIndex,
    minCost,
    costPerExample: safeRatio(minCost, totalExamples),
    precision: safeRatio(tp, tp + fp),
    recall: safeRatio(tp, tp + fn),
    truePositiveCount: tp,
    falsePositiveCount: fp,
    falseNegativeCount: fn,
    trueNegativeCount: totalExamples - tp - fp - fn,
    totalExamples,
    costs: { costFp: costs.costFp, costFn: costs.costFn },
    calibration: calibrated === null ? null : compareCalibration(costCurve, calibrated, minCost),
  };
}

function compareCalibration(
  costCurve: CostCurve,
  threshold: number,
  minCost: number,
): CalibrationComparison {
  const located = lookupCost(costCurve, threshold);
  if (located === null) {
    return {
      calibratedThreshold: threshold,
      available: false,
      index: null,
      cost: null,
      excessCost: null,
    };
  }
  return {
    calibratedThreshold: threshold,
    available: true,
    index: located.index,
    cost: located.cost,
    excessCost: located.cost - minCost,
  };
}

function lookupCost(costCurve: CostCurve, threshold: number): ThresholdCost | null {
  const index = lastIndexAtOrAbove(costCurve.thresholds, threshold);
  const cost = costCurve.totalCost[index];
  const at = costCurve.thresholds[index];
  if (cost === undefined || at === undefined) return null;
  return { index, threshold: at, cost };
}

/** Binary search over descending values; -1 when every value is below `target`. */
function lastIndexAtOrAbove(values: readonly number[], target: number): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const value = values[mid];
    if (value !== undefined && value >= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo - 1;
}
