/**
 * Evaluate one model under one cost scenario: sanitize, build the curve, optimize.
 */

import { buildThresholdCurveFromPairs } from './curve.js';
import { createLabelScorePairs, type LabelInput, type ScoreInput } from './inputs.js';
import { optimizeThreshold } from './optimizer.js';
import type { CostParameters, ThresholdCurve, ThresholdResult } from './types.js';

export interface EvaluateThresholdOptions {
  /** Name of the model, used in error messages. */
  name?: string;
  labels: LabelInput;
  scores: ScoreInput;
  costs: CostParameters;
  compareCalibrated?: boolean;
}

export interface ThresholdEvaluation {
  curve: ThresholdCurve;
  result: ThresholdResult;
}

/**
 * Run the full pipeline for a single (model, scenario) pair.
 *
 * @example
 * ```ts
 * const { result } = evaluateThreshold({
 *   labels: [0, 0, 1, 1],
 *   scores: [0.1, 0.4, 0.35, 0.8],
 *   costs: { costFp: 1, costFn: 10 },
 * });
 * result.optimalThreshold; // 0.35
 * ```
 */
export function evaluateThreshold(opts: EvaluateThresholdOptions): ThresholdEvaluation {
  const pairs = createLabelScorePairs(opts.labels, opts.scores, { name: opts.name });
  const curve = buildThresholdCurveFromPairs(pairs);
  const result = optimizeThreshold(curve, pairs.examples.length, opts.costs, {
    compareCalibrated: opts.compareCalibrated,
  });
  return { curve, result };
}
