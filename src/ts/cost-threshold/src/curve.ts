/**
 * Threshold curve builder.
 *
 * Every distinct score is a candidate threshold. Examples are ranked by score,
 * highest first, and each maximal run of equal scores collapses into one row of
 * cumulative confusion counts, so tied examples always land on the same side
 * of a threshold.
 */

import { InvalidInputError } from './errors.js';
import { createLabelScorePairs, type LabelInput, type ScoreInput } from './inputs.js';
import type { PrecisionRecallPoint } from './reporting/analyses.js';
import type { LabelScorePairs, ThresholdCurve } from './types.js';

export interface BuildCurveOptions {
  /** Name of the model, used in error messages. */
  name?: string;
}

/**
 * Build the threshold curve for aligned labels and scores.
 *
 * @throws InvalidInputError on mismatched lengths, non-binary labels or non-finite scores.
 * @throws EmptyInputError when there are no examples.
 */
export function buildThresholdCurve(
  labels: LabelInput,
  scores: ScoreInput,
  opts?: BuildCurveOptions,
): ThresholdCurve {
  return buildThresholdCurveFromPairs(createLabelScorePairs(labels, scores, opts));
}

/**
 * Build the threshold curve for an already validated sequence.
 */
export function buildThresholdCurveFromPairs(pairs: LabelScorePairs): ThresholdCurve {
  // Array.prototype.sort is stable, so tied scores keep their original order.
  const ranked = [...pairs.examples].sort((a, b) => b.score - a.score);
  const totalPositives = ranked.reduce((n, example) => n + example.label, 0);

  const thresholds: number[] = [];
  const truePositives: number[] = [];
  const falsePositives: number[] = [];
  const falseNegatives: number[] = [];

  let positivesSoFar = 0;
  ranked.forEach((example, i) => {
    positivesSoFar += example.label;
    const next = ranked[i + 1];
    if (next !== undefined && next.score === example.score) return;

    thresholds.push(example.score);
    truePositives.push(positivesSoFar);
    falsePositives.push(i + 1 - positivesSoFar);
    falseNegatives.push(totalPositives - positivesSoFar);
  });

  return {
    thresholds,
    truePositives,
    falsePositives,
    falseNegatives,
    totalPositives,
    totalExamples: ranked.length,
  };
}

/**
 * Number of rows in the curve. Throws if the curve is empty or its columns disagree.
 */
export function curveLength(curve: ThresholdCurve): number {
  const k = curve.thresholds.length;
  if (k === 0) {
    throw new InvalidInputError('threshold curve is empty');
  }
  if (
    curve.truePositives.length !== k ||
    curve.falsePositives.length !== k ||
    curve.falseNegatives.length !== k
  ) {
    throw new InvalidInputError(
      `threshold curve columns disagree in length: thresholds=${k}, ` +
        `truePositives=${curve.truePositives.length}, ` +
        `falsePositives=${curve.falsePositives.length}, ` +
        `falseNegatives=${curve.falseNegatives.length}`,
    );
  }
  return k;
}

/**
 * Read row `i` of a curve as plain counts.
 */
export function curveRow(
  curve: ThresholdCurve,
  i: number,
): { threshold: number; tp: number; fp: number; fn: number } {
  const threshold = curve.thresholds[i];
  const tp = curve.truePositives[i];
  const fp = curve.falsePositives[i];
  const fn = curve.falseNegatives[i];
  if (threshold === undefined || tp === undefined || fp === undefined || fn === undefined) {
    throw new InvalidInputError(`threshold curve has no row ${i}`);
  }
  return { threshold, tp, fp, fn };
}

/** `num / den`, or 0 when the denominator is zero. */
export function safeRatio(num: number, den: number): number {
  return den > 0 ? num / den : 0;
}

/**
 * Exact precision and recall at every distinct threshold of the curve.
 */
export function precisionRecallPoints(curve: ThresholdCurve): PrecisionRecallPoint[] {
  const k = curveLength(curve);
  const points: PrecisionRecallPoint[] = [];
  for (let i = 0; i < k; i++) {
    const { threshold, tp, fp, fn } = curveRow(curve, i);
    points.push({
      threshold,
      precision: safeRatio(tp, tp + fp),
      recall: safeRatio(tp, tp + fn),
    });
  }
  return points;
}
