/**
 * cost-threshold: pick the decision threshold that minimizes the business cost
 * of a binary classifier's mistakes.
 *
 * @example
 * ```ts
 * import { ThresholdSweep } from 'cost-threshold';
 *
 * const sweep = new ThresholdSweep({
 *   labels: [0, 0, 1, 1],
 *   models: [{ name: 'logreg', scores: [0.1, 0.4, 0.35, 0.8] }],
 *   scenarios: [
 *     { name: 'balanced', costFp: 1, costFn: 1 },
 *     { name: 'miss-averse', costFp: 1, costFn: 10 },
 *   ],
 * });
 *
 * const report = await sweep.run();
 * report.print();
 * ```
 */

// Core
export { buildThresholdCurve, buildThresholdCurveFromPairs, precisionRecallPoints } from './curve.js';
export type { EvaluateThresholdOptions, ThresholdEvaluation } from './evaluate.js';
export { evaluateThreshold } from './evaluate.js';
export type { OptimizeOptions } from './optimizer.js';
export {
  calibratedThreshold,
  computeCostCurve,
  costAtThreshold,
  optimizeThreshold,
  validateCosts,
} from './optimizer.js';
// Inputs
export type { LabelInput, NestedNumbers, SanitizeOptions, ScoreInput, ScoreTable } from './inputs.js';
export { createLabelScorePairs, normalizeLabels, normalizeScores } from './inputs.js';
// Errors
export type { ThresholdError } from './errors.js';
export {
  EmptyInputError,
  InvalidCostParametersError,
  InvalidInputError,
  isThresholdError,
} from './errors.js';
// Sweep
export type { ModelScores, RunOptions, ThresholdSweepOptions } from './sweep.js';
export { ThresholdSweep } from './sweep.js';
// Reporting
export type {
  CostCurveAnalysis,
  CostCurvePoint,
  CostCurveSeries,
  CostScenario,
  PrecisionRecall,
  PrecisionRecallCurve,
  PrecisionRecallPoint,
  RendererOptions,
  RenderOptions,
  SweepAnalysis,
  SweepFailure,
  SweepReport,
  SweepResult,
  TableResult,
} from './reporting/index.js';
export {
  createSweepFailure,
  createSweepReport,
  createSweepResult,
  defaultRenderNumber,
  defaultRenderNumberDiff,
  defaultRenderPercentage,
  findBestModels,
  groupByScenario,
  renderTable,
} from './reporting/index.js';
// Serialization
export type { FileFormat, LoadOptions, SweepConfig } from './serialization/index.js';
export {
  loadSweepConfigFromFile,
  loadSweepConfigFromObject,
  loadSweepConfigFromText,
  saveSweepConfigToFile,
  saveSweepReportToFile,
  scenarioSchema,
  sweepConfigSchema,
  sweepFromConfig,
  sweepReportToObject,
} from './serialization/index.js';
// Core types
export type {
  BinaryLabel,
  CalibrationComparison,
  CostCurve,
  CostParameters,
  LabelScorePair,
  LabelScorePairs,
  ThresholdCost,
  ThresholdCurve,
  ThresholdResult,
} from './types.js';
