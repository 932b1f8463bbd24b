export type {
  CostCurveAnalysis,
  CostCurvePoint,
  CostCurveSeries,
  PrecisionRecall,
  PrecisionRecallCurve,
  PrecisionRecallPoint,
  SweepAnalysis,
  TableResult,
} from './analyses.js';
export {
  defaultRenderNumber,
  defaultRenderNumberDiff,
  defaultRenderPercentage,
} from './render-numbers.js';
export type { RendererOptions } from './renderer.js';
export { renderTable } from './renderer.js';
export type {
  CostScenario,
  RenderOptions,
  SweepFailure,
  SweepReport,
  SweepResult,
} from './report.js';
export {
  createSweepFailure,
  createSweepReport,
  createSweepResult,
  findBestModels,
  groupByScenario,
} from './report.js';
