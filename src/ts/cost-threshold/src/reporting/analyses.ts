/**
 * Sweep-level analysis types: cost curves, precision-recall curves and tables.
 *
 * These are plain data for plotting and reporting collaborators; nothing here
 * renders a chart.
 */

export interface CostCurvePoint {
  threshold: number;
  cost: number;
}

export interface CostCurveSeries {
  /** Name of the model this curve belongs to. */
  name: string;
  /** One point per distinct score, highest threshold first. */
  points: CostCurvePoint[];
  optimalThreshold: number;
  /** `null` when the calibration comparison was not requested. */
  calibratedThreshold: number | null;
}

export interface CostCurveAnalysis {
  type: 'cost_curve';
  title: string;
  description?: string | null;
  /** Cost scenario the curves were computed under. */
  scenario: string;
  curves: CostCurveSeries[];
}

export interface PrecisionRecallPoint {
  threshold: number;
  precision: number;
  recall: number;
}

export interface PrecisionRecallCurve {
  /** Name of this curve (the model name). */
  name: string;
  /** Points on the curve, highest threshold first. */
  points: PrecisionRecallPoint[];
}

export interface PrecisionRecall {
  type: 'precision_recall';
  title: string;
  description?: string | null;
  curves: PrecisionRecallCurve[];
}

export interface TableResult {
  type: 'table';
  title: string;
  description?: string | null;
  /** Column headers. */
  columns: string[];
  /** Row data, one array per row. */
  rows: (string | number | boolean | null)[][];
}

/** Discriminated union of all sweep-level analysis types. */
export type SweepAnalysis = CostCurveAnalysis | PrecisionRecall | TableResult;
