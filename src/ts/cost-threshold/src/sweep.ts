/**
 * ThresholdSweep: evaluate every model under every cost scenario.
 *
 * Each (scenario, model) pair is independent. Pairs run with bounded
 * concurrency, and a pair that throws is recorded as a failure instead of
 * aborting the sweep. Results come back only through the returned report.
 */

import pLimit from 'p-limit';
import { precisionRecallPoints } from './curve.js';
import { InvalidInputError, toError } from './errors.js';
import { evaluateThreshold } from './evaluate.js';
import type { LabelInput, ScoreInput } from './inputs.js';
import { computeCostCurve, costAtThreshold } from './optimizer.js';
import type {
  CostCurveAnalysis,
  PrecisionRecall,
  TableResult,
} from './reporting/analyses.js';
import {
  type CostScenario,
  createSweepFailure,
  createSweepReport,
  createSweepResult,
  type SweepFailure,
  type SweepReport,
  type SweepResult,
} from './reporting/report.js';
import type { ThresholdCurve } from './types.js';

/**
 * Scores produced by one trained model.
 */
export interface ModelScores {
  /** Name of the model. Used to identify it in the report. */
  name: string;
  scores: ScoreInput;
  /** Labels aligned with `scores`. Falls back to the sweep-level labels. */
  labels?: LabelInput | null;
}

export interface ThresholdSweepOptions {
  /** Optional name for the sweep. */
  name?: string | null;
  /** Labels shared by every model that does not carry its own. */
  labels?: LabelInput | null;
  models: ModelScores[];
  scenarios: CostScenario[];
  /** Compare each optimum against `costFp / (costFn + costFp)`. Defaults to true. */
  compareCalibrated?: boolean;
  /** Also report the cost at this fixed threshold (e.g. 0.5). */
  referenceThreshold?: number | null;
  /** Default for `RunOptions.maxConcurrency`. */
  maxConcurrency?: number | null;
}

export interface RunOptions {
  /** Maximum number of pairs evaluated at once. */
  maxConcurrency?: number;
  /** Add one cost-curve analysis per scenario. */
  includeCostCurves?: boolean;
  /** Add a precision-recall analysis with one curve per model. */
  includePrecisionRecall?: boolean;
  /** Add a summary table analysis. */
  includeSummary?: boolean;
  /** Sweep-level metadata copied onto the report. */
  metadata?: Record<string, unknown>;
}

type PairOutcome =
  | { kind: 'result'; result: SweepResult; curve: ThresholdCurve }
  | { kind: 'failure'; failure: SweepFailure };

export class ThresholdSweep {
  name: string;
  labels: LabelInput | null;
  models: ModelScores[];
  scenarios: CostScenario[];
  compareCalibrated: boolean;
  referenceThreshold: number | null;
  maxConcurrency: number | null;

  constructor(opts: ThresholdSweepOptions) {
    assertUniqueNames('model', opts.models);
    assertUniqueNames('scenario', opts.scenarios);

    this.name = opts.name ?? 'sweep';
    this.labels = opts.labels ?? null;
    this.models = [...opts.models];
    this.scenarios = [...opts.scenarios];
    this.compareCalibrated = opts.compareCalibrated ?? true;
    this.referenceThreshold = opts.referenceThreshold ?? null;
    this.maxConcurrency = opts.maxConcurrency ?? null;
  }

  /**
   * Add a model to the sweep.
   */
  addModel(model: ModelScores): void {
    if (this.models.some((existing) => existing.name === model.name)) {
      throw new Error(`Duplicate model name: '${model.name}'`);
    }
    this.models.push(model);
  }

  /**
   * Add a cost scenario to the sweep.
   */
  addScenario(scenario: CostScenario): void {
    if (this.scenarios.some((existing) => existing.name === scenario.name)) {
      throw new Error(`Duplicate scenario name: '${scenario.name}'`);
    }
    this.scenarios.push(scenario);
  }

  /**
   * Evaluate every (scenario, model) pair.
   */
  async run(opts?: RunOptions): Promise<SweepReport> {
    const maxConcurrency = opts?.maxConcurrency ?? this.maxConcurrency ?? undefined;
    if (maxConcurrency !== undefined && !(Number.isInteger(maxConcurrency) && maxConcurrency >= 1)) {
      throw new Error(`maxConcurrency must be an integer >= 1, got ${maxConcurrency}`);
    }
    const limit = pLimit(maxConcurrency ?? Number.POSITIVE_INFINITY);

    const pairs = this.scenarios.flatMap((scenario) =>
      this.models.map((model) => [scenario, model] as const),
    );
    const outcomes = await Promise.all(
      pairs.map(([scenario, model]) => limit(() => this.evaluatePair(scenario, model))),
    );

    const results: SweepResult[] = [];
    const failures: SweepFailure[] = [];
    const curves = new Map<string, ThresholdCurve>();

    for (const outcome of outcomes) {
      if (outcome.kind === 'result') {
        results.push(outcome.result);
        if (!curves.has(outcome.result.model)) curves.set(outcome.result.model, outcome.curve);
      } else {
        failures.push(outcome.failure);
      }
    }

    const report = createSweepReport({
      name: this.name,
      scenarios: [...this.scenarios],
      results,
      failures,
      referenceThreshold: this.referenceThreshold,
      metadata: opts?.metadata ?? null,
    });

    if (opts?.includeCostCurves) {
      report.analyses.push(...this.buildCostCurves(results, curves));
    }
    if (opts?.includePrecisionRecall) {
      report.analyses.push(buildPrecisionRecall(curves));
    }
    if (opts?.includeSummary) {
      report.analyses.push(buildSummaryTable(results));
    }

    return report;
  }

  private async evaluatePair(scenario: CostScenario, model: ModelScores): Promise<PairOutcome> {
    try {
      const labels = model.labels ?? this.labels;
      if (labels === null) {
        throw new InvalidInputError(
          `${model.name}: no labels given for the model and no sweep-level labels`,
        );
      }

      const costs = { costFp: scenario.costFp, costFn: scenario.costFn };
      const { curve, result } = evaluateThreshold({
        name: model.name,
        labels,
        scores: model.scores,
        costs,
        compareCalibrated: this.compareCalibrated,
      });
      const reference =
        this.referenceThreshold === null
          ? null
          : costAtThreshold(curve, costs, this.referenceThreshold);

      return {
        kind: 'result',
        result: createSweepResult({ scenario: scenario.name, model: model.name, result, reference }),
        curve,
      };
    } catch (e) {
      return {
        kind: 'failure',
        failure: createSweepFailure({
          scenario: scenario.name,
          model: model.name,
          error: toError(e),
        }),
      };
    }
  }

  private buildCostCurves(
    results: SweepResult[],
    curves: Map<string, ThresholdCurve>,
  ): CostCurveAnalysis[] {
    return this.scenarios.map((scenario) => {
      const analysis: CostCurveAnalysis = {
        type: 'cost_curve',
        title: `Cost Curve: ${scenario.name}`,
        scenario: scenario.name,
        curves: [],
      };
      for (const r of results) {
        const curve = curves.get(r.model);
        if (r.scenario !== scenario.name || !curve) continue;
        const costCurve = computeCostCurve(curve, r.result.costs);
        analysis.curves.push({
          name: r.model,
          points: costCurve.thresholds.map((threshold, i) => ({
            threshold,
            cost: costCurve.totalCost[i] ?? 0,
          })),
          optimalThreshold: r.result.optimalThreshold,
          calibratedThreshold: r.result.calibration?.calibratedThreshold ?? null,
        });
      }
      return analysis;
    });
  }
}

function buildPrecisionRecall(curves: Map<string, ThresholdCurve>): PrecisionRecall {
  return {
    type: 'precision_recall',
    title: 'Precision-Recall',
    curves: [...curves].map(([name, curve]) => ({ name, points: precisionRecallPoints(curve) })),
  };
}

function buildSummaryTable(results: SweepResult[]): TableResult {
  return {
    type: 'table',
    title: 'Threshold Summary',
    columns: [
      'scenario',
      'model',
      'optimal_threshold',
      'min_cost',
      'precision',
      'recall',
      'calibrated_threshold',
      'calibrated_cost',
    ],
    rows: results.map((r) => [
      r.scenario,
      r.model,
      r.result.optimalThreshold,
      r.result.minCost,
      r.result.precision,
      r.result.recall,
      r.result.calibration?.calibratedThreshold ?? null,
      r.result.calibration?.cost ?? null,
    ]),
  };
}

function assertUniqueNames(kind: string, items: { name: string }[]): void {
  const names = new Set<string>();
  for (const item of items) {
    if (names.has(item.name)) {
      throw new Error(`Duplicate ${kind} name: '${item.name}'`);
    }
    names.add(item.name);
  }
}
