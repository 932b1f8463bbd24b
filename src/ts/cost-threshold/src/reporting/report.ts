/**
 * SweepReport, SweepResult, SweepFailure, and cross-model comparison.
 */

import type { CostParameters, ThresholdCost, ThresholdResult } from '../types.js';
import type { SweepAnalysis } from './analyses.js';
import { defaultRenderNumber, defaultRenderNumberDiff, defaultRenderPercentage } from './render-numbers.js';

/**
 * A named cost scenario: what one false positive and one false negative cost.
 */
export interface CostScenario extends CostParameters {
  name: string;
}

/**
 * The result for one (scenario, model) pair.
 */
export interface SweepResult {
  scenario: string;
  model: string;
  result: ThresholdResult;
  /** Cost at the sweep's fixed reference threshold, if one was configured and reachable. */
  reference: ThresholdCost | null;
}

/**
 * A (scenario, model) pair that could not be evaluated.
 */
export interface SweepFailure {
  scenario: string;
  model: string;
  errorName: string;
  errorMessage: string;
  errorStacktrace: string;
}

/**
 * Results of evaluating every model under every cost scenario.
 */
export interface SweepReport {
  name: string;
  scenarios: CostScenario[];
  /** Scenario-major, model-minor order. */
  results: SweepResult[];
  failures: SweepFailure[];
  analyses: SweepAnalysis[];
  referenceThreshold: number | null;
  metadata: Record<string, unknown> | null;

  /** Look up one pair. Returns null if it failed or was never evaluated. */
  get(scenario: string, model: string): SweepResult | null;
  /** scenario -> model -> result, in evaluation order. */
  byScenario(): Map<string, Map<string, SweepResult>>;
  /** Lowest-cost model per scenario; the first model evaluated wins ties. */
  bestModels(): Map<string, SweepResult>;
  /** Render the report as a plain-text summary. */
  render(opts?: RenderOptions): string;
  /** Print the report to the console. */
  print(opts?: RenderOptions): void;
}

export interface RenderOptions {
  includeCalibration?: boolean;
  includeReference?: boolean;
  includeBest?: boolean;
  includeFailures?: boolean;
  includeAnalyses?: boolean;
}

// -- Factories --

export function createSweepResult(opts: {
  scenario: string;
  model: string;
  result: ThresholdResult;
  reference?: ThresholdCost | null;
}): SweepResult {
  return { ...opts, reference: opts.reference ?? null };
}

export function createSweepFailure(opts: {
  scenario: string;
  model: string;
  error: Error;
}): SweepFailure {
  return {
    scenario: opts.scenario,
    model: opts.model,
    errorName: opts.error.name,
    errorMessage: `${opts.error.name}: ${opts.error.message}`,
    errorStacktrace: opts.error.stack ?? '',
  };
}

export function createSweepReport(opts: {
  name: string;
  scenarios: CostScenario[];
  results: SweepResult[];
  failures?: SweepFailure[];
  referenceThreshold?: number | null;
  metadata?: Record<string, unknown> | null;
}): SweepReport {
  const report: SweepReport = {
    name: opts.name,
    scenarios: opts.scenarios,
    results: opts.results,
    failures: opts.failures ?? [],
    analyses: [],
    referenceThreshold: opts.referenceThreshold ?? null,
    metadata: opts.metadata ?? null,

    get(scenario, model) {
      return report.results.find((r) => r.scenario === scenario && r.model === model) ?? null;
    },

    byScenario() {
      return groupByScenario(report.results);
    },

    bestModels() {
      return findBestModels(report.results);
    },

    render(renderOpts) {
      return renderReport(report, renderOpts);
    },

    print(renderOpts) {
      // eslint-disable-next-line no-console
      console.log(report.render(renderOpts));
    },
  };

  return report;
}

// -- Aggregation --

export function groupByScenario(results: SweepResult[]): Map<string, Map<string, SweepResult>> {
  const grouped = new Map<string, Map<string, SweepResult>>();
  for (const r of results) {
    let models = grouped.get(r.scenario);
    if (!models) {
      models = new Map();
      grouped.set(r.scenario, models);
    }
    models.set(r.model, r);
  }
  return grouped;
}

export function findBestModels(results: SweepResult[]): Map<string, SweepResult> {
  const best = new Map<string, SweepResult>();
  for (const r of results) {
    const current = best.get(r.scenario);
    if (!current || r.result.minCost < current.result.minCost) {
      best.set(r.scenario, r);
    }
  }
  return best;
}

// -- Rendering (simple text-based) --

function renderReport(report: SweepReport, opts?: RenderOptions): string {
  const includeCalibration = opts?.includeCalibration ?? true;
  const includeReference = opts?.includeReference ?? true;
  const includeBest = opts?.includeBest ?? true;

  const lines: string[] = [];
  lines.push(`Threshold Sweep: ${report.name}`);
  lines.push('='.repeat(60));

  const grouped = report.byScenario();
  const best = report.bestModels();

  for (const scenario of report.scenarios) {
    lines.push(
      `${scenario.name} (C_FP=${defaultRenderNumber(scenario.costFp)}, ` +
        `C_FN=${defaultRenderNumber(scenario.costFn)})`,
    );

    for (const r of grouped.get(scenario.name)?.values() ?? []) {
      const res = r.result;
      const parts: string[] = [
        `  ${r.model}`,
        `threshold: ${defaultRenderNumber(res.optimalThreshold)}`,
        `cost: ${defaultRenderNumber(res.minCost)}`,
        `precision: ${defaultRenderPercentage(res.precision)}`,
        `recall: ${defaultRenderPercentage(res.recall)}`,
      ];

      if (includeCalibration && res.calibration) {
        parts.push(renderCalibration(res));
      }
      if (includeReference && report.referenceThreshold !== null) {
        parts.push(
          r.reference
            ? `@${defaultRenderNumber(report.referenceThreshold)}: ${defaultRenderNumber(r.reference.cost)}`
            : `@${defaultRenderNumber(report.referenceThreshold)}: n/a`,
        );
      }

      lines.push(parts.join(' | '));
    }

    const winner = best.get(scenario.name);
    if (includeBest && winner) {
      lines.push(`  best: ${winner.model}`);
    }
  }

  if (report.failures.length > 0 && (opts?.includeFailures ?? true)) {
    lines.push('');
    lines.push('Failures:');
    for (const f of report.failures) {
      lines.push(`  ${f.scenario} / ${f.model}: ${f.errorMessage}`);
    }
  }

  if ((opts?.includeAnalyses ?? true) && report.analyses.length > 0) {
    lines.push('');
    lines.push('Analyses:');
    for (const a of report.analyses) {
      lines.push(`  ${a.title} (${a.type})`);
    }
  }

  return lines.join('\n');
}

function renderCalibration(res: ThresholdResult): string {
  const calibration = res.calibration;
  if (!calibration) return '';
  const at = `calibrated ${defaultRenderNumber(calibration.calibratedThreshold)}`;
  if (calibration.cost === null) {
    return `${at}: n/a`;
  }
  const diff = defaultRenderNumberDiff(res.minCost, calibration.cost);
  return `${at}: ${defaultRenderNumber(calibration.cost)}${diff ? ` (${diff})` : ''}`;
}
