/**
 * Terminal table rendering with chalk + cli-table3.
 *
 * One row per (scenario, model) pair; the lowest-cost model of each scenario is marked.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { defaultRenderNumber, defaultRenderPercentage } from './render-numbers.js';
import type { SweepReport, SweepResult } from './report.js';

export interface RendererOptions {
  includeCounts?: boolean;
  includeCalibration?: boolean;
  includeReference?: boolean;
  includeFailures?: boolean;
}

/**
 * Render a SweepReport as a formatted table string.
 */
export function renderTable(report: SweepReport, opts?: RendererOptions): string {
  const includeCounts = opts?.includeCounts ?? true;
  const includeCalibration =
    (opts?.includeCalibration ?? true) && report.results.some((r) => r.result.calibration !== null);
  const includeReference =
    (opts?.includeReference ?? true) && report.referenceThreshold !== null;

  const header: string[] = [chalk.bold('Scenario'), chalk.bold('Model')];
  header.push('Threshold', 'Min Cost', 'Precision', 'Recall');
  if (includeCounts) header.push('TP / FP / FN / TN');
  if (includeCalibration) header.push('Calibrated', 'Calibrated Cost');
  if (includeReference) header.push(`Cost @ ${defaultRenderNumber(report.referenceThreshold ?? 0)}`);

  const table = new Table({
    head: header,
    style: { head: [], border: [] },
  });

  const best = report.bestModels();
  for (const r of report.results) {
    const isBest = best.get(r.scenario) === r;
    const res = r.result;
    const row: string[] = [
      r.scenario,
      isBest ? `${chalk.bold(r.model)} ${chalk.green('✔')}` : r.model,
      defaultRenderNumber(res.optimalThreshold),
      defaultRenderNumber(res.minCost),
      defaultRenderPercentage(res.precision),
      defaultRenderPercentage(res.recall),
    ];

    if (includeCounts) {
      row.push(
        [
          res.truePositiveCount,
          res.falsePositiveCount,
          res.falseNegativeCount,
          res.trueNegativeCount,
        ].join(' / '),
      );
    }
    if (includeCalibration) {
      row.push(...renderCalibrationCells(r));
    }
    if (includeReference) {
      row.push(r.reference ? defaultRenderNumber(r.reference.cost) : '-');
    }

    table.push(row);
  }

  const title = `Threshold Sweep: ${report.name}`;
  const parts = [title, table.toString()];

  if ((opts?.includeFailures ?? true) && report.failures.length > 0) {
    const failures = report.failures.map(
      (f) => `  ${chalk.red('✘')} ${f.scenario} / ${f.model}: ${f.errorMessage}`,
    );
    parts.push(chalk.bold('Failures'), ...failures);
  }

  return parts.join('\n');
}

function renderCalibrationCells(r: SweepResult): [string, string] {
  const calibration = r.result.calibration;
  if (!calibration) return ['-', '-'];
  const threshold = defaultRenderNumber(calibration.calibratedThreshold);
  if (calibration.cost === null) return [threshold, chalk.dim('n/a')];
  const cost = defaultRenderNumber(calibration.cost);
  return [threshold, calibration.cost > r.result.minCost ? chalk.yellow(cost) : cost];
}
