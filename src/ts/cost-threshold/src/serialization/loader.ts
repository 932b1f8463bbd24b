/**
 * YAML/JSON loading and saving for sweep configurations and sweep reports.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import YAML from 'yaml';
import type { CostScenario, SweepReport, SweepResult } from '../reporting/report.js';
import { type ModelScores, ThresholdSweep } from '../sweep.js';
import type { LabelInput } from '../inputs.js';
import { sweepConfigSchema } from './schema.js';

export type FileFormat = 'yaml' | 'json';

/**
 * A validated sweep configuration: which cost scenarios to run and how.
 */
export interface SweepConfig {
  name: string | null;
  compareCalibrated: boolean;
  maxConcurrency: number | null;
  referenceThreshold: number | null;
  scenarios: CostScenario[];
}

export interface LoadOptions {
  /** File format. If not specified, inferred from file extension. */
  fmt?: FileFormat;
}

/**
 * Load a sweep configuration from a file.
 */
export function loadSweepConfigFromFile(path: string, opts?: LoadOptions): SweepConfig {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadSweepConfigFromText(content, { fmt, defaultName: stemOf(path) });
}

/**
 * Load a sweep configuration from a string.
 */
export function loadSweepConfigFromText(
  content: string,
  opts?: LoadOptions & { defaultName?: string },
): SweepConfig {
  const fmt = opts?.fmt ?? 'yaml';
  const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  return loadSweepConfigFromObject(raw, opts);
}

/**
 * Load a sweep configuration from a plain object (after parsing YAML/JSON).
 */
export function loadSweepConfigFromObject(
  data: unknown,
  opts?: { defaultName?: string },
): SweepConfig {
  const parsed = sweepConfigSchema.parse(data);
  const names = new Set<string>();
  for (const s of parsed.scenarios) {
    if (names.has(s.name)) {
      throw new Error(`Duplicate scenario name: '${s.name}'`);
    }
    names.add(s.name);
  }

  return {
    name: parsed.name ?? opts?.defaultName ?? null,
    compareCalibrated: parsed.compare_calibrated,
    maxConcurrency: parsed.max_concurrency ?? null,
    referenceThreshold: parsed.reference_threshold ?? null,
    scenarios: parsed.scenarios.map((s) => ({ name: s.name, costFp: s.cost_fp, costFn: s.cost_fn })),
  };
}

/**
 * Save a sweep configuration to a file.
 */
export function saveSweepConfigToFile(
  config: SweepConfig,
  path: string,
  opts?: LoadOptions,
): void {
  writeData(serializeSweepConfig(config), path, opts?.fmt ?? inferFormat(path));
}

/**
 * Build a sweep from a configuration plus the models' scores.
 */
export function sweepFromConfig(
  config: SweepConfig,
  data: { models: ModelScores[]; labels?: LabelInput | null },
): ThresholdSweep {
  return new ThresholdSweep({
    name: config.name,
    labels: data.labels ?? null,
    models: data.models,
    scenarios: config.scenarios,
    compareCalibrated: config.compareCalibrated,
    referenceThreshold: config.referenceThreshold,
    maxConcurrency: config.maxConcurrency,
  });
}

/**
 * Convert a sweep report into plain snake_case data for display or persistence.
 */
export function sweepReportToObject(report: SweepReport): Record<string, unknown> {
  const data: Record<string, unknown> = { name: report.name };
  if (report.referenceThreshold !== null) data.reference_threshold = report.referenceThreshold;
  if (report.metadata !== null) data.metadata = report.metadata;

  data.scenarios = report.scenarios.map((s) => ({
    name: s.name,
    cost_fp: s.costFp,
    cost_fn: s.costFn,
  }));
  data.results = report.results.map(serializeResult);

  const best = report.bestModels();
  data.best_models = Object.fromEntries([...best].map(([scenario, r]) => [scenario, r.model]));

  if (report.failures.length > 0) {
    data.failures = report.failures.map((f) => ({
      scenario: f.scenario,
      model: f.model,
      error: f.errorMessage,
    }));
  }
  return data;
}

/**
 * Save a sweep report to a file.
 */
export function saveSweepReportToFile(
  report: SweepReport,
  path: string,
  opts?: LoadOptions,
): void {
  writeData(sweepReportToObject(report), path, opts?.fmt ?? inferFormat(path));
}

function serializeSweepConfig(config: SweepConfig): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  if (config.name) data.name = config.name;
  data.compare_calibrated = config.compareCalibrated;
  if (config.maxConcurrency !== null) data.max_concurrency = config.maxConcurrency;
  if (config.referenceThreshold !== null) data.reference_threshold = config.referenceThreshold;
  data.scenarios = config.scenarios.map((s) => ({
    name: s.name,
    cost_fp: s.costFp,
    cost_fn: s.costFn,
  }));
  return data;
}

function serializeResult(r: SweepResult): Record<string, unknown> {
  const res = r.result;
  return {
    scenario: r.scenario,
    model: r.model,
    optimal_threshold: res.optimalThreshold,
    min_cost: res.minCost,
    cost_per_example: res.costPerExample,
    precision: res.precision,
    recall: res.recall,
    true_positives: res.truePositiveCount,
    false_positives: res.falsePositiveCount,
    false_negatives: res.falseNegativeCount,
    true_negatives: res.trueNegativeCount,
    calibration: res.calibration
      ? {
          threshold: res.calibration.calibratedThreshold,
          available: res.calibration.available,
          cost: res.calibration.cost,
          excess_cost: res.calibration.excessCost,
        }
      : null,
    reference_cost: r.reference?.cost ?? null,
  };
}

function writeData(data: Record<string, unknown>, path: string, fmt: FileFormat): void {
  if (fmt === 'yaml') {
    writeFileSync(path, YAML.stringify(data, { sortMapEntries: false }), 'utf-8');
  } else {
    writeFileSync(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  }
}

// -- Utilities --

function inferFormat(path: string): FileFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

function stemOf(path: string): string {
  const base = basename(path);
  const ext = extname(base);
  return base.slice(0, base.length - ext.length);
}
