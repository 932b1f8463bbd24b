import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import {
  loadSweepConfigFromFile,
  loadSweepConfigFromObject,
  loadSweepConfigFromText,
  saveSweepConfigToFile,
  saveSweepReportToFile,
  type SweepConfig,
  sweepFromConfig,
  sweepReportToObject,
} from '../src/serialization/index.js';
import { ThresholdSweep } from '../src/sweep.js';
import { labels, missAverse, modelA, modelB } from './fixtures.js';

const yamlConfig = `
name: churn
reference_threshold: 0.5
scenarios:
  - name: balanced
    cost_fp: 1
    cost_fn: 1
  - name: miss-averse
    cost_fp: 1
    cost_fn: 10
`;

describe('loadSweepConfigFromText', () => {
  it('parses YAML and fills defaults', () => {
    expect(loadSweepConfigFromText(yamlConfig)).toEqual({
      name: 'churn',
      compareCalibrated: true,
      maxConcurrency: null,
      referenceThreshold: 0.5,
      scenarios: [
        { name: 'balanced', costFp: 1, costFn: 1 },
        { name: 'miss-averse', costFp: 1, costFn: 10 },
      ],
    });
  });

  it('parses JSON', () => {
    const config = loadSweepConfigFromText(
      JSON.stringify({
        compare_calibrated: false,
        max_concurrency: 2,
        scenarios: [{ name: 'fp-averse', cost_fp: 5, cost_fn: 1 }],
      }),
      { fmt: 'json' },
    );
    expect(config).toEqual({
      name: null,
      compareCalibrated: false,
      maxConcurrency: 2,
      referenceThreshold: null,
      scenarios: [{ name: 'fp-averse', costFp: 5, costFn: 1 }],
    });
  });
});

describe('loadSweepConfigFromObject', () => {
  it('rejects unknown keys', () => {
    expect(() =>
      loadSweepConfigFromObject({ scenarios: [{ name: 'x', cost_fp: 1, cost_fn: 1, weight: 2 }] }),
    ).toThrow(ZodError);
  });

  it('requires at least one scenario', () => {
    expect(() => loadSweepConfigFromObject({ scenarios: [] })).toThrow(ZodError);
  });

  it('rejects a concurrency limit below 1', () => {
    expect(() =>
      loadSweepConfigFromObject({
        max_concurrency: 0,
        scenarios: [{ name: 'x', cost_fp: 1, cost_fn: 1 }],
      }),
    ).toThrow(ZodError);
  });

  it('rejects duplicate scenario names', () => {
    expect(() =>
      loadSweepConfigFromObject({
        scenarios: [
          { name: 'x', cost_fp: 1, cost_fn: 1 },
          { name: 'x', cost_fp: 2, cost_fn: 1 },
        ],
      }),
    ).toThrow("Duplicate scenario name: 'x'");
  });

  it('leaves cost ranges to the evaluation', () => {
    const config = loadSweepConfigFromObject({ scenarios: [{ name: 'x', cost_fp: -1, cost_fn: 1 }] });
    expect(config.scenarios).toEqual([{ name: 'x', costFp: -1, costFn: 1 }]);
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cost-threshold-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const config: SweepConfig = {
    name: null,
    compareCalibrated: true,
    maxConcurrency: 4,
    referenceThreshold: null,
    scenarios: [{ name: 'balanced', costFp: 1, costFn: 1 }],
  };

  it('round-trips through YAML and names the sweep after the file', () => {
    const path = join(dir, 'costs.yaml');
    saveSweepConfigToFile(config, path);
    expect(loadSweepConfigFromFile(path)).toEqual({ ...config, name: 'costs' });
  });

  it('round-trips through JSON', () => {
    const path = join(dir, 'costs.json');
    saveSweepConfigToFile({ ...config, name: 'named' }, path);
    expect(loadSweepConfigFromFile(path)).toEqual({ ...config, name: 'named' });
  });

  it('refuses to guess an unknown extension', () => {
    expect(() => saveSweepConfigToFile(config, join(dir, 'costs.txt'))).toThrow(
      "Could not infer format for filename 'costs.txt'. Use the fmt option to specify the format.",
    );
  });

  it('writes a report', async () => {
    const report = await new ThresholdSweep({
      name: 'demo',
      labels,
      models: [modelA],
      scenarios: [missAverse],
    }).run();
    const path = join(dir, 'report.json');
    saveSweepReportToFile(report, path);
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(sweepReportToObject(report));
  });
});

describe('sweepFromConfig', () => {
  it('builds a runnable sweep', async () => {
    const config = loadSweepConfigFromText(yamlConfig);
    const sweep = sweepFromConfig(config, { models: [modelA, modelB], labels });

    expect(sweep.name).toBe('churn');
    expect(sweep.referenceThreshold).toBe(0.5);
    const report = await sweep.run();
    expect(report.results).toHaveLength(4);
    expect(report.bestModels().get('miss-averse')?.model).toBe('B');
  });
});

describe('sweepReportToObject', () => {
  it('flattens results into snake_case data', async () => {
    const report = await new ThresholdSweep({
      name: 'demo',
      labels,
      models: [modelA, modelB],
      scenarios: [missAverse],
      referenceThreshold: 0.5,
    }).run();

    const data = sweepReportToObject(report);
    expect(data.name).toBe('demo');
    expect(data.reference_threshold).toBe(0.5);
    expect(data.scenarios).toEqual([{ name: 'miss-averse', cost_fp: 1, cost_fn: 10 }]);
    expect(data.best_models).toEqual({ 'miss-averse': 'B' });
    expect(data).not.toHaveProperty('failures');
    expect(data).not.toHaveProperty('metadata');

    expect(Array.isArray(data.results) ? data.results[0] : null).toEqual({
      scenario: 'miss-averse',
      model: 'A',
      optimal_threshold: 0.4,
      min_cost: 1,
      cost_per_example: 1 / 6,
      precision: 0.75,
      recall: 1,
      true_positives: 3,
      false_positives: 1,
      false_negatives: 0,
      true_negatives: 2,
      calibration: { threshold: 1 / 11, available: true, cost: 3, excess_cost: 2 },
      reference_cost: 11,
    });
  });

  it('includes failures and metadata when present', async () => {
    const report = await new ThresholdSweep({
      labels,
      models: [{ name: 'short', scores: [0.5] }],
      scenarios: [missAverse],
    }).run({ metadata: { seed: 3 } });

    const data = sweepReportToObject(report);
    expect(data.metadata).toEqual({ seed: 3 });
    expect(data.failures).toEqual([
      {
        scenario: 'miss-averse',
        model: 'short',
        error: 'InvalidInputError: short: got 6 labels but 1 scores',
      },
    ]);
    expect(data.best_models).toEqual({});
  });
});
