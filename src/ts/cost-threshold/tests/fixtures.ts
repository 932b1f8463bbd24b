import type { ModelScores } from '../src/sweep.js';
import type { CostScenario } from '../src/reporting/report.js';
import type { BinaryLabel } from '../src/types.js';

export const labels: BinaryLabel[] = [0, 0, 1, 1, 0, 1];

// ranked labels: 1 1 0 1 0 0
export const modelA: ModelScores = { name: 'A', scores: [0.2, 0.3, 0.7, 0.9, 0.6, 0.4] };

// ranked labels: 1 1 1 0 0 0
export const modelB: ModelScores = { name: 'B', scores: [0.1, 0.5, 0.8, 0.6, 0.3, 0.9] };

export const balanced: CostScenario = { name: 'balanced', costFp: 1, costFn: 1 };
export const missAverse: CostScenario = { name: 'miss-averse', costFp: 1, costFn: 10 };
