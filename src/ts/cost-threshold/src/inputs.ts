/**
 * Input sanitization: the single boundary where raw labels and scores become
 * a validated `LabelScorePairs`.
 *
 * Score providers hand over plain sequences, nested arrays (e.g. an `n x 1`
 * prediction matrix), or a column table with one column per output. Nested
 * arrays are flattened row-major; a table must have exactly one column.
 */

import { z } from 'zod';
import { EmptyInputError, InvalidInputError } from './errors.js';
import type { BinaryLabel, LabelScorePair, LabelScorePairs } from './types.js';

/** A flat or arbitrarily nested numeric array. */
export type NestedNumbers = readonly (number | NestedNumbers)[];

/** Column-oriented table: column name -> values. */
export type ScoreTable = Readonly<Record<string, readonly number[]>>;

export type ScoreInput = NestedNumbers | ScoreTable;

/** A flat or nested array of 0/1 (or boolean) labels. */
export type LabelInput = readonly (number | boolean | LabelInput)[];

export interface SanitizeOptions {
  /** Name of the model, used in error messages. */
  name?: string;
}

type NumberTree = number | NumberTree[];
type LabelTree = number | boolean | LabelTree[];

const numberTreeSchema: z.ZodType<NumberTree> = z.lazy(() =>
  z.union([z.number(), z.array(numberTreeSchema)]),
);

const labelTreeSchema: z.ZodType<LabelTree> = z.lazy(() =>
  z.union([z.number(), z.boolean(), z.array(labelTreeSchema)]),
);

const scoreTableSchema = z.record(z.string(), z.array(z.number()));

/**
 * Reduce any accepted score shape to a flat array.
 */
export function normalizeScores(input: ScoreInput, opts?: SanitizeOptions): number[] {
  const name = opts?.name ?? 'scores';
  const raw: unknown = input;

  if (Array.isArray(raw)) {
    const parsed = z.array(numberTreeSchema).safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError(`${name}: ${describeIssues(parsed.error)}`);
    }
    return flattenNumbers(parsed.data);
  }

  const parsed = scoreTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(
      `${name}: expected a numeric array or a one-column table, ${describeIssues(parsed.error)}`,
    );
  }

  const columns = Object.keys(parsed.data);
  const [column] = columns;
  if (columns.length !== 1 || column === undefined) {
    throw new InvalidInputError(
      `${name}: expected a single score column, got ${columns.length} columns` +
        (columns.length > 0 ? ` (${columns.join(', ')})` : ''),
    );
  }
  return parsed.data[column] ?? [];
}

/**
 * Flatten labels and coerce booleans, rejecting anything but 0 and 1.
 */
export function normalizeLabels(input: LabelInput, opts?: SanitizeOptions): BinaryLabel[] {
  const name = opts?.name ?? 'labels';
  const parsed = z.array(labelTreeSchema).safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(`${name}: ${describeIssues(parsed.error)}`);
  }

  return flattenLabels(parsed.data).map((value, i): BinaryLabel => {
    if (value === 1 || value === true) return 1;
    if (value === 0 || value === false) return 0;
    throw new InvalidInputError(
      `${name}: label at index ${i} is ${String(value)}; labels must be 0 or 1`,
    );
  });
}

/**
 * Build a validated label/score sequence.
 *
 * Throws `InvalidInputError` on mismatched lengths, non-binary labels or
 * non-finite scores, and `EmptyInputError` when there are no examples.
 */
export function createLabelScorePairs(
  labels: LabelInput,
  scores: ScoreInput,
  opts?: SanitizeOptions,
): LabelScorePairs {
  const name = opts?.name ?? 'model';
  const flatLabels = normalizeLabels(labels, { name });
  const flatScores = normalizeScores(scores, { name });

  if (flatLabels.length !== flatScores.length) {
    throw new InvalidInputError(
      `${name}: got ${flatLabels.length} labels but ${flatScores.length} scores`,
    );
  }
  if (flatScores.length === 0) {
    throw new EmptyInputError(`${name}: no examples to evaluate`);
  }

  const examples = flatLabels.map((label, i): LabelScorePair => {
    const score = flatScores[i];
    if (score === undefined || !Number.isFinite(score)) {
      throw new InvalidInputError(
        `${name}: score at index ${i} is ${String(score)}; scores must be finite`,
      );
    }
    return { label, score };
  });

  return { name, examples };
}

function flattenNumbers(tree: NumberTree[]): number[] {
  const out: number[] = [];
  const visit = (node: NumberTree): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
    } else {
      out.push(node);
    }
  };
  tree.forEach(visit);
  return out;
}

function flattenLabels(tree: LabelTree[]): (number | boolean)[] {
  const out: (number | boolean)[] = [];
  const visit = (node: LabelTree): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
    } else {
      out.push(node);
    }
  };
  tree.forEach(visit);
  return out;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
    .join('; ');
}
