import { describe, expect, it } from 'vitest';
import { EmptyInputError, InvalidInputError, isThresholdError } from '../src/errors.js';
import { createLabelScorePairs, normalizeLabels, normalizeScores } from '../src/inputs.js';

describe('normalizeScores', () => {
  it('passes flat arrays through', () => {
    expect(normalizeScores([0.1, 0.9])).toEqual([0.1, 0.9]);
  });

  it('flattens nested arrays row-major', () => {
    expect(normalizeScores([[0.1], [0.9], [0.5]])).toEqual([0.1, 0.9, 0.5]);
    expect(normalizeScores([[0.1, 0.2], [[0.3]]])).toEqual([0.1, 0.2, 0.3]);
  });

  it('extracts the column of a one-column table', () => {
    expect(normalizeScores({ probability: [0.2, 0.8] })).toEqual([0.2, 0.8]);
  });

  it('rejects tables with several columns', () => {
    expect(() => normalizeScores({ a: [0.1], b: [0.2] }, { name: 'gbm' })).toThrow(
      'gbm: expected a single score column, got 2 columns (a, b)',
    );
  });

  it('rejects tables without columns', () => {
    expect(() => normalizeScores({})).toThrow('scores: expected a single score column, got 0 columns');
  });

  it('rejects NaN', () => {
    expect(() => normalizeScores([0.1, Number.NaN])).toThrow(InvalidInputError);
  });
});

describe('normalizeLabels', () => {
  it('coerces booleans', () => {
    expect(normalizeLabels([true, false, 1, 0])).toEqual([1, 0, 1, 0]);
  });

  it('flattens nested labels', () => {
    expect(normalizeLabels([[1], [0]])).toEqual([1, 0]);
  });

  it('rejects values other than 0 and 1', () => {
    expect(() => normalizeLabels([0, 2])).toThrow('labels: label at index 1 is 2; labels must be 0 or 1');
    expect(() => normalizeLabels([0.5])).toThrow(InvalidInputError);
  });
});

describe('createLabelScorePairs', () => {
  it('zips labels with scores', () => {
    expect(createLabelScorePairs([1, 0], [0.7, 0.3], { name: 'svm' })).toEqual({
      name: 'svm',
      examples: [
        { label: 1, score: 0.7 },
        { label: 0, score: 0.3 },
      ],
    });
  });

  it('defaults the name', () => {
    expect(createLabelScorePairs([1], [0.5]).name).toBe('model');
  });

  it('rejects mismatched lengths', () => {
    expect(() => createLabelScorePairs([0, 1, 1], [0.1, 0.2], { name: 'm' })).toThrow(
      'm: got 3 labels but 2 scores',
    );
  });

  it('rejects empty input', () => {
    const attempt = () => createLabelScorePairs([], [], { name: 'm' });
    expect(attempt).toThrow(EmptyInputError);
    expect(attempt).toThrow('m: no examples to evaluate');
  });

  it('rejects infinite scores', () => {
    expect(() =>
      createLabelScorePairs([0, 1], [0.1, Number.POSITIVE_INFINITY], { name: 'm' }),
    ).toThrow('m: score at index 1 is Infinity; scores must be finite');
  });

  it('prefixes label errors with the model name', () => {
    expect(() => createLabelScorePairs([3], [0.1], { name: 'm' })).toThrow(
      'm: label at index 0 is 3; labels must be 0 or 1',
    );
  });
});

describe('isThresholdError', () => {
  it('recognizes the library errors', () => {
    expect(isThresholdError(new EmptyInputError('x'))).toBe(true);
    expect(isThresholdError(new InvalidInputError('x'))).toBe(true);
    expect(isThresholdError(new Error('x'))).toBe(false);
    expect(isThresholdError('x')).toBe(false);
  });

  it('keeps the error names', () => {
    expect(new EmptyInputError('x').name).toBe('EmptyInputError');
    expect(new InvalidInputError('x').name).toBe('InvalidInputError');
  });
});
