/**
 * Errors raised while evaluating a (model, scenario) pair.
 *
 * Each one is fatal to a single evaluation only: `ThresholdSweep` records it as a
 * failure and keeps going with the remaining pairs.
 */

/** Raised when the label/score sequence has no examples. */
export class EmptyInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/** Raised for mismatched lengths, non-binary labels, or scores that cannot be reduced to one column. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Raised for negative or non-finite costs, or zero total cost when calibration is compared. */
export class InvalidCostParametersError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCostParametersError';
  }
}

export type ThresholdError = EmptyInputError | InvalidInputError | InvalidCostParametersError;

export function isThresholdError(e: unknown): e is ThresholdError {
  return (
    e instanceof EmptyInputError ||
    e instanceof InvalidInputError ||
    e instanceof InvalidCostParametersError
  );
}

/** Normalize anything thrown into an Error. */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
