import { ValidationError } from '../../lib/errors.js';

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export interface NormalizeOptions {
  normalize?: boolean;
}

function assertWeightValues(weights: readonly number[]): void {
  if (weights.length === 0) {
    throw new ValidationError('At least one percentage is required');
  }
  weights.forEach((weight, index) => {
    if (!Number.isFinite(weight)) {
      throw new ValidationError(`Percentage #${index + 1} is not a finite number`, { index, weight });
    }
    if (weight < 0) {
      throw new ValidationError(`Percentage #${index + 1} is negative (${weight})`, { index, weight });
    }
  });
}

export function sumOf(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

/** Weights must be non-negative and already sum to 1.0 within WEIGHT_SUM_TOLERANCE. */
export function assertNormalized(weights: readonly number[]): void {
  assertWeightValues(weights);
  const total = sumOf(weights);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ValidationError(
      `Percentages must sum to 1.0 (got ${Number(total.toFixed(6))}); use --normalize to rescale them`,
      { sum: total }
    );
  }
}

/**
 * Validate category weights and, when asked, rescale them to sum to 1.0.
 *
 * Without normalization the weights must already sum to 1.0 within
 * WEIGHT_SUM_TOLERANCE; anything else would allocate more or less time
 * than the day holds.
 */
export function normalizeWeights(
  weights: readonly number[],
  options: NormalizeOptions = {}
): number[] {
  if (!options.normalize) {
    assertNormalized(weights);
    return [...weights];
  }

  assertWeightValues(weights);
  const total = sumOf(weights);
  if (total <= 0) {
    throw new ValidationError('Cannot normalize percentages that are all zero');
  }
  return weights.map((weight) => weight / total);
}
