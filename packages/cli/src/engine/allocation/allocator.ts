import { ValidationError } from '../../lib/errors.js';
import { assertResolution, roundToResolution } from './rounding.js';
import { assertNormalized, sumOf } from './weights.js';
import type { AllocationStrategyOutput } from './types.js';

export function assertHours(hours: readonly number[]): void {
  if (hours.length === 0) {
    throw new ValidationError('At least one daily total is required');
  }
  hours.forEach((value, index) => {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(
        `Daily total #${index + 1} must be a non-negative number (got ${value})`,
        { index, value }
      );
    }
  });
}

/**
 * Proportional allocation: every cell is `total * weight` snapped to the grid
 * on its own.
 *
 * Rows are not reconciled. Independent rounding can leave a row up to
 * `(categories - 1) * resolution / 2` away from its total; the Sum and Delta
 * rows of the report expose that drift instead of hiding it.
 */
export function allocate(
  hours: readonly number[],
  weights: readonly number[],
  resolution: number
): number[][] {
  assertHours(hours);
  assertNormalized(weights);
  assertResolution(resolution);

  return hours.map((total) => weights.map((weight) => roundToResolution(total * weight, resolution)));
}

export function allocateProportional(
  hours: readonly number[],
  weights: readonly number[],
  resolution: number
): AllocationStrategyOutput {
  const matrix = allocate(hours, weights, resolution);
  const grandTotal = sumOf(hours);
  return { matrix, targets: weights.map((weight) => weight * grandTotal) };
}
