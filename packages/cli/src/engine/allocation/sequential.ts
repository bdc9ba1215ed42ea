import { assertHours } from './allocator.js';
import { assertResolution, roundToResolution } from './rounding.js';
import { assertNormalized, sumOf } from './weights.js';
import type { AllocationStrategyOutput } from './types.js';

/**
 * Category-by-category allocation. Each category walks the days in order and
 * takes what the day has left, up to its remaining quota. Rounding drift on a
 * category lands on the last day; per-day residuals of at least one grid unit
 * land on the day's last category.
 */
export function allocateSequential(
  hours: readonly number[],
  weights: readonly number[],
  resolution: number
): AllocationStrategyOutput {
  assertHours(hours);
  assertNormalized(weights);
  assertResolution(resolution);

  const grandTotal = sumOf(hours);
  const quotas = weights.map((weight) => weight * grandTotal);
  const remaining = [...quotas];
  const matrix = hours.map(() => weights.map(() => 0));
  const lastDay = hours.length - 1;

  quotas.forEach((quota, category) => {
    hours.forEach((total, day) => {
      const available = total - sumOf(matrix[day]);
      const cell = roundToResolution(Math.min(available, Math.max(0, remaining[category])), resolution);
      remaining[category] -= cell;
      matrix[day][category] = cell;
    });

    const used = sumOf(matrix.map((row) => row[category]));
    const drift = roundToResolution(quota - used, resolution);
    matrix[lastDay][category] = roundToResolution(matrix[lastDay][category] + drift, resolution);
  });

  const lastCategory = weights.length - 1;
  hours.forEach((total, day) => {
    const residual = roundToResolution(total - sumOf(matrix[day]), resolution);
    if (Math.abs(residual) >= resolution - 1e-9) {
      matrix[day][lastCategory] = roundToResolution(matrix[day][lastCategory] + residual, resolution);
    }
  });

  return { matrix, targets: quotas };
}
