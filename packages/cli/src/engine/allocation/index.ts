import { logger } from '../../lib/logger.js';
import { ValidationError } from '../../lib/errors.js';
import { defaultDayLabels } from '../../planning/days.js';
import { allocateProportional } from './allocator.js';
import { allocateOptimal } from './optimal.js';
import { allocateSequential } from './sequential.js';
import { normalizeWeights } from './weights.js';
import type {
  Algorithm,
  AllocationRequest,
  AllocationResult,
  AllocationStrategyOutput,
} from './types.js';

export { allocate, allocateProportional, assertHours } from './allocator.js';
export { allocateOptimal, hamiltonQuotas } from './optimal.js';
export { allocateSequential } from './sequential.js';
export { normalizeWeights, WEIGHT_SUM_TOLERANCE } from './weights.js';
export { assertResolution, roundToResolution, decimalPlaces, isOnGrid } from './rounding.js';
export { summarize } from './summary.js';
export type * from './types.js';

type Strategy = (
  hours: readonly number[],
  weights: readonly number[],
  resolution: number
) => AllocationStrategyOutput;

const STRATEGIES: Record<Algorithm, Strategy> = {
  proportional: allocateProportional,
  optimal: allocateOptimal,
  sequential: allocateSequential,
};

/**
 * Validate a request, normalize its weights when asked and run the chosen
 * strategy. Either returns a complete result or throws ValidationError
 * before anything is computed.
 */
export function runAllocation(request: AllocationRequest): AllocationResult {
  const algorithm = request.algorithm ?? 'proportional';
  const weights = normalizeWeights(request.weights, { normalize: request.normalize });

  const labels = request.days ?? defaultDayLabels(request.hours.length);
  if (labels.length !== request.hours.length) {
    throw new ValidationError('Number of days must match number of hours', {
      days: labels.length,
      hours: request.hours.length,
    });
  }

  logger
    .child({ module: 'engine' })
    .debug({ algorithm, weights, resolution: request.resolution }, 'allocating hours');
  const { matrix, targets } = STRATEGIES[algorithm](request.hours, weights, request.resolution);

  return {
    algorithm,
    resolution: request.resolution,
    weights,
    targets,
    rows: request.hours.map((total, index) => ({
      day: labels[index],
      total,
      categories: matrix[index],
    })),
  };
}
