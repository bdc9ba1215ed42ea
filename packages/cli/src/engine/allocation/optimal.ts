import { assertHours } from './allocator.js';
import { assertResolution } from './rounding.js';
import { assertNormalized, sumOf } from './weights.js';
import type { AllocationStrategyOutput } from './types.js';

/** Absorbs binary noise that lands a grid total just under a whole unit. */
const GRID_NUDGE = 1e-9;

/**
 * Largest-remainder (Hamilton) quotas in whole grid units: floors first,
 * then one unit each to the largest fractional parts.
 */
export function hamiltonQuotas(weights: readonly number[], totalUnits: number): number[] {
  const raw = weights.map((weight) => weight * totalUnits);
  const quotas = raw.map((target) => Math.floor(target));
  const assigned = sumOf(quotas);
  let free = Math.min(totalUnits - assigned, Math.round(sumOf(raw) - assigned));

  const byRemainder = raw
    .map((target, index) => ({ index, remainder: target - Math.floor(target) }))
    .sort((a, b) => b.remainder - a.remainder || a.index - b.index);

  for (const { index } of byRemainder) {
    if (free <= 0) break;
    quotas[index] += 1;
    free -= 1;
  }
  return quotas;
}

/** Index of the category with the most quota left; ties go to the lowest index. */
function largestRemaining(remaining: readonly number[]): number {
  let best = -1;
  remaining.forEach((units, index) => {
    if (units > 0 && (best === -1 || units > remaining[best])) {
      best = index;
    }
  });
  return best;
}

/**
 * Quota allocation in grid units. Category totals across the week come out
 * as close as the grid allows to their targets, and no day ever receives
 * more than its own total: a total that is off the grid only counts its
 * whole units.
 */
export function allocateOptimal(
  hours: readonly number[],
  weights: readonly number[],
  resolution: number
): AllocationStrategyOutput {
  assertHours(hours);
  assertNormalized(weights);
  const factor = assertResolution(resolution);

  const unitsPerDay = hours.map((total) => Math.floor(total * factor + GRID_NUDGE));
  const quotas = hamiltonQuotas(weights, sumOf(unitsPerDay));
  const remaining = [...quotas];

  const unitMatrix = unitsPerDay.map((capacity) => {
    const row = weights.map(() => 0);
    for (let used = 0; used < capacity; used++) {
      const index = largestRemaining(remaining);
      if (index === -1) break;
      row[index] += 1;
      remaining[index] -= 1;
    }
    return row;
  });

  return {
    matrix: unitMatrix.map((row) => row.map((units) => units / factor)),
    targets: quotas.map((units) => units / factor),
  };
}
