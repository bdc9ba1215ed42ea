import { sumOf } from './weights.js';
import type { AllocationResult, AllocationSummary } from './types.js';

export function summarize(result: AllocationResult): AllocationSummary {
  const inputTotal = sumOf(result.rows.map((row) => row.total));
  const categoryTotals = result.weights.map((_, index) =>
    sumOf(result.rows.map((row) => row.categories[index] ?? 0))
  );
  const allocatedTotal = sumOf(categoryTotals);

  return {
    inputTotal,
    allocatedTotal,
    categoryTotals,
    deltas: categoryTotals.map((total, index) => total - (result.targets[index] ?? 0)),
    actualShares: categoryTotals.map((total) => (inputTotal === 0 ? 0 : total / inputTotal)),
    unallocatedHours: inputTotal - allocatedTotal,
  };
}
