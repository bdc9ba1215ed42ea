import { summarize } from '../engine/allocation/index.js';
import type { Algorithm, AllocationResult } from '../engine/allocation/index.js';

export interface AllocationJson {
  days: string[];
  weights: number[];
  normalized: boolean;
  algorithm: Algorithm;
  resolution: number;
  allocations: Record<string, { total: number; categories: number[] }>;
  targets: number[];
  allocatedCategoryTotals: number[];
  unallocatedHours: number;
}

export function toJsonPayload(result: AllocationResult, normalized: boolean): AllocationJson {
  const summary = summarize(result);
  return {
    days: result.rows.map((row) => row.day),
    weights: [...result.weights],
    normalized,
    algorithm: result.algorithm,
    resolution: result.resolution,
    allocations: Object.fromEntries(
      result.rows.map((row) => [row.day, { total: row.total, categories: [...row.categories] }])
    ),
    targets: [...result.targets],
    allocatedCategoryTotals: [...summary.categoryTotals],
    unallocatedHours: summary.unallocatedHours,
  };
}

export function renderJson(result: AllocationResult, normalized: boolean): string {
  return `${JSON.stringify(toJsonPayload(result, normalized), null, 2)}\n`;
}
