export type Algorithm = 'proportional' | 'optimal' | 'sequential';

/** One day's allocation: the original total and one value per category. */
export interface AllocationRow {
  readonly day: string;
  readonly total: number;
  readonly categories: readonly number[];
}

export interface AllocationResult {
  readonly algorithm: Algorithm;
  readonly resolution: number;
  /** Weights actually used (after normalization, if requested). */
  readonly weights: readonly number[];
  readonly rows: readonly AllocationRow[];
  /** Theoretical total hours per category across all days. */
  readonly targets: readonly number[];
}

export interface AllocationRequest {
  readonly hours: readonly number[];
  readonly weights: readonly number[];
  readonly resolution: number;
  readonly normalize?: boolean;
  readonly algorithm?: Algorithm;
  /** Row labels; defaults to `day-1`, `day-2`, ... when omitted. */
  readonly days?: readonly string[];
}

export interface AllocationSummary {
  readonly inputTotal: number;
  readonly allocatedTotal: number;
  readonly categoryTotals: readonly number[];
  /** Allocated minus target, per category. */
  readonly deltas: readonly number[];
  /** Share of the input total each category received (0-1). */
  readonly actualShares: readonly number[];
  /** Input total minus allocated total. Negative when rounding over-allocates. */
  readonly unallocatedHours: number;
}

/** A strategy maps validated inputs to one row of category values per day. */
export interface AllocationStrategyOutput {
  readonly matrix: number[][];
  readonly targets: number[];
}
