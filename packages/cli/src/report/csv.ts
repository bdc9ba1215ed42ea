import { stringify } from 'csv-stringify/sync';
import { summarize } from '../engine/allocation/index.js';
import type { AllocationResult } from '../engine/allocation/index.js';
import { percentHeading } from './format.js';

export interface CsvOptions {
  sum?: boolean;
}

const CSV_DECIMALS = 2;

export function toCsvRecords(result: AllocationResult, options: CsvOptions = {}): string[][] {
  const fmt = (value: number) => value.toFixed(CSV_DECIMALS);
  const records: string[][] = [['Day', 'Total', ...result.weights.map(percentHeading)]];

  for (const row of result.rows) {
    records.push([row.day, fmt(row.total), ...row.categories.map(fmt)]);
  }

  if (options.sum) {
    const summary = summarize(result);
    records.push(['Sum', fmt(summary.inputTotal), ...summary.categoryTotals.map(fmt)]);
  }
  return records;
}

export function renderCsv(result: AllocationResult, options: CsvOptions = {}): string {
  return stringify(toCsvRecords(result, options));
}
