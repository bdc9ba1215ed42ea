import { decimalPlaces, summarize } from '../engine/allocation/index.js';
import type { AllocationResult } from '../engine/allocation/index.js';
import { formatHours, formatSigned, percentHeading } from './format.js';

export interface TableOptions {
  /** Adds the Sum column plus Sum and Delta rows. */
  sum?: boolean;
  /** Adds an Actual % row; only shown together with `sum`. */
  showActualPercent?: boolean;
  /** Adds a Remainder row with the input hours left unallocated, when there are any. */
  showRemainder?: boolean;
}

const REMAINDER_EPSILON = 1e-9;

// ─── Rows ────────────────────────────────────────────────────────────────────

export function buildTableRows(result: AllocationResult, options: TableOptions = {}): string[][] {
  const decimals = decimalPlaces(result.resolution);
  const fmt = (value: number) => formatHours(value, decimals);
  const withSum = options.sum ?? false;

  const header = ['Day', 'Input', ...result.weights.map(percentHeading)];
  if (withSum) header.push('Sum');

  const rows: string[][] = [header];
  for (const row of result.rows) {
    const cells = [row.day, fmt(row.total), ...row.categories.map(fmt)];
    if (withSum) cells.push(fmt(row.categories.reduce((acc, value) => acc + value, 0)));
    rows.push(cells);
  }

  const summary = summarize(result);
  if (options.showRemainder && Math.abs(summary.unallocatedHours) > REMAINDER_EPSILON) {
    const cells = ['Remainder', fmt(summary.unallocatedHours), ...result.weights.map(() => '')];
    if (withSum) cells.push('');
    rows.push(cells);
  }

  if (!withSum) return rows;

  rows.push(['Sum', fmt(summary.inputTotal), ...summary.categoryTotals.map(fmt), fmt(summary.allocatedTotal)]);

  if (options.showActualPercent) {
    rows.push([
      'Actual %',
      '',
      ...summary.actualShares.map((share) => `${formatHours(share * 100, decimals)}%`),
      '',
    ]);
  }

  rows.push(['Delta', '-', ...summary.deltas.map((delta) => formatSigned(delta, decimals)), '']);
  return rows;
}

// ─── Rendering ───────────────────────────────────────────────────────────────

/**
 * Fixed-width table: each column is its longest cell plus two spaces, the
 * first column left-aligned and the rest right-aligned, with a dashed rule
 * under the header.
 */
export function renderTable(result: AllocationResult, options: TableOptions = {}): string {
  const [header, ...body] = buildTableRows(result, options);
  const widths = header.map(
    (_, column) => Math.max(...[header, ...body].map((cells) => (cells[column] ?? '').length)) + 2
  );

  const line = (cells: readonly string[]) =>
    cells
      .map((cell, column) => (column === 0 ? cell.padEnd(widths[column]) : cell.padStart(widths[column])))
      .join('');

  const rule = '-'.repeat(widths.reduce((acc, width) => acc + width, 0));
  return [line(header), rule, ...body.map(line)].join('\n');
}
