import { ValidationError } from '../../lib/errors.js';

/** Absorbs binary noise such as 1.235 / 0.01 = 123.49999999999999. */
const HALF_NUDGE = 1e-9;
const GRID_TOLERANCE = 1e-9;

/**
 * Number of grid units per hour. Throws unless `resolution` is positive
 * and divides 1.0 evenly.
 */
export function assertResolution(resolution: number): number {
  if (!Number.isFinite(resolution) || resolution <= 0) {
    throw new ValidationError('Resolution must be positive', { resolution });
  }
  const factor = Math.round(1 / resolution);
  if (factor < 1 || Math.abs(factor * resolution - 1) > GRID_TOLERANCE) {
    throw new ValidationError(
      'Resolution must evenly divide 1.0 (e.g. 1, 0.5, 0.25, 0.2)',
      { resolution }
    );
  }
  return factor;
}

/**
 * Snap `value` to the nearest multiple of `resolution`, halves rounding up.
 * Grids that divide 1.0 are computed as `units / factor` so 0.01 steps
 * come out as clean decimals.
 */
export function roundToResolution(value: number, resolution: number): number {
  if (!Number.isFinite(resolution) || resolution <= 0) {
    throw new ValidationError('Resolution must be positive', { resolution });
  }
  const factor = Math.round(1 / resolution);
  if (factor >= 1 && Math.abs(factor * resolution - 1) <= GRID_TOLERANCE) {
    return Math.round(value * factor + HALF_NUDGE) / factor;
  }
  return Math.round(value / resolution + HALF_NUDGE) * resolution;
}

/** Digits needed to print a value on the grid: 0.5 -> 1, 0.25 -> 2, 1 -> 0. */
export function decimalPlaces(resolution: number): number {
  const text = resolution.toFixed(10).replace(/0+$/, '').replace(/\.$/, '');
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/** True when `value` lies on the grid within floating tolerance. */
export function isOnGrid(value: number, resolution: number): boolean {
  return Math.abs(value - roundToResolution(value, resolution)) < GRID_TOLERANCE;
}
