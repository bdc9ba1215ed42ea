import { z } from 'zod';

/** Plain decimal notation with an optional sign and exponent: `7.5`, `-1`, `.25`, `1e-2`. */
export const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/** A decimal token as typed on the command line or in the environment. */
export const decimalString = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN, 'must be a decimal number')
  .transform(Number)
  .pipe(z.number().finite());
