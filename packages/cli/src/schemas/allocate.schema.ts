import { z } from 'zod';
import { decimalString } from './number.schema.js';

export const algorithmSchema = z.enum(['proportional', 'optimal', 'sequential']);

export const allocateOptionsSchema = z.object({
  hours: z.array(decimalString).min(1, 'at least one daily total is required'),
  days: z.array(z.string().min(1)).optional(),
  percentages: z.array(decimalString).min(1, 'at least one percentage is required'),
  algorithm: algorithmSchema,
  resolution: decimalString,
  normalize: z.boolean().default(false),
  sum: z.boolean().default(false),
  showActualPercent: z.boolean().default(false),
  showRemainder: z.boolean().default(false),
  csv: z.string().min(1).optional(),
  json: z.string().min(1).optional(),
});

export type AllocateOptions = z.infer<typeof allocateOptionsSchema>;
