import { z } from 'zod';
import { LOG_LEVELS } from '../lib/logger.js';
import { algorithmSchema } from './allocate.schema.js';
import { decimalString } from './number.schema.js';

const numberList = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.split(/[\s,]+/).filter((part) => part.length > 0))
  .pipe(z.array(decimalString.pipe(z.number().nonnegative())).min(1));

export const envSchema = z.object({
  HOUR_SPLIT_RESOLUTION: decimalString.pipe(z.number().positive()).optional().default('0.5'),
  HOUR_SPLIT_PERCENT: numberList.optional().default('0.75,0.25'),
  HOUR_SPLIT_ALGORITHM: algorithmSchema.optional().default('proportional'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().default('warn'),
});
