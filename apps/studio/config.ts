import 'dotenv/config';
import { z } from 'zod';

import { DEFAULT_DURATION_BOUNDS, toValidationError } from '../../packages/core';
import type { ConflictPolicy, DurationBounds } from '../../packages/core';

export interface StudioConfig {
  durationBounds: DurationBounds;
  conflictPolicy: ConflictPolicy;
  logLevel: string;
}

const EnvSchema = z
  .object({
    STUDIO_MIN_DURATION_HOURS: z.coerce.number().int().positive().default(DEFAULT_DURATION_BOUNDS.min),
    STUDIO_MAX_DURATION_HOURS: z.coerce.number().int().positive().default(DEFAULT_DURATION_BOUNDS.max),
    STUDIO_CONFLICT_POLICY: z.enum(['overlap', 'exact']).default('overlap'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  })
  .superRefine((values, ctx) => {
    if (values.STUDIO_MIN_DURATION_HOURS > values.STUDIO_MAX_DURATION_HOURS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STUDIO_MIN_DURATION_HOURS'],
        message: 'must not exceed STUDIO_MAX_DURATION_HOURS',
      });
    }
  });

export function parseStudioConfig(env: Record<string, string | undefined>): StudioConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'env');
  }

  const values = parsed.data;
  return {
    durationBounds: {
      min: values.STUDIO_MIN_DURATION_HOURS,
      max: values.STUDIO_MAX_DURATION_HOURS,
    },
    conflictPolicy: values.STUDIO_CONFLICT_POLICY,
    logLevel: values.LOG_LEVEL,
  };
}

export const CONFIG: StudioConfig = parseStudioConfig(process.env);
