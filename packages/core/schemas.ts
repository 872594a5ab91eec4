import { z } from 'zod';

import { ValidationError, fail, ok, type Result } from './errors';
import { parseDateLabel, parseTimeLabel } from './slot_time';
import type { DurationBounds } from './types';

export const MAX_DISCOUNT_PERCENT = 30;
export const PHONE_DIGITS = 11;
export const DEFAULT_DURATION_BOUNDS: DurationBounds = { min: 1, max: 8 };

const Rate = z.number().finite().nonnegative();

export const HallSchema = z.object({
  number: z.number().int().positive(),
  rate: Rate,
  capacity: z.number().int().positive(),
});

export const EquipmentItemSchema = z.object({
  name: z.string().trim().min(1),
  rate: Rate,
});

export const DiscountSchema = z.number().int().min(0).max(MAX_DISCOUNT_PERCENT);

export const PhoneSchema = z
  .string()
  .regex(new RegExp(`^\\d{${PHONE_DIGITS}}$`), `Phone must be exactly ${PHONE_DIGITS} digits`);

export const NewClientSchema = z.object({
  firstName: z.string().trim().min(1),
  lastName: z.string().trim().min(1),
  phone: z.string().trim().min(1),
  discount: DiscountSchema,
});

export const DurationBoundsSchema = z
  .object({
    min: z.number().int().positive(),
    max: z.number().int().positive(),
  })
  .refine((bounds) => bounds.min <= bounds.max, {
    message: 'Minimum duration must not exceed maximum duration',
    path: ['min'],
  });

const DateLabel = z.string().transform((value, ctx) => {
  const parsed = parseDateLabel(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const TimeLabel = z.string().transform((value, ctx) => {
  const parsed = parseTimeLabel(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid time: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

export function bookingRequestSchema(bounds: DurationBounds) {
  return z.object({
    clientId: z.string().min(1),
    hallNumber: z.number().int().positive(),
    equipment: z.array(z.string().trim().min(1)),
    date: DateLabel,
    time: TimeLabel,
    durationHours: z.number().int().min(bounds.min).max(bounds.max),
  });
}

export type HallInput = z.input<typeof HallSchema>;
export type EquipmentItemInput = z.input<typeof EquipmentItemSchema>;
export type ParsedBookingRequest = z.output<ReturnType<typeof bookingRequestSchema>>;

export function toValidationError(error: z.ZodError, field?: string): ValidationError {
  const issues = error.issues.map((issue) => ({
    path: [...(field ? [field] : []), ...issue.path].join('.') || 'input',
    message: issue.message,
  }));
  const first = issues[0] ?? { path: 'input', message: 'Invalid input' };
  return new ValidationError(first.path, `${first.path}: ${first.message}`, issues);
}

export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  field?: string
): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return fail(toValidationError(parsed.error, field));
  }
  return ok(parsed.data);
}
