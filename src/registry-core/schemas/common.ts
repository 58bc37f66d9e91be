import { randomUUID } from 'crypto';
import { z } from 'zod';

export const uuidSchema = z.string().uuid();

/** UUID pointing at another record; stored and compared in lower case. */
export const referenceIdSchema = uuidSchema.transform((value) => value.toLowerCase());

/** UTC timestamp as written by `Date.prototype.toISOString`. */
export const timestampSchema = z.string().datetime();

/**
 * Numeric query-string value. An empty or blank string is rejected instead of
 * being read as 0.
 */
export function queryNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== 'string') return value;
    return value.trim() === '' ? Number.NaN : Number(value);
  }, schema);
}

/** Optional field that a client may also clear with an explicit `null`. */
export function nullable<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullable().optional();
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  // Malformed strings are reported by the pattern check alone.
  if (!DATE_PATTERN.test(value)) return true;
  const [year, month, day] = value.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export const calendarDateSchema = z
  .string()
  .regex(DATE_PATTERN, 'Date must be formatted YYYY-MM-DD')
  .refine(isCalendarDate, {
    message: 'Date does not exist in the calendar',
    params: { constraint: 'format' },
  });

export const websiteSchema = z
  .string()
  .url()
  .regex(/^https?:\/\//i, 'Website must use http or https')
  .max(2083);

/** Ids of embedded sub-records are generated when the client leaves them out. */
export const embeddedIdSchema = uuidSchema.default(() => randomUUID());
