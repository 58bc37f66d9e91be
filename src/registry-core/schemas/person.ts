import { z } from 'zod';
import { embeddedAddressSchema } from './address';
import { calendarDateSchema, nullable, uuidSchema } from './common';

// Institutional identifier, e.g. "abc1234".
export const UNI_PATTERN = /^[a-z]{2,3}\d{1,4}$/;
export const PHONE_PATTERN = /^\+?[0-9 ()-]{7,20}$/;

const personFields = {
  uni: z.string().regex(UNI_PATTERN, 'UNI must be 2-3 lowercase letters followed by 1-4 digits'),
  first_name: z.string().min(1).max(100),
  last_name: z.string().min(1).max(100),
  email: z.string().email(),
  phone: nullable(z.string().regex(PHONE_PATTERN, 'Phone may only contain digits, spaces, dashes and parentheses')),
  birth_date: nullable(calendarDateSchema),
};

export const personCreateSchema = z.object({
  ...personFields,
  addresses: z.array(embeddedAddressSchema).default([]),
});

// Supplied `addresses` replace the stored list wholesale.
export const personUpdateSchema = z
  .object({
    ...personFields,
    addresses: z.array(embeddedAddressSchema),
  })
  .partial();

export const personRecordSchema = personCreateSchema.extend({
  id: uuidSchema,
});

export const personFiltersSchema = z.object({
  uni: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  email: z.string().optional(),
  phone: z.string().optional(),
  birth_date: z.string().optional(),
  city: z.string().optional(),
  country: z.string().optional(),
});

export type PersonCreate = z.infer<typeof personCreateSchema>;
export type PersonUpdate = z.infer<typeof personUpdateSchema>;
export type PersonRecord = z.infer<typeof personRecordSchema>;
export type PersonFilters = z.infer<typeof personFiltersSchema>;
