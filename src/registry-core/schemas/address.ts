import { z } from 'zod';
import { embeddedIdSchema, uuidSchema } from './common';

export const addressFields = {
  street: z.string().min(1).max(200),
  city: z.string().min(1).max(100),
  state: z.string().min(1).max(100),
  postal_code: z.string().min(1).max(20),
  country: z.string().min(1).max(100),
};

export const addressCreateSchema = z.object({
  id: uuidSchema.optional(),
  ...addressFields,
});

export const addressUpdateSchema = z.object(addressFields).partial();

export const addressRecordSchema = z.object({
  id: uuidSchema,
  ...addressFields,
});

/** Address held inline by a Person or Organization. */
export const embeddedAddressSchema = z.object({
  id: embeddedIdSchema,
  ...addressFields,
});

export const addressFiltersSchema = z.object({
  street: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postal_code: z.string().optional(),
  country: z.string().optional(),
});

export type AddressCreate = z.infer<typeof addressCreateSchema>;
export type AddressUpdate = z.infer<typeof addressUpdateSchema>;
export type AddressRecord = z.infer<typeof addressRecordSchema>;
export type EmbeddedAddress = z.infer<typeof embeddedAddressSchema>;
export type AddressFilters = z.infer<typeof addressFiltersSchema>;
