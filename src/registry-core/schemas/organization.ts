import { z } from 'zod';
import { ORG_TYPES } from '@shared/constants';
import { embeddedAddressSchema } from './address';
import {
  nullable,
  queryNumber,
  referenceIdSchema,
  timestampSchema,
  uuidSchema,
  websiteSchema,
} from './common';

const organizationFields = {
  name: z.string().min(1).max(200),
  org_type: z.enum(ORG_TYPES),
  website: nullable(websiteSchema),
  description: nullable(z.string().max(1000)),
  // References a Person; existence is not checked.
  contact_person_id: nullable(referenceIdSchema),
  employee_count: nullable(z.number().int().min(0)),
  founded_year: nullable(z.number().int().min(1000).max(2030)),
};

export const organizationCreateSchema = z.object({
  ...organizationFields,
  addresses: z.array(embeddedAddressSchema).default([]),
});

export const organizationUpdateSchema = z
  .object({
    ...organizationFields,
    addresses: z.array(embeddedAddressSchema),
  })
  .partial();

export const organizationRecordSchema = organizationCreateSchema.extend({
  id: uuidSchema,
  created_at: timestampSchema,
  updated_at: timestampSchema,
});

export const organizationFiltersSchema = z.object({
  name: z.string().optional(),
  org_type: z.string().optional(),
  founded_year: queryNumber(z.number().int()).optional(),
  contact_person_id: z
    .string()
    .transform((value) => value.toLowerCase())
    .optional(),
  city: z.string().optional(),
  country: z.string().optional(),
});

export type OrganizationCreate = z.infer<typeof organizationCreateSchema>;
export type OrganizationUpdate = z.infer<typeof organizationUpdateSchema>;
export type OrganizationRecord = z.infer<typeof organizationRecordSchema>;
export type OrganizationFilters = z.infer<typeof organizationFiltersSchema>;
