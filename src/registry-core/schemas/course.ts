import { z } from 'zod';
import { SEMESTERS } from '@shared/constants';
import { nullable, queryNumber, referenceIdSchema, timestampSchema, uuidSchema } from './common';

// COMS4111, MATH1101, COMS4111W
export const COURSE_CODE_PATTERN = /^[A-Z]{3,5}\d{4}[A-Z]?$/;
export const DEPARTMENT_CODE_PATTERN = /^[A-Z]{3,5}$/;

export const courseCodeSchema = z
  .string()
  .min(7)
  .max(9)
  .regex(COURSE_CODE_PATTERN, 'Course code must be 3-5 uppercase letters, 4 digits and an optional letter');

const courseFields = {
  course_code: courseCodeSchema,
  title: z.string().min(1).max(200),
  description: nullable(z.string().max(2000)),
  credits: z
    .number()
    .min(0)
    .max(10)
    .refine((value) => Math.abs(value * 10 - Math.round(value * 10)) < 1e-9, {
      message: 'Credits allow at most one decimal place',
      params: { constraint: 'precision' },
    }),
  semester: z.enum(SEMESTERS),
  year: z.number().int().min(2020).max(2040),
  department_code: z
    .string()
    .regex(DEPARTMENT_CODE_PATTERN, 'Department code must be 3-5 uppercase letters'),
  // References a Person; existence is not checked.
  instructor_id: nullable(referenceIdSchema),
  max_enrollment: nullable(z.number().int().min(1).max(1000)),
  location: nullable(z.string().max(100)),
  meeting_times: nullable(z.string().max(200)),
};

export const courseCreateSchema = z.object({
  ...courseFields,
  prerequisites: z.array(courseCodeSchema).default([]),
});

export const courseUpdateSchema = z
  .object({
    ...courseFields,
    prerequisites: z.array(courseCodeSchema),
  })
  .partial();

export const courseRecordSchema = courseCreateSchema.extend({
  id: uuidSchema,
  current_enrollment: z.number().int().min(0).default(0),
  created_at: timestampSchema,
  updated_at: timestampSchema,
});

export const courseFiltersSchema = z.object({
  course_code: z.string().optional(),
  title: z.string().optional(),
  department_code: z.string().optional(),
  semester: z.string().optional(),
  year: queryNumber(z.number().int()).optional(),
  instructor_id: z
    .string()
    .transform((value) => value.toLowerCase())
    .optional(),
  credits: queryNumber(z.number()).optional(),
  min_credits: queryNumber(z.number()).optional(),
  max_credits: queryNumber(z.number()).optional(),
});

export type CourseCreate = z.infer<typeof courseCreateSchema>;
export type CourseUpdate = z.infer<typeof courseUpdateSchema>;
export type CourseRecord = z.infer<typeof courseRecordSchema>;
export type CourseKey = Pick<CourseRecord, 'course_code' | 'semester' | 'year'>;
export type CourseFilters = z.infer<typeof courseFiltersSchema>;
