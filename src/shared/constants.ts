export const SERVICE_NAME = 'Person/Address/Organization/Course API';
export const SERVICE_VERSION = '0.2.0';

export const RESOURCE_PATHS = {
  ADDRESSES: '/addresses',
  PERSONS: '/persons',
  ORGANIZATIONS: '/organizations',
  COURSES: '/courses',
} as const;

export const ORG_TYPES = [
  'university',
  'company',
  'nonprofit',
  'government',
  'startup',
  'research',
] as const;

export const SEMESTERS = ['Fall', 'Spring', 'Summer'] as const;

export const VIOLATED_CONSTRAINTS = [
  'required',
  'type',
  'pattern',
  'length',
  'range',
  'enum',
  'format',
  'precision',
] as const;
