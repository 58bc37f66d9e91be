import { anyOf, atLeast, atMost, containsText, equals } from './filters';
import type { ResourceDefinition } from './resource-service';
import {
  addressCreateSchema,
  addressFiltersSchema,
  addressRecordSchema,
  addressUpdateSchema,
  courseCreateSchema,
  courseFiltersSchema,
  courseRecordSchema,
  courseUpdateSchema,
  organizationCreateSchema,
  organizationFiltersSchema,
  organizationRecordSchema,
  organizationUpdateSchema,
  personCreateSchema,
  personFiltersSchema,
  personRecordSchema,
  personUpdateSchema,
} from './schemas';
import type {
  AddressCreate,
  AddressFilters,
  AddressRecord,
  AddressUpdate,
  CourseCreate,
  CourseFilters,
  CourseRecord,
  CourseUpdate,
  OrganizationCreate,
  OrganizationFilters,
  OrganizationRecord,
  OrganizationUpdate,
  PersonCreate,
  PersonFilters,
  PersonRecord,
  PersonUpdate,
} from './schemas';
import { assertUniqueCourseKey } from './uniqueness';

// ---------------------------------------------------------------------------
// Address
// ---------------------------------------------------------------------------

export const addressResource: ResourceDefinition<
  AddressRecord,
  AddressCreate,
  AddressUpdate,
  AddressFilters
> = {
  name: 'Address',
  createSchema: addressCreateSchema,
  updateSchema: addressUpdateSchema,
  recordSchema: addressRecordSchema,
  filterSchema: addressFiltersSchema,
  timestamped: false,
  filters: {
    street: equals((a: AddressRecord) => a.street),
    city: equals((a: AddressRecord) => a.city),
    state: equals((a: AddressRecord) => a.state),
    postal_code: equals((a: AddressRecord) => a.postal_code),
    country: equals((a: AddressRecord) => a.country),
  },
};

// ---------------------------------------------------------------------------
// Person
// ---------------------------------------------------------------------------

export const personResource: ResourceDefinition<
  PersonRecord,
  PersonCreate,
  PersonUpdate,
  PersonFilters
> = {
  name: 'Person',
  createSchema: personCreateSchema,
  updateSchema: personUpdateSchema,
  recordSchema: personRecordSchema,
  filterSchema: personFiltersSchema,
  timestamped: false,
  filters: {
    uni: equals((p: PersonRecord) => p.uni),
    first_name: equals((p: PersonRecord) => p.first_name),
    last_name: equals((p: PersonRecord) => p.last_name),
    email: equals((p: PersonRecord) => p.email),
    phone: equals((p: PersonRecord) => p.phone),
    birth_date: equals((p: PersonRecord) => p.birth_date),
    city: anyOf((p: PersonRecord) => p.addresses, (a) => a.city),
    country: anyOf((p: PersonRecord) => p.addresses, (a) => a.country),
  },
};

// ---------------------------------------------------------------------------
// Organization
// ---------------------------------------------------------------------------

export const organizationResource: ResourceDefinition<
  OrganizationRecord,
  OrganizationCreate,
  OrganizationUpdate,
  OrganizationFilters
> = {
  name: 'Organization',
  createSchema: organizationCreateSchema,
  updateSchema: organizationUpdateSchema,
  recordSchema: organizationRecordSchema,
  filterSchema: organizationFiltersSchema,
  timestamped: true,
  filters: {
    name: containsText((o: OrganizationRecord) => o.name),
    org_type: equals((o: OrganizationRecord) => o.org_type),
    founded_year: equals((o: OrganizationRecord) => o.founded_year),
    contact_person_id: equals((o: OrganizationRecord) => o.contact_person_id),
    city: anyOf((o: OrganizationRecord) => o.addresses, (a) => a.city),
    country: anyOf((o: OrganizationRecord) => o.addresses, (a) => a.country),
  },
};

// ---------------------------------------------------------------------------
// Course
// ---------------------------------------------------------------------------

export const courseResource: ResourceDefinition<
  CourseRecord,
  CourseCreate,
  CourseUpdate,
  CourseFilters
> = {
  name: 'Course',
  createSchema: courseCreateSchema,
  updateSchema: courseUpdateSchema,
  recordSchema: courseRecordSchema,
  filterSchema: courseFiltersSchema,
  timestamped: true,
  filters: {
    course_code: equals((c: CourseRecord) => c.course_code),
    title: containsText((c: CourseRecord) => c.title),
    department_code: equals((c: CourseRecord) => c.department_code),
    semester: equals((c: CourseRecord) => c.semester),
    year: equals((c: CourseRecord) => c.year),
    instructor_id: equals((c: CourseRecord) => c.instructor_id),
    credits: equals((c: CourseRecord) => c.credits),
    min_credits: atLeast((c: CourseRecord) => c.credits),
    max_credits: atMost((c: CourseRecord) => c.credits),
  },
  checkConstraints: (candidate, existing, excludeId) =>
    assertUniqueCourseKey(existing, candidate, excludeId),
};
