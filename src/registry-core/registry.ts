import { ResourceService } from './resource-service';
import type { ServiceOptions } from './resource-service';
import {
  addressResource,
  courseResource,
  organizationResource,
  personResource,
} from './resources';
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
import { RecordStore } from './store';

export interface Registry {
  addresses: ResourceService<AddressRecord, AddressCreate, AddressUpdate, AddressFilters>;
  persons: ResourceService<PersonRecord, PersonCreate, PersonUpdate, PersonFilters>;
  organizations: ResourceService<
    OrganizationRecord,
    OrganizationCreate,
    OrganizationUpdate,
    OrganizationFilters
  >;
  courses: ResourceService<CourseRecord, CourseCreate, CourseUpdate, CourseFilters>;
}

/**
 * Builds the four resource services over fresh, empty stores. Construct one
 * per process, or one per test for isolation.
 */
export function createRegistry(options: ServiceOptions = {}): Registry {
  return {
    addresses: new ResourceService(addressResource, new RecordStore<AddressRecord>('Address'), options),
    persons: new ResourceService(personResource, new RecordStore<PersonRecord>('Person'), options),
    organizations: new ResourceService(
      organizationResource,
      new RecordStore<OrganizationRecord>('Organization'),
      options,
    ),
    courses: new ResourceService(courseResource, new RecordStore<CourseRecord>('Course'), options),
  };
}
