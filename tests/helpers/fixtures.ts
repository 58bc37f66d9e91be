import { createRegistry } from '@core/registry';
import type { Registry } from '@core/registry';

export const T0 = '2025-01-15T10:20:30.000Z';

export function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `00000000-0000-4000-8000-${String(next).padStart(12, '0')}`;
  };
}

export function makeClock(start = T0) {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

export function makeRegistry(): { registry: Registry; clock: ReturnType<typeof makeClock> } {
  const clock = makeClock();
  const registry = createRegistry({ now: clock.now, generateId: sequentialIds() });
  return { registry, clock };
}

export function addressPayload(overrides: Record<string, unknown> = {}) {
  return {
    street: '116th St & Broadway',
    city: 'New York',
    state: 'NY',
    postal_code: '10027',
    country: 'USA',
    ...overrides,
  };
}

export function personPayload(overrides: Record<string, unknown> = {}) {
  return {
    uni: 'ab1234',
    first_name: 'Ada',
    last_name: 'Lovelace',
    email: 'ada@example.com',
    phone: '+1 212-555-0100',
    birth_date: '1990-12-10',
    addresses: [],
    ...overrides,
  };
}

export function organizationPayload(overrides: Record<string, unknown> = {}) {
  return {
    name: 'Example University',
    org_type: 'university',
    website: 'https://www.example.edu',
    description: 'Research university.',
    employee_count: 15000,
    founded_year: 1754,
    addresses: [addressPayload()],
    ...overrides,
  };
}

export function coursePayload(overrides: Record<string, unknown> = {}) {
  return {
    course_code: 'COMS4111',
    title: 'Introduction to Databases',
    description: 'Relational model, SQL and transactions.',
    credits: 3.0,
    semester: 'Fall',
    year: 2025,
    department_code: 'COMS',
    max_enrollment: 120,
    prerequisites: ['COMS1004', 'COMS3134'],
    location: 'Mudd 233',
    meeting_times: 'MW 2:40PM-3:55PM',
    ...overrides,
  };
}
