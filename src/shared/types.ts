import type { ORG_TYPES, SEMESTERS, VIOLATED_CONSTRAINTS } from './constants';

export type OrgType = (typeof ORG_TYPES)[number];
export type Semester = (typeof SEMESTERS)[number];
export type ViolatedConstraint = (typeof VIOLATED_CONSTRAINTS)[number];

export interface FieldViolation {
  field: string;
  constraint: ViolatedConstraint;
  message: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  details?: FieldViolation[];
}

export interface HealthRecord {
  status: number;
  status_message: string;
  timestamp: string;
  ip_address: string;
  echo: string | null;
  path_echo: string | null;
}
