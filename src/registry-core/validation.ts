import type { z } from 'zod';
import { VIOLATED_CONSTRAINTS } from '@shared/constants';
import type { FieldViolation, ViolatedConstraint } from '@shared/types';
import { ValidationError } from './errors';

function isViolatedConstraint(value: unknown): value is ViolatedConstraint {
  return (VIOLATED_CONSTRAINTS as readonly unknown[]).includes(value);
}

export function classifyIssue(issue: z.ZodIssue): ViolatedConstraint {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' ? 'required' : 'type';
    case 'invalid_string':
      return issue.validation === 'regex' ? 'pattern' : 'format';
    case 'too_small':
    case 'too_big':
      return issue.type === 'number' || issue.type === 'bigint' ? 'range' : 'length';
    case 'invalid_enum_value':
    case 'invalid_literal':
      return 'enum';
    case 'not_multiple_of':
      return 'precision';
    case 'invalid_date':
      return 'format';
    case 'custom': {
      const constraint: unknown = issue.params?.constraint;
      return isViolatedConstraint(constraint) ? constraint : 'format';
    }
    default:
      return 'type';
  }
}

export function toViolations(error: z.ZodError): FieldViolation[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    constraint: classifyIssue(issue),
    message: issue.message,
  }));
}

/**
 * Parses `payload` with `schema`, reporting every violated field at once.
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError(toViolations(result.error));
  }
  return result.data;
}
