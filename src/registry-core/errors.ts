import type { FieldViolation } from '@shared/types';

/**
 * Base class for every failure the registry reports to its caller.
 * `status` is the HTTP status the API layer answers with.
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export class ValidationError extends RegistryError {
  constructor(readonly violations: FieldViolation[]) {
    super(
      `Validation failed: ${violations
        .map((v) => `${v.field} (${v.constraint})`)
        .join(', ')}`,
      400,
    );
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends RegistryError {
  constructor(
    readonly resource: string,
    readonly id: string,
  ) {
    super(`${resource} not found`, 404);
    this.name = 'NotFoundError';
  }
}

// Duplicate ids and duplicate course keys; answered with 400 like any other
// rejected payload.
export class ConflictError extends RegistryError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ConflictError';
  }
}
