import type { ConstraintInvalid } from './constraints/types.js';

export type ValidationErrorCode =
  | 'malformed_predicate'
  | 'unsupported_operator'
  | 'placeholder_out_of_range'
  | 'invalid_option';

/**
 * A query the caller built cannot be compiled. Returned inside a
 * CompileResult rather than thrown; the repository throws it.
 */
export class ValidationError extends Error {
  override readonly name = 'ValidationError';

  constructor(
    readonly code: ValidationErrorCode,
    message: string,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConstraintViolationError extends Error {
  override readonly name = 'ConstraintViolationError';

  constructor(
    readonly violations: readonly ConstraintInvalid[],
    message?: string,
  ) {
    super(
      message ??
        `Constraint violation: ${violations.map((v) => `${v.kind} ${v.constraint.name}`).join(', ')}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error {
  override readonly name = 'NotFoundError';

  constructor(
    readonly id: string,
    message?: string,
  ) {
    super(message ?? `Document not found: ${id}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StoreError extends Error {
  override readonly name = 'StoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
    readonly code: string = 'store_error',
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised for schema authoring bugs. Never retried. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
