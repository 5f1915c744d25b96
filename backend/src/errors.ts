// src/errors.ts
import type { FieldError, ValidationErrors } from "./utils/validation";

/** Error carrying the HTTP status the error handler should answer with. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing, malformed, expired or otherwise unverifiable credentials. */
export class AuthError extends HttpError {
  constructor(message = "Invalid or expired token", options?: ErrorOptions) {
    super(401, message, undefined, options);
  }
}

/** Login failure. Wrong password and unreadable hash look the same. */
export class InvalidCredentialsError extends HttpError {
  constructor(options?: ErrorOptions) {
    super(401, "invalid credentials", undefined, options);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Insufficient permissions") {
    super(403, message);
  }
}

export class PolicyViolationError extends HttpError {
  readonly errors: readonly FieldError[];

  constructor(errors: ValidationErrors) {
    const entries = errors.toArray();
    super(400, errors.render(), entries);
    this.errors = entries;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "not_found") {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

/** Raised while wiring the process; never per request. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
