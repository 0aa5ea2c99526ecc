import { ApiError } from '../middleware/errorHandler';

export interface FieldError {
  field: string;
  message: string;
}

/** Unknown job, data source or API key id. */
export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, message);
  }
}

/** Malformed or conflicting input, reported per field. */
export class ValidationError extends ApiError {
  readonly errors: FieldError[];

  constructor(field: string, message: string);
  constructor(errors: FieldError[]);
  constructor(fieldOrErrors: string | FieldError[], message?: string) {
    const errors =
      typeof fieldOrErrors === 'string'
        ? [{ field: fieldOrErrors, message: message ?? 'Invalid value' }]
        : fieldOrErrors;
    super(400, errors.map((e) => e.message).join(' '), { errors });
    this.errors = errors;
  }
}

/** A transition was requested from a status that does not allow it. */
export class InvalidStateError extends ApiError {
  constructor(message: string) {
    super(400, message);
  }
}

export class AuthenticationError extends ApiError {
  constructor(message = 'Authentication credentials were not provided.') {
    super(401, message);
  }
}

/**
 * Raised by the worker when processing a job fails. `classification` is the
 * failure's error class name and labels the failure metric.
 */
export class ProcessingFailureError extends ApiError {
  readonly classification: string;

  constructor(cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(500, message, undefined, false);
    this.classification = cause instanceof Error ? cause.name : typeof cause;
    this.cause = cause;
  }
}

export class JobTimeoutError extends ApiError {
  constructor(hours: number) {
    super(500, `Job timed out after ${hours} hours`);
  }
}

/** A health-check dependency did not answer in time or answered with an error. */
export class DependencyUnavailableError extends ApiError {
  readonly dependency: string;

  constructor(dependency: string, reason: string) {
    super(503, `${dependency} unavailable: ${reason}`);
    this.dependency = dependency;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedSourceTypeError extends Error {
  constructor(sourceType: string) {
    super(`Unsupported data source type: ${sourceType}`);
    this.name = 'UnsupportedSourceTypeError';
  }
}
