/**
 * Application error hierarchy.
 * Every error raised by a service carries a stable machine-readable code
 * plus optional structured details for the log trail.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
  }
}

/** A storage call failed. `operation` names the repository call. */
export class PersistenceError extends AppError {
  constructor(operation: string, cause: unknown) {
    super('PERSISTENCE_ERROR', `Persistence failure during ${operation}`, {
      operation,
      cause: describeError(cause),
    });
  }
}

/** The caller aborted the operation before it completed. */
export class CancelledError extends AppError {
  constructor(message = 'Operation was cancelled') {
    super('CANCELLED', message);
  }
}

/** Error text suitable for logs. Never shown to end users. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
