/**
 * Error taxonomy shared by the stores, services and routes. Every error that
 * should reach the client carries the HTTP status it maps to.
 */
export class AppError extends Error {
  readonly status_code: number;

  constructor(message: string, status_code: number) {
    super(message);
    this.name = 'AppError';
    this.status_code = status_code;
  }
}

export class ClientError extends AppError {
  constructor(message: string, status_code = 400) {
    super(message, status_code);
    this.name = 'ClientError';
  }
}

export class UnauthorizedError extends ClientError {
  constructor(message = 'Unauthorized') {
    super(message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends ClientError {
  constructor(message = 'Forbidden') {
    super(message, 403);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends ClientError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ClientError {
  constructor(message: string) {
    super(message, 409);
    this.name = 'ConflictError';
  }
}

export class InternalError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500);
    this.name = 'InternalError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** The object was already absent when a delete was requested. */
export class ObjectNotFoundError extends InternalError {
  readonly key: string;

  constructor(key: string, options?: { cause?: unknown }) {
    super(`Object not found in storage: ${key}`, options);
    this.name = 'ObjectNotFoundError';
    this.key = key;
  }
}

/** A delete reported success but the object can still be read back. */
export class ObjectStillPresentError extends InternalError {
  readonly key: string;

  constructor(key: string) {
    super(`Object still exists after deletion attempt: ${key}`);
    this.name = 'ObjectStillPresentError';
    this.key = key;
  }
}

export function status_for(err: unknown): number {
  return err instanceof AppError ? err.status_code : 500;
}
