export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' already exists`, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** A domain that is not a bare hostname; `input` is what the caller sent. */
export class InvalidDomainError extends ValidationError {
  constructor(public readonly input: string) {
    super(`Invalid domain: '${input}'`);
    this.name = 'InvalidDomainError';
  }
}
