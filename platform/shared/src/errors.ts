/**
 * Failures a request handler can surface. Each carries the HTTP status it maps
 * to; anything that is not an `AppError` is reported as a generic 500.
 */
export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = new.target.name;
    this.field = field;
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;

  constructor(field: string, message: string) {
    super(message, field);
  }
}

export class IdentifierFormatError extends AppError {
  readonly statusCode = 400;

  constructor(readonly received: unknown) {
    super('identifier must be a valid UUID', 'identifier');
  }
}

export class AuthenticationRequiredError extends AppError {
  readonly statusCode = 401;
}

export class AccessDeniedError extends AppError {
  readonly statusCode = 403;
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
}

export const isAppError = (err: unknown): err is AppError => err instanceof AppError;

export const GENERIC_SERVER_ERROR = 'An error occurred while processing the request.';
