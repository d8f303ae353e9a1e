export type ErrorCode =
  | "NOT_FOUND"
  | "VALIDATION_FAILED"
  | "UNAUTHORIZED"
  | "STORAGE_OPERATION_FAILED"
  | "UNROUTABLE_EVENT";

/**
 * Base class of every failure the services report to their callers.
 * Carries the HTTP status the error middleware renders it with.
 */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An id lookup found nothing, or the store could not be read. */
export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;
}

/** A referenced user or product variant is not present in the local projection. */
export class ValidationFailedError extends AppError {
  readonly code = "VALIDATION_FAILED";
  readonly statusCode = 400;
}

export class UnauthorizedError extends AppError {
  readonly code = "UNAUTHORIZED";
  readonly statusCode = 403;
}

export class StorageOperationFailedError extends AppError {
  readonly code = "STORAGE_OPERATION_FAILED";
  readonly statusCode = 500;
}

export class UnroutableEventError extends AppError {
  readonly code = "UNROUTABLE_EVENT";
  readonly statusCode = 500;

  constructor(readonly topic: string) {
    super(`Event topic: \`${topic}\` is not handled by this service.`);
  }
}
