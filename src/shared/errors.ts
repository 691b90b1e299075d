export class ValidationError extends Error {
  name = "ValidationError";
}

export class NotFoundError extends Error {
  name = "NotFoundError";

  constructor(message = "Record not found") {
    super(message);
  }
}

// Raised when the database fails mid-operation; `cause` keeps the driver error for logs.
export class StorageError extends Error {
  name = "StorageError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export const isDomainError = (error: unknown): error is ValidationError | NotFoundError =>
  error instanceof ValidationError || error instanceof NotFoundError;
