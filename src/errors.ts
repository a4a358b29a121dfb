/**
 * Application error classes.
 *
 * Every error the server reports to the browser is an `AppError`; anything
 * else is wrapped by `toAppError` at the boundary.
 */

export type ErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFIGURATION_ERROR"
  | "CORRUPT_DOCUMENT"
  | "ENCRYPTED_DOCUMENT"
  | "LLM_FAILED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface SerializedError {
  code: ErrorCode;
  message: string;
  details?: ErrorDetail[];
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[]
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export class BadRequestError extends AppError {
  constructor(message = "Bad request", details?: ErrorDetail[]) {
    super("BAD_REQUEST", message, 400, details);
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details);
  }

  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>;
  }): ValidationError {
    const details = error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return new ValidationError("Validation failed", details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404);
  }
}

/**
 * Missing or invalid server configuration, e.g. no LLM API key.
 * Fatal to the action that needs it, never to the process.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Service is not configured", details?: ErrorDetail[]) {
    super("CONFIGURATION_ERROR", message, 503, details);
  }
}

export class CorruptDocumentError extends AppError {
  constructor(message = "The file is not a readable PDF") {
    super("CORRUPT_DOCUMENT", message, 422);
  }
}

export class EncryptedDocumentError extends AppError {
  constructor(message = "The PDF is password-protected") {
    super("ENCRYPTED_DOCUMENT", message, 422);
  }
}

export class LlmFailedError extends AppError {
  constructor(message = "Language model request failed") {
    super("LLM_FAILED", message, 502);
  }
}

export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 500);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    // Internal messages stay out of production responses
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message;
    return new InternalError(message);
  }

  return new InternalError("An unexpected error occurred");
}
