export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  CONFLICT: "CONFLICT",
  NOT_FOUND: "NOT_FOUND",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR"
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, statusCode: number, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Error.captureStackTrace(this, new.target);
  }

  toJSON() {
    return {
      message: this.message,
      code: this.code,
      details: this.details
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.VALIDATION_ERROR, message, 400, details);
  }
}

/** A unique field collided at the storage layer. */
export class UniquenessViolation extends AppError {
  public readonly entity: string;
  public readonly field: string;

  constructor(entity: string, field: string, value?: unknown) {
    super(ErrorCodes.CONFLICT, `${entity} with this ${field} already exists`, 409, { entity, field, value });
    this.entity = entity;
    this.field = field;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(ErrorCodes.CONFIGURATION_ERROR, message, 500);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(ErrorCodes.NOT_FOUND, `${entity} not found`, 404, { entity, id });
  }
}
