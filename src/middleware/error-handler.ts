import type { NextFunction, Request, Response } from "express";
import { createLogger } from "../lib/logger";

const logger = createLogger("error");

// Custom error classes
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode = 500, code?: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  public readonly details: FieldError[];

  constructor(message = "Validation failed", details: FieldError[] = []) {
    super(message, 400, "VALIDATION_ERROR");
    this.details = details;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super(message, 401, "UNAUTHORIZED");
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(message, 404, "NOT_FOUND");
  }
}

export type DuplicateField = "indexKey" | "contactAddress";

export class DuplicateError extends AppError {
  public readonly field: DuplicateField;

  constructor(field: DuplicateField, message = "Resource already exists") {
    super(message, 409, "DUPLICATE");
    this.field = field;
  }
}

// Connection or transaction failure in the backing store; not retried
export class TransientStoreError extends AppError {
  constructor(message = "Store unavailable", cause?: unknown) {
    super(message, 503, "STORE_UNAVAILABLE", false);
    this.cause = cause;
  }
}

// Errors raised by express.json() (http-errors instances carrying a `type`)
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return (
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

const bodyParserCodes: Record<string, string> = {
  "entity.too.large": "PAYLOAD_TOO_LARGE",
  "encoding.unsupported": "UNSUPPORTED_ENCODING",
  "charset.unsupported": "UNSUPPORTED_ENCODING",
};

// Map request body failures onto the client error they describe
export function fromBodyParserError(err: Error): AppError | null {
  if (!isBodyParserError(err) || err.status < 400 || err.status >= 500) {
    return null;
  }
  if (err.type === "entity.parse.failed") {
    return new ValidationError("Malformed JSON request body");
  }
  return new AppError(err.message, err.status, bodyParserCodes[err.type] ?? "BAD_REQUEST");
}

// Error response format
interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
  details?: FieldError[];
  stack?: string;
}

export interface ErrorHandlerOptions {
  exposeStack?: boolean;
}

// Global error handler middleware
export function errorHandler(options: ErrorHandlerOptions = {}) {
  return (
    thrown: Error,
    req: Request,
    res: Response,
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    _next: NextFunction,
  ) => {
    const err = fromBodyParserError(thrown) ?? thrown;
    const operational = err instanceof AppError && err.isOperational;

    // Log error
    if (operational) {
      logger.warn({ err, path: req.path, method: req.method }, "Operational error");
    } else {
      logger.error({ err, path: req.path, method: req.method }, "Unexpected error");
    }

    // Determine status code
    const statusCode = err instanceof AppError ? err.statusCode : 500;

    // Build response; internals of unexpected errors stay in the log
    const response: ErrorResponse = {
      success: false,
      error: operational ? err.message : "Internal server error",
      code: err instanceof AppError ? err.code : "INTERNAL_ERROR",
    };

    if (err instanceof ValidationError && err.details.length > 0) {
      response.details = err.details;
    }

    if (options.exposeStack) {
      response.stack = err.stack;
    }

    res.status(statusCode).json(response);
  };
}

// 404 handler for unknown routes
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    success: false,
    error: `Route ${req.method} ${req.path} not found`,
    code: "ROUTE_NOT_FOUND",
  });
}
