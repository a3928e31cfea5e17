import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { FieldError } from "./error-handler";

// Helper to clear and assign object properties
function replaceObjectContent(target: Record<string, unknown>, source: unknown) {
  for (const key of Object.keys(target)) {
    delete target[key];
  }
  Object.assign(target, source);
}

function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((e) => ({
    field: e.path.join("."),
    message: e.message,
  }));
}

function sendValidationError(res: Response, error: z.ZodError) {
  res.status(400).json({
    success: false,
    error: "Validation failed",
    code: "VALIDATION_ERROR",
    details: toFieldErrors(error),
  });
}

// Validate multiple sources at once
export function validateRequest(schemas: {
  body?: z.ZodType;
  query?: z.ZodType;
  params?: z.ZodType;
}) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.body) {
        req.body = schemas.body.parse(req.body ?? {});
      }
      // req.query is a getter that re-parses on every access; handlers parse it again
      if (schemas.query) {
        schemas.query.parse(req.query);
      }
      if (schemas.params) {
        replaceObjectContent(req.params, schemas.params.parse(req.params));
      }
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        sendValidationError(res, error);
        return;
      }
      next(error);
    }
  };
}

// Validate a single source
export function validate(schema: z.ZodType, source: "body" | "query" | "params" = "body") {
  return validateRequest({ [source]: schema });
}
