/**
 * OpenAPI Response Schemas
 *
 * Reusable response schemas for consistent API responses across all endpoints.
 */

import { z } from "zod";
import { extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";

// Extend Zod with OpenAPI support
extendZodWithOpenApi(z);

// ═══════════════════════════════════════════════════════════════════════════
// BASE RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Pagination metadata included in list responses
 */
export const PaginationSchema = z
  .object({
    page: z.int().positive().describe("Current page number"),
    limit: z.int().positive().describe("Items per page"),
    total: z.int().nonnegative().describe("Total number of items"),
    totalPages: z.int().nonnegative().describe("Total number of pages"),
  })
  .openapi("Pagination");

/**
 * Error response structure for all API errors
 */
export const ErrorResponseSchema = z
  .object({
    success: z.literal(false).describe("Indicates the request failed"),
    error: z.string().describe("Human-readable error message"),
    code: z.string().optional().describe("Machine-readable error code"),
  })
  .openapi("ErrorResponse");

/**
 * Validation error response (400 Bad Request)
 */
export const ValidationErrorSchema = z
  .object({
    success: z.literal(false),
    error: z.string().default("Validation failed"),
    code: z.literal("VALIDATION_ERROR"),
    details: z.array(
      z.object({
        field: z.string().describe("Field that caused the error"),
        message: z.string().describe("Error message for this field"),
      }),
    ),
  })
  .openapi("ValidationError");

/**
 * Rate limit response (429 Too Many Requests)
 */
export const RateLimitErrorSchema = z
  .object({
    success: z.literal(false),
    error: z.string(),
    code: z.literal("RATE_LIMIT_EXCEEDED"),
    retryAfter: z.int().positive().describe("Seconds until the window resets"),
  })
  .openapi("RateLimitError");

// ═══════════════════════════════════════════════════════════════════════════
// COMMON DATA SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const UuidSchema = z.uuid().openapi({
  description: "Unique identifier (UUID v4)",
  example: "550e8400-e29b-41d4-a716-446655440000",
});

export const TimestampSchema = z.iso.datetime().openapi({
  description: "ISO 8601 timestamp",
  example: "2025-01-15T10:30:00.000Z",
});

export const EmailSchema = z.email().openapi({
  description: "Valid email address",
  example: "student@example.com",
});

// ═══════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS FOR CREATING RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a success response schema with data
 */
export function createDataResponseSchema<T extends z.ZodType>(dataSchema: T, name: string) {
  return z
    .object({
      success: z.literal(true),
      data: dataSchema,
    })
    .openapi(name);
}

/**
 * Create a success response schema with data and a human-readable message
 */
export function createMessageDataResponseSchema<T extends z.ZodType>(dataSchema: T, name: string) {
  return z
    .object({
      success: z.literal(true),
      message: z.string(),
      data: dataSchema,
    })
    .openapi(name);
}

/**
 * Create a paginated list response schema
 */
export function createPaginatedResponseSchema<T extends z.ZodType>(itemSchema: T, name: string) {
  return z
    .object({
      success: z.literal(true),
      data: z.array(itemSchema),
      pagination: PaginationSchema,
    })
    .openapi(name);
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMON ERROR RESPONSES FOR OPENAPI REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

export const commonErrorResponses = {
  400: {
    description: "Bad Request - Invalid input data or validation failed",
    content: {
      "application/json": {
        schema: ValidationErrorSchema,
      },
    },
  },
  401: {
    description: "Unauthorized - Missing, invalid or expired admin token",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
  404: {
    description: "Not Found - No subject with this index number",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
  409: {
    description: "Conflict - Index number or email address already registered",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
  429: {
    description: "Too Many Requests - Rate limit exceeded",
    content: {
      "application/json": {
        schema: RateLimitErrorSchema,
      },
    },
  },
  500: {
    description: "Internal Server Error - Unexpected error occurred",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
  503: {
    description: "Service Unavailable - The database could not be reached",
    content: {
      "application/json": {
        schema: ErrorResponseSchema,
      },
    },
  },
} as const;

/**
 * Security requirement for admin endpoints
 */
export const bearerAuth = [{ bearerAuth: [] }];
