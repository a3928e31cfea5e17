/**
 * Registry Module - OpenAPI Route Definitions
 */

import { z } from "zod";
import { extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";
import { registry } from "@/lib/openapi";
import {
  bearerAuth,
  commonErrorResponses,
  createDataResponseSchema,
  createMessageDataResponseSchema,
  createPaginatedResponseSchema,
  EmailSchema,
  TimestampSchema,
  UuidSchema,
} from "@/lib/openapi/responses";

extendZodWithOpenApi(z);

// ═══════════════════════════════════════════════════════════════════════════
// SUBJECT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const IndexKeySchema = z.string().min(3).max(50).openapi({
  description: "Student index number, encoded in the ticket QR code",
  example: "IT21004512",
});

const SubjectSchema = z
  .object({
    id: UuidSchema,
    indexKey: IndexKeySchema,
    contactAddress: EmailSchema.describe("Email address the ticket is sent to"),
    displayName: z.string().describe("Full name"),
    category: z.string().describe("Subject combination"),
    phone: z.string().nullable().describe("Contact phone number"),
    attended: z.boolean().describe("Whether the subject has checked in"),
    registeredAt: TimestampSchema,
    updatedAt: TimestampSchema,
  })
  .openapi("Subject");

const RegisterSubjectRequestSchema = z
  .object({
    indexKey: IndexKeySchema,
    contactAddress: EmailSchema.describe("Stored lowercased"),
    displayName: z.string().min(2).max(255).openapi({ example: "Nimal Perera" }),
    category: z.string().min(2).max(255).openapi({ example: "Physical Science" }),
    phone: z.string().max(20).nullable().optional().openapi({ example: "0771234567" }),
  })
  .openapi("RegisterSubjectRequest");

const UpdateSubjectRequestSchema = z
  .object({
    indexKey: IndexKeySchema.optional(),
    contactAddress: EmailSchema.optional(),
    displayName: z.string().min(2).max(255).optional(),
    category: z.string().min(2).max(255).optional(),
    phone: z.string().max(20).nullable().optional().describe("Empty string or null clears it"),
  })
  .openapi("UpdateSubjectRequest");

const ScanRequestSchema = z
  .object({
    indexKey: IndexKeySchema.describe("Value decoded from the ticket QR code"),
  })
  .openapi("ScanRequest");

const ScanResultSchema = z
  .object({
    subjectName: z.string(),
    alreadyAttended: z.boolean().describe("True if attendance was recorded by an earlier scan"),
  })
  .openapi("ScanResult");

const AttendanceStatsSchema = z
  .object({
    total: z.int().nonnegative(),
    attended: z.int().nonnegative(),
    pending: z.int().nonnegative(),
  })
  .openapi("AttendanceStats");

const IndexKeyParamSchema = z.object({
  indexKey: IndexKeySchema,
});

// ═══════════════════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════════════════

registry.registerPath({
  method: "post",
  path: "/api/subjects/register",
  tags: ["Subjects"],
  summary: "Register for the festival",
  description: `
Create a registration. On success an invitation email carrying the QR code is
queued for delivery; a delivery failure does not undo the registration.

**Notes:**
- Index numbers are unique
- Email addresses are unique unless the server disables that check
`,
  request: {
    body: {
      required: true,
      content: {
        "application/json": {
          schema: RegisterSubjectRequestSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: "Subject registered",
      content: {
        "application/json": {
          schema: createMessageDataResponseSchema(SubjectSchema, "RegisterSubjectResponse"),
        },
      },
    },
    400: commonErrorResponses[400],
    409: commonErrorResponses[409],
    429: commonErrorResponses[429],
    503: commonErrorResponses[503],
  },
});

registry.registerPath({
  method: "put",
  path: "/api/subjects/update/{indexKey}",
  tags: ["Subjects"],
  summary: "Update a subject's profile",
  description:
    "Overwrite any of the descriptive fields. A new ticket is sent when the index number, name or email changes.",
  security: bearerAuth,
  request: {
    params: IndexKeyParamSchema,
    body: {
      required: true,
      content: {
        "application/json": {
          schema: UpdateSubjectRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: "Updated subject",
      content: {
        "application/json": {
          schema: createDataResponseSchema(SubjectSchema, "UpdateSubjectResponse"),
        },
      },
    },
    400: commonErrorResponses[400],
    401: commonErrorResponses[401],
    404: commonErrorResponses[404],
    409: commonErrorResponses[409],
    503: commonErrorResponses[503],
  },
});

registry.registerPath({
  method: "post",
  path: "/api/subjects/scan",
  tags: ["Subjects"],
  summary: "Record attendance from a ticket scan",
  description: "Idempotent. Scanning the same ticket again reports `alreadyAttended: true`.",
  security: bearerAuth,
  request: {
    body: {
      required: true,
      content: {
        "application/json": {
          schema: ScanRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: "Scan result",
      content: {
        "application/json": {
          schema: createMessageDataResponseSchema(ScanResultSchema, "ScanResponse"),
        },
      },
    },
    400: commonErrorResponses[400],
    401: commonErrorResponses[401],
    404: commonErrorResponses[404],
    503: commonErrorResponses[503],
  },
});

registry.registerPath({
  method: "get",
  path: "/api/subjects/list",
  tags: ["Subjects"],
  summary: "List registered subjects",
  description: "Newest registrations first.",
  security: bearerAuth,
  request: {
    query: z.object({
      page: z.int().positive().optional().openapi({ example: 1 }),
      limit: z.int().min(1).max(100).optional().openapi({ example: 20 }),
      attended: z.enum(["true", "false"]).optional().describe("Filter by attendance"),
    }),
  },
  responses: {
    200: {
      description: "Page of subjects",
      content: {
        "application/json": {
          schema: createPaginatedResponseSchema(SubjectSchema, "SubjectListResponse"),
        },
      },
    },
    400: commonErrorResponses[400],
    401: commonErrorResponses[401],
    503: commonErrorResponses[503],
  },
});

registry.registerPath({
  method: "get",
  path: "/api/subjects/stats",
  tags: ["Subjects"],
  summary: "Registration and attendance counts",
  security: bearerAuth,
  responses: {
    200: {
      description: "Counts",
      content: {
        "application/json": {
          schema: createDataResponseSchema(AttendanceStatsSchema, "AttendanceStatsResponse"),
        },
      },
    },
    401: commonErrorResponses[401],
    503: commonErrorResponses[503],
  },
});

registry.registerPath({
  method: "get",
  path: "/api/subjects/by-index/{indexKey}",
  tags: ["Subjects"],
  summary: "Get a subject by index number",
  security: bearerAuth,
  request: {
    params: IndexKeyParamSchema,
  },
  responses: {
    200: {
      description: "Subject",
      content: {
        "application/json": {
          schema: createDataResponseSchema(SubjectSchema, "SubjectResponse"),
        },
      },
    },
    401: commonErrorResponses[401],
    404: commonErrorResponses[404],
    503: commonErrorResponses[503],
  },
});
