/**
 * OpenAPI Documentation Generator
 *
 * Builds the OpenAPI 3.0.3 document at runtime from the definitions that
 * each module's *.openapi.ts registers with the shared registry.
 */

import { OpenApiGeneratorV3 } from "@asteasolutions/zod-to-openapi";
import { registry } from "./registry";
import "./security";

export { registry } from "./registry";
export * from "./responses";

export interface OpenAPIDocumentOptions {
  serverUrl: string;
}

/**
 * Generate the complete OpenAPI document from all registered definitions
 */
export function generateOpenAPIDocument(options: OpenAPIDocumentOptions) {
  const generator = new OpenApiGeneratorV3(registry.definitions);

  return generator.generateDocument({
    openapi: "3.0.3",
    info: {
      title: "FestPass API",
      version: "1.0.0",
      description: `
# FestPass - Festival Registration and Check-in

Students register for the festival and receive an email with a QR code
encoding their index number. At the venue, scanning the QR code records
attendance.

## Authentication

Registration is public. Every other subject endpoint requires the admin
token:

1. Call \`POST /api/auth/login\` with the admin password
2. Send \`Authorization: Bearer <accessToken>\` on subsequent requests

## Error Handling

All errors follow a consistent format:
\`\`\`json
{
  "success": false,
  "error": "Error message",
  "code": "ERROR_CODE"
}
\`\`\`
      `.trim(),
    },
    servers: [
      {
        url: options.serverUrl,
        description: "This server",
      },
    ],
    tags: [
      {
        name: "Auth",
        description: "Admin login and token verification.",
      },
      {
        name: "Subjects",
        description:
          "Registration, profile updates, QR attendance scanning and the admin registry views.",
      },
    ],
  });
}
