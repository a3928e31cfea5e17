/**
 * Auth Module - OpenAPI Route Definitions
 */

import { z } from "zod";
import { extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";
import { registry } from "@/lib/openapi";
import {
  bearerAuth,
  commonErrorResponses,
  createDataResponseSchema,
} from "@/lib/openapi/responses";

extendZodWithOpenApi(z);

const LoginRequestSchema = z
  .object({
    password: z.string().min(1).describe("Admin password"),
  })
  .openapi("LoginRequest");

const AccessTokenSchema = z
  .object({
    accessToken: z.string().describe("Signed JWT"),
    tokenType: z.literal("Bearer"),
    expiresIn: z.int().positive().describe("Lifetime in seconds"),
  })
  .openapi("AccessToken");

const TokenStatusSchema = z
  .object({
    valid: z.literal(true),
    message: z.string(),
  })
  .openapi("TokenStatus");

registry.registerPath({
  method: "post",
  path: "/api/auth/login",
  tags: ["Auth"],
  summary: "Exchange the admin password for an access token",
  request: {
    body: {
      required: true,
      content: {
        "application/json": {
          schema: LoginRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: "Access token",
      content: {
        "application/json": {
          schema: createDataResponseSchema(AccessTokenSchema, "LoginResponse"),
        },
      },
    },
    400: commonErrorResponses[400],
    401: commonErrorResponses[401],
    429: commonErrorResponses[429],
  },
});

registry.registerPath({
  method: "post",
  path: "/api/auth/verify",
  tags: ["Auth"],
  summary: "Check that an access token is still valid",
  security: bearerAuth,
  responses: {
    200: {
      description: "Token is valid",
      content: {
        "application/json": {
          schema: createDataResponseSchema(TokenStatusSchema, "VerifyTokenResponse"),
        },
      },
    },
    401: commonErrorResponses[401],
  },
});
