/**
 * OpenAPI Security Schemes
 */

import { registry } from "./registry";

registry.registerComponent("securitySchemes", "bearerAuth", {
  type: "http",
  scheme: "bearer",
  bearerFormat: "JWT",
  description:
    "Admin access token. Obtain one from POST /api/auth/login and send it as " +
    "`Authorization: Bearer <token>`.",
});
