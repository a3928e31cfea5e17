// Auth module exports
export { createAuthenticate } from "./auth.middleware";
export { createAuthRouter } from "./auth.routes";
export { createAuthService, type AuthService } from "./auth.service";

// OpenAPI registration - importing registers routes with the registry
import "./auth.openapi";
