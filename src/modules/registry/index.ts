export { createRegistryRouter } from "./registry.routes";
export * from "./registry.schema";
export { createRegistry, type Registry } from "./registry.service";
export { createSubjectStore } from "./registry.store";
export type * from "./registry.types";

// OpenAPI registration - importing registers routes with the registry
import "./registry.openapi";
