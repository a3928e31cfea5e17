import { z } from "zod";
import { logger } from "@/lib/logger";

// Environment schema validation
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(8000),
  HOST: z.string().default("localhost"),
  FRONTEND_URL: z.url().default("http://localhost:5173"),

  // Database
  DATABASE_URL: z.string().min(1),

  // Valkey (Redis) - ticket queue and rate limiting
  VALKEY_URL: z.string().default("valkey://localhost:6379"),

  // Admin authentication
  ADMIN_PASSWORD: z.string().min(8),
  JWT_SECRET: z.string().min(32),
  JWT_EXPIRES_IN: z.coerce.number().int().positive().default(28800), // 8 hours

  // Email (SMTP)
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().default(587),
  SMTP_SECURE: z.stringbool().optional(),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  EMAIL_FROM: z.string().default("FestPass <noreply@example.com>"),

  // Event details printed on the invitation
  EVENT_NAME: z.string().default("Campus Festival"),
  EVENT_DATE: z.string().optional(),
  EVENT_VENUE: z.string().optional(),

  // Registry
  UNIQUE_CONTACT_ADDRESS: z.stringbool().default(true),
  TICKET_WORKER_ENABLED: z.stringbool().default(true),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),
  TRUST_PROXY: z.coerce.number().int().min(0).default(0), // reverse proxy hops in front of the API

  // API Documentation
  ENABLE_API_DOCS: z.stringbool().optional(), // Defaults based on NODE_ENV
  API_DOCS_PATH: z.string().default("/api-docs"),
});

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  public readonly issues: ReturnType<typeof z.treeifyError>;

  constructor(issues: ReturnType<typeof z.treeifyError>) {
    super("Invalid environment variables");
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse configuration from an environment map.
 * Throws ConfigError with the treeified issues when validation fails.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(z.treeifyError(parsed.error));
  }

  return parsed.data;
}

// Parse process.env or exit - for entry points only
export function loadConfig(): AppConfig {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, "Invalid environment variables");
      process.exit(1);
    }
    throw error;
  }
}

export const isDev = (config: AppConfig) => config.NODE_ENV === "development";
export const isProd = (config: AppConfig) => config.NODE_ENV === "production";

// API docs enabled by default outside production
export const isApiDocsEnabled = (config: AppConfig) => config.ENABLE_API_DOCS ?? !isProd(config);
