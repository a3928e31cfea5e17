import compression from "compression";
import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import { type AppConfig, isApiDocsEnabled, isDev } from "./config";
import { generateOpenAPIDocument } from "./lib/openapi";
import { httpLogger } from "./lib/logger";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { authRateLimit, type RateLimitClient, rateLimit } from "./middleware/rate-limit";

// Import routes (these also register their OpenAPI definitions)
import { type AuthService, createAuthenticate, createAuthRouter } from "./modules/auth";
import { createRegistryRouter, type Registry } from "./modules/registry";

export interface HealthStatus {
  database: boolean;
  valkey: boolean;
}

export interface AppDependencies {
  config: AppConfig;
  registry: Registry;
  auth: AuthService;
  rateLimitClient: RateLimitClient;
  checkHealth: () => Promise<HealthStatus>;
}

export function createApp(deps: AppDependencies): Express {
  const { config, registry, auth, rateLimitClient } = deps;
  const app = express();

  // ─────────────────────────────────────────────────────────────
  // Trust proxy (for proper IP extraction behind reverse proxies)
  // ─────────────────────────────────────────────────────────────
  app.set("trust proxy", config.TRUST_PROXY);

  // ─────────────────────────────────────────────────────────────
  // Security middleware
  // ─────────────────────────────────────────────────────────────
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'", "'unsafe-inline'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", "data:", "https:"],
        },
      },
      crossOriginEmbedderPolicy: false,
    }),
  );

  // ─────────────────────────────────────────────────────────────
  // CORS configuration
  // ─────────────────────────────────────────────────────────────
  app.use(
    cors({
      origin: config.FRONTEND_URL,
      methods: ["GET", "POST", "PUT", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    }),
  );

  // ─────────────────────────────────────────────────────────────
  // Body parsing and compression
  // ─────────────────────────────────────────────────────────────
  app.use(express.json({ limit: "100kb" }));
  app.use(compression());

  // ─────────────────────────────────────────────────────────────
  // Request logging
  // ─────────────────────────────────────────────────────────────
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - start;
      httpLogger.info({
        method: req.method,
        url: req.url,
        status: res.statusCode,
        duration: `${duration}ms`,
      });
    });
    next();
  });

  // ─────────────────────────────────────────────────────────────
  // Health check
  // ─────────────────────────────────────────────────────────────
  app.get("/health", async (_req, res, next) => {
    try {
      const { database, valkey } = await deps.checkHealth();

      // Only the database decides the status code
      res.status(database ? 200 : 503).json({
        status: database && valkey ? "ok" : "degraded",
        database: database ? "connected" : "unreachable",
        valkey: valkey ? "connected" : "unreachable",
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // API Documentation (Swagger UI) - Conditionally enabled
  // ─────────────────────────────────────────────────────────────
  if (isApiDocsEnabled(config)) {
    const openapiSpec = generateOpenAPIDocument({
      serverUrl: `http://${config.HOST}:${config.PORT}`,
    });

    // Serve raw OpenAPI JSON spec
    app.get("/api/docs/openapi.json", (_req, res) => {
      res.json(openapiSpec);
    });

    // Swagger UI
    app.use(
      config.API_DOCS_PATH,
      swaggerUi.serve,
      swaggerUi.setup(openapiSpec, {
        customCss: ".swagger-ui .topbar { display: none }",
        customSiteTitle: "FestPass API Documentation",
      }),
    );
  }

  // ─────────────────────────────────────────────────────────────
  // API Routes
  // ─────────────────────────────────────────────────────────────
  const authenticate = createAuthenticate(auth);

  app.use(
    "/api/auth",
    createAuthRouter({
      auth,
      authenticate,
      loginRateLimit: authRateLimit(rateLimitClient),
    }),
  );
  app.use(
    "/api/subjects",
    createRegistryRouter({
      registry,
      authenticate,
      registerRateLimit: rateLimit({
        client: rateLimitClient,
        windowMs: config.RATE_LIMIT_WINDOW_MS,
        maxRequests: config.RATE_LIMIT_MAX_REQUESTS,
        prefix: "register",
      }),
    }),
  );

  // ─────────────────────────────────────────────────────────────
  // Error handling
  // ─────────────────────────────────────────────────────────────
  app.use(notFoundHandler);
  app.use(errorHandler({ exposeStack: isDev(config) }));

  return app;
}
