import { createServer } from "node:http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { createMailer } from "./lib/email";
import { createTicketQueue } from "./lib/jobs";
import { logger } from "./lib/logger";
import { withRetry } from "./lib/retry";
import { createTicketSender } from "./lib/tickets";
import { checkValkeyConnection, createValkeyClient, parseValkeyUrl } from "./lib/valkey";
import { createAuthService } from "./modules/auth";
import { createRegistry, createSubjectStore } from "./modules/registry";

const config = loadConfig();

// Log startup environment info (redact sensitive data)
logger.info(
  {
    NODE_ENV: config.NODE_ENV,
    HOST: config.HOST,
    PORT: config.PORT,
    DATABASE_URL: config.DATABASE_URL ? "[SET]" : "[NOT SET]",
    VALKEY_URL: config.VALKEY_URL ? `${config.VALKEY_URL.split("@")[0]}@[REDACTED]` : "[NOT SET]",
    UNIQUE_CONTACT_ADDRESS: config.UNIQUE_CONTACT_ADDRESS,
    TICKET_WORKER_ENABLED: config.TICKET_WORKER_ENABLED,
  },
  "Starting FestPass API with configuration",
);

const database = createDatabase({ url: config.DATABASE_URL, logQueries: config.LOG_LEVEL === "trace" });
const valkey = createValkeyClient(config.VALKEY_URL);
const ticketQueue = createTicketQueue(parseValkeyUrl(config.VALKEY_URL));

const registry = createRegistry({
  store: createSubjectStore(database.db),
  dispatcher: ticketQueue.dispatcher,
  options: { uniqueContactAddress: config.UNIQUE_CONTACT_ADDRESS },
});

const auth = createAuthService({
  adminPassword: config.ADMIN_PASSWORD,
  jwtSecret: config.JWT_SECRET,
  expiresIn: config.JWT_EXPIRES_IN,
});

// Create Express app
const app = createApp({
  config,
  registry,
  auth,
  rateLimitClient: valkey,
  checkHealth: async () => {
    const [db, cache] = await Promise.all([database.ping(), checkValkeyConnection(valkey)]);
    return { database: db, valkey: cache };
  },
});

// Create HTTP server
const httpServer = createServer(app);

// Graceful shutdown handler
let isShuttingDown = false;

async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, "Shutting down gracefully...");

  // Close HTTP server (stop accepting new connections)
  httpServer.close(() => {
    logger.info("HTTP server closed");
  });

  try {
    await ticketQueue.close();

    await database.close();
    logger.info("Database connection closed");

    await valkey.quit();
    logger.info("Valkey connection closed");
  } catch (error) {
    logger.error({ err: error }, "Error during shutdown");
    process.exit(1);
  }

  logger.info("Shutdown complete");
  process.exit(0);
}

// Handle shutdown signals
process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

// Start server
async function start() {
  try {
    // Check database connection with retry (services may not be ready immediately)
    await withRetry(
      async () => {
        const connected = await database.ping();
        if (!connected) throw new Error("Database ping failed");
      },
      { maxAttempts: 5, delayMs: 2000, name: "Database connection" },
    );
    logger.info("Database connected");

    if (config.TICKET_WORKER_ENABLED) {
      const mailer = createMailer({
        host: config.SMTP_HOST,
        port: config.SMTP_PORT,
        secure: config.SMTP_SECURE,
        user: config.SMTP_USER,
        pass: config.SMTP_PASS,
        from: config.EMAIL_FROM,
      });

      ticketQueue.startWorker(
        createTicketSender({
          mailer,
          event: { name: config.EVENT_NAME, date: config.EVENT_DATE, venue: config.EVENT_VENUE },
        }),
      );
    }

    // Start HTTP server
    httpServer.listen(config.PORT, config.HOST, () => {
      logger.info(
        { host: config.HOST, port: config.PORT },
        `FestPass API running at http://${config.HOST}:${config.PORT}`,
      );
    });
  } catch (error) {
    logger.fatal({ err: error }, "Failed to start server");
    process.exit(1);
  }
}

// Run
void start();
