/**
 * Standalone ticket dispatch worker.
 * Run beside the API with TICKET_WORKER_ENABLED=false on the API process.
 */

import { loadConfig } from "./config";
import { createMailer } from "./lib/email";
import { createTicketQueue } from "./lib/jobs";
import { logger } from "./lib/logger";
import { createTicketSender } from "./lib/tickets";
import { parseValkeyUrl } from "./lib/valkey";

const config = loadConfig();

const ticketQueue = createTicketQueue(parseValkeyUrl(config.VALKEY_URL));

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

async function shutdown(signal: string) {
  logger.info({ signal }, "Stopping ticket worker...");
  try {
    await ticketQueue.close();
  } catch (error) {
    logger.error({ err: error }, "Error while stopping ticket worker");
    process.exit(1);
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
