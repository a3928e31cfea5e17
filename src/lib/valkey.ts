import Valkey from "iovalkey";
import { createLogger } from "./logger";

const logger = createLogger("valkey");

export interface ValkeyConnection {
  host: string;
  port: number;
  password?: string;
}

// Parse a Valkey URL into host/port/password (BullMQ takes plain options)
export function parseValkeyUrl(url: string): ValkeyConnection {
  try {
    const parsed = new URL(url);
    return {
      host: parsed.hostname || "localhost",
      port: Number.parseInt(parsed.port, 10) || 6379,
      password: parsed.password || undefined,
    };
  } catch {
    return { host: "localhost", port: 6379 };
  }
}

// Create Valkey client
export function createValkeyClient(url: string) {
  const client = new Valkey(url, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => {
      if (times > 3) {
        logger.error("Valkey connection failed after 3 retries");
        return null; // Stop retrying
      }
      return Math.min(times * 200, 2000); // Exponential backoff
    },
  });

  client.on("connect", () => logger.info("Connected to Valkey"));
  client.on("error", (err) => logger.error({ err }, "Valkey error"));
  client.on("close", () => logger.warn("Valkey connection closed"));

  return client;
}

export type ValkeyClient = ReturnType<typeof createValkeyClient>;

// Health check
export async function checkValkeyConnection(client: ValkeyClient): Promise<boolean> {
  try {
    await client.ping();
    return true;
  } catch {
    return false;
  }
}
