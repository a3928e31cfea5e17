import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { dbLogger } from "@/lib/logger";
import * as schema from "./schema/index";

export interface DatabaseOptions {
  url: string;
  logQueries?: boolean;
}

// Create postgres connection and drizzle instance
export function createDatabase(options: DatabaseOptions) {
  // Log database host only (credentials stay out of the log)
  const dbHost = options.url.includes("@")
    ? options.url.split("@")[1]?.split(":")[0]?.split("/")[0]
    : "unknown";
  dbLogger.info({ host: dbHost }, "Connecting to PostgreSQL");

  const client = postgres(options.url, {
    max: 10, // Maximum connections
    idle_timeout: 20, // Close idle connections after 20s
    connect_timeout: 10, // Connection timeout
    prepare: true,
  });

  const db = drizzle(client, {
    schema,
    logger: options.logQueries ?? false,
  });

  return {
    db,

    // Health check
    async ping(): Promise<boolean> {
      try {
        await db.execute(sql`SELECT 1`);
        return true;
      } catch (error) {
        dbLogger.error({ err: error }, "Database connection failed");
        return false;
      }
    },

    // Graceful shutdown
    async close(): Promise<void> {
      await client.end();
    },
  };
}

export type DatabaseHandle = ReturnType<typeof createDatabase>;
export type Database = DatabaseHandle["db"];
