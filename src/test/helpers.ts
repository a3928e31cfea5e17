/**
 * Test Helpers
 *
 * Builds the full Express app over in-memory collaborators.
 */

import type { Express } from "express";
import { createApp } from "@/app";
import { createAuthService } from "@/modules/auth";
import { createRegistry } from "@/modules/registry";
import type { Subject } from "@/modules/registry/registry.types";
import {
  createMemoryRateLimitClient,
  createMemoryStore,
  createRecordingDispatcher,
  type MemoryRateLimitClient,
  type MemoryStore,
  type RecordingDispatcher,
} from "./fakes";
import { createTestConfig, TEST_ADMIN_PASSWORD, TEST_JWT_SECRET } from "./fixtures";

export interface TestContext {
  app: Express;
  store: MemoryStore;
  dispatcher: RecordingDispatcher;
  rateLimitClient: MemoryRateLimitClient;
  adminToken: string;
}

export interface TestAppOptions {
  env?: Record<string, string>;
  seed?: Subject[];
  databaseHealthy?: boolean;
  valkeyHealthy?: boolean;
}

export function createTestApp(options: TestAppOptions = {}): TestContext {
  const config = createTestConfig(options.env);
  const store = createMemoryStore(options.seed);
  const dispatcher = createRecordingDispatcher();
  const rateLimitClient = createMemoryRateLimitClient();

  const auth = createAuthService({
    adminPassword: TEST_ADMIN_PASSWORD,
    jwtSecret: TEST_JWT_SECRET,
    expiresIn: config.JWT_EXPIRES_IN,
  });

  const registry = createRegistry({
    store,
    dispatcher,
    options: { uniqueContactAddress: config.UNIQUE_CONTACT_ADDRESS },
  });

  const app = createApp({
    config,
    registry,
    auth,
    rateLimitClient,
    checkHealth: async () => ({
      database: options.databaseHealthy ?? true,
      valkey: options.valkeyHealthy ?? true,
    }),
  });

  return {
    app,
    store,
    dispatcher,
    rateLimitClient,
    adminToken: auth.login(TEST_ADMIN_PASSWORD).accessToken,
  };
}
