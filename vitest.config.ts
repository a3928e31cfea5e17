import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],

    // Setup files run before each test file
    setupFiles: ["./src/test/setup.ts"],

    // Keep pino quiet and away from pino-pretty's worker thread
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },

    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      reportsDirectory: "./coverage",
      exclude: ["node_modules", "src/test", "**/*.d.ts", "**/*.config.ts", "src/index.ts", "src/worker.ts"],
    },

    testTimeout: 10000,
  },

  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
});
