#!/usr/bin/env node
/**
 * Generate static OpenAPI documentation files
 *
 * Writes openapi.json and openapi.yaml to docs/ for sharing with client
 * developers and external tools.
 *
 * Usage:
 *   npm run docs:generate
 */

import { mkdir, writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { stringify as yamlStringify } from "yaml";

// Importing the modules registers their OpenAPI definitions
import "../src/modules/auth";
import "../src/modules/registry";

import { generateOpenAPIDocument } from "../src/lib/openapi";

const DOCS_DIR = fileURLToPath(new URL("../docs/", import.meta.url));

async function main() {
  console.log("Generating OpenAPI documentation...\n");

  const spec = generateOpenAPIDocument({
    serverUrl: process.env.API_SERVER_URL ?? "http://localhost:8000",
  });

  await mkdir(DOCS_DIR, { recursive: true });

  const jsonPath = `${DOCS_DIR}openapi.json`;
  await writeFile(jsonPath, JSON.stringify(spec, null, 2), "utf-8");
  console.log(`Generated: ${jsonPath}`);

  const yamlPath = `${DOCS_DIR}openapi.yaml`;
  await writeFile(yamlPath, yamlStringify(spec), "utf-8");
  console.log(`Generated: ${yamlPath}`);

  const paths = Object.values(spec.paths ?? {});
  const operations = paths.reduce(
    (count, item) =>
      count + Object.keys(item).filter((m) => ["get", "post", "put", "delete"].includes(m)).length,
    0,
  );

  console.log("\nSummary:");
  console.log(`   - Paths: ${paths.length}`);
  console.log(`   - Operations: ${operations}`);
  console.log(`   - Output: ${DOCS_DIR}`);
}

main().catch((error: unknown) => {
  console.error("Failed to generate OpenAPI docs:", error);
  process.exit(1);
});
