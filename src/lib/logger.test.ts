import pino from "pino";
import { describe, expect, it } from "vitest";
import { loggerOptions } from "./logger";

function createCapturingLogger() {
  const lines: string[] = [];
  const log = pino({ ...loggerOptions, level: "info" }, { write: (line: string) => lines.push(line) });
  return { log, entries: () => lines.map((line) => JSON.parse(line)) };
}

describe("logger", () => {
  it("should write the message and stack of an error logged under err", () => {
    const { log, entries } = createCapturingLogger();

    log.child({ module: "registry" }).error(
      { err: new Error("queue unavailable"), indexKey: "IT21000001" },
      "Failed to enqueue ticket dispatch",
    );

    const [entry] = entries();
    expect(entry).toMatchObject({
      service: "festpass-api",
      module: "registry",
      indexKey: "IT21000001",
      msg: "Failed to enqueue ticket dispatch",
      err: { type: "Error", message: "queue unavailable" },
    });
    expect(entry.err.stack).toContain("queue unavailable");
  });

  it("should redact admin secrets", () => {
    const { log, entries } = createCapturingLogger();

    log.info({ password: "test-password", body: { accessToken: "test-token" } }, "Login attempt");

    const [entry] = entries();
    expect(entry.password).toBe("[REDACTED]");
    expect(entry.body.accessToken).toBe("[REDACTED]");
  });
});
