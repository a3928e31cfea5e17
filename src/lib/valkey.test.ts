import { describe, expect, it } from "vitest";
import { parseValkeyUrl } from "./valkey";

describe("parseValkeyUrl", () => {
  it("should read host, port and password", () => {
    expect(parseValkeyUrl("valkey://:test-secret@cache.internal:6380")).toEqual({
      host: "cache.internal",
      port: 6380,
      password: "test-secret",
    });
  });

  it("should default the port", () => {
    expect(parseValkeyUrl("redis://localhost")).toEqual({
      host: "localhost",
      port: 6379,
      password: undefined,
    });
  });

  it("should fall back to localhost for an unparsable URL", () => {
    expect(parseValkeyUrl("not a url")).toEqual({ host: "localhost", port: 6379 });
  });
});
