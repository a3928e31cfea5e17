/**
 * Error Handler Middleware Tests
 *
 * Tests for custom error classes and error handling middleware.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import {
  AppError,
  DuplicateError,
  errorHandler,
  fromBodyParserError,
  NotFoundError,
  notFoundHandler,
  TransientStoreError,
  UnauthorizedError,
  ValidationError,
} from "@/middleware/error-handler";

// ─────────────────────────────────────────────────────────────
// Error Classes
// ─────────────────────────────────────────────────────────────

describe("AppError", () => {
  it("should create an error with default values", () => {
    const error = new AppError("Test error");

    expect(error.message).toBe("Test error");
    expect(error.statusCode).toBe(500);
    expect(error.code).toBeUndefined();
    expect(error.isOperational).toBe(true);
    expect(error).toBeInstanceOf(Error);
  });

  it("should have a stack trace", () => {
    expect(new AppError("Test error").stack).toBeDefined();
  });
});

describe("error subclasses", () => {
  it("ValidationError should carry field details", () => {
    const error = new ValidationError("Validation failed", [
      { field: "indexKey", message: "indexKey is required" },
    ]);

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.details).toEqual([{ field: "indexKey", message: "indexKey is required" }]);
  });

  it("DuplicateError should name the conflicting field", () => {
    const error = new DuplicateError("contactAddress", "Email taken");

    expect(error.statusCode).toBe(409);
    expect(error.code).toBe("DUPLICATE");
    expect(error.field).toBe("contactAddress");
  });

  it("TransientStoreError should be non-operational and keep its cause", () => {
    const cause = new Error("ECONNREFUSED");
    const error = new TransientStoreError("Subject store scan failed", cause);

    expect(error.statusCode).toBe(503);
    expect(error.code).toBe("STORE_UNAVAILABLE");
    expect(error.isOperational).toBe(false);
    expect(error.cause).toBe(cause);
  });

  it.each([
    [new UnauthorizedError(), 401, "UNAUTHORIZED", "Unauthorized"],
    [new NotFoundError(), 404, "NOT_FOUND", "Resource not found"],
  ])("%s should use its defaults", (error, statusCode, code, message) => {
    expect(error.statusCode).toBe(statusCode);
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  });
});

// ─────────────────────────────────────────────────────────────
// errorHandler middleware
// ─────────────────────────────────────────────────────────────

function createApp(error: Error, exposeStack = false) {
  const app = express();
  app.get("/boom", (_req: Request, _res: Response, next: NextFunction) => {
    next(error);
  });
  app.use(notFoundHandler);
  app.use(errorHandler({ exposeStack }));
  return app;
}

describe("errorHandler", () => {
  it("should render an operational error with its status and code", async () => {
    const response = await request(createApp(new NotFoundError("No subject with index number: X1"))).get(
      "/boom",
    );

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: "No subject with index number: X1",
      code: "NOT_FOUND",
    });
  });

  it("should include validation details", async () => {
    const app = createApp(
      new ValidationError("Validation failed", [{ field: "category", message: "category is required" }]),
    );

    const response = await request(app).get("/boom");

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([{ field: "category", message: "category is required" }]);
  });

  it("should hide the message of a store failure", async () => {
    const app = createApp(new TransientStoreError("Subject store insert failed", new Error("password=x")));

    const response = await request(app).get("/boom");

    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      success: false,
      error: "Internal server error",
      code: "STORE_UNAVAILABLE",
    });
  });

  it("should answer unknown errors with 500", async () => {
    const response = await request(createApp(new Error("kaboom"))).get("/boom");

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      success: false,
      error: "Internal server error",
      code: "INTERNAL_ERROR",
    });
  });

  it("should include the stack only when asked to", async () => {
    const withStack = await request(createApp(new Error("kaboom"), true)).get("/boom");
    const withoutStack = await request(createApp(new Error("kaboom"))).get("/boom");

    expect(typeof withStack.body.stack).toBe("string");
    expect(withoutStack.body.stack).toBeUndefined();
  });
});

describe("request body failures", () => {
  function createJsonApp() {
    const app = express();
    app.use(express.json({ limit: "1kb" }));
    app.post("/echo", (req: Request, res: Response) => {
      res.json({ success: true, data: req.body });
    });
    app.use(errorHandler());
    return app;
  }

  it("should answer truncated JSON with a validation error", async () => {
    const response = await request(createJsonApp())
      .post("/echo")
      .set("Content-Type", "application/json")
      .send('{"indexKey": "AS001",');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      error: "Malformed JSON request body",
      code: "VALIDATION_ERROR",
    });
  });

  it("should keep the 413 of an oversized body", async () => {
    const response = await request(createJsonApp())
      .post("/echo")
      .send({ displayName: "x".repeat(2048) });

    expect(response.status).toBe(413);
    expect(response.body).toEqual({
      success: false,
      error: "request entity too large",
      code: "PAYLOAD_TOO_LARGE",
    });
  });

  it("should leave other errors alone", () => {
    const serverSide = Object.assign(new Error("stream failure"), { type: "stream.not.readable", status: 500 });

    expect(fromBodyParserError(new Error("kaboom"))).toBeNull();
    expect(fromBodyParserError(serverSide)).toBeNull();
  });

  it("should fall back to BAD_REQUEST for unnamed 4xx body errors", () => {
    const error = fromBodyParserError(
      Object.assign(new Error("request aborted"), { type: "request.aborted", status: 400 }),
    );

    expect(error?.statusCode).toBe(400);
    expect(error?.code).toBe("BAD_REQUEST");
    expect(error?.message).toBe("request aborted");
  });
});

describe("notFoundHandler", () => {
  it("should report the unknown route", async () => {
    const response = await request(createApp(new Error("unused"))).post("/nowhere");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: "Route POST /nowhere not found",
      code: "ROUTE_NOT_FOUND",
    });
  });
});
