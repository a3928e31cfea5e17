import request from "supertest";
import { describe, expect, it } from "vitest";
import { TEST_ADMIN_PASSWORD } from "@/test/fixtures";
import { createTestApp } from "@/test/helpers";

describe("auth routes", () => {
  describe("POST /api/auth/login", () => {
    it("should return an access token for the admin password", async () => {
      const { app } = createTestApp();

      const response = await request(app)
        .post("/api/auth/login")
        .send({ password: TEST_ADMIN_PASSWORD });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data).toMatchObject({ tokenType: "Bearer", expiresIn: 28800 });
      expect(typeof response.body.data.accessToken).toBe("string");
    });

    it("should reject a wrong password", async () => {
      const { app } = createTestApp();

      const response = await request(app).post("/api/auth/login").send({ password: "wrong" });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        success: false,
        error: "Invalid password",
        code: "UNAUTHORIZED",
      });
    });

    it("should require a password", async () => {
      const { app } = createTestApp();

      const response = await request(app).post("/api/auth/login").send({ password: "" });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual([{ field: "password", message: "Password is required" }]);
    });

    it("should limit login attempts", async () => {
      const { app } = createTestApp();

      for (let i = 0; i < 10; i++) {
        await request(app).post("/api/auth/login").send({ password: "wrong" });
      }
      const response = await request(app)
        .post("/api/auth/login")
        .send({ password: TEST_ADMIN_PASSWORD });

      expect(response.status).toBe(429);
    });

    it("should keep limiting when every attempt forges a new X-Forwarded-For", async () => {
      const { app } = createTestApp();

      for (let i = 0; i < 10; i++) {
        await request(app)
          .post("/api/auth/login")
          .set("X-Forwarded-For", `198.51.100.${i}`)
          .send({ password: "wrong" });
      }
      const response = await request(app)
        .post("/api/auth/login")
        .set("X-Forwarded-For", "198.51.100.200")
        .send({ password: TEST_ADMIN_PASSWORD });

      expect(response.status).toBe(429);
    });
  });

  describe("POST /api/auth/verify", () => {
    it("should confirm a valid token", async () => {
      const { app, adminToken } = createTestApp();

      const response = await request(app)
        .post("/api/auth/verify")
        .set("Authorization", `Bearer ${adminToken}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: { valid: true, message: "Token is valid" },
      });
    });

    it("should reject a missing token", async () => {
      const { app } = createTestApp();

      const response = await request(app).post("/api/auth/verify");

      expect(response.status).toBe(401);
    });
  });
});
