/**
 * Auth Service
 * Single-secret admin login backed by signed JWTs
 */

import { createHash, timingSafeEqual } from "node:crypto";
import jwt, { type JwtPayload } from "jsonwebtoken";
import { authLogger } from "@/lib/logger";
import { UnauthorizedError } from "@/middleware/error-handler";

export interface AuthOptions {
  adminPassword: string;
  jwtSecret: string;
  // Token lifetime in seconds
  expiresIn: number;
}

export interface AdminClaims {
  sub: "admin";
  role: "admin";
}

export interface AccessToken {
  accessToken: string;
  tokenType: "Bearer";
  expiresIn: number;
}

// Hash both sides first so timingSafeEqual always compares equal lengths
function passwordMatches(candidate: string, expected: string): boolean {
  const a = createHash("sha256").update(candidate).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

export function createAuthService(options: AuthOptions) {
  return {
    /**
     * Exchange the admin password for an access token
     */
    login(password: string): AccessToken {
      if (!passwordMatches(password, options.adminPassword)) {
        authLogger.warn("Rejected admin login");
        throw new UnauthorizedError("Invalid password");
      }

      const claims: AdminClaims = { sub: "admin", role: "admin" };
      const accessToken = jwt.sign(claims, options.jwtSecret, { expiresIn: options.expiresIn });

      authLogger.info("Admin logged in");
      return { accessToken, tokenType: "Bearer", expiresIn: options.expiresIn };
    },

    /**
     * Verify an access token and return its claims
     */
    verify(token: string): AdminClaims {
      let payload: string | JwtPayload;
      try {
        payload = jwt.verify(token, options.jwtSecret);
      } catch (error) {
        if (error instanceof jwt.TokenExpiredError) {
          throw new UnauthorizedError("Token expired");
        }
        throw new UnauthorizedError("Invalid or expired token");
      }

      if (typeof payload === "string" || payload.sub !== "admin" || payload.role !== "admin") {
        throw new UnauthorizedError("Invalid or expired token");
      }

      return { sub: "admin", role: "admin" };
    },
  };
}

export type AuthService = ReturnType<typeof createAuthService>;
