import type { NextFunction, Request, RequestHandler, Response } from "express";
import { createLogger } from "@/lib/logger";

const logger = createLogger("rate-limit");

// =============================================================================
// Fixed-window rate limiter backed by Valkey hashes
// =============================================================================

// Key pattern: ratelimit:{prefix}:{windowId}
// Field: clientId -> count

/**
 * The subset of the Valkey client the limiter needs
 */
export interface RateLimitClient {
  hincrby(key: string, field: string, increment: number): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
}

export interface RateLimitOptions {
  client: RateLimitClient;
  windowMs: number;
  maxRequests: number;
  message?: string;
  prefix?: string;
}

/**
 * Get the current time window ID (for bucket-based rate limiting)
 */
function getWindowId(windowMs: number): number {
  return Math.floor(Date.now() / windowMs);
}

// req.ip honours the app's "trust proxy" hop count; X-Forwarded-For is never read directly
function getClientId(req: Request): string {
  return `ip:${req.ip ?? "unknown"}`;
}

/**
 * Increment rate limit counter; the hash expires shortly after its window
 */
async function incrementRateLimit(
  client: RateLimitClient,
  key: string,
  clientId: string,
  windowSeconds: number,
): Promise<number> {
  const count = await client.hincrby(key, clientId, 1);

  if (count === 1) {
    await client.expire(key, windowSeconds + 10);
  }

  return count;
}

// Rate limiter middleware
export function rateLimit(options: RateLimitOptions): RequestHandler {
  const { client, windowMs, maxRequests } = options;
  const message = options.message ?? "Too many requests, please try again later";
  const prefix = options.prefix ?? "default";
  const windowSeconds = Math.ceil(windowMs / 1000);

  return async (req: Request, res: Response, next: NextFunction) => {
    const clientId = getClientId(req);
    const windowId = getWindowId(windowMs);
    const key = `ratelimit:${prefix}:${windowId}`;

    try {
      const count = await incrementRateLimit(client, key, clientId, windowSeconds);

      // End of current window
      const resetTime = (windowId + 1) * windowMs;

      res.set({
        "X-RateLimit-Limit": maxRequests.toString(),
        "X-RateLimit-Remaining": Math.max(0, maxRequests - count).toString(),
        "X-RateLimit-Reset": Math.ceil(resetTime / 1000).toString(),
      });

      if (count > maxRequests) {
        const retryAfter = Math.ceil((resetTime - Date.now()) / 1000);
        res.status(429).json({
          success: false,
          error: message,
          code: "RATE_LIMIT_EXCEEDED",
          retryAfter: Math.max(1, retryAfter),
        });
        return;
      }

      next();
    } catch (err) {
      // If Valkey fails, log and allow request (fail open)
      logger.error({ err, clientId }, "Rate limit check failed, allowing request");
      next();
    }
  };
}

// Stricter limit for the admin login
export function authRateLimit(client: RateLimitClient): RequestHandler {
  return rateLimit({
    client,
    windowMs: 15 * 60 * 1000, // 15 minutes
    maxRequests: 10,
    message: "Too many login attempts, please try again later",
    prefix: "auth",
  });
}

export const noRateLimit: RequestHandler = (_req, _res, next) => next();
