import type { NextFunction, Request, RequestHandler, Response } from "express";
import { UnauthorizedError } from "@/middleware/error-handler";
import type { AdminClaims, AuthService } from "./auth.service";

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      admin?: AdminClaims;
    }
  }
}

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const [scheme, token] = header.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !token) return null;

  return token;
}

// Authenticate request using the admin bearer token
export function createAuthenticate(auth: AuthService): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);

    if (!token) {
      next(new UnauthorizedError("Authentication required"));
      return;
    }

    try {
      req.admin = auth.verify(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}
