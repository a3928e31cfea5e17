/**
 * Auth Routes
 * Admin login and token verification
 */

import { type NextFunction, type Request, type RequestHandler, type Response, Router } from "express";
import { noRateLimit } from "@/middleware/rate-limit";
import { validateRequest } from "@/middleware/validate";
import { loginBody } from "./auth.schema";
import type { AuthService } from "./auth.service";

export interface AuthRouterDependencies {
  auth: AuthService;
  authenticate: RequestHandler;
  loginRateLimit?: RequestHandler;
}

export function createAuthRouter(deps: AuthRouterDependencies): Router {
  const { auth, authenticate } = deps;
  const router = Router();

  // POST /api/auth/login
  router.post(
    "/login",
    deps.loginRateLimit ?? noRateLimit,
    validateRequest({ body: loginBody }),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const token = auth.login(req.body.password);

        res.json({
          success: true,
          data: token,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  // POST /api/auth/verify
  router.post("/verify", authenticate, (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: { valid: true, message: "Token is valid" },
    });
  });

  return router;
}
