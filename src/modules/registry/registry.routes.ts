/**
 * Registry Routes
 * API endpoints for registration, profile updates, scanning and listing
 */

import { type NextFunction, type Request, type RequestHandler, type Response, Router } from "express";
import { noRateLimit } from "@/middleware/rate-limit";
import { validateRequest } from "@/middleware/validate";
import {
  indexKeyParam,
  listSubjectsQuery,
  registerSubjectBody,
  scanBody,
  updateSubjectBody,
} from "./registry.schema";
import type { Registry } from "./registry.service";

export interface RegistryRouterDependencies {
  registry: Registry;
  authenticate: RequestHandler;
  registerRateLimit?: RequestHandler;
}

export function createRegistryRouter(deps: RegistryRouterDependencies): Router {
  const { registry, authenticate } = deps;
  const router = Router();

  // ─────────────────────────────────────────────────────────────
  // POST /api/subjects/register - Register a subject (public)
  // ─────────────────────────────────────────────────────────────
  router.post(
    "/register",
    deps.registerRateLimit ?? noRateLimit,
    validateRequest({ body: registerSubjectBody }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const subject = await registry.register(req.body);

        res.status(201).json({
          success: true,
          message: `Registration successful! An invitation email with your QR code is on its way to ${subject.contactAddress}`,
          data: subject,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  // ─────────────────────────────────────────────────────────────
  // PUT /api/subjects/update/:indexKey - Update a subject's profile
  // ─────────────────────────────────────────────────────────────
  router.put(
    "/update/:indexKey",
    authenticate,
    validateRequest({ params: indexKeyParam, body: updateSubjectBody }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const subject = await registry.updateProfile(req.params.indexKey, req.body);

        res.json({
          success: true,
          data: subject,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  // ─────────────────────────────────────────────────────────────
  // POST /api/subjects/scan - Record attendance from a QR scan
  // ─────────────────────────────────────────────────────────────
  router.post(
    "/scan",
    authenticate,
    validateRequest({ body: scanBody }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { subject, alreadyAttended } = await registry.scan(req.body.indexKey);

        res.json({
          success: true,
          message: alreadyAttended
            ? `Hello again, ${subject.displayName}! You've already checked in.`
            : `Welcome, ${subject.displayName}! Your attendance has been recorded.`,
          data: {
            subjectName: subject.displayName,
            alreadyAttended,
          },
        });
      } catch (error) {
        next(error);
      }
    },
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/subjects/list - List subjects, newest first (admin)
  // ─────────────────────────────────────────────────────────────
  router.get(
    "/list",
    authenticate,
    validateRequest({ query: listSubjectsQuery }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        // Parsed again here: req.query is a getter and keeps the raw strings
        const result = await registry.listAll(listSubjectsQuery.parse(req.query));

        res.json({
          success: true,
          ...result,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  // ─────────────────────────────────────────────────────────────
  // GET /api/subjects/stats - Registration and attendance counts
  // ─────────────────────────────────────────────────────────────
  router.get("/stats", authenticate, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await registry.stats();

      res.json({
        success: true,
        data: stats,
      });
    } catch (error) {
      next(error);
    }
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/subjects/by-index/:indexKey - Get a subject
  // ─────────────────────────────────────────────────────────────
  router.get(
    "/by-index/:indexKey",
    authenticate,
    validateRequest({ params: indexKeyParam }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const subject = await registry.lookup(req.params.indexKey);

        res.json({
          success: true,
          data: subject,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
