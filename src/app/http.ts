/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";

import { registerSmsRoutes } from "../routes/sms";
import { registerStatsRoutes } from "../routes/stats";

export function createApp(ctx: AppContext): Express {
  const app = express();
  const { logger } = ctx;

  // Behind a reverse proxy; req.protocol must reflect the public scheme for signature checks.
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  // Twilio posts application/x-www-form-urlencoded
  app.use(express.urlencoded({ extended: false, limit: "1mb" }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  registerSmsRoutes(app, ctx);
  registerStatsRoutes(app, ctx);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err, path: req.path }, "http.unhandled_error");
    res.status(500).json({ ok: false, error: "INTERNAL_ERROR" });
  });

  return app;
}
