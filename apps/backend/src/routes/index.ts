import type { Express, NextFunction, Request, Response } from "express";
import createDebug from "debug";
import type { AppContext } from "./helpers.js";
import { registerJobRoutes } from "./jobs.js";

export type { AppContext };

const debug = createDebug("cadence:api");

export function registerRoutes(app: Express, ctx: AppContext): void {
  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });
  registerJobRoutes(app, ctx);
}

/** Last middleware: anything a route did not answer itself becomes a 500. */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  debug("%s %s failed: %o", req.method, req.path, err);
  const message = err instanceof Error ? err.message : "Internal server error";
  res.status(500).json({ success: false, message });
}
