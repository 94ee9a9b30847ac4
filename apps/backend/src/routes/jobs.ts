import type { Express, Request, Response } from "express";
import { z } from "zod";
import { MAX_INTERVAL_MINUTES, StoreUnavailableError } from "../errors.js";
import { MESSAGES } from "../scheduler/reconciler.js";
import type { CommandResult } from "../types.js";
import type { AppContext } from "./helpers.js";
import { getParam, httpStatusFor } from "./helpers.js";

const timeIntervalQuery = z
  .string()
  .trim()
  .regex(/^-?\d+$/)
  .transform(Number)
  .pipe(z.number().int().positive().max(MAX_INTERVAL_MINUTES));

function sendResult(res: Response, result: CommandResult): void {
  res.status(httpStatusFor(result.status)).json(result);
}

export function registerJobRoutes(app: Express, ctx: AppContext): void {
  const { reconciler } = ctx;

  app.get("/api/jobs", async (_req: Request, res: Response): Promise<void> => {
    try {
      const jobs = await reconciler.listJobs();
      res.json({ success: true, message: "Jobs successfully retrieved.", jobs });
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      res.status(503).json({ success: false, message: err.message, jobs: [] });
    }
  });

  app.get("/api/jobs/:id", async (req: Request, res: Response): Promise<void> => {
    const job = await reconciler.getJob(getParam(req, "id"));
    if (!job) {
      res.status(404).json({ success: false, message: MESSAGES.notFound });
      return;
    }
    res.json({ success: true, job });
  });

  app.post("/api/jobs/:id/start", async (req: Request, res: Response) => {
    sendResult(res, await reconciler.startJob(getParam(req, "id")));
  });

  app.post("/api/jobs/:id/pause", async (req: Request, res: Response) => {
    sendResult(res, await reconciler.pauseJob(getParam(req, "id")));
  });

  app.put("/api/jobs/:id", async (req: Request, res: Response): Promise<void> => {
    const parsed = timeIntervalQuery.safeParse(req.query.time_interval);
    if (!parsed.success) {
      sendResult(res, {
        success: false,
        status: "invalid_interval",
        message: MESSAGES.invalidInterval,
      });
      return;
    }
    sendResult(res, await reconciler.updateInterval(getParam(req, "id"), parsed.data));
  });

  app.delete("/api/jobs/:id", async (req: Request, res: Response) => {
    sendResult(res, await reconciler.deleteJob(getParam(req, "id")));
  });
}
