/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * recordings.ts: Recording status route for TwitchTuner.
 */
import type { Express, Request, Response } from "express";
import type { AppContext } from "../context.js";
import { formatError } from "../utils/index.js";

/**
 * Creates an endpoint that lists the recording supervisor's jobs. POST /recordings/reconcile runs a reconciliation pass immediately instead of waiting for the next
 * snapshot or the fallback interval.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupRecordingsEndpoint(app: Express, ctx: AppContext): void {

  app.get("/recordings", (_req: Request, res: Response): void => {

    const jobs = ctx.supervisor?.getJobs() ?? [];

    res.json({

      count: jobs.length,
      enabled: ctx.supervisor !== null,
      recordings: jobs.map((job) => ({ ...job, startedAt: job.startedAt.toISOString() }))
    });
  });

  app.post("/recordings/reconcile", async (_req: Request, res: Response): Promise<void> => {

    if(!ctx.supervisor) {

      res.status(409).json({ error: "Recording is disabled." });

      return;
    }

    try {

      await ctx.supervisor.reconcile();
    } catch(error) {

      res.status(500).json({ error: formatError(error) });

      return;
    }

    res.json({ count: ctx.supervisor.activeCount });
  });
}
