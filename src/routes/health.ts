/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for TwitchTuner.
 */
import type { Express, Request, Response } from "express";
import type { AppContext } from "../context.js";
import type { HealthStatus } from "../types/index.js";
import { getPackageVersion, isExecutableAvailable } from "../utils/index.js";

/* The health endpoint reports the application status for monitoring and alerting systems: whether the extractor is installed, how the last channel refresh went,
 * memory usage, and viewer, recording, and channel counts. The service is "degraded" when it cannot stream (no extractor) or cannot see channel status (the last
 * refresh failed). Degraded still answers 200, because the tuner documents and any cached state keep working.
 */

/**
 * Builds the health report.
 * @param ctx - Application services.
 * @param extractorAvailable - Whether the extractor executable responded to a version probe.
 * @returns The health report.
 */
export function buildHealthStatus(ctx: AppContext, extractorAvailable: boolean): HealthStatus {

  const memoryUsage = process.memoryUsage();
  const lastRefresh = ctx.refresher.lastRefresh;
  const problems: string[] = [];

  if(!extractorAvailable) {

    problems.push("The extractor " + ctx.config.streaming.extractor + " is not available.");
  }

  if(lastRefresh.error) {

    problems.push("The last channel refresh failed: " + lastRefresh.error);
  }

  const health: HealthStatus = {

    channels: {

      live: ctx.store.liveCount,
      total: ctx.store.getChannels().length
    },
    extractorAvailable,
    lastRefresh: {

      error: lastRefresh.error,
      time: lastRefresh.time ? lastRefresh.time.toISOString() : null
    },
    memory: {

      heapTotal: memoryUsage.heapTotal,
      heapUsed: memoryUsage.heapUsed,
      rss: memoryUsage.rss
    },
    recordings: {

      active: ctx.supervisor?.activeCount ?? 0,
      enabled: ctx.supervisor !== null
    },
    status: (problems.length > 0) ? "degraded" : "healthy",
    streams: {

      active: ctx.registry.count,
      limit: ctx.config.hdhr.tunerCount
    },
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    version: getPackageVersion()
  };

  if(problems.length > 0) {

    health.message = problems.join(" ");
  }

  return health;
}

/**
 * Creates a health check endpoint for monitoring application status with detailed metrics.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupHealthEndpoint(app: Express, ctx: AppContext): void {

  app.get("/health", async (_req: Request, res: Response): Promise<void> => {

    res.json(buildHealthStatus(ctx, await isExecutableAvailable(ctx.config.streaming.extractor)));
  });
}
