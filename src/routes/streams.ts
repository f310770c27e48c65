/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * streams.ts: Viewer session management routes for TwitchTuner.
 */
import type { Express, Request, Response } from "express";
import type { AppContext } from "../context.js";
import type { ExtractionMode } from "../types/index.js";
import type { ViewerSession } from "../streaming/registry.js";

/* The streams endpoint provides visibility into active viewer sessions and allows operators to end one via the API. Ending a session aborts it the same way a client
 * disconnect does, so the pipeline is torn down by the session itself.
 */

/**
 * A viewer session as reported by GET /streams.
 */
export interface StreamListEntry {

  bytesSent: number;
  channel: string;
  clientAddress: string | null;

  // Seconds since the session started.
  duration: number;

  id: number;
  mode: ExtractionMode;
  startTime: string;
}

/**
 * Converts sessions to their API form.
 * @param sessions - Active sessions.
 * @param now - Current time in milliseconds.
 * @returns The list entries.
 */
export function describeSessions(sessions: readonly ViewerSession[], now: number): StreamListEntry[] {

  return sessions.map((session) => ({

    bytesSent: session.bytesSent,
    channel: session.channelId,
    clientAddress: session.clientAddress,
    duration: Math.round((now - session.startTime.getTime()) / 1000),
    id: session.id,
    mode: session.mode,
    startTime: session.startTime.toISOString()
  }));
}

/**
 * Creates endpoints to list viewer sessions and end one.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupStreamsEndpoint(app: Express, ctx: AppContext): void {

  app.get("/streams", (_req: Request, res: Response): void => {

    res.json({

      count: ctx.registry.count,
      limit: ctx.config.hdhr.tunerCount,
      streams: describeSessions(ctx.registry.getAll(), Date.now())
    });
  });

  app.delete("/streams/:id", (req: Request, res: Response): void => {

    const sessionId = Number(req.params.id);

    if(!Number.isInteger(sessionId)) {

      res.status(400).json({ error: "Invalid stream ID." });

      return;
    }

    const session = ctx.registry.get(sessionId);

    if(!session) {

      res.status(404).json({ error: "Stream not found." });

      return;
    }

    session.terminate("API request");

    res.json({ message: "Stream terminated.", streamId: sessionId });
  });
}
