/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * mpegts.ts: MPEG-TS streaming routes for TwitchTuner.
 */
import type { Express, Request, Response } from "express";
import { LOG, runWithStreamContext } from "../utils/index.js";
import type { AppContext } from "../context.js";
import type { ChannelRecord } from "../types/index.js";
import type { StreamClient } from "../streaming/mpegts.js";
import { getChannelByNumber } from "../hdhr/channelMap.js";
import { selectExtractionMode } from "../streaming/extractors.js";

/* This module registers the HTTP routes for MPEG-TS streaming:
 *
 * - GET /stream/:channel - Returns a continuous MPEG-TS byte stream for a channel
 * - GET /auto/v:number - The same stream, addressed by guide number the way HDHomeRun devices accept it
 *
 * /stream/:channel is what the lineup, the playlist, and HDHomeRun-compatible clients such as Plex tune to. The route checks the channel against the snapshot, ties the
 * session's abort signal to the response closing, registers the session, and hands the rest to the live stream service.
 */

/**
 * The parts of an Express request the stream routes read.
 */
export interface StreamRequest {

  readonly ip?: string;
  readonly params: Readonly<Record<string, string>>;
}

/**
 * The parts of an Express response the stream routes use. An Express Response satisfies it.
 */
export interface StreamResponse {

  readonly headersSent: boolean;
  readonly writableEnded: boolean;
  destroy(): unknown;
  end(): unknown;
  flushHeaders(): void;
  on(event: "close", listener: () => void): unknown;
  setHeader(name: string, value: string): unknown;
  status(code: number): { json(body: unknown): unknown; type(type: string): { send(body: string): unknown } };
  write(chunk: Buffer, callback: (error?: Error | null) => void): boolean;
}

/**
 * Adapts a response to the StreamClient interface used by the live stream service.
 * @param res - The response.
 * @returns The stream client.
 */
export function createResponseClient(res: StreamResponse): StreamClient {

  return {

    commitHeaders: (): void => {

      res.setHeader("Cache-Control", "no-cache");
      res.setHeader("Connection", "close");
      res.setHeader("Content-Type", "video/mp2t");
      res.setHeader("transferMode.dlna.org", "Streaming");
      res.flushHeaders();
    },

    end: (): void => {

      if(!res.writableEnded) {

        res.end();
      }
    },

    fail: (status: number, message: string): void => {

      if(res.headersSent) {

        if(!res.writableEnded) {

          res.end();
        }

        return;
      }

      res.status(status).type("text/plain").send(message);
    },

    get headersSent(): boolean {

      return res.headersSent;
    },

    // The callback fires once the chunk has been flushed to the socket, which is where back-pressure from a slow client is felt.
    write: async (chunk: Buffer): Promise<void> => new Promise<void>((resolve, reject) => {

      res.write(chunk, (error?: Error | null): void => {

        if(error) {

          reject(error);

          return;
        }

        resolve();
      });
    })
  };
}

/**
 * Handles one viewer request.
 * @param ctx - Application services.
 * @param channel - The channel to serve.
 * @param req - The Express request.
 * @param res - The Express response.
 */
async function handleStreamRequest(ctx: AppContext, channel: ChannelRecord, req: StreamRequest, res: StreamResponse): Promise<void> {

  const controller = new AbortController();
  const session = ctx.registry.register({

    channelId: channel.id,
    clientAddress: req.ip ?? null,
    mode: selectExtractionMode(ctx.config.streaming),
    terminate: (reason: string): void => {

      LOG.info("Ending the %s session for %s: %s.", channel.id, req.ip ?? "unknown client", reason);
      controller.abort();

      // A terminated session will not write again, so close the connection rather than leave the client waiting.
      res.destroy();
    }
  });

  res.on("close", () => {

    controller.abort();
  });

  const serving = runWithStreamContext({ channelId: channel.id, streamId: session.streamIdStr }, async () => ctx.liveService.serve(channel.id,
    createResponseClient(res), controller.signal, (total) => {

      session.bytesSent = total;
    }));

  ctx.registry.track(session.id, serving);

  try {

    await serving;
  } finally {

    ctx.registry.unregister(session.id);

    if(!res.writableEnded) {

      res.destroy();
    }
  }
}

/**
 * GET /stream/:channel. Resolves once the session has ended, or at once when the channel is unknown.
 * @param ctx - Application services.
 * @param req - The request.
 * @param res - The response.
 */
export async function streamChannel(ctx: AppContext, req: StreamRequest, res: StreamResponse): Promise<void> {

  const channelId = req.params.channel.toLowerCase();
  const channel = ctx.store.getChannel(channelId);

  if(!channel) {

    res.status(404).json({ error: "Channel " + channelId + " is not in the lineup." });

    return;
  }

  await handleStreamRequest(ctx, channel, req, res);
}

/**
 * GET /auto/v:number. Resolves once the session has ended, or at once when no channel has the number.
 * @param ctx - Application services.
 * @param req - The request.
 * @param res - The response.
 */
export async function streamGuideNumber(ctx: AppContext, req: StreamRequest, res: StreamResponse): Promise<void> {

  const number = req.params.number;
  const channel = getChannelByNumber(ctx.store.getChannels(), Number(number));

  if(!channel) {

    res.status(404).json({ error: "No channel has guide number " + number + "." });

    return;
  }

  await handleStreamRequest(ctx, channel, req, res);
}

/**
 * Sets up MPEG-TS streaming routes on the Express application.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupMpegTsRoutes(app: Express, ctx: AppContext): void {

  app.get("/stream/:channel", (req: Request, res: Response): void => {

    void streamChannel(ctx, req, res);
  });

  app.get("/auto/v:number", (req: Request, res: Response): void => {

    void streamGuideNumber(ctx, req, res);
  });
}
