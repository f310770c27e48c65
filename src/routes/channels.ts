/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * channels.ts: Channel listing and refresh routes for TwitchTuner.
 */
import type { Express, Request, Response } from "express";
import type { AppContext } from "../context.js";
import type { ChannelRecord } from "../types/index.js";
import { buildChannelMap } from "../hdhr/channelMap.js";

/* The channels endpoint exposes the current channel snapshot with guide numbers, so integrations can see what the lineup is built from. GET /update forces a
 * refresh from Twitch instead of waiting for the next interval.
 */

/**
 * Response entry for a single channel in the GET /channels response.
 */
export interface ChannelEntry {

  artworkUrl: string;
  category: string;
  id: string;
  live: boolean;
  name: string;
  number: number;
  recordingEnabled: boolean;
  startedAt: string | null;
  thumbnailUrl: string;
  title: string;
}

/**
 * Converts channels to their API form.
 * @param channels - Channels in subscription order.
 * @returns Entries in guide number order.
 */
export function describeChannels(channels: readonly ChannelRecord[]): ChannelEntry[] {

  return buildChannelMap(channels).map(({ channel, number }) => ({

    artworkUrl: channel.artworkUrl,
    category: channel.category,
    id: channel.id,
    live: channel.live,
    name: channel.displayName,
    number,
    recordingEnabled: channel.recordingEnabled,
    startedAt: channel.startedAt ? channel.startedAt.toISOString() : null,
    thumbnailUrl: channel.thumbnailUrl,
    title: channel.title
  }));
}

/**
 * Creates the channel listing and refresh endpoints.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupChannelsEndpoint(app: Express, ctx: AppContext): void {

  app.get("/channels", (_req: Request, res: Response): void => {

    const snapshot = ctx.store.getSnapshot();
    const channels = describeChannels(snapshot.channels);

    res.json({

      channels,
      count: channels.length,
      takenAt: snapshot.takenAt.toISOString()
    });
  });

  // GET /update - Refresh now. Answers once the refresh has finished so a following lineup or guide request sees the result.
  app.get("/update", async (_req: Request, res: Response): Promise<void> => {

    const snapshot = await ctx.refresher.refresh();

    if(!snapshot) {

      res.status(502).type("text/plain").send("Update failed: " + (ctx.refresher.lastRefresh.error ?? "unknown error"));

      return;
    }

    res.type("text/plain").send("Updated");
  });
}
